/**
 * Row <-> domain translation. The only place that knows both shapes.
 */

import { z } from 'zod';
import type {
  CustomerRow,
  InsertCustomerRow,
  InsertLoanInstallmentRow,
  InsertLoanRow,
  InsertPaymentReceiptRow,
  LoanInstallmentRow,
  LoanRow,
  PaymentReceiptRow
} from '../../shared/schema';
import type { Currency } from '../../shared/lending-types';
import { InvariantViolationError } from '../domain/errors';
import { Money } from '../domain/money';
import { isAllowedInstallmentCount } from '../domain/schedule';
import type { Customer, InstallmentSettlement, Loan, LoanInstallment, PaymentResult } from '../domain/types';
import type { PaymentReceipt } from '../repositories/types';

const currencySchema = z.enum(['USD', 'EUR', 'GBP', 'AED']);

function toCurrency(value: string): Currency {
  const parsed = currencySchema.safeParse(value);
  if (!parsed.success) {
    throw new InvariantViolationError(`Unknown currency in storage: ${value}`);
  }
  return parsed.data;
}

export function rowToCustomer(row: CustomerRow): Customer {
  const currency = toCurrency(row.currency);
  return {
    id: row.id,
    name: row.name,
    creditLimit: Money.fromMinor(row.creditLimitMinor, currency, row.scale),
    usedCreditLimit: Money.fromMinor(row.usedCreditMinor, currency, row.scale),
    version: row.version
  };
}

export function customerToRow(customer: Customer): InsertCustomerRow {
  return {
    id: customer.id,
    name: customer.name,
    currency: customer.creditLimit.currency,
    scale: customer.creditLimit.scale,
    creditLimitMinor: customer.creditLimit.minor,
    usedCreditMinor: customer.usedCreditLimit.minor,
    version: customer.version
  };
}

export function rowToInstallment(row: LoanInstallmentRow, unit: Money): LoanInstallment {
  return {
    id: row.id,
    loanId: row.loanId,
    sequence: row.sequence,
    amount: unit.withMinor(row.amountMinor),
    paidAmount: unit.withMinor(row.paidAmountMinor),
    dueDate: row.dueDate,
    paymentDate: row.paymentDate,
    status: row.status
  };
}

export function installmentToRow(installment: LoanInstallment): InsertLoanInstallmentRow {
  return {
    id: installment.id,
    loanId: installment.loanId,
    sequence: installment.sequence,
    amountMinor: installment.amount.minor,
    paidAmountMinor: installment.paidAmount.minor,
    dueDate: installment.dueDate,
    paymentDate: installment.paymentDate,
    status: installment.status
  };
}

export function rowToLoan(row: LoanRow, installmentRows: readonly LoanInstallmentRow[]): Loan {
  const count = row.installmentCount;
  if (!isAllowedInstallmentCount(count)) {
    throw new InvariantViolationError(`Loan ${row.id} stored with ${count} installments`);
  }
  const principal = Money.fromMinor(row.principalMinor, toCurrency(row.currency), row.scale);
  const installments = installmentRows
    .map(r => rowToInstallment(r, principal))
    .sort((a, b) => a.sequence - b.sequence);

  return {
    id: row.id,
    customerId: row.customerId,
    principal,
    interestRate: row.interestRate,
    installmentCount: count,
    createDate: row.createDate,
    status: row.status,
    reservedCredit: principal.withMinor(row.reservedCreditMinor),
    installments,
    cancellationReason: row.cancellationReason,
    version: row.version
  };
}

export function loanToRow(loan: Loan): InsertLoanRow {
  return {
    id: loan.id,
    customerId: loan.customerId,
    currency: loan.principal.currency,
    scale: loan.principal.scale,
    principalMinor: loan.principal.minor,
    interestRate: loan.interestRate,
    installmentCount: loan.installmentCount,
    createDate: loan.createDate,
    status: loan.status,
    reservedCreditMinor: loan.reservedCredit.minor,
    cancellationReason: loan.cancellationReason,
    version: loan.version
  };
}

// Payment results are stored as JSON; bigint does not survive JSON.stringify
const storedSettlementSchema = z.object({
  installmentId: z.string(),
  sequence: z.number().int(),
  dueDate: z.string(),
  scheduledMinor: z.string(),
  discountMinor: z.string(),
  penaltyMinor: z.string(),
  amountPaidMinor: z.string()
});

const storedResultSchema = z.object({
  loanId: z.string(),
  paymentDate: z.string(),
  installmentsPaid: z.number().int(),
  totalAppliedMinor: z.string(),
  remainingMinor: z.string(),
  isLoanFullyPaid: z.boolean(),
  creditToReleaseMinor: z.string(),
  settlements: z.array(storedSettlementSchema)
});

export type StoredPaymentResult = z.infer<typeof storedResultSchema>;

export function serializePaymentResult(result: PaymentResult): StoredPaymentResult {
  return {
    loanId: result.loanId,
    paymentDate: result.paymentDate,
    installmentsPaid: result.installmentsPaid,
    totalAppliedMinor: result.totalAmountApplied.minor.toString(),
    remainingMinor: result.remainingUnappliedAmount.minor.toString(),
    isLoanFullyPaid: result.isLoanFullyPaid,
    creditToReleaseMinor: result.creditToRelease.minor.toString(),
    settlements: result.settlements.map(s => ({
      installmentId: s.installmentId,
      sequence: s.sequence,
      dueDate: s.dueDate,
      scheduledMinor: s.scheduledAmount.minor.toString(),
      discountMinor: s.discount.minor.toString(),
      penaltyMinor: s.penalty.minor.toString(),
      amountPaidMinor: s.amountPaid.minor.toString()
    }))
  };
}

export function deserializePaymentResult(value: unknown, unit: Money): PaymentResult {
  const parsed = storedResultSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvariantViolationError('Stored payment result is malformed', {
      issues: parsed.error.issues.map(i => i.path.join('.'))
    });
  }
  const r = parsed.data;
  const m = (minor: string) => unit.withMinor(BigInt(minor));

  return {
    loanId: r.loanId,
    paymentDate: r.paymentDate,
    installmentsPaid: r.installmentsPaid,
    totalAmountApplied: m(r.totalAppliedMinor),
    remainingUnappliedAmount: m(r.remainingMinor),
    isLoanFullyPaid: r.isLoanFullyPaid,
    creditToRelease: m(r.creditToReleaseMinor),
    settlements: r.settlements.map((s): InstallmentSettlement => ({
      installmentId: s.installmentId,
      sequence: s.sequence,
      dueDate: s.dueDate,
      scheduledAmount: m(s.scheduledMinor),
      discount: m(s.discountMinor),
      penalty: m(s.penaltyMinor),
      amountPaid: m(s.amountPaidMinor)
    }))
  };
}

export function rowToReceipt(row: PaymentReceiptRow): PaymentReceipt {
  const amount = Money.fromMinor(row.amountMinor, toCurrency(row.currency), row.scale);
  return {
    idempotencyKey: row.idempotencyKey,
    loanId: row.loanId,
    amount,
    paymentDate: row.paymentDate,
    result: deserializePaymentResult(row.result, amount),
    recordedAt: row.recordedAt.toISOString()
  };
}

export function receiptToRow(receipt: PaymentReceipt): InsertPaymentReceiptRow {
  return {
    idempotencyKey: receipt.idempotencyKey,
    loanId: receipt.loanId,
    currency: receipt.amount.currency,
    scale: receipt.amount.scale,
    amountMinor: receipt.amount.minor,
    paymentDate: receipt.paymentDate,
    result: serializePaymentResult(receipt.result),
    recordedAt: new Date(receipt.recordedAt)
  };
}
