/**
 * Loan aggregate: owns the installment schedule and the loan status.
 * Installments are fixed at creation; afterwards they only move PENDING → PAID.
 */

import Decimal from 'decimal.js';
import { ulid } from 'ulid';
import type { IsoDate, RemainderPlacement, RoundingMode, UUID } from '../../shared/lending-types';
import { compareDates } from './dates';
import { InvariantViolationError, LoanHasPaymentsError, LoanNotActiveError, invariant } from './errors';
import type { Money } from './money';
import { generateSchedule, isAllowedInstallmentCount } from './schedule';
import type { Loan, LoanInstallment } from './types';

export interface CreateLoanInput {
  id?: UUID;
  customerId: UUID;
  principal: Money;
  interestRate: Decimal.Value;
  installmentCount: number;
  createDate: IsoDate;
  rounding?: RoundingMode;
  remainder?: RemainderPlacement;
  newId?: () => UUID;
}

export function createLoan(inp: CreateLoanInput): Loan {
  const newId = inp.newId ?? ulid;
  const id = inp.id ?? newId();
  const installments = generateSchedule({
    principal: inp.principal,
    interestRate: inp.interestRate,
    installmentCount: inp.installmentCount,
    originationDate: inp.createDate,
    rounding: inp.rounding,
    remainder: inp.remainder,
    loanId: id,
    newId
  });

  return {
    id,
    customerId: inp.customerId,
    principal: inp.principal,
    interestRate: new Decimal(inp.interestRate).toString(),
    installmentCount: checkedCount(installments),
    createDate: inp.createDate,
    status: 'active',
    reservedCredit: inp.principal,
    installments,
    cancellationReason: null,
    version: 0
  };
}

function checkedCount(installments: readonly LoanInstallment[]): Loan['installmentCount'] {
  const n = installments.length;
  if (isAllowedInstallmentCount(n)) return n;
  throw new InvariantViolationError(`Unexpected schedule length ${n}`);
}

export function isLoanPaid(loan: Pick<Loan, 'installments'>): boolean {
  return loan.installments.every(i => i.status === 'PAID');
}

/**
 * Unpaid installments, earliest due first (ties by sequence)
 */
export function unpaidInstallments(loan: Pick<Loan, 'installments'>): LoanInstallment[] {
  return loan.installments
    .filter(i => i.status === 'PENDING')
    .sort(byDueDateThenSequence);
}

export function byDueDateThenSequence(a: LoanInstallment, b: LoanInstallment): number {
  return compareDates(a.dueDate, b.dueDate) || a.sequence - b.sequence;
}

export function findInstallment(loan: Pick<Loan, 'installments'>, sequence: number): LoanInstallment | undefined {
  return loan.installments.find(i => i.sequence === sequence);
}

/**
 * Unpaid installments whose due date has passed, earliest first
 */
export function overdueInstallments(loan: Pick<Loan, 'installments'>, today: IsoDate): LoanInstallment[] {
  return unpaidInstallments(loan).filter(i => compareDates(i.dueDate, today) < 0);
}

export function outstandingAmount(loan: Loan): Money {
  return loan.installments
    .filter(i => i.status === 'PENDING')
    .reduce((sum, i) => sum.add(i.amount), loan.principal.withMinor(0n));
}

export function assertAcceptsPayments(loan: Loan): void {
  if (loan.status === 'cancelled') {
    throw new LoanNotActiveError(loan.id, loan.status);
  }
}

/**
 * PENDING → PAID. There is no way back.
 */
export function markInstallmentPaid(installment: LoanInstallment, amountPaid: Money, paymentDate: IsoDate): void {
  invariant(installment.status === 'PENDING', `Installment ${installment.sequence} is already paid`, {
    installmentId: installment.id
  });
  installment.status = 'PAID';
  installment.paidAmount = amountPaid;
  installment.paymentDate = paymentDate;
}

/**
 * Close the loan once every installment is paid. Returns the credit the
 * caller must release on the ledger (zero when the loan is still open).
 */
export function closeIfPaid(loan: Loan): Money {
  const zero = loan.reservedCredit.withMinor(0n);
  if (loan.status !== 'active' || !isLoanPaid(loan)) return zero;

  const released = loan.reservedCredit;
  loan.status = 'paid_off';
  loan.reservedCredit = zero;
  return released;
}

/**
 * Cancel a loan nobody has paid into yet. Returns the credit to release.
 */
export function cancelLoan(loan: Loan, reason: string): Money {
  if (loan.status !== 'active') {
    throw new LoanNotActiveError(loan.id, loan.status);
  }
  const paidCount = loan.installments.filter(i => i.status === 'PAID').length;
  if (paidCount > 0) {
    throw new LoanHasPaymentsError(loan.id, paidCount);
  }

  const released = loan.reservedCredit;
  loan.status = 'cancelled';
  loan.cancellationReason = reason;
  loan.reservedCredit = released.withMinor(0n);
  loan.version += 1;
  return released;
}
