/**
 * Payment allocation engine
 *
 * Allocation runs in two steps:
 *   1. planAllocation() - pure, works on a snapshot of the loan
 *   2. commitAllocation() - applies the plan to the aggregate in one go
 *
 * Rules:
 *   - only installments due within the payable window (today + N months) are payable
 *   - payable installments settle earliest due date first, ties by sequence
 *   - a selection of installments may not skip an earlier payable one
 *   - an installment is either paid in full (after adjustment) or not at all;
 *     allocation stops at the first one the remaining funds cannot cover
 */

import type { IsoDate } from '../../shared/lending-types';
import { simulateAdjustment } from './adjustment';
import { addMonths, compareDates, isIsoDate } from './dates';
import {
  InvalidAmountError,
  InvalidInstallmentSelectionError,
  InvalidPaymentDateError,
  NoEligibleInstallmentsError,
  invariant
} from './errors';
import {
  assertAcceptsPayments,
  closeIfPaid,
  findInstallment,
  isLoanPaid,
  markInstallmentPaid,
  unpaidInstallments
} from './loan';
import type { Money } from './money';
import type { AdjustmentPolicy, InstallmentSettlement, Loan, LoanInstallment, PaymentResult } from './types';

export interface AllocationOptions {
  today: IsoDate;
  policy: AdjustmentPolicy;
  payableWindowMonths: number;
}

export interface AllocationPlan {
  loanId: string;
  loanVersion: number;
  paymentDate: IsoDate;
  paymentAmount: Money;
  settlements: InstallmentSettlement[];
  applied: Money;
  remaining: Money;
  // First payable installment the funds could not cover, if any
  stoppedAt: number | null;
}

/**
 * Last due date that may be paid today
 */
export function payableHorizon(today: IsoDate, payableWindowMonths: number): IsoDate {
  return addMonths(today, payableWindowMonths);
}

export function payableInstallments(
  loan: Pick<Loan, 'installments'>,
  today: IsoDate,
  payableWindowMonths: number
): LoanInstallment[] {
  const horizon = payableHorizon(today, payableWindowMonths);
  return unpaidInstallments(loan).filter(i => compareDates(i.dueDate, horizon) <= 0);
}

function resolveTargets(loan: Loan, targetInstallmentNumbers: readonly number[]): Set<number> {
  const wanted = new Set(targetInstallmentNumbers);
  const invalid = [...wanted].filter(n => {
    const installment = findInstallment(loan, n);
    return !installment || installment.status !== 'PENDING';
  });

  if (wanted.size === 0 || invalid.length > 0) {
    throw new InvalidInstallmentSelectionError(
      wanted.size === 0
        ? 'At least one installment number is required when selecting installments'
        : `Installments ${invalid.join(', ')} are not unpaid installments of loan ${loan.id}`,
      invalid
    );
  }
  return wanted;
}

/**
 * Work out which installments a payment settles, without touching the loan
 */
export function planAllocation(
  loan: Loan,
  paymentAmount: Money,
  paymentDate: IsoDate,
  options: AllocationOptions,
  targetInstallmentNumbers?: readonly number[]
): AllocationPlan {
  // Everything is validated before any installment is looked at
  if (!paymentAmount.isPositive()) {
    throw new InvalidAmountError('Payment amount must be greater than zero', {
      amount: paymentAmount.toString()
    });
  }
  paymentAmount.assertCompatible(loan.principal);
  if (!isIsoDate(paymentDate)) {
    throw new InvalidPaymentDateError(paymentDate);
  }
  assertAcceptsPayments(loan);
  const targets = targetInstallmentNumbers === undefined
    ? null
    : resolveTargets(loan, targetInstallmentNumbers);

  if (isLoanPaid(loan)) {
    throw new NoEligibleInstallmentsError(loan.id, 'loan_fully_paid');
  }

  const payable = payableInstallments(loan, options.today, options.payableWindowMonths);
  const eligible = payable.filter(i => targets === null || targets.has(i.sequence));

  if (eligible.length === 0) {
    throw new NoEligibleInstallmentsError(
      loan.id,
      targets === null ? 'outside_payable_window' : 'no_selected_installment_payable',
      { horizon: payableHorizon(options.today, options.payableWindowMonths) }
    );
  }

  // Selected installments must be the earliest payable ones
  const lastSelected = payable.indexOf(eligible[eligible.length - 1]);
  const skipped = payable.slice(0, lastSelected).filter(i => !eligible.includes(i));
  if (skipped.length > 0) {
    const numbers = skipped.map(i => i.sequence);
    throw new InvalidInstallmentSelectionError(
      `Installments ${numbers.join(', ')} of loan ${loan.id} fall due earlier and must be paid first`,
      numbers
    );
  }

  const settlements: InstallmentSettlement[] = [];
  let remaining = paymentAmount;
  let stoppedAt: number | null = null;

  for (const installment of eligible) {
    const quote = simulateAdjustment(installment, paymentDate, options.policy);
    if (remaining.lt(quote.amountDue)) {
      stoppedAt = installment.sequence;
      break;
    }
    settlements.push({
      installmentId: installment.id,
      sequence: installment.sequence,
      dueDate: installment.dueDate,
      scheduledAmount: installment.amount,
      discount: quote.discount,
      penalty: quote.penalty,
      amountPaid: quote.amountDue
    });
    remaining = remaining.subtract(quote.amountDue);
  }

  const applied = paymentAmount.subtract(remaining);
  invariant(!remaining.isNegative(), 'Allocation overspent the payment', {
    loanId: loan.id,
    payment: paymentAmount.toString(),
    remaining: remaining.toString()
  });

  return {
    loanId: loan.id,
    loanVersion: loan.version,
    paymentDate,
    paymentAmount,
    settlements,
    applied,
    remaining,
    stoppedAt
  };
}

/**
 * Apply a plan to the loan it was made for. All-or-nothing: the plan is
 * checked against the loan before the first installment changes.
 */
export function commitAllocation(loan: Loan, plan: AllocationPlan): PaymentResult {
  invariant(plan.loanId === loan.id, 'Plan belongs to a different loan', {
    planLoanId: plan.loanId,
    loanId: loan.id
  });
  invariant(plan.loanVersion === loan.version, 'Loan changed since the plan was made', {
    loanId: loan.id,
    planVersion: plan.loanVersion,
    loanVersion: loan.version
  });

  const targets = plan.settlements.map(s => {
    const installment = loan.installments.find(i => i.id === s.installmentId);
    invariant(installment !== undefined && installment.status === 'PENDING', 'Planned installment is not payable', {
      loanId: loan.id,
      installmentId: s.installmentId
    });
    return { installment, settlement: s };
  });

  for (const { installment, settlement } of targets) {
    markInstallmentPaid(installment, settlement.amountPaid, plan.paymentDate);
  }

  const creditToRelease = closeIfPaid(loan);
  if (targets.length > 0) loan.version += 1;

  return {
    loanId: loan.id,
    paymentDate: plan.paymentDate,
    installmentsPaid: targets.length,
    totalAmountApplied: plan.applied,
    remainingUnappliedAmount: plan.remaining,
    isLoanFullyPaid: isLoanPaid(loan),
    settlements: plan.settlements,
    creditToRelease
  };
}

/**
 * Plan and commit a payment against the loan
 */
export function applyPayment(
  loan: Loan,
  paymentAmount: Money,
  paymentDate: IsoDate,
  options: AllocationOptions,
  targetInstallmentNumbers?: readonly number[]
): PaymentResult {
  const plan = planAllocation(loan, paymentAmount, paymentDate, options, targetInstallmentNumbers);
  return commitAllocation(loan, plan);
}

/**
 * What a payment would do, as a result, leaving the loan untouched
 */
export function previewPayment(
  loan: Loan,
  paymentAmount: Money,
  paymentDate: IsoDate,
  options: AllocationOptions,
  targetInstallmentNumbers?: readonly number[]
): PaymentResult {
  const plan = planAllocation(loan, paymentAmount, paymentDate, options, targetInstallmentNumbers);
  const settledIds = new Set(plan.settlements.map(s => s.installmentId));
  const paysOff = loan.status === 'active'
    && loan.installments.every(i => i.status === 'PAID' || settledIds.has(i.id));

  return {
    loanId: loan.id,
    paymentDate: plan.paymentDate,
    installmentsPaid: plan.settlements.length,
    totalAmountApplied: plan.applied,
    remainingUnappliedAmount: plan.remaining,
    isLoanFullyPaid: paysOff,
    settlements: plan.settlements,
    creditToRelease: paysOff ? loan.reservedCredit : loan.reservedCredit.withMinor(0n)
  };
}
