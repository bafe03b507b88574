/**
 * Early/late adjustment for a single installment.
 *
 * daysDelta = dueDate − paymentDate. Paying early earns a discount of
 * amount × dailyRate per day, paying late costs the same as a penalty.
 * Pure: safe to call for previews.
 */

import type { IsoDate } from '../../shared/lending-types';
import { daysBetween, isIsoDate } from './dates';
import { InvalidPaymentDateError } from './errors';
import { roundMinor } from './money';
import type { AdjustmentPolicy, AdjustmentQuote, LoanInstallment } from './types';

export function simulateAdjustment(
  installment: Pick<LoanInstallment, 'amount' | 'dueDate'>,
  paymentDate: IsoDate,
  policy: AdjustmentPolicy
): AdjustmentQuote {
  if (!isIsoDate(paymentDate)) {
    throw new InvalidPaymentDateError(paymentDate);
  }
  const { amount } = installment;
  const zero = amount.withMinor(0n);
  const daysDelta = daysBetween(paymentDate, installment.dueDate);

  if (daysDelta === 0) {
    return { daysDelta, discount: zero, penalty: zero, amountDue: amount };
  }

  // amount ± amount × rate × days, kept exact until the single rounding
  const adjustment = amount.exactMinor().times(policy.dailyRate).times(Math.abs(daysDelta));
  const exactDue = daysDelta > 0
    ? amount.exactMinor().minus(adjustment)
    : amount.exactMinor().plus(adjustment);
  const amountDue = amount.withMinor(roundMinor(exactDue, policy.rounding));

  // Discount cannot push the charge below zero
  const due = amountDue.isNegative() ? zero : amountDue;

  return daysDelta > 0
    ? { daysDelta, discount: amount.subtract(due), penalty: zero, amountDue: due }
    : { daysDelta, discount: zero, penalty: due.subtract(amount), amountDue: due };
}
