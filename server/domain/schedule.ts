/**
 * Installment schedule generator
 *
 * Flat-interest schedule: total = principal × (1 + rate), split into equal
 * installments due on the first of each following month.
 */

import Decimal from 'decimal.js';
import { ulid } from 'ulid';
import type { InstallmentCount, IsoDate, RemainderPlacement, RoundingMode, UUID } from '../../shared/lending-types';
import { LOAN_TERMS } from '../config/constants';
import { firstOfMonthAfter, isIsoDate } from './dates';
import { InvalidLoanTermsError, invariant } from './errors';
import { Money } from './money';
import type { LoanInstallment } from './types';

export interface ScheduleInput {
  principal: Money;
  interestRate: Decimal.Value;
  installmentCount: number;
  originationDate: IsoDate;
  rounding?: RoundingMode;
  remainder?: RemainderPlacement;
  loanId?: UUID;
  newId?: () => UUID;
}

export interface ValidatedTerms {
  principal: Money;
  interestRate: Decimal;
  installmentCount: InstallmentCount;
  originationDate: IsoDate;
}

export interface ScheduleTotals {
  total: Money;
  paid: Money;
  outstanding: Money;
  paidCount: number;
  pendingCount: number;
}

export function isAllowedInstallmentCount(n: number): n is InstallmentCount {
  return LOAN_TERMS.ALLOWED_INSTALLMENT_COUNTS.some(allowed => allowed === n);
}

/**
 * Validate loan terms, failing on the first offending field
 */
export function validateLoanTerms(inp: ScheduleInput): ValidatedTerms {
  if (!inp.principal.isPositive()) {
    throw new InvalidLoanTermsError('principal', 'Principal must be greater than zero', {
      value: inp.principal.toString()
    });
  }

  let rate: Decimal;
  try {
    rate = new Decimal(inp.interestRate);
  } catch {
    throw new InvalidLoanTermsError('interestRate', 'Interest rate must be numeric', {
      value: String(inp.interestRate)
    });
  }
  if (!rate.isFinite() || rate.lt(LOAN_TERMS.MIN_MONTHLY_RATE) || rate.gt(LOAN_TERMS.MAX_MONTHLY_RATE)) {
    throw new InvalidLoanTermsError(
      'interestRate',
      `Interest rate must be between ${LOAN_TERMS.MIN_MONTHLY_RATE} and ${LOAN_TERMS.MAX_MONTHLY_RATE}`,
      { value: rate.toString() }
    );
  }

  const count = inp.installmentCount;
  if (!isAllowedInstallmentCount(count)) {
    throw new InvalidLoanTermsError(
      'installmentCount',
      `Installment count must be one of ${LOAN_TERMS.ALLOWED_INSTALLMENT_COUNTS.join(', ')}`,
      { value: count }
    );
  }

  if (!isIsoDate(inp.originationDate)) {
    throw new InvalidLoanTermsError('originationDate', 'Origination date must be YYYY-MM-DD', {
      value: inp.originationDate
    });
  }

  return {
    principal: inp.principal,
    interestRate: rate,
    installmentCount: count,
    originationDate: inp.originationDate
  };
}

/**
 * Total repayable amount, rounded once
 */
export function totalRepayable(principal: Money, interestRate: Decimal.Value, rounding: RoundingMode = 'half_away_from_zero'): Money {
  return principal.multiply(new Decimal(1).plus(interestRate), rounding);
}

/**
 * Generate the installment schedule for a loan
 */
export function generateSchedule(inp: ScheduleInput): LoanInstallment[] {
  const terms = validateLoanTerms(inp);
  const newId = inp.newId ?? ulid;
  const loanId = inp.loanId ?? '';

  const total = totalRepayable(terms.principal, terms.interestRate, inp.rounding);
  const shares = total.divideEvenly(terms.installmentCount, inp.remainder);

  const installments = shares.map((amount, index): LoanInstallment => ({
    id: newId(),
    loanId,
    sequence: index + 1,
    amount,
    paidAmount: Money.zero(amount.currency, amount.scale),
    dueDate: firstOfMonthAfter(terms.originationDate, index + 1),
    paymentDate: null,
    status: 'PENDING'
  }));

  const scheduled = Money.sum(installments.map(i => i.amount), total);
  invariant(scheduled.equals(total), 'Schedule does not sum to the repayable total', {
    total: total.toString(),
    scheduled: scheduled.toString()
  });

  return installments;
}

export function scheduleTotals(installments: readonly LoanInstallment[], unit: Money): ScheduleTotals {
  const paidRows = installments.filter(i => i.status === 'PAID');
  const pendingRows = installments.filter(i => i.status === 'PENDING');
  return {
    total: Money.sum(installments.map(i => i.amount), unit),
    paid: Money.sum(paidRows.map(i => i.paidAmount), unit),
    outstanding: Money.sum(pendingRows.map(i => i.amount), unit),
    paidCount: paidRows.length,
    pendingCount: pendingRows.length
  };
}
