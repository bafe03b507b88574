/**
 * In-process entry points of the lending engine.
 *
 * Every operation returns an OperationResult instead of throwing for business
 * outcomes. Defects (InvariantViolationError) and non-lending errors still throw.
 */

import type Decimal from 'decimal.js';
import type { IsoDate } from '../../shared/lending-types';
import type { LendingConfig } from '../config/lending-config';
import { simulateAdjustment } from '../domain/adjustment';
import { applyPayment, previewPayment, type AllocationOptions } from '../domain/allocation';
import { availableCredit, release, reserve } from '../domain/credit-ledger';
import { InvariantViolationError, isLendingError, type LendingError } from '../domain/errors';
import { Money } from '../domain/money';
import { generateSchedule } from '../domain/schedule';
import type { AdjustmentPolicy, AdjustmentQuote, Customer, Loan, LoanInstallment, PaymentResult } from '../domain/types';
import type { Clock } from '../utils/clock';

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LendingError };

export type AmountInput = Money | Decimal.Value;

export function attempt<T>(fn: () => T): OperationResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (isLendingError(error) && !(error instanceof InvariantViolationError)) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function adjustmentPolicy(config: LendingConfig): AdjustmentPolicy {
  return { dailyRate: config.dailyAdjustmentRate, rounding: config.rounding };
}

export function allocationOptions(config: LendingConfig, today: IsoDate): AllocationOptions {
  return {
    today,
    policy: adjustmentPolicy(config),
    payableWindowMonths: config.payableWindowMonths
  };
}

export class LendingEngine {
  constructor(
    private readonly config: LendingConfig,
    private readonly clock: Clock
  ) {}

  /**
   * Amounts given as plain numbers or strings are read in the configured currency
   */
  toMoney(amount: AmountInput): Money {
    return amount instanceof Money
      ? amount
      : Money.of(amount, this.config.currency, this.config.currencyScale, this.config.rounding);
  }

  generateSchedule(
    principal: AmountInput,
    interestRate: Decimal.Value,
    installmentCount: number,
    originationDate: IsoDate = this.clock.today()
  ): OperationResult<LoanInstallment[]> {
    return attempt(() => generateSchedule({
      principal: this.toMoney(principal),
      interestRate,
      installmentCount,
      originationDate,
      rounding: this.config.rounding,
      remainder: this.config.remainderPlacement
    }));
  }

  reserve(customer: Customer, amount: AmountInput): OperationResult<Money> {
    return attempt(() => {
      reserve(customer, this.toMoney(amount));
      return availableCredit(customer);
    });
  }

  release(customer: Customer, amount: AmountInput): OperationResult<Money> {
    return attempt(() => {
      release(customer, this.toMoney(amount));
      return availableCredit(customer);
    });
  }

  applyPayment(
    loan: Loan,
    amount: AmountInput,
    paymentDate: IsoDate,
    installmentNumbers?: readonly number[]
  ): OperationResult<PaymentResult> {
    return attempt(() => applyPayment(
      loan,
      this.toMoney(amount),
      paymentDate,
      allocationOptions(this.config, this.clock.today()),
      installmentNumbers
    ));
  }

  previewPayment(
    loan: Loan,
    amount: AmountInput,
    paymentDate: IsoDate,
    installmentNumbers?: readonly number[]
  ): OperationResult<PaymentResult> {
    return attempt(() => previewPayment(
      loan,
      this.toMoney(amount),
      paymentDate,
      allocationOptions(this.config, this.clock.today()),
      installmentNumbers
    ));
  }

  simulateAdjustment(installment: LoanInstallment, paymentDate: IsoDate): OperationResult<AdjustmentQuote> {
    return attempt(() => simulateAdjustment(installment, paymentDate, adjustmentPolicy(this.config)));
  }
}
