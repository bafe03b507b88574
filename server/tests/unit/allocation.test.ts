/**
 * Unit Tests: Payment Allocation
 */

import { describe, it, expect } from 'vitest';
import {
  applyPayment,
  commitAllocation,
  payableHorizon,
  payableInstallments,
  planAllocation,
  previewPayment
} from '../../domain/allocation';
import {
  IncompatibleUnitsError,
  InvalidAmountError,
  InvalidInstallmentSelectionError,
  InvalidPaymentDateError,
  InvariantViolationError,
  LoanNotActiveError,
  NoEligibleInstallmentsError
} from '../../domain/errors';
import { cancelLoan } from '../../domain/loan';
import { Money } from '../../domain/money';
import type { Loan } from '../../domain/types';
import { allocationOptions, makeLoan } from '../fixtures';

function noEligibleReason(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof NoEligibleInstallmentsError) return error.reason;
    throw error;
  }
  return undefined;
}

function statuses(loan: Loan): string[] {
  return loan.installments.map(i => i.status);
}

describe('Payment Allocation', () => {
  describe('payable window', () => {
    it('should include installments due on the horizon', () => {
      expect(payableHorizon('2025-02-01', 3)).toBe('2025-05-01');
      expect(payableInstallments(makeLoan(), '2025-02-01', 3).map(i => i.sequence)).toEqual([1, 2, 3, 4]);
    });

    it('should clamp the horizon at month end', () => {
      expect(payableHorizon('2025-11-30', 3)).toBe('2026-02-28');
    });
  });

  describe('whole-installment allocation', () => {
    it('should pay the first installment and carry the rest over', () => {
      const loan = makeLoan();
      const result = applyPayment(loan, Money.of('1500'), '2025-02-01', allocationOptions('2025-02-01'));

      expect(result.installmentsPaid).toBe(1);
      expect(result.totalAmountApplied.toString()).toBe('1000.00');
      expect(result.remainingUnappliedAmount.toString()).toBe('500.00');
      expect(result.isLoanFullyPaid).toBe(false);
      expect(result.creditToRelease.isZero()).toBe(true);
      expect(statuses(loan)).toEqual(['PAID', 'PENDING', 'PENDING', 'PENDING', 'PENDING', 'PENDING']);
      expect(loan.version).toBe(1);
    });

    it('should report where allocation stopped', () => {
      const plan = planAllocation(makeLoan(), Money.of('1500'), '2025-02-01', allocationOptions('2025-02-01'));
      expect(plan.stoppedAt).toBe(2);
    });

    it('should discount every early installment inside the window', () => {
      const loan = makeLoan();
      const result = applyPayment(loan, Money.of('10000'), '2025-02-01', allocationOptions('2025-02-01'));

      expect(result.settlements.map(s => s.amountPaid.toString())).toEqual(['1000.00', '972.00', '941.00', '911.00']);
      expect(result.settlements.map(s => s.discount.toString())).toEqual(['0.00', '28.00', '59.00', '89.00']);
      expect(result.totalAmountApplied.toString()).toBe('3824.00');
      expect(result.remainingUnappliedAmount.toString()).toBe('6176.00');
      expect(statuses(loan)).toEqual(['PAID', 'PAID', 'PAID', 'PAID', 'PENDING', 'PENDING']);
    });

    it('should mix late penalties and early discounts', () => {
      const loan = makeLoan();
      const result = applyPayment(loan, Money.of('3200'), '2025-04-15', allocationOptions('2025-04-15'));

      expect(result.settlements.map(s => s.amountPaid.toString())).toEqual(['1073.00', '1045.00', '1014.00']);
      expect(result.settlements.map(s => s.penalty.toString())).toEqual(['73.00', '45.00', '14.00']);
      expect(result.installmentsPaid).toBe(3);
      expect(result.totalAmountApplied.toString()).toBe('3132.00');
      expect(result.remainingUnappliedAmount.toString()).toBe('68.00');
      expect(loan.installments[3].status).toBe('PENDING');
    });

    it('should leave the loan unchanged when nothing is covered', () => {
      const loan = makeLoan();
      const result = applyPayment(loan, Money.of('999.99'), '2025-02-01', allocationOptions('2025-02-01'));

      expect(result.installmentsPaid).toBe(0);
      expect(result.totalAmountApplied.isZero()).toBe(true);
      expect(result.remainingUnappliedAmount.toString()).toBe('999.99');
      expect(loan.version).toBe(0);
    });

    it('should keep applied + remaining equal to the payment', () => {
      for (const amount of ['1', '999.99', '1000', '2500.5', '3824', '7000']) {
        const payment = Money.of(amount);
        const result = applyPayment(makeLoan(), payment, '2025-02-01', allocationOptions('2025-02-01'));
        expect(result.totalAmountApplied.add(result.remainingUnappliedAmount).equals(payment)).toBe(true);
      }
    });
  });

  describe('payoff', () => {
    it('should close the loan and release its credit', () => {
      const loan = makeLoan();
      const options = allocationOptions('2025-05-01', { policy: { dailyRate: '0', rounding: 'half_away_from_zero' } });
      const result = applyPayment(loan, Money.of('6000'), '2025-05-01', options);

      expect(result.installmentsPaid).toBe(6);
      expect(result.isLoanFullyPaid).toBe(true);
      expect(result.creditToRelease.toString()).toBe('5000.00');
      expect(result.remainingUnappliedAmount.isZero()).toBe(true);
      expect(loan.status).toBe('paid_off');
      expect(loan.reservedCredit.isZero()).toBe(true);

      expect(noEligibleReason(() => applyPayment(loan, Money.of('10'), '2025-05-02', options))).toBe('loan_fully_paid');
    });
  });

  describe('eligibility', () => {
    it('should refuse payments when nothing is due within the window', () => {
      const loan = makeLoan({ createDate: '2025-06-20' });
      expect(noEligibleReason(() => applyPayment(loan, Money.of('1000'), '2025-01-10', allocationOptions('2025-01-10'))))
        .toBe('outside_payable_window');
      expect(loan.version).toBe(0);
    });

    it('should pay only the selected installments', () => {
      const loan = makeLoan();
      const result = applyPayment(loan, Money.of('5000'), '2025-02-01', allocationOptions('2025-02-01'), [1, 2]);

      expect(result.settlements.map(s => s.sequence)).toEqual([1, 2]);
      expect(result.totalAmountApplied.toString()).toBe('1972.00');
      expect(result.remainingUnappliedAmount.toString()).toBe('3028.00');
      expect(statuses(loan)).toEqual(['PAID', 'PAID', 'PENDING', 'PENDING', 'PENDING', 'PENDING']);
    });

    it('should refuse a selection that skips an earlier payable installment', () => {
      const loan = makeLoan();

      let caught: unknown;
      try {
        applyPayment(loan, Money.of('2000'), '2025-02-01', allocationOptions('2025-02-01'), [3]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidInstallmentSelectionError);
      if (caught instanceof InvalidInstallmentSelectionError) {
        expect(caught.installmentNumbers).toEqual([1, 2]);
      }
      expect(statuses(loan)).toEqual(['PENDING', 'PENDING', 'PENDING', 'PENDING', 'PENDING', 'PENDING']);
    });

    it('should accept a selection once the earlier installments are paid', () => {
      const loan = makeLoan();
      applyPayment(loan, Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'));
      const result = applyPayment(loan, Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'), [2]);

      expect(result.settlements.map(s => s.sequence)).toEqual([2]);
      expect(result.totalAmountApplied.toString()).toBe('972.00');
    });

    it('should reject unknown or already paid installment numbers', () => {
      const loan = makeLoan();
      applyPayment(loan, Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'));

      let caught: unknown;
      try {
        applyPayment(loan, Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'), [1, 2, 7]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidInstallmentSelectionError);
      if (caught instanceof InvalidInstallmentSelectionError) {
        expect(caught.installmentNumbers).toEqual([1, 7]);
      }
    });

    it('should reject an empty selection', () => {
      expect(() => applyPayment(makeLoan(), Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'), []))
        .toThrow(InvalidInstallmentSelectionError);
    });

    it('should refuse selected installments beyond the window', () => {
      expect(noEligibleReason(() =>
        applyPayment(makeLoan(), Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'), [5])
      )).toBe('no_selected_installment_payable');
    });
  });

  describe('validation', () => {
    const options = allocationOptions('2025-02-01');

    it('should reject non-positive amounts', () => {
      expect(() => applyPayment(makeLoan(), Money.zero(), '2025-02-01', options)).toThrow(InvalidAmountError);
      expect(() => applyPayment(makeLoan(), Money.of('-1'), '2025-02-01', options)).toThrow(InvalidAmountError);
    });

    it('should reject a payment in another currency', () => {
      expect(() => applyPayment(makeLoan(), Money.of('1000', 'EUR'), '2025-02-01', options)).toThrow(IncompatibleUnitsError);
    });

    it('should reject malformed dates', () => {
      expect(() => applyPayment(makeLoan(), Money.of('1000'), '2025-02-30', options)).toThrow(InvalidPaymentDateError);
    });

    it('should reject payments on a cancelled loan', () => {
      const loan = makeLoan();
      cancelLoan(loan, 'withdrawn');
      expect(() => applyPayment(loan, Money.of('1000'), '2025-02-01', options)).toThrow(LoanNotActiveError);
    });
  });

  describe('plan and commit', () => {
    it('should preview without touching the loan', () => {
      const loan = makeLoan();
      const preview = previewPayment(loan, Money.of('1972'), '2025-02-01', allocationOptions('2025-02-01'));

      expect(preview.installmentsPaid).toBe(2);
      expect(preview.remainingUnappliedAmount.isZero()).toBe(true);
      expect(preview.isLoanFullyPaid).toBe(false);
      expect(statuses(loan).every(s => s === 'PENDING')).toBe(true);
      expect(loan.version).toBe(0);
    });

    it('should preview a payoff with the credit it would release', () => {
      const options = allocationOptions('2025-05-01', { policy: { dailyRate: '0', rounding: 'half_away_from_zero' } });
      const preview = previewPayment(makeLoan(), Money.of('6000'), '2025-05-01', options);

      expect(preview.isLoanFullyPaid).toBe(true);
      expect(preview.creditToRelease.toString()).toBe('5000.00');
    });

    it('should refuse a plan made against an older version', () => {
      const loan = makeLoan();
      const plan = planAllocation(loan, Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'));
      applyPayment(loan, Money.of('1000'), '2025-02-01', allocationOptions('2025-02-01'));

      expect(() => commitAllocation(loan, plan)).toThrow(InvariantViolationError);
    });
  });
});
