/**
 * Unit Tests: Loan Aggregate
 */

import { describe, it, expect } from 'vitest';
import {
  cancelLoan,
  closeIfPaid,
  findInstallment,
  isLoanPaid,
  markInstallmentPaid,
  outstandingAmount,
  overdueInstallments,
  unpaidInstallments
} from '../../domain/loan';
import { InvalidLoanTermsError, InvariantViolationError, LoanHasPaymentsError, LoanNotActiveError } from '../../domain/errors';
import { Money } from '../../domain/money';
import { makeLoan } from '../fixtures';

describe('Loan Aggregate', () => {
  describe('createLoan', () => {
    it('should open an active loan reserving its principal', () => {
      const loan = makeLoan();

      expect(loan.status).toBe('active');
      expect(loan.reservedCredit.toString()).toBe('5000.00');
      expect(loan.installmentCount).toBe(6);
      expect(loan.interestRate).toBe('0.2');
      expect(loan.version).toBe(0);
      expect(loan.cancellationReason).toBeNull();
      expect(loan.installments.map(i => i.id)).toEqual(['inst-1', 'inst-2', 'inst-3', 'inst-4', 'inst-5', 'inst-6']);
      expect(loan.installments.every(i => i.loanId === 'loan-1')).toBe(true);
      expect(outstandingAmount(loan).toString()).toBe('6000.00');
    });

    it('should reject invalid terms', () => {
      expect(() => makeLoan({ installmentCount: 3 })).toThrow(InvalidLoanTermsError);
      expect(() => makeLoan({ interestRate: '0.6' })).toThrow(InvalidLoanTermsError);
    });
  });

  describe('installments', () => {
    it('should list unpaid installments by due date', () => {
      const loan = makeLoan();
      const first = findInstallment(loan, 1);
      expect(first).toBeDefined();
      if (first) markInstallmentPaid(first, first.amount, '2025-02-01');

      expect(unpaidInstallments(loan).map(i => i.sequence)).toEqual([2, 3, 4, 5, 6]);
      expect(outstandingAmount(loan).toString()).toBe('5000.00');
    });

    it('should count only unpaid installments past their due date as overdue', () => {
      const loan = makeLoan();
      markInstallmentPaid(loan.installments[0], Money.of('1000'), '2025-02-01');

      expect(overdueInstallments(loan, '2025-04-15').map(i => i.sequence)).toEqual([2, 3]);
      expect(overdueInstallments(makeLoan(), '2025-03-01').map(i => i.sequence)).toEqual([1]);
    });

    it('should record the amount and date paid', () => {
      const loan = makeLoan();
      const second = loan.installments[1];
      markInstallmentPaid(second, Money.of('972'), '2025-02-01');

      expect(second.status).toBe('PAID');
      expect(second.paidAmount.toString()).toBe('972.00');
      expect(second.paymentDate).toBe('2025-02-01');
    });

    it('should never pay an installment twice', () => {
      const loan = makeLoan();
      const first = loan.installments[0];
      markInstallmentPaid(first, first.amount, '2025-02-01');

      expect(() => markInstallmentPaid(first, first.amount, '2025-02-02')).toThrow(InvariantViolationError);
      expect(first.paymentDate).toBe('2025-02-01');
    });
  });

  describe('closeIfPaid', () => {
    it('should leave an open loan alone', () => {
      const loan = makeLoan();
      expect(closeIfPaid(loan).isZero()).toBe(true);
      expect(loan.status).toBe('active');
    });

    it('should close a fully paid loan and hand back its reservation once', () => {
      const loan = makeLoan();
      for (const i of loan.installments) markInstallmentPaid(i, i.amount, i.dueDate);

      expect(isLoanPaid(loan)).toBe(true);
      expect(closeIfPaid(loan).toString()).toBe('5000.00');
      expect(loan.status).toBe('paid_off');
      expect(loan.reservedCredit.isZero()).toBe(true);
      expect(closeIfPaid(loan).isZero()).toBe(true);
    });
  });

  describe('cancelLoan', () => {
    it('should cancel an untouched loan', () => {
      const loan = makeLoan();
      const released = cancelLoan(loan, 'customer withdrew');

      expect(released.toString()).toBe('5000.00');
      expect(loan.status).toBe('cancelled');
      expect(loan.cancellationReason).toBe('customer withdrew');
      expect(loan.reservedCredit.isZero()).toBe(true);
      expect(loan.version).toBe(1);
    });

    it('should refuse once an installment is paid', () => {
      const loan = makeLoan();
      markInstallmentPaid(loan.installments[0], loan.installments[0].amount, '2025-02-01');

      expect(() => cancelLoan(loan, 'late change of mind')).toThrow(LoanHasPaymentsError);
      expect(loan.status).toBe('active');
    });

    it('should refuse to cancel twice', () => {
      const loan = makeLoan();
      cancelLoan(loan, 'duplicate');
      expect(() => cancelLoan(loan, 'again')).toThrow(LoanNotActiveError);
    });
  });
});
