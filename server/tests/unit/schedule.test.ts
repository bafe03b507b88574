/**
 * Unit Tests: Installment Schedule Generator
 */

import { describe, it, expect } from 'vitest';
import { generateSchedule, scheduleTotals, totalRepayable, validateLoanTerms } from '../../domain/schedule';
import { InvalidLoanTermsError, type LoanTermsField } from '../../domain/errors';
import { daysBetween } from '../../domain/dates';
import { Money } from '../../domain/money';
import { sequentialIds } from '../fixtures';

function fieldOf(fn: () => unknown): LoanTermsField | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidLoanTermsError) return error.field;
    throw error;
  }
  return undefined;
}

describe('Installment Schedule Generator', () => {
  const base = {
    principal: Money.of('10000'),
    interestRate: '0.2',
    installmentCount: 12,
    originationDate: '2025-01-15'
  };

  describe('Amounts', () => {
    it('should split 10,000 at 0.2 over 12 months into 1,000.00 installments', () => {
      const installments = generateSchedule(base);

      expect(installments).toHaveLength(12);
      expect(installments.every(i => i.amount.toString() === '1000.00')).toBe(true);
      expect(scheduleTotals(installments, base.principal).total.toString()).toBe('12000.00');
    });

    it('should put the remainder on the last installment', () => {
      const installments = generateSchedule({ ...base, principal: Money.of('1000'), interestRate: '0.1', installmentCount: 9 });

      expect(installments.slice(0, 8).every(i => i.amount.toString() === '122.22')).toBe(true);
      expect(installments[8].amount.toString()).toBe('122.24');
    });

    it('should put the remainder on the first installment when configured', () => {
      const installments = generateSchedule({
        ...base,
        principal: Money.of('1000'),
        interestRate: '0.1',
        installmentCount: 9,
        remainder: 'first'
      });

      expect(installments[0].amount.toString()).toBe('122.24');
      expect(installments.slice(1).every(i => i.amount.toString() === '122.22')).toBe(true);
    });

    it('should conserve the repayable total for any valid terms', () => {
      for (const principal of ['1234.56', '999.99', '50000.01', '0.07']) {
        for (const rate of ['0.1', '0.137', '0.25', '0.5']) {
          for (const count of [6, 9, 12, 24]) {
            const p = Money.of(principal);
            const installments = generateSchedule({ ...base, principal: p, interestRate: rate, installmentCount: count });
            const total = totalRepayable(p, rate);
            expect(scheduleTotals(installments, p).total.equals(total)).toBe(true);
          }
        }
      }
    });

    it('should round the total once', () => {
      expect(totalRepayable(Money.of('999.99'), '0.137').toString()).toBe('1136.99');
    });

    it('should start every installment unpaid', () => {
      const installments = generateSchedule(base);
      for (const i of installments) {
        expect(i.status).toBe('PENDING');
        expect(i.paidAmount.isZero()).toBe(true);
        expect(i.paymentDate).toBeNull();
      }
    });
  });

  describe('Due dates', () => {
    it('should fall on the first of each following month', () => {
      const installments = generateSchedule(base);

      expect(installments[0].dueDate).toBe('2025-02-01');
      expect(installments[10].dueDate).toBe('2025-12-01');
      expect(installments[11].dueDate).toBe('2026-01-01');
    });

    it('should roll over the year end', () => {
      const installments = generateSchedule({ ...base, originationDate: '2025-12-31', installmentCount: 6 });
      expect(installments.map(i => i.dueDate)).toEqual([
        '2026-01-01', '2026-02-01', '2026-03-01', '2026-04-01', '2026-05-01', '2026-06-01'
      ]);
    });

    it('should be strictly increasing and one month apart', () => {
      const installments = generateSchedule({ ...base, installmentCount: 24 });
      for (let k = 1; k < installments.length; k++) {
        const gap = daysBetween(installments[k - 1].dueDate, installments[k].dueDate);
        expect(gap).toBeGreaterThanOrEqual(28);
        expect(gap).toBeLessThanOrEqual(31);
        expect(installments[k].dueDate.endsWith('-01')).toBe(true);
        expect(installments[k].sequence).toBe(k + 1);
      }
    });
  });

  describe('Identity', () => {
    it('should use the supplied loan id and id factory', () => {
      const installments = generateSchedule({ ...base, installmentCount: 6, loanId: 'loan-9', newId: sequentialIds('i') });
      expect(installments.map(i => i.id)).toEqual(['i-1', 'i-2', 'i-3', 'i-4', 'i-5', 'i-6']);
      expect(installments.every(i => i.loanId === 'loan-9')).toBe(true);
    });
  });

  describe('Validation', () => {
    it('should reject a non-positive principal', () => {
      expect(fieldOf(() => generateSchedule({ ...base, principal: Money.zero() }))).toBe('principal');
      expect(fieldOf(() => generateSchedule({ ...base, principal: Money.of('-1') }))).toBe('principal');
    });

    it('should reject rates outside [0.1, 0.5]', () => {
      expect(fieldOf(() => generateSchedule({ ...base, interestRate: '0.09' }))).toBe('interestRate');
      expect(fieldOf(() => generateSchedule({ ...base, interestRate: '0.51' }))).toBe('interestRate');
      expect(fieldOf(() => generateSchedule({ ...base, interestRate: 'ten' }))).toBe('interestRate');
    });

    it('should accept the rate bounds', () => {
      expect(validateLoanTerms({ ...base, interestRate: '0.1' }).interestRate.toString()).toBe('0.1');
      expect(validateLoanTerms({ ...base, interestRate: 0.5 }).interestRate.toString()).toBe('0.5');
    });

    it('should reject installment counts outside the product set', () => {
      for (const count of [0, 1, 7, 10, 36, 12.5]) {
        expect(fieldOf(() => generateSchedule({ ...base, installmentCount: count }))).toBe('installmentCount');
      }
    });

    it('should reject impossible origination dates', () => {
      expect(fieldOf(() => generateSchedule({ ...base, originationDate: '2025-02-30' }))).toBe('originationDate');
      expect(fieldOf(() => generateSchedule({ ...base, originationDate: '15/01/2025' }))).toBe('originationDate');
    });

    it('should name the first offending field', () => {
      expect(fieldOf(() => generateSchedule({ ...base, principal: Money.zero(), installmentCount: 7 }))).toBe('principal');
    });
  });
});
