/**
 * Domain records. Plain data: no storage annotations, no lifecycle hooks.
 * Persistence mapping lives in server/db/mappers.ts.
 */

import type { InstallmentCount, InstallmentStatus, IsoDate, LoanStatus, RoundingMode, UUID } from '../../shared/lending-types';
import type { Money } from './money';

export interface Customer {
  id: UUID;
  name: string;
  creditLimit: Money;
  usedCreditLimit: Money;
  version: number;
}

export interface LoanInstallment {
  id: UUID;
  loanId: UUID;
  sequence: number; // 1-based
  amount: Money;
  paidAmount: Money;
  dueDate: IsoDate;
  paymentDate: IsoDate | null;
  status: InstallmentStatus;
}

export interface Loan {
  id: UUID;
  customerId: UUID;
  principal: Money;
  interestRate: string; // monthly nominal, decimal string
  installmentCount: InstallmentCount;
  createDate: IsoDate;
  status: LoanStatus;
  reservedCredit: Money;
  installments: LoanInstallment[];
  cancellationReason: string | null;
  version: number;
}

export interface AdjustmentPolicy {
  dailyRate: string;
  rounding: RoundingMode;
}

export interface AdjustmentQuote {
  daysDelta: number; // positive = early, negative = late
  discount: Money;
  penalty: Money;
  amountDue: Money;
}

export interface InstallmentSettlement {
  installmentId: UUID;
  sequence: number;
  dueDate: IsoDate;
  scheduledAmount: Money;
  discount: Money;
  penalty: Money;
  amountPaid: Money;
}

export interface PaymentResult {
  loanId: UUID;
  paymentDate: IsoDate;
  installmentsPaid: number;
  totalAmountApplied: Money;
  remainingUnappliedAmount: Money;
  isLoanFullyPaid: boolean;
  settlements: InstallmentSettlement[];
  // Credit the caller should release on the ledger; zero unless the loan was paid off
  creditToRelease: Money;
}
