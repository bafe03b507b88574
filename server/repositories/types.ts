/**
 * Persistence abstraction consumed by the lending services.
 *
 * Repositories only read. Every change goes through UnitOfWork.commit(), which
 * writes a loan together with the customer and receipt it affects, all or
 * nothing. Each entity carries the version it had when it was loaded; a
 * mismatch fails the whole commit with ConcurrencyConflictError.
 */

import type { IsoDate, UUID } from '../../shared/lending-types';
import type { Money } from '../domain/money';
import type { Customer, Loan, PaymentResult } from '../domain/types';

export interface CustomerRepository {
  findById(id: UUID): Promise<Customer | null>;
  // Customers are onboarded outside the engine
  insert(customer: Customer): Promise<void>;
}

export interface LoanRepository {
  findById(id: UUID): Promise<Loan | null>;
  listByCustomer(customerId: UUID): Promise<Loan[]>;
}

export interface PaymentReceipt {
  idempotencyKey: string;
  loanId: UUID;
  amount: Money;
  paymentDate: IsoDate;
  result: PaymentResult;
  recordedAt: string;
}

export interface PaymentReceiptRepository {
  findByKey(idempotencyKey: string): Promise<PaymentReceipt | null>;
}

export interface VersionedWrite<T> {
  entity: T;
  // null inserts a new row
  expectedVersion: number | null;
}

export interface LoanChangeSet {
  loan: VersionedWrite<Loan>;
  customer?: VersionedWrite<Customer>;
  // Rejected with DuplicatePaymentError if the key is already recorded
  receipt?: PaymentReceipt;
}

export interface UnitOfWork {
  commit(changes: LoanChangeSet): Promise<void>;
}

export interface LendingRepositories {
  customers: CustomerRepository;
  loans: LoanRepository;
  receipts: PaymentReceiptRepository;
  unitOfWork: UnitOfWork;
}
