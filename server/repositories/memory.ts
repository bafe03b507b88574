/**
 * In-process repositories. Entities are copied on the way in and out so a
 * caller never holds a reference into the store.
 */

import { ConcurrencyConflictError, DuplicatePaymentError, InvariantViolationError } from '../domain/errors';
import type { Customer, Loan, PaymentResult } from '../domain/types';
import type {
  CustomerRepository,
  LendingRepositories,
  LoanChangeSet,
  LoanRepository,
  PaymentReceipt,
  PaymentReceiptRepository,
  UnitOfWork,
  VersionedWrite
} from './types';

// Money is immutable, so copying the records is enough
export function cloneCustomer(c: Customer): Customer {
  return { ...c };
}

export function cloneLoan(l: Loan): Loan {
  return { ...l, installments: l.installments.map(i => ({ ...i })) };
}

function cloneReceipt(r: PaymentReceipt): PaymentReceipt {
  const result: PaymentResult = { ...r.result, settlements: r.result.settlements.map(s => ({ ...s })) };
  return { ...r, result };
}

export class InMemoryLendingStore {
  readonly customers = new Map<string, Customer>();
  readonly loans = new Map<string, Loan>();
  readonly receipts = new Map<string, PaymentReceipt>();
}

export class InMemoryCustomerRepository implements CustomerRepository {
  constructor(private readonly store: InMemoryLendingStore) {}

  async findById(id: string): Promise<Customer | null> {
    const row = this.store.customers.get(id);
    return row ? cloneCustomer(row) : null;
  }

  async insert(customer: Customer): Promise<void> {
    if (this.store.customers.has(customer.id)) {
      throw new InvariantViolationError(`Customer ${customer.id} already exists`);
    }
    this.store.customers.set(customer.id, cloneCustomer(customer));
  }
}

export class InMemoryLoanRepository implements LoanRepository {
  constructor(private readonly store: InMemoryLendingStore) {}

  async findById(id: string): Promise<Loan | null> {
    const row = this.store.loans.get(id);
    return row ? cloneLoan(row) : null;
  }

  async listByCustomer(customerId: string): Promise<Loan[]> {
    return [...this.store.loans.values()]
      .filter(l => l.customerId === customerId)
      .sort((a, b) => a.createDate.localeCompare(b.createDate) || a.id.localeCompare(b.id))
      .map(cloneLoan);
  }
}

export class InMemoryPaymentReceiptRepository implements PaymentReceiptRepository {
  constructor(private readonly store: InMemoryLendingStore) {}

  async findByKey(idempotencyKey: string): Promise<PaymentReceipt | null> {
    const row = this.store.receipts.get(idempotencyKey);
    return row ? cloneReceipt(row) : null;
  }
}

function checkWrite<T extends { id: string; version: number }>(
  rows: Map<string, T>,
  write: VersionedWrite<T>,
  entity: 'customer' | 'loan'
): void {
  const current = rows.get(write.entity.id);
  if (write.expectedVersion === null) {
    if (current) {
      throw new InvariantViolationError(`${entity === 'loan' ? 'Loan' : 'Customer'} ${write.entity.id} already exists`);
    }
    return;
  }
  if (!current || current.version !== write.expectedVersion) {
    throw new ConcurrencyConflictError(entity, write.entity.id, write.expectedVersion);
  }
}

/**
 * Every precondition is checked before the first row changes
 */
export class InMemoryUnitOfWork implements UnitOfWork {
  constructor(private readonly store: InMemoryLendingStore) {}

  async commit(changes: LoanChangeSet): Promise<void> {
    const { customers, loans, receipts } = this.store;

    checkWrite(loans, changes.loan, 'loan');
    if (changes.customer) checkWrite(customers, changes.customer, 'customer');
    if (changes.receipt) {
      const recorded = receipts.get(changes.receipt.idempotencyKey);
      if (recorded) throw new DuplicatePaymentError(changes.receipt.idempotencyKey, recorded.loanId);
    }

    loans.set(changes.loan.entity.id, cloneLoan(changes.loan.entity));
    if (changes.customer) customers.set(changes.customer.entity.id, cloneCustomer(changes.customer.entity));
    if (changes.receipt) receipts.set(changes.receipt.idempotencyKey, cloneReceipt(changes.receipt));
  }
}

export function createInMemoryRepositories(store: InMemoryLendingStore = new InMemoryLendingStore()): LendingRepositories {
  return {
    customers: new InMemoryCustomerRepository(store),
    loans: new InMemoryLoanRepository(store),
    receipts: new InMemoryPaymentReceiptRepository(store),
    unitOfWork: new InMemoryUnitOfWork(store)
  };
}
