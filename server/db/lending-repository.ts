/**
 * Lending repositories for PostgreSQL (drizzle-orm)
 *
 * All writes of one change set run in a single transaction. Updates are
 * guarded by the version column: an UPDATE that matches no row means another
 * writer got there first, and the transaction rolls back.
 */

import { and, asc, eq, inArray } from 'drizzle-orm';
import { customers, loanInstallments, loans, paymentReceipts } from '../../shared/schema';
import { ConcurrencyConflictError, DuplicatePaymentError } from '../domain/errors';
import type { Customer, Loan } from '../domain/types';
import type {
  CustomerRepository,
  LendingRepositories,
  LoanChangeSet,
  LoanRepository,
  PaymentReceipt,
  PaymentReceiptRepository,
  UnitOfWork,
  VersionedWrite
} from '../repositories/types';
import type { LendingDb } from './index';
import {
  customerToRow,
  installmentToRow,
  loanToRow,
  receiptToRow,
  rowToCustomer,
  rowToLoan,
  rowToReceipt
} from './mappers';

type LendingTx = Parameters<Parameters<LendingDb['transaction']>[0]>[0];

export class PgCustomerRepository implements CustomerRepository {
  constructor(private readonly db: LendingDb) {}

  async findById(id: string): Promise<Customer | null> {
    const rows = await this.db.select().from(customers).where(eq(customers.id, id)).limit(1);
    return rows[0] ? rowToCustomer(rows[0]) : null;
  }

  async insert(customer: Customer): Promise<void> {
    await this.db.insert(customers).values(customerToRow(customer));
  }
}

export class PgLoanRepository implements LoanRepository {
  constructor(private readonly db: LendingDb) {}

  async findById(id: string): Promise<Loan | null> {
    const rows = await this.db.select().from(loans).where(eq(loans.id, id)).limit(1);
    if (!rows[0]) return null;

    const installmentRows = await this.db
      .select()
      .from(loanInstallments)
      .where(eq(loanInstallments.loanId, id))
      .orderBy(asc(loanInstallments.sequence));

    return rowToLoan(rows[0], installmentRows);
  }

  async listByCustomer(customerId: string): Promise<Loan[]> {
    const loanRows = await this.db
      .select()
      .from(loans)
      .where(eq(loans.customerId, customerId))
      .orderBy(asc(loans.createDate), asc(loans.id));
    if (loanRows.length === 0) return [];

    const installmentRows = await this.db
      .select()
      .from(loanInstallments)
      .where(inArray(loanInstallments.loanId, loanRows.map(l => l.id)))
      .orderBy(asc(loanInstallments.sequence));

    return loanRows.map(row => rowToLoan(row, installmentRows.filter(i => i.loanId === row.id)));
  }
}

export class PgPaymentReceiptRepository implements PaymentReceiptRepository {
  constructor(private readonly db: LendingDb) {}

  async findByKey(idempotencyKey: string): Promise<PaymentReceipt | null> {
    const rows = await this.db
      .select()
      .from(paymentReceipts)
      .where(eq(paymentReceipts.idempotencyKey, idempotencyKey))
      .limit(1);
    return rows[0] ? rowToReceipt(rows[0]) : null;
  }
}

async function writeLoan(tx: LendingTx, { entity: loan, expectedVersion }: VersionedWrite<Loan>): Promise<void> {
  if (expectedVersion === null) {
    await tx.insert(loans).values(loanToRow(loan));
    await tx.insert(loanInstallments).values(loan.installments.map(installmentToRow));
    return;
  }

  const updated = await tx
    .update(loans)
    .set({ ...loanToRow(loan), updatedAt: new Date() })
    .where(and(eq(loans.id, loan.id), eq(loans.version, expectedVersion)))
    .returning({ id: loans.id });

  if (updated.length === 0) {
    throw new ConcurrencyConflictError('loan', loan.id, expectedVersion);
  }

  // Installment rows never appear or disappear; only their paid state moves
  for (const installment of loan.installments) {
    await tx
      .update(loanInstallments)
      .set({
        paidAmountMinor: installment.paidAmount.minor,
        paymentDate: installment.paymentDate,
        status: installment.status
      })
      .where(eq(loanInstallments.id, installment.id));
  }
}

async function writeCustomer(tx: LendingTx, { entity: customer, expectedVersion }: VersionedWrite<Customer>): Promise<void> {
  if (expectedVersion === null) {
    await tx.insert(customers).values(customerToRow(customer));
    return;
  }

  const updated = await tx
    .update(customers)
    .set({ ...customerToRow(customer), updatedAt: new Date() })
    .where(and(eq(customers.id, customer.id), eq(customers.version, expectedVersion)))
    .returning({ id: customers.id });

  if (updated.length === 0) {
    throw new ConcurrencyConflictError('customer', customer.id, expectedVersion);
  }
}

export class PgUnitOfWork implements UnitOfWork {
  constructor(private readonly db: LendingDb) {}

  async commit(changes: LoanChangeSet): Promise<void> {
    await this.db.transaction(async (tx) => {
      const { receipt } = changes;
      if (receipt) {
        // Double-check inside the transaction; another process may hold the same key
        const recorded = await tx
          .select({ loanId: paymentReceipts.loanId })
          .from(paymentReceipts)
          .where(eq(paymentReceipts.idempotencyKey, receipt.idempotencyKey))
          .limit(1);
        if (recorded[0]) {
          throw new DuplicatePaymentError(receipt.idempotencyKey, recorded[0].loanId);
        }
      }

      await writeLoan(tx, changes.loan);
      if (changes.customer) await writeCustomer(tx, changes.customer);
      if (receipt) await tx.insert(paymentReceipts).values(receiptToRow(receipt));
    });
  }
}

export function createPgRepositories(db: LendingDb): LendingRepositories {
  return {
    customers: new PgCustomerRepository(db),
    loans: new PgLoanRepository(db),
    receipts: new PgPaymentReceiptRepository(db),
    unitOfWork: new PgUnitOfWork(db)
  };
}
