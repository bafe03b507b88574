/**
 * Customer credit access for the lending services. Every write goes through
 * the customer lock and the credit ledger.
 */

import { availableCredit, release } from '../domain/credit-ledger';
import { CustomerNotFoundError } from '../domain/errors';
import type { Money } from '../domain/money';
import type { Customer } from '../domain/types';
import type { VersionedWrite } from '../repositories/types';
import { redactId } from '../utils/redact';
import type { LendingServiceDeps } from './types';

export class CreditService {
  constructor(private readonly deps: LendingServiceDeps) {}

  async load(customerId: string): Promise<Customer> {
    const customer = await this.deps.repositories.customers.findById(customerId);
    if (!customer) throw new CustomerNotFoundError(customerId);
    return customer;
  }

  async available(customerId: string): Promise<Money> {
    return availableCredit(await this.load(customerId));
  }

  /**
   * Return credit held for a loan that was paid off or cancelled.
   *
   * The released customer is handed to `persist`, which must write it in the
   * same unit of work as the loan that gave the credit up. The customer lock
   * is held until `persist` settles.
   */
  async release(
    customerId: string,
    amount: Money,
    loanId: string,
    persist: (customer: VersionedWrite<Customer>) => Promise<void>
  ): Promise<Customer> {
    return this.deps.locks.customers.runExclusive(customerId, async () => {
      const customer = await this.load(customerId);
      const expectedVersion = customer.version;
      release(customer, amount);
      await persist({ entity: customer, expectedVersion });

      this.deps.logger.info({
        customerId: redactId(customerId),
        loanId: redactId(loanId),
        released: amount.toString(),
        used: customer.usedCreditLimit.toString()
      }, 'Credit released');
      return customer;
    });
  }
}
