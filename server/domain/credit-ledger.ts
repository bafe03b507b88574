/**
 * Credit ledger: the only writer of a customer's credit-limit reservation.
 *
 * Callers serialize calls per customer (see server/utils/locks.ts); each call
 * either applies fully or leaves the customer untouched.
 */

import { InsufficientCreditError, InvalidAmountError, invariant } from './errors';
import { Money } from './money';
import type { Customer } from './types';

export function availableCredit(customer: Customer): Money {
  return customer.creditLimit.subtract(customer.usedCreditLimit);
}

export function reserve(customer: Customer, amount: Money): void {
  assertPositive(amount, 'reserve');
  const available = availableCredit(customer);
  if (available.lt(amount)) {
    throw new InsufficientCreditError(customer.id, amount.toString(), available.toString());
  }
  customer.usedCreditLimit = customer.usedCreditLimit.add(amount);
  customer.version += 1;
  assertBounds(customer);
}

/**
 * Give back reserved credit. Never drops below zero; releasing nothing is a no-op.
 */
export function release(customer: Customer, amount: Money): void {
  if (amount.isZero()) return;
  assertPositive(amount, 'release');
  customer.usedCreditLimit = Money.max(
    customer.usedCreditLimit.subtract(amount),
    customer.usedCreditLimit.withMinor(0n)
  );
  customer.version += 1;
  assertBounds(customer);
}

function assertPositive(amount: Money, operation: 'reserve' | 'release'): void {
  if (!amount.isPositive()) {
    throw new InvalidAmountError(`Cannot ${operation} a non-positive amount`, {
      amount: amount.toString()
    });
  }
}

function assertBounds(customer: Customer): void {
  invariant(
    !customer.usedCreditLimit.isNegative() && customer.usedCreditLimit.compare(customer.creditLimit) <= 0,
    'Used credit is outside [0, creditLimit]',
    {
      customerId: customer.id,
      used: customer.usedCreditLimit.toString(),
      limit: customer.creditLimit.toString()
    }
  );
}
