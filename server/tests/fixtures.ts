/**
 * Shared builders for lending tests
 */

import { getLogger } from '../bootstrap/logger';
import { loadConfig, type LendingConfig } from '../config/lending-config';
import type { AllocationOptions } from '../domain/allocation';
import { createLoan } from '../domain/loan';
import { Money } from '../domain/money';
import type { Customer, Loan } from '../domain/types';
import { createInMemoryRepositories } from '../repositories/memory';
import type { LendingRepositories } from '../repositories/types';
import type { LendingServiceDeps } from '../services/types';
import { fixedClock } from '../utils/clock';
import { KeyedMutexes } from '../utils/locks';

export const silentLogger = getLogger('silent', false);

export function sequentialIds(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function makeCustomer(overrides: Partial<Customer> = {}): Customer {
  return {
    id: 'cust-1',
    name: 'Test Customer',
    creditLimit: Money.of('10000'),
    usedCreditLimit: Money.zero(),
    version: 0,
    ...overrides
  };
}

/**
 * 5000.00 at 0.2 over 6 months, created 2025-01-10:
 * six installments of 1000.00 due on the 1st of Feb..Jul 2025
 */
export function makeLoan(overrides: Partial<Parameters<typeof createLoan>[0]> = {}): Loan {
  return createLoan({
    id: 'loan-1',
    customerId: 'cust-1',
    principal: Money.of('5000'),
    interestRate: '0.2',
    installmentCount: 6,
    createDate: '2025-01-10',
    newId: sequentialIds('inst'),
    ...overrides
  });
}

export function allocationOptions(today: string, overrides: Partial<AllocationOptions> = {}): AllocationOptions {
  return {
    today,
    policy: { dailyRate: '0.001', rounding: 'half_away_from_zero' },
    payableWindowMonths: 3,
    ...overrides
  };
}

export function testConfig(overrides: Partial<LendingConfig> = {}): LendingConfig {
  return { ...loadConfig({ LOG_LEVEL: 'silent' }), ...overrides };
}

export function makeDeps(
  today: string,
  options: { config?: Partial<LendingConfig>; repositories?: LendingRepositories } = {}
): LendingServiceDeps {
  let n = 0;
  return {
    repositories: options.repositories ?? createInMemoryRepositories(),
    clock: fixedClock(today),
    config: testConfig(options.config),
    logger: silentLogger,
    locks: { customers: new KeyedMutexes(), loans: new KeyedMutexes() },
    newId: () => `id-${++n}`
  };
}
