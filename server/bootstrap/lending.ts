/**
 * Composition root: wires repositories, clock, config, logger and locks into
 * the lending services.
 */

import type { Pool } from 'pg';
import { loadConfig, type LendingConfig } from '../config/lending-config';
import { createDbPool, createLendingDb } from '../db';
import { createPgRepositories } from '../db/lending-repository';
import { createInMemoryRepositories } from '../repositories/memory';
import type { LendingRepositories } from '../repositories/types';
import { CreditService } from '../services/credit-service';
import { LendingEngine } from '../services/lending-engine';
import { LoanQueryService } from '../services/loan-query-service';
import { OriginationService } from '../services/origination-service';
import { PaymentService } from '../services/payment-service';
import type { LendingServiceDeps } from '../services/types';
import { systemClock, type Clock } from '../utils/clock';
import { KeyedMutexes } from '../utils/locks';
import { getLogger, type Logger } from './logger';

export interface LendingModuleOptions {
  config?: LendingConfig;
  clock?: Clock;
  logger?: Logger;
  repositories?: LendingRepositories;
  newId?: () => string;
}

export interface LendingModule {
  config: LendingConfig;
  engine: LendingEngine;
  credit: CreditService;
  origination: OriginationService;
  payments: PaymentService;
  loans: LoanQueryService;
  repositories: LendingRepositories;
  close(): Promise<void>;
}

export function createLendingModule(options: LendingModuleOptions = {}): LendingModule {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? getLogger(config.logLevel, config.logPretty);

  let pool: Pool | undefined;
  let repositories = options.repositories;
  if (!repositories) {
    if (config.databaseUrl) {
      pool = createDbPool(config.databaseUrl);
      repositories = createPgRepositories(createLendingDb(pool));
    } else {
      logger.warn('DATABASE_URL not set, using in-memory repositories');
      repositories = createInMemoryRepositories();
    }
  }

  const deps: LendingServiceDeps = {
    repositories,
    clock,
    config,
    logger,
    locks: { customers: new KeyedMutexes(), loans: new KeyedMutexes() },
    newId: options.newId
  };

  return {
    config,
    engine: new LendingEngine(config, clock),
    credit: new CreditService(deps),
    origination: new OriginationService(deps),
    payments: new PaymentService(deps),
    loans: new LoanQueryService(deps),
    repositories,
    async close() {
      await pool?.end();
    }
  };
}
