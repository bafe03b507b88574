import type { Logger } from '../bootstrap/logger';
import type { LendingConfig } from '../config/lending-config';
import type { LendingRepositories } from '../repositories/types';
import type { Clock } from '../utils/clock';
import type { KeyedMutexes } from '../utils/locks';

export interface LendingLocks {
  customers: KeyedMutexes;
  loans: KeyedMutexes;
}

export interface LendingServiceDeps {
  repositories: LendingRepositories;
  clock: Clock;
  config: LendingConfig;
  logger: Logger;
  locks: LendingLocks;
  newId?: () => string;
}
