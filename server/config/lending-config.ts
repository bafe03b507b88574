/**
 * Runtime configuration, read once from the environment and validated with zod
 */

import { z } from 'zod';
import type { Currency, RemainderPlacement, RoundingMode } from '../../shared/lending-types';
import { MONEY_DEFAULTS, PAYMENT_DEFAULTS } from './constants';

const decimalString = z.string().trim().regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal');

const envSchema = z.object({
  LENDING_DAILY_ADJUSTMENT_RATE: decimalString.default(PAYMENT_DEFAULTS.DAILY_ADJUSTMENT_RATE),
  LENDING_PAYABLE_WINDOW_MONTHS: z.coerce.number().int().min(0).max(24).default(PAYMENT_DEFAULTS.PAYABLE_WINDOW_MONTHS),
  LENDING_ROUNDING_MODE: z.enum(['half_away_from_zero', 'half_even']).default(PAYMENT_DEFAULTS.ROUNDING),
  LENDING_REMAINDER_PLACEMENT: z.enum(['first', 'last']).default(PAYMENT_DEFAULTS.REMAINDER_PLACEMENT),
  LENDING_CURRENCY: z.enum(['USD', 'EUR', 'GBP', 'AED']).default(MONEY_DEFAULTS.CURRENCY),
  LENDING_CURRENCY_SCALE: z.coerce.number().int().min(0).max(8).default(MONEY_DEFAULTS.SCALE),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z.enum(['true', 'false']).default('false'),
  DATABASE_URL: z.string().url().optional()
});

export interface LendingConfig {
  dailyAdjustmentRate: string;
  payableWindowMonths: number;
  rounding: RoundingMode;
  remainderPlacement: RemainderPlacement;
  currency: Currency;
  currencyScale: number;
  logLevel: string;
  logPretty: boolean;
  databaseUrl?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): LendingConfig {
  // Unset and empty variables both fall back to defaults
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid lending configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    dailyAdjustmentRate: e.LENDING_DAILY_ADJUSTMENT_RATE,
    payableWindowMonths: e.LENDING_PAYABLE_WINDOW_MONTHS,
    rounding: e.LENDING_ROUNDING_MODE,
    remainderPlacement: e.LENDING_REMAINDER_PLACEMENT,
    currency: e.LENDING_CURRENCY,
    currencyScale: e.LENDING_CURRENCY_SCALE,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === 'true',
    databaseUrl: e.DATABASE_URL
  };
}

export const defaultConfig: LendingConfig = loadConfig({});
