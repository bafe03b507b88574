/**
 * Money value type for deterministic, integer-safe financial calculations
 * Amounts are held in minor units (cents) as bigint together with currency and scale
 */

import Decimal from 'decimal.js';
import type { Currency, Minor, RemainderPlacement, RoundingMode } from '../../shared/lending-types';
import { IncompatibleUnitsError, InvalidAmountError } from './errors';

// Enough significant digits that no intermediate product is ever truncated
const Exact = Decimal.clone({ precision: 64 });

export const DEFAULT_CURRENCY: Currency = 'USD';
export const DEFAULT_SCALE = 2;

/**
 * Round an exact minor-unit value to a whole number of minor units.
 * This is the only place a computation chain is allowed to lose precision.
 */
export function roundMinor(x: Decimal.Value, mode: RoundingMode): Minor {
  const rounding = mode === 'half_even' ? Decimal.ROUND_HALF_EVEN : Decimal.ROUND_HALF_UP;
  return BigInt(new Exact(x).toDecimalPlaces(0, rounding).toFixed(0));
}

export class Money {
  private constructor(
    readonly minor: Minor,
    readonly currency: Currency,
    readonly scale: number
  ) {}

  /**
   * Build from a major-unit literal ("1000.50", 1000.5). Digits beyond the
   * scale are rounded with the given mode.
   */
  static of(
    value: Decimal.Value,
    currency: Currency = DEFAULT_CURRENCY,
    scale: number = DEFAULT_SCALE,
    mode: RoundingMode = 'half_away_from_zero'
  ): Money {
    assertScale(scale);
    let exact: Decimal;
    try {
      exact = new Exact(value);
    } catch {
      throw new InvalidAmountError(`Not a numeric amount: ${String(value)}`, { value: String(value) });
    }
    if (!exact.isFinite()) {
      throw new InvalidAmountError(`Not a finite amount: ${String(value)}`, { value: String(value) });
    }
    return new Money(roundMinor(exact.times(pow10(scale)), mode), currency, scale);
  }

  static fromMinor(minor: Minor, currency: Currency = DEFAULT_CURRENCY, scale: number = DEFAULT_SCALE): Money {
    assertScale(scale);
    return new Money(minor, currency, scale);
  }

  static zero(currency: Currency = DEFAULT_CURRENCY, scale: number = DEFAULT_SCALE): Money {
    return Money.fromMinor(0n, currency, scale);
  }

  static sum(values: readonly Money[], unit: Money = Money.zero()): Money {
    return values.reduce((acc, v) => acc.add(v), unit.withMinor(0n));
  }

  static min(a: Money, b: Money): Money {
    return a.compare(b) <= 0 ? a : b;
  }

  static max(a: Money, b: Money): Money {
    return a.compare(b) >= 0 ? a : b;
  }

  add(other: Money): Money {
    this.assertCompatible(other);
    return this.withMinor(this.minor + other.minor);
  }

  subtract(other: Money): Money {
    this.assertCompatible(other);
    return this.withMinor(this.minor - other.minor);
  }

  /**
   * Multiply by a scalar, rounding once at the end.
   */
  multiply(factor: Decimal.Value, mode: RoundingMode = 'half_away_from_zero'): Money {
    return this.withMinor(roundMinor(this.exactMinor().times(factor), mode));
  }

  /**
   * Divide by a positive integer count, rounding the single quotient.
   */
  divide(count: number, mode: RoundingMode = 'half_away_from_zero'): Money {
    assertCount(count);
    return this.withMinor(roundMinor(this.exactMinor().dividedBy(count), mode));
  }

  /**
   * Split into `count` shares that sum exactly to this amount. Every share but
   * one is the truncated quotient; the first or last absorbs the residual.
   */
  divideEvenly(count: number, placement: RemainderPlacement = 'last'): Money[] {
    assertCount(count);
    const n = BigInt(count);
    const share = this.minor / n; // bigint division truncates toward zero
    const residual = this.minor - share * n;
    const shares: Money[] = [];
    for (let i = 0; i < count; i++) shares.push(this.withMinor(share));
    const absorbing = placement === 'first' ? 0 : count - 1;
    shares[absorbing] = this.withMinor(share + residual);
    return shares;
  }

  compare(other: Money): -1 | 0 | 1 {
    this.assertCompatible(other);
    if (this.minor < other.minor) return -1;
    if (this.minor > other.minor) return 1;
    return 0;
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.scale === other.scale && this.minor === other.minor;
  }

  isZero(): boolean {
    return this.minor === 0n;
  }

  isPositive(): boolean {
    return this.minor > 0n;
  }

  isNegative(): boolean {
    return this.minor < 0n;
  }

  gte(other: Money): boolean {
    return this.compare(other) >= 0;
  }

  lt(other: Money): boolean {
    return this.compare(other) < 0;
  }

  /**
   * Exact value in minor units, for callers chaining several operations
   * before a single roundMinor().
   */
  exactMinor(): Decimal {
    return new Exact(this.minor.toString());
  }

  withMinor(minor: Minor): Money {
    return new Money(minor, this.currency, this.scale);
  }

  toDecimal(): Decimal {
    return this.exactMinor().dividedBy(pow10(this.scale));
  }

  toString(): string {
    return this.toDecimal().toFixed(this.scale);
  }

  toJSON(): { amount: string; currency: Currency } {
    return { amount: this.toString(), currency: this.currency };
  }

  format(): string {
    return `${this.toString()} ${this.currency}`;
  }

  assertCompatible(other: Money): void {
    if (this.currency !== other.currency || this.scale !== other.scale) {
      throw new IncompatibleUnitsError(
        `${this.currency}/${this.scale}`,
        `${other.currency}/${other.scale}`
      );
    }
  }
}

function pow10(scale: number): Decimal {
  return new Exact(10).pow(scale);
}

function assertScale(scale: number): void {
  if (!Number.isInteger(scale) || scale < 0 || scale > 8) {
    throw new InvalidAmountError(`Unsupported scale ${scale}`, { scale });
  }
}

function assertCount(count: number): void {
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidAmountError(`Count must be a positive integer, got ${count}`, { count });
  }
}
