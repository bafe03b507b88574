/**
 * Lending domain primitives
 * Money values travel as minor units (cents) in bigint; dates as ISO calendar dates
 */

export type Minor = bigint; // cents
export type Currency = 'USD' | 'EUR' | 'GBP' | 'AED';
export type IsoDate = string; // YYYY-MM-DD
export type UUID = string;

export type RoundingMode = 'half_away_from_zero' | 'half_even';

// Which installment absorbs the minor units left over by an uneven split
export type RemainderPlacement = 'first' | 'last';

// Schedules are only offered in these lengths
export type InstallmentCount = 6 | 9 | 12 | 24;

export type InstallmentStatus = 'PENDING' | 'PAID';

export type LoanStatus =
  | 'active'
  | 'paid_off'
  | 'cancelled';

export type ErrorCategory =
  | 'validation'
  | 'capacity'
  | 'eligibility'
  | 'state'
  | 'units'
  | 'defect';
