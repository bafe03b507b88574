/**
 * Business constants for loan products and payment handling
 */

// Loan term limits
export const LOAN_TERMS = {
  ALLOWED_INSTALLMENT_COUNTS: [6, 9, 12, 24],
  MIN_MONTHLY_RATE: '0.1',
  MAX_MONTHLY_RATE: '0.5'
} as const;

// Payment handling defaults, overridable through the environment
export const PAYMENT_DEFAULTS = {
  DAILY_ADJUSTMENT_RATE: '0.001', // per day early (discount) or late (penalty)
  PAYABLE_WINDOW_MONTHS: 3,
  ROUNDING: 'half_away_from_zero',
  REMAINDER_PLACEMENT: 'last'
} as const;

export const MONEY_DEFAULTS = {
  CURRENCY: 'USD',
  SCALE: 2
} as const;
