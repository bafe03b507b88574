/**
 * Lending error taxonomy
 *
 * Every failure the engine reports extends LendingError so callers can tell a
 * business outcome ("nothing due yet", "not enough credit") from a system fault.
 */

import type { ErrorCategory } from '../../shared/lending-types';

export enum ErrorCode {
  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_LOAN_TERMS = 'INVALID_LOAN_TERMS',
  INVALID_INSTALLMENT_SELECTION = 'INVALID_INSTALLMENT_SELECTION',
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  INVALID_PAYMENT_DATE = 'INVALID_PAYMENT_DATE',

  // Capacity
  INSUFFICIENT_CREDIT = 'INSUFFICIENT_CREDIT',

  // Eligibility
  NO_ELIGIBLE_INSTALLMENTS = 'NO_ELIGIBLE_INSTALLMENTS',

  // State
  LOAN_NOT_ACTIVE = 'LOAN_NOT_ACTIVE',
  LOAN_HAS_PAYMENTS = 'LOAN_HAS_PAYMENTS',
  LOAN_NOT_FOUND = 'LOAN_NOT_FOUND',
  CUSTOMER_NOT_FOUND = 'CUSTOMER_NOT_FOUND',
  CONCURRENCY_CONFLICT = 'CONCURRENCY_CONFLICT',
  DUPLICATE_PAYMENT = 'DUPLICATE_PAYMENT',

  // Units
  INCOMPATIBLE_UNITS = 'INCOMPATIBLE_UNITS',

  // Defects
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION'
}

export type ErrorDetails = Record<string, unknown>;

export class LendingError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly category: ErrorCategory,
    public readonly details: ErrorDetails = {}
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * Malformed request (wrong types, missing fields) caught before any business rule runs
 */
export class RequestValidationError extends LendingError {
  constructor(message: string, public readonly fields: Record<string, string[]>) {
    super(message, ErrorCode.VALIDATION_ERROR, 'validation', { fields });
  }
}

export type LoanTermsField = 'principal' | 'interestRate' | 'installmentCount' | 'originationDate' | 'customerId';

export class InvalidLoanTermsError extends LendingError {
  constructor(public readonly field: LoanTermsField, message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.INVALID_LOAN_TERMS, 'validation', { field, ...details });
  }
}

export class InvalidInstallmentSelectionError extends LendingError {
  constructor(message: string, public readonly installmentNumbers: readonly number[]) {
    super(message, ErrorCode.INVALID_INSTALLMENT_SELECTION, 'validation', {
      installmentNumbers: [...installmentNumbers]
    });
  }
}

export class InvalidAmountError extends LendingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.INVALID_AMOUNT, 'validation', details);
  }
}

export class InvalidPaymentDateError extends LendingError {
  constructor(value: string) {
    super(`Payment date must be YYYY-MM-DD, got "${value}"`, ErrorCode.INVALID_PAYMENT_DATE, 'validation', { value });
  }
}

export class InsufficientCreditError extends LendingError {
  constructor(
    public readonly customerId: string,
    public readonly requested: string,
    public readonly available: string
  ) {
    super(
      `Requested ${requested} exceeds available credit ${available}`,
      ErrorCode.INSUFFICIENT_CREDIT,
      'capacity',
      { customerId, requested, available }
    );
  }
}

export class NoEligibleInstallmentsError extends LendingError {
  constructor(
    public readonly loanId: string,
    public readonly reason: 'loan_fully_paid' | 'outside_payable_window' | 'no_selected_installment_payable',
    details: ErrorDetails = {}
  ) {
    super(
      reason === 'loan_fully_paid'
        ? `Loan ${loanId} has no unpaid installments`
        : `Loan ${loanId} has no installment payable yet`,
      ErrorCode.NO_ELIGIBLE_INSTALLMENTS,
      'eligibility',
      { loanId, reason, ...details }
    );
  }
}

export class LoanNotActiveError extends LendingError {
  constructor(public readonly loanId: string, public readonly status: string) {
    super(`Loan ${loanId} is ${status}`, ErrorCode.LOAN_NOT_ACTIVE, 'state', { loanId, status });
  }
}

export class LoanHasPaymentsError extends LendingError {
  constructor(public readonly loanId: string, paidCount: number) {
    super(
      `Loan ${loanId} already has ${paidCount} paid installment(s)`,
      ErrorCode.LOAN_HAS_PAYMENTS,
      'state',
      { loanId, paidCount }
    );
  }
}

export class LoanNotFoundError extends LendingError {
  constructor(public readonly loanId: string) {
    super(`Loan ${loanId} not found`, ErrorCode.LOAN_NOT_FOUND, 'state', { loanId });
  }
}

export class CustomerNotFoundError extends LendingError {
  constructor(public readonly customerId: string) {
    super(`Customer ${customerId} not found`, ErrorCode.CUSTOMER_NOT_FOUND, 'state', { customerId });
  }
}

export class ConcurrencyConflictError extends LendingError {
  constructor(entity: 'customer' | 'loan', id: string, expectedVersion: number) {
    super(
      `${entity} ${id} was modified concurrently (expected version ${expectedVersion})`,
      ErrorCode.CONCURRENCY_CONFLICT,
      'state',
      { entity, id, expectedVersion }
    );
  }
}

export class DuplicatePaymentError extends LendingError {
  constructor(public readonly idempotencyKey: string, loanId: string) {
    super(
      `Idempotency key already used for a different loan (${loanId})`,
      ErrorCode.DUPLICATE_PAYMENT,
      'state',
      { idempotencyKey, loanId }
    );
  }
}

export class IncompatibleUnitsError extends LendingError {
  constructor(left: string, right: string) {
    super(`Cannot combine ${left} with ${right}`, ErrorCode.INCOMPATIBLE_UNITS, 'units', { left, right });
  }
}

/**
 * Programming defect. Never converted into an error result.
 */
export class InvariantViolationError extends LendingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.INVARIANT_VIOLATION, 'defect', details);
  }
}

export function isLendingError(error: unknown): error is LendingError {
  return error instanceof LendingError;
}

export function invariant(condition: boolean, message: string, details?: ErrorDetails): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message, details);
  }
}
