/**
 * Error translation for callers of the engine
 *
 * Maps zod failures to RequestValidationError and any error to a
 * transport-neutral payload. Defects are never disguised as business outcomes.
 */

import { ZodError, type ZodIssue } from 'zod';
import { ErrorCode, LendingError, RequestValidationError, type ErrorDetails } from '../domain/errors';

export interface ErrorResponse {
  error: string;
  code: ErrorCode | 'INTERNAL_ERROR';
  category: string;
  details?: ErrorDetails;
  timestamp: string;
}

function issueMessage(issue: ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' ? 'Required.' : `Invalid format. Expected ${issue.expected}.`;
    case 'too_small':
      return `Must be at least ${String(issue.minimum)}.`;
    case 'too_big':
      return `Must be at most ${String(issue.maximum)}.`;
    default:
      return issue.message;
  }
}

/**
 * Maps Zod validation errors to a field → messages record
 */
export function mapZodError(error: ZodError): RequestValidationError {
  const fields: Record<string, string[]> = {};

  error.issues.forEach(issue => {
    const path = issue.path.join('.') || '(root)';
    (fields[path] ??= []).push(issueMessage(issue));
  });

  const names = Object.keys(fields);
  const message = names.length === 1
    ? `Invalid ${names[0]}: ${fields[names[0]].join(' ')}`
    : `Invalid request: ${names.join(', ')}`;

  return new RequestValidationError(message, fields);
}

export function toErrorResponse(error: unknown, now: Date = new Date()): ErrorResponse {
  const timestamp = now.toISOString();

  if (error instanceof ZodError) {
    return toErrorResponse(mapZodError(error), now);
  }

  if (error instanceof LendingError && error.category !== 'defect') {
    return {
      error: error.message,
      code: error.code,
      category: error.category,
      details: error.details,
      timestamp
    };
  }

  // Defects and unknown failures: no internals leak to the caller
  return {
    error: 'An unexpected error occurred.',
    code: 'INTERNAL_ERROR',
    category: 'defect',
    timestamp
  };
}
