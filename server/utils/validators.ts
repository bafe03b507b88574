import { z } from 'zod';
import { mapZodError } from './error-handler';

// Amounts arrive as decimal strings or numbers in major units
export const amountSchema = z.union([
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Amount must be a decimal number'),
  z.number().finite()
]).transform(v => String(v));

export const dateStringSchema = z.string().regex(
  /^\d{4}-\d{2}-\d{2}$/,
  'Date must be in YYYY-MM-DD format'
);

export const idSchema = z.string().trim().min(1, 'Identifier is required').max(64);

export const originationRequestSchema = z.object({
  customerId: idSchema,
  principal: amountSchema,
  interestRate: amountSchema,
  installmentCount: z.number().int('Installment count must be a whole number'),
  originationDate: dateStringSchema.optional()
});

export const paymentRequestSchema = z.object({
  loanId: idSchema,
  amount: amountSchema,
  paymentDate: dateStringSchema.optional(),
  installmentNumbers: z.array(z.number().int()).optional(),
  idempotencyKey: z.string().trim().min(1).max(128)
});

export const previewRequestSchema = paymentRequestSchema.omit({ idempotencyKey: true });

export const cancellationRequestSchema = z.object({
  loanId: idSchema,
  reason: z.string().trim().min(1, 'A reason is required').max(500)
});

export type OriginationRequest = z.input<typeof originationRequestSchema>;
export type PaymentRequest = z.input<typeof paymentRequestSchema>;
export type PreviewRequest = z.input<typeof previewRequestSchema>;
export type CancellationRequest = z.input<typeof cancellationRequestSchema>;

/**
 * Parse or throw RequestValidationError
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw mapZodError(result.error);
  }
  return result.data;
}
