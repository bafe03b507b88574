/**
 * Idempotency keys for payments
 * A key identifies one logical payment; replaying it must not allocate twice
 */

import { createHash } from 'crypto';

export interface PaymentKeyComponents {
  loanId: string;
  amount: string;
  paymentDate: string;
  externalRef: string;
}

/**
 * Deterministic key from payment attributes
 */
export function generatePaymentKey(components: PaymentKeyComponents): string {
  const normalized = {
    loan_id: components.loanId.trim(),
    amount: components.amount.trim(),
    payment_date: components.paymentDate.trim(),
    external_ref: components.externalRef.trim()
  };

  const payload = JSON.stringify(normalized, Object.keys(normalized).sort());
  return createHash('sha256').update(payload).digest('hex');
}
