/**
 * Payment collaborator: loads the loan, runs the allocation engine, persists
 * the outcome and releases credit for loans that end up paid off.
 *
 * Payments on one loan are serialized; a replayed idempotency key returns the
 * recorded result instead of allocating the funds a second time. Log lines of
 * a payment carry its idempotency key as correlation id unless the caller
 * already set one.
 */

import type { IsoDate } from '../../shared/lending-types';
import { currentCorrelationId, withCorrelation } from '../bootstrap/logger';
import { simulateAdjustment } from '../domain/adjustment';
import { applyPayment, payableInstallments, previewPayment } from '../domain/allocation';
import { DuplicatePaymentError, LoanNotFoundError, isLendingError } from '../domain/errors';
import { Money } from '../domain/money';
import type { AdjustmentQuote, Loan, PaymentResult } from '../domain/types';
import type { LoanChangeSet } from '../repositories/types';
import { redactId } from '../utils/redact';
import {
  parseRequest,
  paymentRequestSchema,
  previewRequestSchema,
  type PaymentRequest,
  type PreviewRequest
} from '../utils/validators';
import { CreditService } from './credit-service';
import { adjustmentPolicy, allocationOptions } from './lending-engine';
import type { LendingServiceDeps } from './types';

export interface InstallmentQuote extends AdjustmentQuote {
  sequence: number;
  dueDate: IsoDate;
  amount: Money;
}

export class PaymentService {
  private readonly credit: CreditService;

  constructor(private readonly deps: LendingServiceDeps) {
    this.credit = new CreditService(deps);
  }

  private async loadLoan(loanId: string): Promise<Loan> {
    const loan = await this.deps.repositories.loans.findById(loanId);
    if (!loan) throw new LoanNotFoundError(loanId);
    return loan;
  }

  private amountFor(loan: Loan, amount: string): Money {
    return Money.of(amount, loan.principal.currency, loan.principal.scale, this.deps.config.rounding);
  }

  async pay(input: PaymentRequest): Promise<PaymentResult> {
    const req = parseRequest(paymentRequestSchema, input);
    const { repositories, locks, logger, config, clock } = this.deps;

    return withCorrelation(currentCorrelationId() ?? req.idempotencyKey, () =>
      locks.loans.runExclusive(req.loanId, async () => {
        const recorded = await repositories.receipts.findByKey(req.idempotencyKey);
        if (recorded) {
          if (recorded.loanId !== req.loanId) {
            throw new DuplicatePaymentError(req.idempotencyKey, recorded.loanId);
          }
          logger.info({
            loanId: redactId(req.loanId),
            idempotencyKey: req.idempotencyKey
          }, 'Payment replayed, returning recorded result');
          return recorded.result;
        }

        const loan = await this.loadLoan(req.loanId);
        const expectedVersion = loan.version;
        const amount = this.amountFor(loan, req.amount);
        const paymentDate = req.paymentDate ?? clock.today();

        let result: PaymentResult;
        try {
          result = applyPayment(
            loan,
            amount,
            paymentDate,
            allocationOptions(config, clock.today()),
            req.installmentNumbers
          );
        } catch (error) {
          if (isLendingError(error)) {
            logger.warn({
              loanId: redactId(loan.id),
              amount: amount.toString(),
              code: error.code,
              details: error.details
            }, 'Payment rejected');
          }
          throw error;
        }

        // Loan, receipt and any released credit are written together or not at all
        const changes: LoanChangeSet = {
          loan: { entity: loan, expectedVersion },
          receipt: {
            idempotencyKey: req.idempotencyKey,
            loanId: loan.id,
            amount,
            paymentDate,
            result,
            recordedAt: clock.now().toISOString()
          }
        };
        if (result.creditToRelease.isPositive()) {
          // Lock order is always loan, then customer
          await this.credit.release(loan.customerId, result.creditToRelease, loan.id,
            customer => repositories.unitOfWork.commit({ ...changes, customer }));
        } else {
          await repositories.unitOfWork.commit(changes);
        }

        logger.info({
          loanId: redactId(loan.id),
          paymentDate,
          amount: amount.toString(),
          installmentsPaid: result.installmentsPaid,
          applied: result.totalAmountApplied.toString(),
          unapplied: result.remainingUnappliedAmount.toString(),
          paidOff: result.isLoanFullyPaid
        }, 'Payment applied');

        return result;
      })
    );
  }

  /**
   * What a payment would settle, without saving anything
   */
  async preview(input: PreviewRequest): Promise<PaymentResult> {
    const req = parseRequest(previewRequestSchema, input);
    const { config, clock } = this.deps;
    const loan = await this.loadLoan(req.loanId);

    return previewPayment(
      loan,
      this.amountFor(loan, req.amount),
      req.paymentDate ?? clock.today(),
      allocationOptions(config, clock.today()),
      req.installmentNumbers
    );
  }

  /**
   * Adjusted amount due for every installment payable today
   */
  async quote(loanId: string, paymentDate?: IsoDate): Promise<InstallmentQuote[]> {
    const { config, clock } = this.deps;
    const loan = await this.loadLoan(loanId);
    const policy = adjustmentPolicy(config);
    const date = paymentDate ?? clock.today();

    return payableInstallments(loan, clock.today(), config.payableWindowMonths).map(installment => ({
      sequence: installment.sequence,
      dueDate: installment.dueDate,
      amount: installment.amount,
      ...simulateAdjustment(installment, date, policy)
    }));
  }
}
