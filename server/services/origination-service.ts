/**
 * Loan origination: reserve credit, build the schedule, persist the loan.
 * Runs under the customer lock so two originations cannot race on the
 * available credit.
 */

import { reserve } from '../domain/credit-ledger';
import { LoanNotFoundError, isLendingError } from '../domain/errors';
import { cancelLoan, createLoan } from '../domain/loan';
import { Money } from '../domain/money';
import type { Loan } from '../domain/types';
import { redactId } from '../utils/redact';
import {
  cancellationRequestSchema,
  originationRequestSchema,
  parseRequest,
  type CancellationRequest,
  type OriginationRequest
} from '../utils/validators';
import { CreditService } from './credit-service';
import type { LendingServiceDeps } from './types';

export class OriginationService {
  private readonly credit: CreditService;

  constructor(private readonly deps: LendingServiceDeps) {
    this.credit = new CreditService(deps);
  }

  async originate(input: OriginationRequest): Promise<Loan> {
    const req = parseRequest(originationRequestSchema, input);
    const { repositories, locks, logger, config, clock } = this.deps;

    return locks.customers.runExclusive(req.customerId, async () => {
      try {
        const customer = await this.credit.load(req.customerId);
        const expectedVersion = customer.version;
        const principal = Money.of(
          req.principal,
          customer.creditLimit.currency,
          customer.creditLimit.scale,
          config.rounding
        );
        // Terms are validated here, before the reservation touches the customer
        const loan = createLoan({
          customerId: customer.id,
          principal,
          interestRate: req.interestRate,
          installmentCount: req.installmentCount,
          createDate: req.originationDate ?? clock.today(),
          rounding: config.rounding,
          remainder: config.remainderPlacement,
          newId: this.deps.newId
        });

        reserve(customer, principal);
        // The reservation and the new loan land together or not at all
        await repositories.unitOfWork.commit({
          loan: { entity: loan, expectedVersion: null },
          customer: { entity: customer, expectedVersion }
        });

        logger.info({
          loanId: redactId(loan.id),
          customerId: redactId(customer.id),
          principal: principal.toString(),
          installments: loan.installmentCount,
          firstDueDate: loan.installments[0].dueDate
        }, 'Loan originated');
        return loan;
      } catch (error) {
        if (isLendingError(error)) {
          logger.warn({
            customerId: redactId(req.customerId),
            code: error.code,
            details: error.details
          }, 'Loan origination rejected');
        } else {
          logger.error({ err: error, customerId: redactId(req.customerId) }, 'Loan origination failed');
        }
        throw error;
      }
    });
  }

  /**
   * Cancel a loan that has not received any payment and release its credit
   */
  async cancel(input: CancellationRequest): Promise<Loan> {
    const req = parseRequest(cancellationRequestSchema, input);
    const { repositories, locks, logger } = this.deps;

    const loan = await locks.loans.runExclusive(req.loanId, async () => {
      const loan = await repositories.loans.findById(req.loanId);
      if (!loan) throw new LoanNotFoundError(req.loanId);

      const expectedVersion = loan.version;
      const released = cancelLoan(loan, req.reason);
      // Lock order is always loan, then customer
      await this.credit.release(loan.customerId, released, loan.id, customer =>
        repositories.unitOfWork.commit({ loan: { entity: loan, expectedVersion }, customer }));
      return loan;
    });

    logger.info({ loanId: redactId(loan.id), reason: req.reason }, 'Loan cancelled');
    return loan;
  }
}
