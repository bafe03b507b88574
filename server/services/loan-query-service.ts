/**
 * Read side of the lending services: a customer's loans, a loan's schedule
 * and what is overdue as of today.
 */

import { CustomerNotFoundError, LoanNotFoundError } from '../domain/errors';
import { outstandingAmount, overdueInstallments, unpaidInstallments } from '../domain/loan';
import type { Money } from '../domain/money';
import type { Loan, LoanInstallment } from '../domain/types';
import type { LendingServiceDeps } from './types';

export interface LoanSummary {
  loan: Loan;
  // Scheduled amount of the unpaid installments, before any adjustment
  outstanding: Money;
  overdue: LoanInstallment[];
  nextDue: LoanInstallment | null;
}

export class LoanQueryService {
  constructor(private readonly deps: LendingServiceDeps) {}

  private async loadLoan(loanId: string): Promise<Loan> {
    const loan = await this.deps.repositories.loans.findById(loanId);
    if (!loan) throw new LoanNotFoundError(loanId);
    return loan;
  }

  private summarize(loan: Loan): LoanSummary {
    return {
      loan,
      outstanding: outstandingAmount(loan),
      overdue: overdueInstallments(loan, this.deps.clock.today()),
      nextDue: unpaidInstallments(loan)[0] ?? null
    };
  }

  async loansOf(customerId: string): Promise<LoanSummary[]> {
    const { customers, loans } = this.deps.repositories;
    if (!(await customers.findById(customerId))) {
      throw new CustomerNotFoundError(customerId);
    }
    return (await loans.listByCustomer(customerId)).map(loan => this.summarize(loan));
  }

  async summary(loanId: string): Promise<LoanSummary> {
    return this.summarize(await this.loadLoan(loanId));
  }

  async installments(loanId: string): Promise<LoanInstallment[]> {
    return (await this.loadLoan(loanId)).installments;
  }

  async overdue(loanId: string): Promise<LoanInstallment[]> {
    return overdueInstallments(await this.loadLoan(loanId), this.deps.clock.today());
  }
}
