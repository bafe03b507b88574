export { createLendingModule, type LendingModule, type LendingModuleOptions } from './bootstrap/lending';
export { getLogger, withCorrelation } from './bootstrap/logger';
export { loadConfig, type LendingConfig } from './config/lending-config';
export { Money, roundMinor } from './domain/money';
export { generateSchedule, scheduleTotals, totalRepayable } from './domain/schedule';
export { availableCredit, reserve, release } from './domain/credit-ledger';
export { simulateAdjustment } from './domain/adjustment';
export { applyPayment, commitAllocation, planAllocation, previewPayment } from './domain/allocation';
export { cancelLoan, createLoan, isLoanPaid, outstandingAmount, overdueInstallments } from './domain/loan';
export * from './domain/errors';
export type * from './domain/types';
export { LendingEngine, type OperationResult } from './services/lending-engine';
export { CreditService } from './services/credit-service';
export { LoanQueryService, type LoanSummary } from './services/loan-query-service';
export { OriginationService } from './services/origination-service';
export { PaymentService, type InstallmentQuote } from './services/payment-service';
export { createInMemoryRepositories } from './repositories/memory';
export type * from './repositories/types';
export { fixedClock, systemClock, type Clock } from './utils/clock';
export { generatePaymentKey } from './utils/idempotency';
export { toErrorResponse } from './utils/error-handler';
