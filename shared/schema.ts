import { pgTable, pgEnum, text, integer, bigint, numeric, date, timestamp, jsonb, index, unique, check } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

// Enums
export const loanStatusEnum = pgEnum("loan_status", ["active", "paid_off", "cancelled"]);
export const installmentStatusEnum = pgEnum("installment_status", ["PENDING", "PAID"]);

// Tables
export const customers = pgTable("customers", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  currency: text("currency").notNull(),
  scale: integer("scale").notNull().default(2),
  creditLimitMinor: bigint("credit_limit_minor", { mode: "bigint" }).notNull(),
  usedCreditMinor: bigint("used_credit_minor", { mode: "bigint" }).notNull().default(sql`0`),
  version: integer("version").notNull().default(0),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull()
}, (t) => ({
  usedWithinLimit: check("customers_used_within_limit", sql`${t.usedCreditMinor} >= 0 AND ${t.usedCreditMinor} <= ${t.creditLimitMinor}`)
}));

export const loans = pgTable("loans", {
  id: text("id").primaryKey(),
  customerId: text("customer_id").references(() => customers.id).notNull(),
  currency: text("currency").notNull(),
  scale: integer("scale").notNull().default(2),
  principalMinor: bigint("principal_minor", { mode: "bigint" }).notNull(),
  interestRate: numeric("interest_rate", { precision: 8, scale: 6 }).notNull(),
  installmentCount: integer("installment_count").notNull(),
  createDate: date("create_date").notNull(),
  status: loanStatusEnum("status").notNull().default("active"),
  reservedCreditMinor: bigint("reserved_credit_minor", { mode: "bigint" }).notNull(),
  cancellationReason: text("cancellation_reason"),
  version: integer("version").notNull().default(0),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull()
}, (t) => ({
  customerIdx: index("loans_customer_idx").on(t.customerId),
  statusIdx: index("loans_status_idx").on(t.status),
  allowedCount: check("loans_installment_count_allowed", sql`${t.installmentCount} IN (6, 9, 12, 24)`)
}));

export const loanInstallments = pgTable("loan_installments", {
  id: text("id").primaryKey(),
  loanId: text("loan_id").references(() => loans.id).notNull(),
  sequence: integer("sequence").notNull(),
  amountMinor: bigint("amount_minor", { mode: "bigint" }).notNull(),
  paidAmountMinor: bigint("paid_amount_minor", { mode: "bigint" }).notNull().default(sql`0`),
  dueDate: date("due_date").notNull(),
  paymentDate: date("payment_date"),
  status: installmentStatusEnum("status").notNull().default("PENDING")
}, (t) => ({
  loanSequence: unique("loan_installments_loan_sequence").on(t.loanId, t.sequence),
  dueIdx: index("loan_installments_due_idx").on(t.loanId, t.dueDate)
}));

export const paymentReceipts = pgTable("payment_receipts", {
  idempotencyKey: text("idempotency_key").primaryKey(),
  loanId: text("loan_id").references(() => loans.id).notNull(),
  currency: text("currency").notNull(),
  scale: integer("scale").notNull().default(2),
  amountMinor: bigint("amount_minor", { mode: "bigint" }).notNull(),
  paymentDate: date("payment_date").notNull(),
  result: jsonb("result").notNull(),
  recordedAt: timestamp("recorded_at", { withTimezone: true }).notNull()
}, (t) => ({
  loanIdx: index("payment_receipts_loan_idx").on(t.loanId)
}));

// Types
export type CustomerRow = typeof customers.$inferSelect;
export type InsertCustomerRow = typeof customers.$inferInsert;
export type LoanRow = typeof loans.$inferSelect;
export type InsertLoanRow = typeof loans.$inferInsert;
export type LoanInstallmentRow = typeof loanInstallments.$inferSelect;
export type InsertLoanInstallmentRow = typeof loanInstallments.$inferInsert;
export type PaymentReceiptRow = typeof paymentReceipts.$inferSelect;
export type InsertPaymentReceiptRow = typeof paymentReceipts.$inferInsert;
