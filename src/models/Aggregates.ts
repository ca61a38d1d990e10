/**
 * Aggregate structures produced by the engine
 */

import { GroupBalances } from "./AccountGroups";
import { Transaction } from "./Ledger";

/** "YYYY-MM" */
export type MonthKey = string;

/**
 * Cumulative balance per account group at the end of each month
 */
export type NetWorthByMonth = Record<MonthKey, GroupBalances>;

export interface CashFlowEntry {
  income: number;
  expenses: number; // always >= 0
  net: number;
}

export type CashFlowByMonth = Record<MonthKey, CashFlowEntry>;

/**
 * Per-month health ratios, most recent month first
 */
export interface Metrics {
  savingsRate: number[];
  withdrawalRate: number[];
  savingsMultiple: number[];
}

export interface GroupMonthActivity {
  transactions: Transaction[];
  total: number;
}

/**
 * Non-cumulative activity per group within each month
 */
export type ActivityByMonth = Record<MonthKey, Record<string, GroupMonthActivity>>;

export interface AggregateDiagnostics {
  transactionCount: number;
  dateFallbackCount: number;
}

export interface LedgerAggregate {
  netWorthByMonth: NetWorthByMonth;
  cashFlowByMonth: CashFlowByMonth;
  metrics: Metrics;
  diagnostics: AggregateDiagnostics;
}

export const ZERO_CASH_FLOW: Readonly<CashFlowEntry> = Object.freeze({
  income: 0,
  expenses: 0,
  net: 0,
});

/**
 * Cash flow of a month; zeros when the month has no categorized activity.
 */
export function getCashFlow(cashFlowByMonth: CashFlowByMonth, month: MonthKey): CashFlowEntry {
  return cashFlowByMonth[month] ?? { ...ZERO_CASH_FLOW };
}
