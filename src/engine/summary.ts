import {
  AccountGroupConfig,
  getGroupBalance,
  humanizeGroupName,
  sumAssets,
  sumLiabilities,
} from "../models/AccountGroups";
import { LedgerAggregate, MonthKey, getCashFlow } from "../models/Aggregates";
import { sortMonthKeys } from "../utils/time";
import { savingsRate } from "./metrics";

export interface ChartSeries {
  label: string;
  data: number[];
}

export interface ChartData {
  labels: MonthKey[];
  datasets: ChartSeries[];
}

export interface GroupBalanceRow {
  group: string;
  label: string;
  balance: number;
}

/**
 * Figures shown on the dashboard: headline cards, the two charts and the group table
 */
export interface DashboardSummary {
  latestMonth: MonthKey | null;
  currentAssets: number;
  currentDebts: number;
  currentNetWorth: number;
  currentSavingsRate: number;
  netWorthChart: ChartData;
  cashFlowChart: ChartData;
  groupBalances: GroupBalanceRow[];
}

function latest(months: MonthKey[]): MonthKey | null {
  return months.length > 0 ? months[months.length - 1] : null;
}

/**
 * Builds the dashboard view of an aggregate.
 * Debts are liability balances as recorded (negative), so net worth is assets + debts.
 */
export function buildDashboardSummary(
  aggregate: LedgerAggregate,
  accountGroups: AccountGroupConfig
): DashboardSummary {
  const { netWorthByMonth, cashFlowByMonth } = aggregate;
  const netWorthMonths = sortMonthKeys(Object.keys(netWorthByMonth));
  const cashFlowMonths = sortMonthKeys(Object.keys(cashFlowByMonth));

  const latestMonth = latest(netWorthMonths);
  const latestBalances = latestMonth ? netWorthByMonth[latestMonth] : undefined;
  const currentAssets = sumAssets(latestBalances);
  const currentDebts = sumLiabilities(latestBalances);

  const latestCashFlowMonth = latest(cashFlowMonths);
  const latestCashFlow = latestCashFlowMonth
    ? getCashFlow(cashFlowByMonth, latestCashFlowMonth)
    : undefined;

  return {
    latestMonth,
    currentAssets,
    currentDebts,
    currentNetWorth: currentAssets + currentDebts,
    currentSavingsRate: latestCashFlow
      ? savingsRate(latestCashFlow.income, latestCashFlow.expenses)
      : 0,
    netWorthChart: {
      labels: netWorthMonths,
      datasets: [
        { label: "Assets", data: netWorthMonths.map((month) => sumAssets(netWorthByMonth[month])) },
        { label: "Debts", data: netWorthMonths.map((month) => sumLiabilities(netWorthByMonth[month])) },
      ],
    },
    cashFlowChart: {
      labels: cashFlowMonths,
      datasets: [
        { label: "Income", data: cashFlowMonths.map((month) => getCashFlow(cashFlowByMonth, month).income) },
        { label: "Expenses", data: cashFlowMonths.map((month) => getCashFlow(cashFlowByMonth, month).expenses) },
      ],
    },
    groupBalances: Object.keys(accountGroups).map((group) => ({
      group,
      label: humanizeGroupName(group),
      balance: getGroupBalance(latestBalances, group),
    })),
  };
}
