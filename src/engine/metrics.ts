import { sumAssets } from "../models/AccountGroups";
import { CashFlowByMonth, Metrics, NetWorthByMonth, getCashFlow } from "../models/Aggregates";
import { positiveRatio } from "../utils/math";
import { sortMonthKeys } from "../utils/time";
import { MONTHS_PER_YEAR } from "../utils/constants";

/**
 * Share of income kept: (income - expenses) / income, 0 without income.
 */
export function savingsRate(income: number, expenses: number): number {
  return positiveRatio(income - expenses, income);
}

/**
 * Monthly expenses as a share of total assets, 0 without assets.
 */
export function withdrawalRate(expenses: number, totalAssets: number): number {
  return positiveRatio(expenses, totalAssets);
}

/**
 * Years of expenses covered by total assets, 0 without expenses.
 */
export function savingsMultiple(totalAssets: number, expenses: number): number {
  return positiveRatio(totalAssets, expenses * MONTHS_PER_YEAR);
}

/**
 * Derives the monthly health ratios.
 *
 * One entry per cash-flow month, most recent first. Total assets are the sum of
 * the month's `assets_*` group balances; a month missing from `netWorthByMonth`
 * has no assets.
 */
export function computeMetrics(
  netWorthByMonth: NetWorthByMonth,
  cashFlowByMonth: CashFlowByMonth
): Metrics {
  const metrics: Metrics = { savingsRate: [], withdrawalRate: [], savingsMultiple: [] };

  for (const month of sortMonthKeys(Object.keys(cashFlowByMonth))) {
    const { income, expenses } = getCashFlow(cashFlowByMonth, month);
    const totalAssets = sumAssets(netWorthByMonth[month]);

    metrics.savingsRate.push(savingsRate(income, expenses));
    metrics.withdrawalRate.push(withdrawalRate(expenses, totalAssets));
    metrics.savingsMultiple.push(savingsMultiple(totalAssets, expenses));
  }

  return {
    savingsRate: metrics.savingsRate.reverse(),
    withdrawalRate: metrics.withdrawalRate.reverse(),
    savingsMultiple: metrics.savingsMultiple.reverse(),
  };
}
