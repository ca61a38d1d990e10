import { Category, Transaction, isCategorized, isIncomeCategory, isTransfer } from "../models/Ledger";
import { CashFlowByMonth, MonthKey } from "../models/Aggregates";
import { currentUtcDate, sortMonthKeys, toMonthKey } from "../utils/time";
import { amountOrZero, toMajorUnits } from "../utils/math";
import { AggregationOptions } from "./netWorth";

interface MonthTotals {
  income: number; // minor units
  expenses: number; // minor units, signed as recorded
}

/**
 * Calculates income, expenses and net cash flow per month.
 *
 * Transfers and uncategorized transactions are excluded. A transaction is income
 * when its category has `is_income: true`; every other category, including ids
 * missing from `categories`, counts as expense. `expenses` is reported unsigned,
 * while `net` uses the recorded signs (income minus outflow).
 */
export function computeCashFlowByMonth(
  transactions: readonly Transaction[],
  categories: readonly Category[],
  options: AggregationOptions = {}
): CashFlowByMonth {
  const today = options.today ?? currentUtcDate();
  const categoriesById = new Map(categories.map((category) => [category.id, category]));

  const totalsByMonth = new Map<MonthKey, MonthTotals>();
  for (const transaction of transactions) {
    if (isTransfer(transaction) || !isCategorized(transaction)) {
      continue;
    }

    const month = toMonthKey(transaction.date, today);
    const totals = totalsByMonth.get(month) ?? { income: 0, expenses: 0 };
    const amount = amountOrZero(transaction.amount);

    if (isIncomeCategory(categoriesById.get(transaction.category))) {
      totals.income += amount;
    } else {
      totals.expenses += amount;
    }
    totalsByMonth.set(month, totals);
  }

  const cashFlowByMonth: CashFlowByMonth = {};
  for (const month of sortMonthKeys(totalsByMonth.keys())) {
    const totals = totalsByMonth.get(month) ?? { income: 0, expenses: 0 };
    cashFlowByMonth[month] = {
      income: toMajorUnits(totals.income),
      expenses: toMajorUnits(Math.abs(totals.expenses)),
      net: toMajorUnits(totals.income + totals.expenses),
    };
  }

  return cashFlowByMonth;
}
