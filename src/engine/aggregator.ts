import { AccountGroupConfig } from "../models/AccountGroups";
import { LedgerAggregate } from "../models/Aggregates";
import { LedgerSnapshot } from "../models/Ledger";
import { currentUtcDate, parseTransactionDate } from "../utils/time";
import { deepFreeze } from "../utils/immutability";
import { computeCashFlowByMonth } from "./cashFlow";
import { computeMetrics } from "./metrics";
import { AggregationOptions, computeNetWorthByMonth } from "./netWorth";

export type AggregationInput = Pick<LedgerSnapshot, "accounts" | "categories" | "transactions">;

/**
 * Runs the full aggregation pass over one ledger snapshot.
 *
 * Net worth and cash flow are computed independently from the same transactions,
 * then both feed the metrics. The result is frozen. Unreadable transaction dates
 * are bucketed into `today`'s month and counted in `diagnostics.dateFallbackCount`.
 */
export function aggregateLedger(
  ledger: AggregationInput,
  accountGroups: AccountGroupConfig,
  options: AggregationOptions = {}
): LedgerAggregate {
  const today = options.today ?? currentUtcDate();
  const { accounts, categories, transactions } = ledger;

  const netWorthByMonth = computeNetWorthByMonth(transactions, accounts, accountGroups, { today });
  const cashFlowByMonth = computeCashFlowByMonth(transactions, categories, { today });
  const metrics = computeMetrics(netWorthByMonth, cashFlowByMonth);

  const dateFallbackCount = transactions.filter(
    (transaction) => parseTransactionDate(transaction.date, today).fallback
  ).length;

  return deepFreeze({
    netWorthByMonth,
    cashFlowByMonth,
    metrics,
    diagnostics: {
      transactionCount: transactions.length,
      dateFallbackCount,
    },
  });
}
