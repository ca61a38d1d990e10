import { Account, Transaction } from "../models/Ledger";
import { AccountGroupConfig, GroupBalances } from "../models/AccountGroups";
import { ActivityByMonth, GroupMonthActivity, NetWorthByMonth } from "../models/Aggregates";
import {
  CalendarDate,
  currentUtcDate,
  formatMonthKey,
  isNotAfterMonth,
  parseTransactionDate,
  sortMonthKeys,
} from "../utils/time";
import { amountOrZero, sumBy, toMajorUnits } from "../utils/math";

export interface AggregationOptions {
  /** Date substituted for unreadable transaction dates; defaults to today (UTC) */
  today?: CalendarDate;
}

interface DatedTransaction {
  transaction: Transaction;
  date: CalendarDate;
}

/**
 * Resolves the account names of a group to account ids.
 * Names with no matching account contribute nothing.
 */
export function resolveGroupAccountIds(
  accountsById: Map<string, Account>,
  accountNames: readonly string[]
): Set<string> {
  const names = new Set(accountNames);
  const ids = new Set<string>();
  for (const account of accountsById.values()) {
    if (names.has(account.name)) {
      ids.add(account.id);
    }
  }
  return ids;
}

function indexAccounts(accounts: readonly Account[]): Map<string, Account> {
  return new Map(accounts.map((account) => [account.id, account]));
}

function resolveGroups(
  accounts: readonly Account[],
  accountGroups: AccountGroupConfig
): Array<[string, Set<string>]> {
  const accountsById = indexAccounts(accounts);
  return Object.entries(accountGroups).map(([groupName, accountNames]) => [
    groupName,
    resolveGroupAccountIds(accountsById, accountNames),
  ]);
}

function dateTransactions(
  transactions: readonly Transaction[],
  today: CalendarDate
): DatedTransaction[] {
  return transactions.map((transaction) => ({
    transaction,
    date: parseTransactionDate(transaction.date, today).date,
  }));
}

/**
 * Calculates the balance of every account group at the end of each month.
 *
 * Balances are cumulative: month `m` sums every transaction dated on or before
 * the last day of `m`, transfers included. Each month is computed from the full
 * transaction list, independent of the others. Every configured group appears
 * in every month, with 0 when none of its accounts has activity.
 *
 * @param transactions - Ledger transactions (amounts in minor units)
 * @param accounts - Ledger accounts, joined to groups by name
 * @param accountGroups - Group name -> account names
 * @returns Month key -> group name -> balance in major units
 */
export function computeNetWorthByMonth(
  transactions: readonly Transaction[],
  accounts: readonly Account[],
  accountGroups: AccountGroupConfig,
  options: AggregationOptions = {}
): NetWorthByMonth {
  const today = options.today ?? currentUtcDate();
  const groups = resolveGroups(accounts, accountGroups);
  const dated = dateTransactions(transactions, today);
  const months = sortMonthKeys(dated.map(({ date }) => formatMonthKey(date)));

  const netWorthByMonth: NetWorthByMonth = {};
  for (const month of months) {
    const upToMonth = dated.filter(({ date }) => isNotAfterMonth(date, month));

    const balances: GroupBalances = {};
    for (const [groupName, accountIds] of groups) {
      const minorUnits = sumBy(upToMonth, ({ transaction }) =>
        accountIds.has(transaction.account) ? amountOrZero(transaction.amount) : 0
      );
      balances[groupName] = toMajorUnits(minorUnits);
    }
    netWorthByMonth[month] = balances;
  }

  return netWorthByMonth;
}

/**
 * Groups each month's own transactions (not cumulative) by account group,
 * with the group's total for that month in major units.
 * Transactions without an account are skipped.
 */
export function processTransactionsByMonth(
  transactions: readonly Transaction[],
  accounts: readonly Account[],
  accountGroups: AccountGroupConfig,
  options: AggregationOptions = {}
): ActivityByMonth {
  const today = options.today ?? currentUtcDate();
  const groups = resolveGroups(accounts, accountGroups);

  const byMonth = new Map<string, Transaction[]>();
  for (const { transaction, date } of dateTransactions(transactions, today)) {
    if (!transaction.account) {
      continue;
    }
    const month = formatMonthKey(date);
    const bucket = byMonth.get(month) ?? [];
    bucket.push(transaction);
    byMonth.set(month, bucket);
  }

  const activity: ActivityByMonth = {};
  for (const month of sortMonthKeys(byMonth.keys())) {
    const monthTransactions = byMonth.get(month) ?? [];
    const perGroup: Record<string, GroupMonthActivity> = {};
    for (const [groupName, accountIds] of groups) {
      const groupTransactions = monthTransactions.filter((transaction) =>
        accountIds.has(transaction.account)
      );
      perGroup[groupName] = {
        transactions: groupTransactions,
        total: toMajorUnits(sumBy(groupTransactions, (transaction) => amountOrZero(transaction.amount))),
      };
    }
    activity[month] = perGroup;
  }

  return activity;
}
