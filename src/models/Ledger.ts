/**
 * Ledger records as served by the budgeting app's HTTP API.
 * Field names follow the wire format.
 */

export interface Account {
  id: string;
  name: string;
  offbudget?: boolean;
  closed?: boolean;
}

export interface Category {
  id: string;
  name?: string;
  group_id?: string;
  is_income?: boolean;
}

export interface Payee {
  id: string;
  name: string;
}

export interface Transaction {
  id: string;
  account: string;
  category?: string | null;
  amount?: number | null; // minor units, signed
  date?: unknown; // "YYYY-MM-DD" or "YYYYMMDD"; anything else falls back to today
  transfer_id?: string | null;
  payee?: string | null;
  notes?: string | null;
}

/**
 * One point-in-time pull of the ledger.
 */
export interface LedgerSnapshot {
  accounts: Account[];
  categories: Category[];
  payees: Payee[];
  transactions: Transaction[];
}

/**
 * Whether a transaction moves money between two of the user's own accounts
 */
export function isTransfer(transaction: Transaction): boolean {
  return transaction.transfer_id !== null && transaction.transfer_id !== undefined;
}

/**
 * Whether a transaction carries a category id
 */
export function isCategorized(
  transaction: Transaction
): transaction is Transaction & { category: string } {
  return typeof transaction.category === "string";
}

export function isIncomeCategory(category: Category | undefined): boolean {
  return category?.is_income === true;
}
