/**
 * Shared constants for ledger aggregation and the dashboard service.
 */

import { AccountGroupConfig } from "../models/AccountGroups";

/** Ledger amounts are stored in cents. */
export const MINOR_UNITS_PER_MAJOR = 100;

/** Used to turn a monthly expense figure into a yearly one. */
export const MONTHS_PER_YEAR = 12;

/** How often the cache pulls a fresh ledger snapshot. */
export const DEFAULT_REFRESH_INTERVAL_MS = 5 * 60 * 1000;

export const DEFAULT_PORT = 3000;

export const DEFAULT_API_BASE_URL = "http://localhost:5007";

/** Placeholder credentials; startup warns when they are still in use. */
export const DEMO_API_KEY = "demo_key_12345";

/** Groups used when ACCOUNT_GROUPS is not set. */
export const DEFAULT_ACCOUNT_GROUPS: AccountGroupConfig = {
  assets_liquid: ["Ally Savings", "Bank of America", "Capital One Checking"],
  assets_restricted: ["Roth IRA", "Vanguard 401k"],
  assets_investment: [],
  assets_physical: ["House Asset"],
  liabilities_installment: [],
  liabilities_physical: ["Mortgage"],
  liabilities_revolving: [],
  liabilities_transacting: ["HSBC"],
};
