import { AccountGroupConfig } from "../models/AccountGroups";
import { DEFAULT_ACCOUNT_GROUPS } from "../utils/constants";
import { AccountGroupConfigSchema, formatIssues } from "../utils/validation";

/**
 * Reads the account group configuration from its JSON form.
 *
 * Unset means the default groups. JSON that does not parse falls back to no
 * groups with a warning; JSON that parses but is not a valid configuration
 * (wrong shape, or an account listed in two groups) is rejected.
 */
export function loadAccountGroups(json: string | undefined): AccountGroupConfig {
  if (json === undefined) {
    return structuredClone(DEFAULT_ACCOUNT_GROUPS);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    console.warn(
      `[config] ACCOUNT_GROUPS is not valid JSON, using no groups: ${error instanceof Error ? error.message : String(error)}`
    );
    return {};
  }

  const parsed = AccountGroupConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ACCOUNT_GROUPS: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}
