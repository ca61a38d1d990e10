/**
 * Account group configuration and balance lookups
 */

export const ASSET_GROUP_PREFIX = "assets_";
export const LIABILITY_GROUP_PREFIX = "liabilities_";

/**
 * Ordered mapping of group name to the account names it rolls up.
 * Names match `Account.name` exactly (case-sensitive).
 */
export type AccountGroupConfig = Record<string, string[]>;

/**
 * Balance per group for a single month, in major units
 */
export type GroupBalances = Record<string, number>;

export function isAssetGroup(groupName: string): boolean {
  return groupName.startsWith(ASSET_GROUP_PREFIX);
}

export function isLiabilityGroup(groupName: string): boolean {
  return groupName.startsWith(LIABILITY_GROUP_PREFIX);
}

/**
 * Balance of a group in a month; 0 when the month or group is absent.
 */
export function getGroupBalance(
  balances: GroupBalances | undefined,
  groupName: string
): number {
  return balances?.[groupName] ?? 0;
}

/**
 * Sum of all asset group balances (liabilities excluded)
 */
export function sumAssets(balances: GroupBalances | undefined): number {
  if (!balances) {
    return 0;
  }
  return Object.entries(balances).reduce(
    (sum, [groupName, value]) => (isAssetGroup(groupName) ? sum + value : sum),
    0
  );
}

/**
 * Sum of all liability group balances, typically negative
 */
export function sumLiabilities(balances: GroupBalances | undefined): number {
  if (!balances) {
    return 0;
  }
  return Object.entries(balances).reduce(
    (sum, [groupName, value]) => (isLiabilityGroup(groupName) ? sum + value : sum),
    0
  );
}

/**
 * Account names listed under more than one group.
 * Overlapping membership double-counts a balance.
 */
export function findOverlappingAccounts(config: AccountGroupConfig): string[] {
  const seen = new Set<string>();
  const overlapping = new Set<string>();
  for (const accountNames of Object.values(config)) {
    for (const name of new Set(accountNames)) {
      if (seen.has(name)) {
        overlapping.add(name);
      }
      seen.add(name);
    }
  }
  return [...overlapping];
}

/**
 * "assets_liquid" -> "Assets Liquid"
 */
export function humanizeGroupName(groupName: string): string {
  return groupName
    .split("_")
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
