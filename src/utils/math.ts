/**
 * Money and ratio helpers.
 * Ledger amounts are integer minor units (cents); everything reported is in major units.
 */

import { MINOR_UNITS_PER_MAJOR } from "./constants";

/**
 * Converts an integer minor-unit amount to major units.
 *
 * @example
 * ```ts
 * toMajorUnits(500000) // 5000
 * ```
 */
export function toMajorUnits(minorUnits: number): number {
  return minorUnits / MINOR_UNITS_PER_MAJOR;
}

/**
 * Reads a transaction amount, treating a missing or non-finite value as 0.
 */
export function amountOrZero(amount: number | null | undefined): number {
  return typeof amount === "number" && Number.isFinite(amount) ? amount : 0;
}

/**
 * Divides when the denominator is strictly positive, else returns 0.
 * All dashboard ratios degrade to 0 rather than Infinity or NaN.
 */
export function positiveRatio(numerator: number, denominator: number): number {
  if (!(denominator > 0)) {
    return 0;
  }
  return numerator / denominator;
}

/**
 * Sum of the values picked from each item.
 */
export function sumBy<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((sum, item) => sum + pick(item), 0);
}
