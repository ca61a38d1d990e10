/**
 * Date parsing and month bucketing for ledger transactions.
 * Dates are handled as plain calendar dates so no timezone shifts a
 * transaction into a neighbouring month.
 */

import { MonthKey } from "../models/Aggregates";

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface ParsedDate {
  date: CalendarDate;
  /** True when the input could not be read and today's date was used */
  fallback: boolean;
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE_PATTERN = /^\d{8}$/;
const MONTH_KEY_PATTERN = /^(\d{4})-(\d{2})$/;

/**
 * Gregorian leap year rule.
 */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Number of days in a month (month is 1-12).
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= daysInMonth(year, month);
}

/**
 * Today's date in UTC.
 */
export function currentUtcDate(now: Date = new Date()): CalendarDate {
  return {
    year: now.getUTCFullYear(),
    month: now.getUTCMonth() + 1,
    day: now.getUTCDate(),
  };
}

function buildDate(year: number, month: number, day: number): CalendarDate | null {
  return isValidCalendarDate(year, month, day) ? { year, month, day } : null;
}

function parseIsoDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return buildDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

function parseCompactDate(value: string): CalendarDate | null {
  if (!COMPACT_DATE_PATTERN.test(value)) {
    return null;
  }
  return buildDate(
    Number(value.slice(0, 4)),
    Number(value.slice(4, 6)),
    Number(value.slice(6, 8))
  );
}

/**
 * Parses a transaction date.
 *
 * Accepts ISO `YYYY-MM-DD`, then the compact `YYYYMMDD` form. Anything
 * else (absent, non-string, or not a real calendar date) resolves to
 * `today` and is flagged as a fallback.
 *
 * @param value - Raw `date` field of a transaction
 * @param today - Date to fall back to; defaults to the current UTC date
 */
export function parseTransactionDate(
  value: unknown,
  today: CalendarDate = currentUtcDate()
): ParsedDate {
  if (typeof value === "string") {
    const parsed = parseIsoDate(value) ?? parseCompactDate(value);
    if (parsed) {
      return { date: parsed, fallback: false };
    }
  }
  return { date: { ...today }, fallback: true };
}

/**
 * Formats the month of a date as "YYYY-MM".
 */
export function formatMonthKey(date: CalendarDate): MonthKey {
  return `${String(date.year).padStart(4, "0")}-${String(date.month).padStart(2, "0")}`;
}

/**
 * Buckets a raw transaction date into its month key.
 *
 * @example
 * ```ts
 * toMonthKey("2024-03-15") // "2024-03"
 * toMonthKey("20240315")   // "2024-03"
 * ```
 */
export function toMonthKey(value: unknown, today?: CalendarDate): MonthKey {
  return formatMonthKey(parseTransactionDate(value, today).date);
}

/**
 * Reads a "YYYY-MM" key back into its year and month, or null if malformed.
 */
export function parseMonthKey(month: MonthKey): { year: number; month: number } | null {
  const match = MONTH_KEY_PATTERN.exec(month);
  if (!match) {
    return null;
  }
  const parsed = { year: Number(match[1]), month: Number(match[2]) };
  return parsed.month >= 1 && parsed.month <= 12 ? parsed : null;
}

/**
 * First day of the month following `month`.
 */
export function startOfNextMonth(month: MonthKey): CalendarDate | null {
  const parsed = parseMonthKey(month);
  if (!parsed) {
    return null;
  }
  return parsed.month === 12
    ? { year: parsed.year + 1, month: 1, day: 1 }
    : { year: parsed.year, month: parsed.month + 1, day: 1 };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * True when `date` falls on or before the last day of `month`.
 */
export function isNotAfterMonth(date: CalendarDate, month: MonthKey): boolean {
  const boundary = startOfNextMonth(month);
  return boundary !== null && compareDates(date, boundary) < 0;
}

/**
 * Month keys compare chronologically as strings.
 */
export function compareMonthKeys(a: MonthKey, b: MonthKey): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Distinct month keys in ascending order.
 */
export function sortMonthKeys(months: Iterable<MonthKey>): MonthKey[] {
  return [...new Set(months)].sort(compareMonthKeys);
}
