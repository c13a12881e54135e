/**
 * Calendar Date Utilities
 *
 * All dates in the transformation core are calendar dates, represented as
 * `YYYY-MM-DD` strings in table cells and as UTC-midnight `Date` objects while
 * computing. Working in UTC keeps ISO weeks and month boundaries independent of
 * the host's timezone.
 *
 * Accepted inputs:
 * - `YYYY-MM-DD` strings, optionally followed by a time part
 *   (`2024-03-01T10:00:00Z`); only the date part as written is kept
 * - `Date` objects, read through their UTC components
 *
 * Anything else raises MalformedDateError.
 */

import { MalformedDateError } from './errors';

// ============================================================================
// Types
// ============================================================================

/** A date bound or cell as accepted by the public transforms */
export type DateInput = string | Date;

/** ISO-8601 week identifier */
export interface IsoWeek {
  /** ISO week-numbering year (may differ from the calendar year near Jan 1) */
  isoYear: number;
  /** Week number, 1-53 */
  isoWeek: number;
}

/** Inclusive date interval as `YYYY-MM-DD` strings */
export interface DateRange {
  start: string;
  end: string;
}

// ============================================================================
// Constants
// ============================================================================

const MS_PER_DAY = 86_400_000;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export const SHORT_MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

/** Weekday names indexed Monday = 0 */
export const WEEKDAY_NAMES = [
  'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday',
] as const;

/**
 * Selectable reporting periods and their length in days.
 */
export const PERIOD_DAYS = {
  'Last 7 Days': 7,
  'Last 30 Days': 30,
  'Last 90 Days': 90,
  'Last 6 Months': 180,
  'Last Year': 365,
} as const;

export type PeriodLabel = keyof typeof PERIOD_DAYS;

/** Fallback length for unknown period labels */
export const DEFAULT_PERIOD_DAYS = 30;

// ============================================================================
// Parsing & Formatting
// ============================================================================

/**
 * Parses a date cell or bound into a UTC-midnight Date.
 *
 * @param value - The raw value to parse
 * @param field - Field or bound name, used in the error message
 * @throws MalformedDateError if the value is not a valid calendar date
 */
export function parseDate(value: unknown, field: string = 'date'): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MalformedDateError(value, field);
    }
    return new Date(
      Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate())
    );
  }

  if (typeof value !== 'string') {
    throw new MalformedDateError(value, field);
  }

  const match = ISO_DATE_RE.exec(value.trim());
  if (!match) {
    throw new MalformedDateError(value, field);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 2024-02-30 over to March; reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new MalformedDateError(value, field);
  }

  return date;
}

/**
 * Formats a Date as `YYYY-MM-DD` using its UTC components.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Normalises any accepted date input to its `YYYY-MM-DD` key.
 *
 * @throws MalformedDateError if the value is not a valid calendar date
 */
export function toDateKey(value: unknown, field: string = 'date'): string {
  return formatDate(parseDate(value, field));
}

// ============================================================================
// Calendar Arithmetic
// ============================================================================

/** Returns a new date `days` days after `date` (negative to go back). */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/** Whole days from `from` to `to` (both treated as calendar dates). */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Computes the ISO-8601 week and week-year of a date.
 *
 * Weeks start on Monday and week 1 is the week containing the year's first
 * Thursday, so 2021-01-03 belongs to week 53 of 2020 and 2024-12-30 to week 1
 * of 2025.
 *
 * @example
 * ```typescript
 * isoWeek(parseDate('2021-01-03')); // { isoYear: 2020, isoWeek: 53 }
 * ```
 */
export function isoWeek(date: Date): IsoWeek {
  const weekday = (date.getUTCDay() + 6) % 7; // Monday = 0
  const thursday = addDays(date, 3 - weekday);
  const isoYear = thursday.getUTCFullYear();
  const yearStart = Date.UTC(isoYear, 0, 1);
  const week = Math.ceil(((thursday.getTime() - yearStart) / MS_PER_DAY + 1) / 7);

  return { isoYear, isoWeek: week };
}

/** Weekday index with Monday = 0 and Sunday = 6. */
export function weekdayIndex(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

/**
 * Lists every calendar date from `start` to `end` inclusive.
 * Returns an empty list when `start` is after `end`.
 */
export function getDateRange(start: DateInput, end: DateInput): string[] {
  const from = parseDate(start, 'start');
  const to = parseDate(end, 'end');
  const count = daysBetween(from, to) + 1;

  const dates: string[] = [];
  for (let i = 0; i < count; i++) {
    dates.push(formatDate(addDays(from, i)));
  }
  return dates;
}

// ============================================================================
// Reporting Periods
// ============================================================================

/**
 * Converts a period label to its length in days. Unknown labels fall back to
 * DEFAULT_PERIOD_DAYS.
 */
export function getDaysFromPeriod(period: string): number {
  return isPeriodLabel(period) ? PERIOD_DAYS[period] : DEFAULT_PERIOD_DAYS;
}

export function isPeriodLabel(value: string): value is PeriodLabel {
  return Object.prototype.hasOwnProperty.call(PERIOD_DAYS, value);
}

/**
 * The period label spanning exactly `days` days, or null when none does.
 */
export function getPeriodForDays(days: number): PeriodLabel | null {
  for (const label of Object.keys(PERIOD_DAYS)) {
    if (isPeriodLabel(label) && PERIOD_DAYS[label] === days) {
      return label;
    }
  }
  return null;
}

/**
 * Resolves a period label to an inclusive range ending on `today`.
 *
 * @example
 * ```typescript
 * getDateRangeForPeriod('Last 7 Days', '2024-03-10');
 * // { start: '2024-03-04', end: '2024-03-10' }
 * ```
 */
export function getDateRangeForPeriod(
  period: string,
  today: DateInput = new Date()
): DateRange {
  const days = getDaysFromPeriod(period);
  const end = parseDate(today, 'today');
  return {
    start: formatDate(addDays(end, -(days - 1))),
    end: formatDate(end),
  };
}

// ============================================================================
// Names
// ============================================================================

/** Full month name for a 1-based month number. */
export function getMonthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? 'Unknown';
}

/** Three-letter month name for a 1-based month number. */
export function getShortMonthName(month: number): string {
  return SHORT_MONTH_NAMES[month - 1] ?? 'Unknown';
}

/** Weekday name for a Monday = 0 index. */
export function getWeekdayName(weekday: number): string {
  return WEEKDAY_NAMES[weekday] ?? 'Unknown';
}
