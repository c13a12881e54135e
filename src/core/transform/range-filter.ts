/**
 * Range Filter
 *
 * Slices a table to an inclusive date interval. Bounds may be `YYYY-MM-DD` /
 * ISO strings or Date objects; bounds and record dates are both reduced to
 * calendar dates before comparison, so a time-of-day never excludes a record
 * from its own day.
 */

import { addDays, parseDate, type DateInput } from './dates';
import { freezeTable, type TimeSeriesTable } from './table';

/**
 * Keeps the records whose date falls within [start, end], inclusive on both
 * ends. Returns an empty table when nothing qualifies or when start is after
 * end. Filtering an already filtered table with the same bounds returns the
 * same rows.
 *
 * @throws MalformedDateError if a bound or any record date cannot be parsed
 *
 * @example
 * ```typescript
 * const lastWeek = filterByRange(streams, 'date', '2024-03-04', '2024-03-10');
 * ```
 */
export function filterByRange(
  table: TimeSeriesTable,
  dateField: string,
  start: DateInput,
  end: DateInput
): TimeSeriesTable {
  const from = parseDate(start, 'start').getTime();
  const to = parseDate(end, 'end').getTime();

  return freezeTable(
    table.filter((row) => {
      const time = parseDate(row[dateField], dateField).getTime();
      return time >= from && time <= to;
    })
  );
}

/**
 * Keeps the trailing `days` calendar days ending on `end` (inclusive).
 */
export function filterLastDays(
  table: TimeSeriesTable,
  dateField: string,
  days: number,
  end: DateInput
): TimeSeriesTable {
  const endDate = parseDate(end, 'end');
  const startDate = addDays(endDate, -(days - 1));
  return filterByRange(table, dateField, startDate, endDate);
}
