/**
 * TimeSeriesTable Model
 *
 * The basic data model of the transformation core: an immutable, ordered list
 * of rows. A row maps field names to cells; one field (conventionally `date`)
 * holds a `YYYY-MM-DD` calendar date and the rest hold numeric metrics or
 * categorical labels.
 *
 * Tables are never mutated. Every transform returns a new frozen array of
 * frozen rows, so the same input table can feed several charts.
 *
 * `null` is the explicit "no value" marker: it is what division by zero,
 * insufficient history and missing data produce, and it serialises to JSON
 * `null` so charts render a gap.
 */

import { MalformedDateError } from './errors';
import { getShortMonthName, getWeekdayName, parseDate, toDateKey, weekdayIndex } from './dates';

// ============================================================================
// Types
// ============================================================================

/** A single table cell */
export type CellValue = number | string | null;

/** An immutable table row */
export type TableRow = Readonly<Record<string, CellValue>>;

/** An immutable, date-ordered sequence of rows */
export type TimeSeriesTable = readonly TableRow[];

/**
 * A row as handed over by collaborators before normalisation: dates may
 * still be Date objects and absent values may be `undefined`.
 */
export type RawRow = Readonly<Record<string, CellValue | Date | undefined>>;

// ============================================================================
// Construction
// ============================================================================

/**
 * Freezes a list of rows into a table without reordering it.
 */
export function freezeTable(rows: readonly TableRow[]): TimeSeriesTable {
  return Object.freeze(rows.map((row) => Object.freeze({ ...row })));
}

/**
 * Builds a table from raw rows.
 *
 * - every date-field cell is parsed and normalised to `YYYY-MM-DD`
 * - other Date cells are normalised the same way
 * - `undefined` cells become `null`
 * - rows are stably sorted by date ascending
 *
 * @param rows - Raw rows from a generator or adapter
 * @param dateField - Name of the date field (default 'date')
 * @throws MalformedDateError if any date-field cell cannot be parsed
 *
 * @example
 * ```typescript
 * const table = createTable([
 *   { date: '2024-03-02', streams: 1200 },
 *   { date: new Date('2024-03-01'), streams: 1100 },
 * ]);
 * table[0].date; // '2024-03-01'
 * ```
 */
export function createTable(
  rows: Iterable<RawRow>,
  dateField: string = 'date'
): TimeSeriesTable {
  const normalised: TableRow[] = [];

  for (const raw of rows) {
    const row: Record<string, CellValue> = {};
    for (const [field, cell] of Object.entries(raw)) {
      if (field === dateField) {
        row[field] = toDateKey(cell, dateField);
      } else if (cell instanceof Date) {
        row[field] = toDateKey(cell, field);
      } else {
        row[field] = cell ?? null;
      }
    }
    if (!(dateField in row)) {
      throw new MalformedDateError(undefined, dateField);
    }
    normalised.push(row);
  }

  return freezeTable(sortByDate(normalised, dateField));
}

/**
 * Returns the rows stably sorted by their date field. Dates are compared as
 * parsed calendar dates, so mixed `Date`/string inputs order correctly.
 *
 * @throws MalformedDateError if any date cell cannot be parsed
 */
export function sortByDate(rows: readonly TableRow[], dateField: string): TableRow[] {
  return rows
    .map((row, index) => ({ row, index, time: parseDate(row[dateField], dateField).getTime() }))
    .sort((a, b) => a.time - b.time || a.index - b.index)
    .map((entry) => entry.row);
}

// ============================================================================
// Cell Access
// ============================================================================

/**
 * Reads a numeric cell. Anything other than a finite number reads as `null`.
 */
export function numericValue(row: TableRow, field: string): number | null {
  const cell = row[field];
  return typeof cell === 'number' && Number.isFinite(cell) ? cell : null;
}

/** Numeric cells of one field, in row order. */
export function columnValues(table: TimeSeriesTable, field: string): (number | null)[] {
  return table.map((row) => numericValue(row, field));
}

/** Sum of the non-null numeric cells of one field. */
export function sumField(table: TimeSeriesTable, field: string): number {
  let total = 0;
  for (const row of table) {
    const value = numericValue(row, field);
    if (value !== null) total += value;
  }
  return total;
}

/** Mean of the non-null numeric cells of one field, or `null` if there are none. */
export function meanField(table: TimeSeriesTable, field: string): number | null {
  const values = columnValues(table, field).filter((v): v is number => v !== null);
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ============================================================================
// Derived Columns
// ============================================================================

/**
 * Returns a new table with `field` set on every row from `values`
 * (index-aligned). The input table is left untouched.
 */
export function withColumn(
  table: TimeSeriesTable,
  field: string,
  values: readonly CellValue[]
): TimeSeriesTable {
  return freezeTable(table.map((row, i) => ({ ...row, [field]: values[i] ?? null })));
}

/**
 * Adds calendar parts derived from the date field: `year`, `month`, `day`,
 * `weekday` (Monday = 0), `weekday_name` and `month_name` (short form).
 *
 * @throws MalformedDateError if any date cell cannot be parsed
 */
export function addDateParts(table: TimeSeriesTable, dateField: string = 'date'): TimeSeriesTable {
  return freezeTable(
    table.map((row) => {
      const date = parseDate(row[dateField], dateField);
      const month = date.getUTCMonth() + 1;
      const weekday = weekdayIndex(date);
      return {
        ...row,
        year: date.getUTCFullYear(),
        month,
        day: date.getUTCDate(),
        weekday,
        weekday_name: getWeekdayName(weekday),
        month_name: getShortMonthName(month),
      };
    })
  );
}
