/**
 * Aggregator
 *
 * Rolls daily (or irregular) records up into weekly or monthly buckets.
 *
 * Weekly buckets follow ISO-8601 (Monday start, ISO week-year), monthly
 * buckets follow the calendar. Each output row carries the bucket key
 * (`year` + `week` or `year` + `month`), the first observed date of the bucket
 * in the date field (used as the chart's x value) and one aggregated cell per
 * value field.
 *
 * @example
 * ```typescript
 * const weekly = aggregate(streams, 'date', 'streams', 'weekly');
 * // [{ year: 2024, week: 9, date: '2024-02-26', streams: 7312 }, ...]
 *
 * const monthly = aggregate(streams, 'date', ['streams', 'followers'], 'monthly', {
 *   streams: 'sum',
 *   followers: 'first',
 * });
 * ```
 */

import { formatDate, isoWeek, parseDate } from './dates';
import { UnsupportedMethodError } from './errors';
import { freezeTable, numericValue, type CellValue, type TableRow, type TimeSeriesTable } from './table';

// ============================================================================
// Types
// ============================================================================

export const GRANULARITIES = ['weekly', 'monthly'] as const;

/** Time bucket size for rollups */
export type Granularity = (typeof GRANULARITIES)[number];

export const AGG_FUNCS = ['sum', 'mean', 'first', 'count'] as const;

/** Reduction applied to the values of one field within a bucket */
export type AggFunc = (typeof AGG_FUNCS)[number];

/** One function for every value field, or a per-field map (unlisted fields sum) */
export type AggSpec = AggFunc | Readonly<Record<string, AggFunc>>;

/** Derived grouping key of a record under a granularity */
export interface AggregationKey {
  year: number;
  /** ISO week for weekly, calendar month (1-12) for monthly */
  period: number;
}

// ============================================================================
// Reductions
// ============================================================================

/**
 * Applies an aggregation function to a list of cells. Null cells are skipped:
 * `sum` of nothing is 0, `mean` and `first` of nothing are null, `count`
 * counts non-null cells.
 */
export function reduceValues(values: readonly (number | null)[], aggFunc: AggFunc): number | null {
  const present = values.filter((v): v is number => v !== null);

  switch (aggFunc) {
    case 'sum':
      return present.reduce((sum, v) => sum + v, 0);
    case 'mean':
      return present.length > 0
        ? present.reduce((sum, v) => sum + v, 0) / present.length
        : null;
    case 'first':
      return present.length > 0 ? present[0] : null;
    case 'count':
      return present.length;
    default:
      return assertAggFunc(aggFunc);
  }
}

function assertAggFunc(aggFunc: never): never {
  throw new UnsupportedMethodError(String(aggFunc), AGG_FUNCS);
}

/**
 * Narrows an arbitrary string to an AggFunc.
 *
 * @throws UnsupportedMethodError for unknown names
 */
export function parseAggFunc(name: string): AggFunc {
  const found = AGG_FUNCS.find((fn) => fn === name);
  if (!found) {
    throw new UnsupportedMethodError(name, AGG_FUNCS);
  }
  return found;
}

function aggFuncFor(spec: AggSpec, field: string): AggFunc {
  if (typeof spec === 'string') return spec;
  return spec[field] ?? 'sum';
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Computes the aggregation key of a date under a granularity.
 */
export function aggregationKey(date: Date, granularity: Granularity): AggregationKey {
  if (granularity === 'weekly') {
    const { isoYear, isoWeek: week } = isoWeek(date);
    return { year: isoYear, period: week };
  }
  return { year: date.getUTCFullYear(), period: date.getUTCMonth() + 1 };
}

interface Bucket {
  key: AggregationKey;
  firstDate: string;
  rows: TableRow[];
}

/**
 * Groups records into weekly or monthly buckets and reduces each value field.
 *
 * @param table - Input table (left untouched)
 * @param dateField - Field holding the record date
 * @param valueField - Field, or fields, to aggregate
 * @param granularity - 'weekly' (ISO weeks) or 'monthly'
 * @param aggFunc - Reduction for all fields, or a per-field map (default 'sum')
 * @returns Rollup ordered by (year, week-or-month) ascending; empty for an empty table
 * @throws MalformedDateError if any record's date cannot be parsed
 */
export function aggregate(
  table: TimeSeriesTable,
  dateField: string,
  valueField: string | readonly string[],
  granularity: Granularity,
  aggFunc: AggSpec = 'sum'
): TimeSeriesTable {
  const fields = typeof valueField === 'string' ? [valueField] : valueField;
  const periodField = granularity === 'weekly' ? 'week' : 'month';

  const buckets = new Map<string, Bucket>();
  for (const row of table) {
    const date = parseDate(row[dateField], dateField);
    const key = aggregationKey(date, granularity);
    const id = `${key.year}-${key.period}`;
    const bucket = buckets.get(id);
    if (bucket) {
      bucket.rows.push(row);
    } else {
      buckets.set(id, { key, firstDate: formatDate(date), rows: [row] });
    }
  }

  const ordered = [...buckets.values()].sort(
    (a, b) => a.key.year - b.key.year || a.key.period - b.key.period
  );

  return freezeTable(
    ordered.map((bucket) => {
      const out: Record<string, CellValue> = {
        year: bucket.key.year,
        [periodField]: bucket.key.period,
        [dateField]: bucket.firstDate,
      };
      for (const field of fields) {
        out[field] = reduceValues(
          bucket.rows.map((row) => numericValue(row, field)),
          aggFuncFor(aggFunc, field)
        );
      }
      return out;
    })
  );
}

/**
 * Sums a value field into ISO weeks.
 */
export function convertToWeekly(
  table: TimeSeriesTable,
  dateField: string,
  valueField: string
): TimeSeriesTable {
  return aggregate(table, dateField, valueField, 'weekly', 'sum');
}

/**
 * Sums a value field into calendar months.
 */
export function convertToMonthly(
  table: TimeSeriesTable,
  dateField: string,
  valueField: string
): TimeSeriesTable {
  return aggregate(table, dateField, valueField, 'monthly', 'sum');
}
