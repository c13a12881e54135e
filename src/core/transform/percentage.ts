/**
 * Percentage Normalizer
 *
 * Converts absolute values to shares of a total, for pie charts and
 * breakdown tables.
 */

import { columnValues, sumField, withColumn, type TimeSeriesTable } from './table';

/** Name of the percentage column added for a field */
export function percentageField(valueField: string): string {
  return `${valueField}_pct`;
}

/**
 * Adds `<valueField>_pct = value / total * 100` to every row.
 *
 * When `total` is omitted it is the sum of the field's non-null values. A
 * zero total, or a null value, yields a null percentage.
 *
 * @example
 * ```typescript
 * toPercentage(platforms, 'streams');
 * // [{ platform: 'Spotify', streams: 450, streams_pct: 45 }, ...]
 * ```
 */
export function toPercentage(
  table: TimeSeriesTable,
  valueField: string,
  total?: number
): TimeSeriesTable {
  const denominator = total ?? sumField(table, valueField);
  const shares = columnValues(table, valueField).map((value) =>
    value === null || denominator === 0 ? null : (value * 100) / denominator
  );
  return withColumn(table, percentageField(valueField), shares);
}
