/**
 * Trend Calculator
 *
 * Row-wise trend metrics over a single value field: period-over-period growth,
 * trailing moving averages, running totals, percentile ranks and simple
 * forecasts.
 *
 * Insufficient history and zero denominators produce `null` cells rather than
 * errors or Infinity, so a chart can draw a gap where a value is undefined.
 */

import { addDays, daysBetween, formatDate, parseDate } from './dates';
import { InvalidParameterError, UnsupportedMethodError } from './errors';
import { columnValues, freezeTable, withColumn, type CellValue, type TimeSeriesTable } from './table';

// ============================================================================
// Constants & Types
// ============================================================================

/** Default trailing window for moving averages */
export const DEFAULT_MA_WINDOW = 7;

export const FORECAST_METHODS = ['linear', 'movingAverage'] as const;

export type ForecastMethod = (typeof FORECAST_METHODS)[number];

/** Name of the moving-average column added for a field and window */
export function movingAverageField(valueField: string, window: number): string {
  return `${valueField}_ma${window}`;
}

/** Name of the running-total column added for a field */
export function cumulativeSumField(valueField: string): string {
  return `${valueField}_cumsum`;
}

// ============================================================================
// Growth
// ============================================================================

/**
 * Adds `previous_value` and `growth_rate` to every row.
 *
 * growth_rate[i] = (v[i] - v[i-1]) / v[i-1]. Row 0 has no previous value, so
 * both cells are null there. A zero or null previous value, or a null current
 * value, gives a null rate.
 *
 * @example
 * ```typescript
 * growthRate(table, 'streams').map((r) => r.growth_rate);
 * // [null, 0.1, 0.0909..., ...]
 * ```
 */
export function growthRate(table: TimeSeriesTable, valueField: string): TimeSeriesTable {
  const values = columnValues(table, valueField);

  return freezeTable(
    table.map((row, i) => {
      const previous = i > 0 ? values[i - 1] : null;
      const current = values[i];
      const rate =
        previous === null || previous === 0 || current === null
          ? null
          : (current - previous) / previous;
      return { ...row, previous_value: previous, growth_rate: rate };
    })
  );
}

// ============================================================================
// Moving Average
// ============================================================================

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidParameterError(name, `expected a positive integer, got ${value}`);
  }
}

/**
 * Trailing moving averages of a value list. Entry i is null while fewer than
 * `window` values are available, or when any value in the window is null.
 */
export function trailingMeans(values: readonly (number | null)[], window: number): (number | null)[] {
  assertPositiveInteger('window', window);

  return values.map((_, i) => {
    if (i < window - 1) return null;
    let sum = 0;
    for (let j = i - window + 1; j <= i; j++) {
      const v = values[j];
      if (v === null) return null;
      sum += v;
    }
    return sum / window;
  });
}

/**
 * Adds `<valueField>_ma<window>`: the mean of the trailing `window` values
 * ending at each row (inclusive).
 *
 * @throws InvalidParameterError if window is not a positive integer
 */
export function movingAverage(
  table: TimeSeriesTable,
  valueField: string,
  window: number = DEFAULT_MA_WINDOW
): TimeSeriesTable {
  const means = trailingMeans(columnValues(table, valueField), window);
  return withColumn(table, movingAverageField(valueField, window), means);
}

// ============================================================================
// Cumulative Sum
// ============================================================================

/**
 * Adds `<valueField>_cumsum`: the running total from the first row. A null
 * cell gives a null total on that row without resetting later totals.
 */
export function cumulativeSum(table: TimeSeriesTable, valueField: string): TimeSeriesTable {
  let running = 0;
  const totals: CellValue[] = columnValues(table, valueField).map((v) => {
    if (v === null) return null;
    running += v;
    return running;
  });
  return withColumn(table, cumulativeSumField(valueField), totals);
}

// ============================================================================
// Percentile Rank
// ============================================================================

/**
 * Percentage (0-100) of dataset values less than or equal to `value`.
 * Null entries are ignored; an empty dataset gives null.
 *
 * @example
 * ```typescript
 * percentileRank([10, 20, 30, 40], 20); // 50
 * ```
 */
export function percentileRank(dataset: readonly (number | null)[], value: number): number | null {
  const present = dataset.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  const atOrBelow = present.filter((v) => v <= value).length;
  return (atOrBelow / present.length) * 100;
}

/** percentileRank over one field of a table. */
export function percentileRankOf(table: TimeSeriesTable, valueField: string, value: number): number | null {
  return percentileRank(columnValues(table, valueField), value);
}

// ============================================================================
// Forecasting
// ============================================================================

/**
 * Narrows a method name to a ForecastMethod.
 *
 * @throws UnsupportedMethodError naming the rejected method
 */
export function parseForecastMethod(method: string): ForecastMethod {
  const found = FORECAST_METHODS.find((m) => m === method);
  if (!found) {
    throw new UnsupportedMethodError(method, FORECAST_METHODS);
  }
  return found;
}

/**
 * Ordinary least-squares line through (index, value) points.
 * Returns null when there are no points; a single point gives a flat line.
 */
export function linearFit(values: readonly (number | null)[]): { slope: number; intercept: number } | null {
  const points = values
    .map((y, x) => ({ x, y }))
    .filter((p): p is { x: number; y: number } => p.y !== null);
  if (points.length === 0) return null;

  const n = points.length;
  const meanX = points.reduce((sum, p) => sum + p.x, 0) / n;
  const meanY = points.reduce((sum, p) => sum + p.y, 0) / n;

  let num = 0;
  let den = 0;
  for (const p of points) {
    num += (p.x - meanX) * (p.y - meanY);
    den += (p.x - meanX) ** 2;
  }
  const slope = den === 0 ? 0 : num / den;
  return { slope, intercept: meanY - slope * meanX };
}

/**
 * Predicts `periods` future values of a field.
 *
 * - `linear`: least-squares fit of value against 0-based row index,
 *   evaluated at indices n .. n + periods - 1
 * - `movingAverage`: the last trailing mean with window min(7, n), repeated
 *
 * An empty table forecasts null for every period.
 *
 * @throws UnsupportedMethodError for any other method name
 * @throws InvalidParameterError if periods is negative or fractional
 *
 * @example
 * ```typescript
 * forecast(table, 'streams', 3, 'linear'); // [1290, 1300, 1310]
 * ```
 */
export function forecast(
  table: TimeSeriesTable,
  valueField: string,
  periods: number,
  method: string = 'linear'
): (number | null)[] {
  const resolved = parseForecastMethod(method);
  if (!Number.isInteger(periods) || periods < 0) {
    throw new InvalidParameterError('periods', `expected a non-negative integer, got ${periods}`);
  }

  const values = columnValues(table, valueField);
  const n = values.length;

  if (resolved === 'linear') {
    const fit = linearFit(values);
    return Array.from({ length: periods }, (_, k) =>
      fit === null ? null : fit.slope * (n + k) + fit.intercept
    );
  }

  if (n === 0) {
    return Array.from({ length: periods }, () => null);
  }
  const window = Math.min(DEFAULT_MA_WINDOW, n);
  const last = trailingMeans(values, window)[n - 1];
  return Array.from({ length: periods }, () => last);
}

/**
 * Forecast as dated rows, ready to append to a chart series.
 *
 * Future dates continue from the last row, stepping by the median spacing
 * between consecutive rows (one day when there are fewer than two rows).
 * Each row carries the date field, the forecast value and `forecast: 1`.
 */
export function forecastTable(
  table: TimeSeriesTable,
  dateField: string,
  valueField: string,
  periods: number,
  method: string = 'linear'
): TimeSeriesTable {
  const values = forecast(table, valueField, periods, method);
  if (table.length === 0) {
    return freezeTable([]);
  }

  const dates = table.map((row) => parseDate(row[dateField], dateField));
  const step = medianSpacing(dates);
  const lastDate = dates[dates.length - 1];

  return freezeTable(
    values.map((value, k) => ({
      [dateField]: formatDate(addDays(lastDate, step * (k + 1))),
      [valueField]: value,
      forecast: 1,
    }))
  );
}

function medianSpacing(dates: readonly Date[]): number {
  if (dates.length < 2) return 1;
  const gaps = dates
    .slice(1)
    .map((date, i) => daysBetween(dates[i], date))
    .sort((a, b) => a - b);
  const median = gaps[Math.floor((gaps.length - 1) / 2)];
  return Math.max(1, median);
}
