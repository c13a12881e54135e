/**
 * Core Transform Module - Barrel Export
 *
 * Pure, synchronous table transformations that turn raw streaming records
 * into chart-ready series:
 * - RangeFilter: slice a table to a date interval
 * - Aggregator: weekly / monthly rollups
 * - TrendCalculator: growth, moving averages, running totals, forecasts
 * - Pivoter: long-to-wide cross tabulation
 * - PercentageNormalizer: shares of a total
 *
 * @example
 * ```typescript
 * import { createTable, filterByRange, aggregate, growthRate } from './core/transform';
 *
 * const table = createTable(rows);
 * const weekly = aggregate(filterByRange(table, 'date', start, end), 'date', 'streams', 'weekly');
 * const withGrowth = growthRate(weekly, 'streams');
 * ```
 */

// Errors
export {
  TransformError,
  MalformedDateError,
  UnsupportedMethodError,
  InvalidParameterError,
} from './errors';
export type { TransformErrorType } from './errors';

// Table model
export {
  createTable,
  freezeTable,
  sortByDate,
  numericValue,
  columnValues,
  sumField,
  meanField,
  withColumn,
  addDateParts,
} from './table';
export type { CellValue, TableRow, TimeSeriesTable, RawRow } from './table';

// Dates
export {
  parseDate,
  formatDate,
  toDateKey,
  addDays,
  daysBetween,
  isoWeek,
  weekdayIndex,
  getDateRange,
  getDaysFromPeriod,
  getPeriodForDays,
  getDateRangeForPeriod,
  isPeriodLabel,
  getMonthName,
  getShortMonthName,
  getWeekdayName,
  PERIOD_DAYS,
  DEFAULT_PERIOD_DAYS,
} from './dates';
export type { DateInput, IsoWeek, DateRange, PeriodLabel } from './dates';

// Aggregation
export {
  aggregate,
  aggregationKey,
  convertToWeekly,
  convertToMonthly,
  reduceValues,
  parseAggFunc,
  GRANULARITIES,
  AGG_FUNCS,
} from './aggregator';
export type { Granularity, AggFunc, AggSpec, AggregationKey } from './aggregator';

// Trends
export {
  growthRate,
  movingAverage,
  trailingMeans,
  cumulativeSum,
  percentileRank,
  percentileRankOf,
  forecast,
  forecastTable,
  linearFit,
  parseForecastMethod,
  movingAverageField,
  cumulativeSumField,
  DEFAULT_MA_WINDOW,
  FORECAST_METHODS,
} from './trend-calculator';
export type { ForecastMethod } from './trend-calculator';

// Filtering
export { filterByRange, filterLastDays } from './range-filter';

// Percentages
export { toPercentage, percentageField } from './percentage';

// Pivot
export { pivot, pivotValue, pivotSize, toMatrix } from './pivot';
export type { PivotTable } from './pivot';
