/**
 * Data Export Types
 *
 * An export flattens one dashboard view into table rows and serialises
 * them as JSON (rows plus the period they cover) or CSV (one line per row).
 */

import type { StreamsGranularity } from '../dashboard';
import type { DateRange, PeriodLabel, TableRow } from '../transform';

export type ExportFormat = 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv'];

/**
 * The views an export can flatten:
 * - streams: one row per bucket with growth, moving average and running total
 * - songs: the content view's song table
 * - platforms: streams share per platform
 * - geography: listeners per country
 * - revenue: earnings per platform
 */
export const EXPORT_VIEWS = ['streams', 'songs', 'platforms', 'geography', 'revenue'] as const;

export type ExportView = (typeof EXPORT_VIEWS)[number];

export function isExportView(value: string): value is ExportView {
  return EXPORT_VIEWS.some((view) => view === value);
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface ExportOptions {
  format: ExportFormat;
  view: ExportView;
  period: PeriodLabel;
  /** Bucket size of the streams view (default daily); ignored by other views */
  granularity?: StreamsGranularity;
}

/**
 * The JSON export document.
 *
 * @example
 * ```json
 * {
 *   "view": "streams",
 *   "period": "Last 7 Days",
 *   "dateRange": { "start": "2024-03-04", "end": "2024-03-10" },
 *   "exportedAt": "2024-03-10T15:30:00.000Z",
 *   "rows": [{ "date": "2024-03-04", "streams": 100, ... }]
 * }
 * ```
 */
export interface ExportDocument {
  view: ExportView;
  period: PeriodLabel;
  dateRange: DateRange;
  /** ISO 8601 timestamp */
  exportedAt: string;
  rows: TableRow[];
}
