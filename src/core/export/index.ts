/**
 * Data Export Module - Barrel Export
 *
 * Flattens dashboard views into rows and writes them as JSON or CSV.
 *
 * @example
 * ```typescript
 * import { ExportService } from './core/export';
 *
 * const json = await new ExportService(aggregator).export({
 *   format: 'json',
 *   view: 'revenue',
 *   period: 'Last 30 Days',
 * });
 * ```
 */

export { ExportService, escapeCsv, rowsToCsv } from './export-service';

export { EXPORT_FORMATS, EXPORT_VIEWS, isExportFormat, isExportView } from './types';
export type { ExportDocument, ExportFormat, ExportOptions, ExportView } from './types';
