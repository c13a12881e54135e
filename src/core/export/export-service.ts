/**
 * Export Service
 *
 * Exports dashboard views as JSON or CSV for spreadsheets and external
 * analysis. Each view is flattened into table rows first, so both formats
 * carry the same columns.
 *
 * @example
 * ```typescript
 * const exportService = new ExportService(aggregator);
 *
 * const csv = await exportService.export({
 *   format: 'csv',
 *   view: 'streams',
 *   period: 'Last 90 Days',
 *   granularity: 'weekly',
 * });
 * ```
 */

import type { DashboardDataAggregator } from '../dashboard';
import type { CellValue, TableRow } from '../transform';
import type { ExportDocument, ExportOptions } from './types';

export class ExportService {
  private readonly now: () => Date;

  constructor(
    private readonly aggregator: DashboardDataAggregator,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  /**
   * Exports a view in the requested format.
   *
   * @returns Pretty-printed JSON, or CSV with a header line
   */
  async export(options: ExportOptions): Promise<string> {
    const document = await this.buildDocument(options);

    if (options.format === 'csv') {
      return rowsToCsv(document.rows);
    }
    return JSON.stringify(document, null, 2);
  }

  /**
   * Builds the export document: the view's rows plus the period they cover.
   */
  async buildDocument(options: ExportOptions): Promise<ExportDocument> {
    const { dateRange, rows } = await this.collectRows(options);

    return {
      view: options.view,
      period: options.period,
      dateRange,
      exportedAt: this.now().toISOString(),
      rows,
    };
  }

  private async collectRows(
    options: ExportOptions
  ): Promise<Pick<ExportDocument, 'dateRange' | 'rows'>> {
    const { period } = options;

    switch (options.view) {
      case 'streams': {
        const streams = await this.aggregator.getStreams(period, options.granularity ?? 'daily');
        return {
          dateRange: streams.dateRange,
          rows: streams.points.map((point) => ({
            date: point.date,
            streams: point.streams,
            growth_rate: point.growthRate,
            moving_average: point.movingAverage,
            cumulative: point.cumulative,
          })),
        };
      }
      case 'songs': {
        const content = await this.aggregator.getContent(period);
        return {
          dateRange: content.dateRange,
          rows: content.songs.map((song) => ({
            song: song.song,
            streams: song.streams,
            avg_completion_rate: song.avgCompletionRate,
            saves: song.saves,
            shares: song.shares,
            save_rate: song.saveRate,
            share_rate: song.shareRate,
            engagement_score: song.engagementScore,
          })),
        };
      }
      case 'platforms': {
        const overview = await this.aggregator.getOverview(period);
        return {
          dateRange: overview.dateRange,
          rows: overview.platformDistribution.map((share) => ({
            platform: share.category,
            streams: share.value,
            percentage: share.percentage,
          })),
        };
      }
      case 'geography': {
        const audience = await this.aggregator.getAudience(period);
        return {
          dateRange: audience.dateRange,
          rows: audience.geography.map((share) => ({
            country: share.category,
            listeners: share.value,
            percentage: share.percentage,
          })),
        };
      }
      case 'revenue': {
        const revenue = await this.aggregator.getRevenue(period);
        return {
          dateRange: revenue.dateRange,
          rows: revenue.byPlatform.map((platform) => ({
            platform: platform.platform,
            streams: platform.streams,
            revenue: platform.revenue,
            revenue_per_stream: platform.revenuePerStream,
            revenue_per_thousand: platform.revenuePerThousand,
            share: platform.share,
          })),
        };
      }
    }
  }
}

/**
 * Escape a value for CSV output.
 *
 * Null becomes an empty field; values containing a comma, quote or line
 * break are quoted with inner quotes doubled.
 */
export function escapeCsv(value: CellValue): string {
  if (value === null) {
    return '';
  }

  const str = String(value);
  if (/[",\n\r]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Serialises rows as CSV. Columns are the union of the rows' fields in
 * first-seen order; a row missing a column leaves it empty. No rows give
 * an empty string.
 */
export function rowsToCsv(rows: readonly TableRow[]): string {
  if (rows.length === 0) {
    return '';
  }

  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) {
        columns.push(key);
      }
    }
  }

  const lines = [columns.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsv(row[column] ?? null)).join(','));
  }
  return lines.join('\n') + '\n';
}
