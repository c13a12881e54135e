/**
 * CLI Report Command
 *
 * Prints the dashboard in the terminal: headline totals, the streams
 * series at the chosen granularity with its forecast, the platform split,
 * the top songs and revenue.
 *
 * Usage Examples:
 * ```bash
 * # Last 30 days (or DEFAULT_DAYS), weekly buckets
 * npm run cli -- report
 *
 * # Last 90 days by month, reproducible sample data
 * npm run cli -- report --days 90 --granularity monthly --seed 42
 * ```
 */

import type { Command } from 'commander';
import type {
  ContentView,
  DashboardOverview,
  RevenueView,
  StreamsGranularity,
  StreamsView,
} from '../../core/dashboard';
import type { PeriodLabel } from '../../core/transform';
import { defaultPeriod, parseDays, parseGranularity, parseSeed, type CliContext } from '../context';
import {
  bold,
  colorGrowth,
  cyan,
  dim,
  formatCurrency,
  formatNumber,
  formatPercent,
  formatSeparator,
  formatTable,
} from '../utils/terminal';

interface ReportCommandOptions {
  days?: PeriodLabel;
  granularity: StreamsGranularity;
  seed?: number;
}

/** Songs listed in the report */
const TOP_SONGS = 5;

/** Buckets of the streams table; earlier buckets are left out */
const MAX_STREAM_ROWS = 14;

export interface ReportData {
  artistName: string;
  overview: DashboardOverview;
  streams: StreamsView;
  content: ContentView;
  revenue: RevenueView;
}

function field(label: string, value: string): string {
  return `  ${label.padEnd(20)}${value}`;
}

/**
 * Renders the report as lines of text.
 */
export function renderReport(data: ReportData): string[] {
  const { overview, streams, content, revenue } = data;
  const { totals } = overview;
  const lines: string[] = [];

  lines.push(bold(`Artist Pulse Report: ${data.artistName}`));
  lines.push(dim(`${overview.period} (${overview.dateRange.start} to ${overview.dateRange.end})`));
  lines.push(formatSeparator(60));
  lines.push('');

  lines.push(cyan(bold('Overview')));
  lines.push(field('Total streams', formatNumber(totals.totalStreams)));
  lines.push(field('Avg daily streams', formatNumber(totals.avgDailyStreams)));
  lines.push(field('Stream growth', colorGrowth(totals.streamGrowth)));
  lines.push(field('Followers', `${formatNumber(totals.currentFollowers)} (${colorGrowth(totals.followerGrowth)})`));
  lines.push(field('Top song', totals.topSong ?? '-'));
  lines.push('');

  lines.push(cyan(bold(`Streams (${streams.granularity})`)));
  const points = streams.points.slice(-MAX_STREAM_ROWS);
  lines.push(
    ...formatTable(
      ['Date', 'Streams', 'Growth', 'Moving avg', 'Cumulative'],
      points.map((point) => [
        point.date,
        formatNumber(point.streams),
        formatPercent(point.growthRate === null ? null : point.growthRate * 100),
        formatNumber(point.movingAverage),
        formatNumber(point.cumulative),
      ])
    )
  );
  const forecastTotal = streams.forecast.reduce((sum, point) => sum + (point.value ?? 0), 0);
  lines.push(field(`Forecast (${streams.forecast.length} ahead)`, formatNumber(forecastTotal)));
  lines.push('');

  lines.push(cyan(bold('Platforms')));
  lines.push(
    ...formatTable(
      ['Platform', 'Streams', 'Share'],
      overview.platformDistribution.map((share) => [
        share.category,
        formatNumber(share.value),
        formatPercent(share.percentage),
      ])
    )
  );
  lines.push('');

  lines.push(cyan(bold('Top Songs')));
  lines.push(
    ...formatTable(
      ['Song', 'Streams', 'Save rate', 'Engagement'],
      content.songs.slice(0, TOP_SONGS).map((song) => [
        song.song,
        formatNumber(song.streams),
        formatPercent(song.saveRate * 100),
        formatNumber(song.engagementScore, 1),
      ])
    )
  );
  lines.push('');

  lines.push(cyan(bold('Revenue')));
  lines.push(field('Total revenue', formatCurrency(revenue.totalRevenue)));
  lines.push(field('Avg daily revenue', formatCurrency(revenue.avgDailyRevenue)));
  lines.push(field('Per 1,000 streams', formatCurrency(revenue.avgRevenuePerStream * 1000)));
  const projection = revenue.projection.at(-1);
  if (projection && projection.growthLabel !== null) {
    lines.push(
      field(`Projected ${projection.month}`, `${formatCurrency(projection.projectedRevenue)} (${colorGrowth(projection.growthLabel)})`)
    );
  }

  return lines;
}

/**
 * Collects every view the report needs for one period.
 */
export async function buildReport(
  ctx: CliContext,
  period: PeriodLabel,
  granularity: StreamsGranularity,
  seed?: number
): Promise<ReportData> {
  const aggregator = ctx.createAggregator(seed);
  const [overview, streams, content, revenue] = await Promise.all([
    aggregator.getOverview(period),
    aggregator.getStreams(period, granularity),
    aggregator.getContent(period),
    aggregator.getRevenue(period),
  ]);

  return { artistName: ctx.artistName, overview, streams, content, revenue };
}

/**
 * Registers `report` on the program.
 */
export function registerReportCommand(program: Command, ctx: CliContext): void {
  program
    .command('report')
    .description('Print the dashboard report for a period')
    .option('-d, --days <days>', 'Period length in days (7, 30, 90, 180 or 365)', parseDays)
    .option('-g, --granularity <granularity>', 'Streams buckets: daily, weekly or monthly', parseGranularity, 'weekly')
    .option('-s, --seed <seed>', 'Seed for reproducible sample data', parseSeed)
    .action(async (options: ReportCommandOptions) => {
      const period = options.days ?? defaultPeriod(ctx);
      const data = await buildReport(ctx, period, options.granularity, options.seed);

      ctx.log('');
      for (const line of renderReport(data)) {
        ctx.log(line);
      }
      ctx.log('');
    });
}
