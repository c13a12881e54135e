/**
 * CLI Export Command
 *
 * Exports one dashboard view as JSON or CSV, to a file or to standard
 * output, for spreadsheets and external analysis.
 *
 * Usage Examples:
 * ```bash
 * # Daily streams for the default period as JSON on stdout
 * npm run cli -- export
 *
 * # Weekly streams for 90 days as CSV
 * npm run cli -- export --format csv --view streams --days 90 --granularity weekly --output streams.csv
 *
 * # Revenue per platform
 * npm run cli -- export --view revenue --format csv
 * ```
 */

import type { Command } from 'commander';
import type { StreamsGranularity } from '../../core/dashboard';
import { ExportService, type ExportFormat, type ExportView } from '../../core/export';
import type { PeriodLabel } from '../../core/transform';
import {
  defaultPeriod,
  parseDays,
  parseFormat,
  parseGranularity,
  parseSeed,
  parseView,
  type CliContext,
} from '../context';
import { dim, green } from '../utils/terminal';

interface ExportCommandOptions {
  format: ExportFormat;
  view: ExportView;
  days?: PeriodLabel;
  granularity: StreamsGranularity;
  seed?: number;
  output?: string;
}

/**
 * Formats a byte count into a human-readable string.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/**
 * Registers `export` on the program.
 */
export function registerExportCommand(program: Command, ctx: CliContext): void {
  program
    .command('export')
    .description('Export a dashboard view as JSON or CSV')
    .option('-f, --format <format>', 'Output format (json or csv)', parseFormat, 'json')
    .option('-v, --view <view>', 'View: streams, songs, platforms, geography or revenue', parseView, 'streams')
    .option('-d, --days <days>', 'Period length in days (7, 30, 90, 180 or 365)', parseDays)
    .option('-g, --granularity <granularity>', 'Streams buckets: daily, weekly or monthly', parseGranularity, 'daily')
    .option('-s, --seed <seed>', 'Seed for reproducible sample data', parseSeed)
    .option('-o, --output <file>', 'Write to a file instead of standard output')
    .action(async (options: ExportCommandOptions) => {
      const exportService = new ExportService(ctx.createAggregator(options.seed), ctx.now);
      const data = await exportService.export({
        format: options.format,
        view: options.view,
        period: options.days ?? defaultPeriod(ctx),
        granularity: options.granularity,
      });

      if (!options.output) {
        ctx.write(data.endsWith('\n') ? data : `${data}\n`);
        return;
      }

      await ctx.writeFile(options.output, data);
      ctx.log(green(`Exported ${options.view} (${options.format}) to ${options.output}`));
      ctx.log(dim(`Size: ${formatBytes(Buffer.byteLength(data, 'utf-8'))}`));
    });
}
