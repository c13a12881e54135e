/**
 * What the CLI commands run against. index.ts builds the real context from
 * configuration; tests pass one over fixture data that captures output.
 */

import { writeFile } from 'node:fs/promises';
import { InvalidArgumentError } from 'commander';
import type { Config } from '../config';
import { DashboardDataAggregator, SampleDataSource, type StreamsGranularity } from '../core/dashboard';
import { isExportFormat, isExportView, type ExportFormat, type ExportView } from '../core/export';
import { getPeriodForDays, PERIOD_DAYS, type PeriodLabel } from '../core/transform';

export interface CliContext {
  /** Builds the aggregator, over sample data seeded with `seed` when given */
  createAggregator(seed?: number): DashboardDataAggregator;
  artistName: string;
  /** Period length used when --days is absent */
  defaultDays: number;
  /** Prints one line of output */
  log(line: string): void;
  /** Writes raw text to standard output */
  write(text: string): void;
  writeError(text: string): void;
  writeFile(path: string, data: string): Promise<void>;
  now?: () => Date;
}

export function createDefaultContext(cfg: Config): CliContext {
  return {
    createAggregator: (seed) =>
      new DashboardDataAggregator(new SampleDataSource(seed ?? cfg.data.sampleSeed), {
        artistName: cfg.data.artistName,
      }),
    artistName: cfg.data.artistName,
    defaultDays: cfg.data.defaultDays,
    log: (line) => console.log(line),
    write: (text) => {
      process.stdout.write(text);
    },
    writeError: (text) => {
      process.stderr.write(text);
    },
    writeFile: (path, data) => writeFile(path, data, 'utf-8'),
  };
}

/**
 * The period for the configured default length, or "Last 30 Days" when no
 * period has that many days.
 */
export function defaultPeriod(ctx: CliContext): PeriodLabel {
  return getPeriodForDays(ctx.defaultDays) ?? 'Last 30 Days';
}

// =============================================================================
// Option Parsers
// =============================================================================

export function parseDays(value: string): PeriodLabel {
  const period = getPeriodForDays(Number(value));
  if (!/^\d+$/.test(value) || period === null) {
    throw new InvalidArgumentError(`Expected one of: ${Object.values(PERIOD_DAYS).join(', ')}.`);
  }
  return period;
}

export function parseSeed(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parseInt(value, 10);
}

export function parseGranularity(value: string): StreamsGranularity {
  if (value === 'daily' || value === 'weekly' || value === 'monthly') {
    return value;
  }
  throw new InvalidArgumentError('Expected daily, weekly or monthly.');
}

export function parseFormat(value: string): ExportFormat {
  const format = value.toLowerCase();
  if (!isExportFormat(format)) {
    throw new InvalidArgumentError('Expected json or csv.');
  }
  return format;
}

export function parseView(value: string): ExportView {
  if (!isExportView(value)) {
    throw new InvalidArgumentError('Expected streams, songs, platforms, geography or revenue.');
  }
  return value;
}
