/**
 * CLI Command Tests
 *
 * These tests run the commander program in process against the fixture
 * data set and capture everything it prints or writes:
 * 1. Argument parsing and validation
 * 2. Report content
 * 3. Export output to stdout and to files
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CommanderError } from 'commander';
import { DashboardDataAggregator } from '../../src/core/dashboard';
import { buildReport } from '../../src/cli/commands/report';
import { createProgram } from '../../src/cli/program';
import { createDefaultContext, type CliContext } from '../../src/cli/context';
import { loadConfig } from '../../src/config';
import { FIXTURE_TODAY, FixtureDataSource } from '../helpers';

interface TestCli {
  ctx: CliContext;
  lines: string[];
  stdout: string[];
  stderr: string[];
  files: Map<string, string>;
  seeds: (number | undefined)[];
  run(args: string[]): Promise<void>;
}

function createTestCli(): TestCli {
  const lines: string[] = [];
  const stdout: string[] = [];
  const stderr: string[] = [];
  const files = new Map<string, string>();
  const seeds: (number | undefined)[] = [];

  const ctx: CliContext = {
    createAggregator: (seed) => {
      seeds.push(seed);
      return new DashboardDataAggregator(new FixtureDataSource(), { now: () => FIXTURE_TODAY });
    },
    artistName: 'Test Artist',
    defaultDays: 7,
    log: (line) => lines.push(line),
    write: (text) => stdout.push(text),
    writeError: (text) => stderr.push(text),
    writeFile: async (path, data) => {
      files.set(path, data);
    },
    now: () => FIXTURE_TODAY,
  };

  return {
    ctx,
    lines,
    stdout,
    stderr,
    files,
    seeds,
    run: async (args) => {
      await createProgram(ctx).parseAsync(args, { from: 'user' });
    },
  };
}

async function runExpectingError(cli: TestCli, args: string[]): Promise<CommanderError> {
  try {
    await cli.run(args);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected "${args.join(' ')}" to fail`);
}

describe('CLI', () => {
  let cli: TestCli;

  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
    cli = createTestCli();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  // ==========================================================================
  // report
  // ==========================================================================
  describe('report', () => {
    it('prints the headline totals for the default period', async () => {
      await cli.run(['report']);

      expect(cli.lines).toContain('Artist Pulse Report: Test Artist');
      expect(cli.lines).toContain('Last 7 Days (2024-03-04 to 2024-03-10)');
      expect(cli.lines).toContainEqual(expect.stringMatching(/^ {2}Total streams\s+2,800$/));
      expect(cli.lines).toContainEqual(expect.stringMatching(/^ {2}Followers\s+1,100 \(\+10\.0%\)$/));
      expect(cli.lines).toContainEqual(expect.stringMatching(/^ {2}Top song\s+Solar Flare$/));
    });

    it('prints weekly streams with the forecast', async () => {
      await cli.run(['report', '--days', '7']);

      expect(cli.lines).toContain('Streams (weekly)');
      expect(cli.lines).toContainEqual(expect.stringMatching(/^2024-03-04\s+2,800\s+-\s+-\s+2,800$/));
      expect(cli.lines).toContainEqual(expect.stringMatching(/^ {2}Forecast \(4 ahead\)\s+11,200$/));
    });

    it('prints the platform split and revenue', async () => {
      await cli.run(['report']);

      expect(cli.lines).toContainEqual(expect.stringMatching(/^Spotify\s+1,400\s+50\.0%$/));
      expect(cli.lines).toContainEqual(expect.stringMatching(/^ {2}Total revenue\s+\$6\.00$/));
      expect(cli.lines).toContainEqual(expect.stringMatching(/^ {2}Per 1,000 streams\s+\$3\.00$/));
    });

    it('honours --granularity', async () => {
      await cli.run(['report', '-g', 'daily']);

      const dateRows = cli.lines.filter((line) => /^2024-03-\d{2}\s/.test(line));
      expect(cli.lines).toContain('Streams (daily)');
      expect(dateRows).toHaveLength(7);
    });

    it('passes --seed to the data source', async () => {
      await cli.run(['report', '--seed', '42']);

      expect(cli.seeds).toEqual([42]);
    });

    it('rejects a day count with no matching period', async () => {
      const error = await runExpectingError(cli, ['report', '--days', '14']);

      expect(error.code).toBe('commander.invalidArgument');
      expect(cli.stderr.join('')).toContain("argument '14' is invalid. Expected one of: 7, 30, 90, 180, 365.");
      expect(cli.lines).toEqual([]);
    });

    it('rejects an unknown granularity', async () => {
      const error = await runExpectingError(cli, ['report', '--granularity', 'hourly']);

      expect(error.code).toBe('commander.invalidArgument');
    });
  });

  // ==========================================================================
  // export
  // ==========================================================================
  describe('export', () => {
    it('writes CSV to stdout', async () => {
      await cli.run(['export', '--format', 'csv', '--view', 'streams', '--granularity', 'weekly']);

      expect(cli.stdout.join('')).toBe(
        'date,streams,growth_rate,moving_average,cumulative\n2024-03-04,2800,,,2800\n'
      );
    });

    it('writes JSON by default', async () => {
      await cli.run(['export', '--view', 'geography']);

      const document: unknown = JSON.parse(cli.stdout.join(''));
      expect(document).toMatchObject({
        view: 'geography',
        period: 'Last 7 Days',
        exportedAt: '2024-03-10T15:30:00.000Z',
        rows: [
          { country: 'United States', listeners: 2100, percentage: 75 },
          { country: 'Germany', listeners: 700, percentage: 25 },
        ],
      });
    });

    it('writes to --output and reports the size', async () => {
      await cli.run(['export', '-f', 'csv', '-g', 'weekly', '-o', 'streams.csv']);

      expect(cli.files.get('streams.csv')).toBe(
        'date,streams,growth_rate,moving_average,cumulative\n2024-03-04,2800,,,2800\n'
      );
      expect(cli.lines).toEqual(['Exported streams (csv) to streams.csv', 'Size: 74 B']);
      expect(cli.stdout).toEqual([]);
    });

    it('rejects an unknown format', async () => {
      const error = await runExpectingError(cli, ['export', '--format', 'xml']);

      expect(error.code).toBe('commander.invalidArgument');
      expect(cli.files.size).toBe(0);
    });

    it('rejects an unknown view', async () => {
      const error = await runExpectingError(cli, ['export', '--view', 'playlists']);

      expect(error.code).toBe('commander.invalidArgument');
    });
  });

  it('builds every section of an unseeded report from one data set', async () => {
    const ctx = createDefaultContext(loadConfig({}));

    const report = await buildReport(ctx, 'Last 30 Days', 'daily');

    expect(report.streams.points).toHaveLength(30);
    expect(report.streams.points.at(-1)?.cumulative).toBe(report.overview.totals.totalStreams);
    expect(report.overview.dailyStreams.map((p) => p.value)).toEqual(
      report.streams.points.map((p) => p.streams)
    );
  });

  it('prints help for --help', async () => {
    const error = await runExpectingError(cli, ['--help']);

    expect(error.code).toBe('commander.helpDisplayed');
    expect(cli.stdout.join('')).toContain('report');
    expect(cli.stdout.join('')).toContain('export');
  });
});
