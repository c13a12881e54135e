/**
 * Test Helpers Module
 *
 * Provides utility functions for creating test data, fixtures, and
 * common test patterns. These helpers reduce boilerplate in tests and
 * ensure consistent test data across the test suite.
 */

import { addDays, createTable, formatDate, freezeTable, parseDate, type TimeSeriesTable } from '../src/core/transform';
import type { DashboardDataSource } from '../src/core/dashboard';
import type { SampleDataSet } from '../src/core/sample-data';

// ============================================================================
// Table Fixtures
// ============================================================================

/** First date of the standard fixture series (a Friday) */
export const FIXTURE_START = '2024-03-01';

/**
 * Creates a daily table with strictly linear values:
 * `start + i * step` on day i, starting at FIXTURE_START.
 *
 * With the defaults this is 30 days (2024-03-01 .. 2024-03-30) of
 * 100, 110, 120, ... 390.
 */
export function buildLinearTable(
  days: number = 30,
  options: { start?: number; step?: number; field?: string; firstDate?: string } = {}
): TimeSeriesTable {
  const { start = 100, step = 10, field = 'value', firstDate = FIXTURE_START } = options;
  const first = parseDate(firstDate);

  return createTable(
    Array.from({ length: days }, (_, i) => ({
      date: formatDate(addDays(first, i)),
      [field]: start + i * step,
    }))
  );
}

/**
 * Creates a daily table from explicit values, one per day from `firstDate`.
 * `null` entries become null cells.
 */
export function buildTable(
  values: readonly (number | null)[],
  field: string = 'value',
  firstDate: string = FIXTURE_START
): TimeSeriesTable {
  const first = parseDate(firstDate);
  return createTable(
    values.map((value, i) => ({ date: formatDate(addDays(first, i)), [field]: value }))
  );
}

/**
 * Deterministic random source for generator tests: cycles through the given
 * fractions in order.
 */
export function sequenceRandom(values: readonly number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index++;
    return value;
  };
}

// ============================================================================
// Dashboard Fixtures
// ============================================================================

/** Last day of the fixture data set (a Sunday) */
export const FIXTURE_TODAY = new Date(Date.UTC(2024, 2, 10, 15, 30));

/**
 * A small hand-made data set for the week 2024-03-04 .. 2024-03-10 with
 * round numbers, so dashboard views can be checked value by value.
 *
 * Streams rise by 100 a day from 100 to 700 (2800 in total). One extra day
 * before the week (2024-03-03, 9999 streams) lies outside "Last 7 Days".
 */
export function createFixtureDataSet(): SampleDataSet {
  const streams = [100, 200, 300, 400, 500, 600, 700];
  const followers = [1000, 1010, 1020, 1030, 1040, 1050, 1100];
  const revenue = [0.5, 0.5, 1, 1, 1, 1, 1];
  const first = parseDate('2024-03-04');
  const dates = streams.map((_, i) => formatDate(addDays(first, i)));

  return {
    streamingData: createTable([
      { date: '2024-03-03', streams: 9999, followers: 990 },
      ...dates.map((date, i) => ({ date, streams: streams[i], followers: followers[i] })),
    ]),
    platformData: freezeTable([
      { platform: 'Spotify', percentage: 0.5, streams: 1400 },
      { platform: 'Other', percentage: 0.5, streams: 1400 },
    ]),
    geoData: freezeTable([
      { country: 'Germany', percentage: 0.25, listeners: 700 },
      { country: 'United States', percentage: 0.75, listeners: 2100 },
    ]),
    ageData: freezeTable([
      { age_group: '18-24', percentage: 0.6 },
      { age_group: '25-34', percentage: 0.4 },
    ]),
    genderData: freezeTable([
      { gender: 'Female', percentage: 0.5 },
      { gender: 'Male', percentage: 0.5 },
    ]),
    songData: freezeTable([
      { song: 'Ocean Waves', streams: 1000, avg_completion_rate: 0.8, saves: 300, shares: 50 },
      { song: 'Solar Flare', streams: 3000, avg_completion_rate: 0.9, saves: 900, shares: 150 },
    ]),
    revenueData: freezeTable([
      { platform: 'Spotify', percentage: 0.5, streams: 1000, revenue_per_stream: 0.004, total_revenue: 4 },
      { platform: 'Other', percentage: 0.5, streams: 1000, revenue_per_stream: 0.002, total_revenue: 2 },
    ]),
    dailyRevenue: createTable(dates.map((date, i) => ({ date, revenue: revenue[i] }))),
    revenueProjection: freezeTable([
      { month: 'Current Month', projected_revenue: 6, growth_rate: 1 },
      { month: 'Month 1', projected_revenue: 6.42, growth_rate: 1.07 },
    ]),
    engagementData: freezeTable([
      { age_group: '18-24', metric: 'Save Rate', value: 0.4 },
      { age_group: '25-34', metric: 'Share Rate', value: 0.2 },
    ]),
  };
}

/**
 * Data source serving createFixtureDataSet(). Every known song streams 42
 * times on the last day.
 */
export class FixtureDataSource implements DashboardDataSource {
  readonly requests: Array<{ days: number; endDate: string }> = [];

  async load(days: number, endDate: Date): Promise<SampleDataSet> {
    this.requests.push({ days, endDate: formatDate(endDate) });
    return createFixtureDataSet();
  }

  async loadSongDaily(song: string, data: SampleDataSet): Promise<TimeSeriesTable | null> {
    if (!data.songData.some((row) => row.song === song)) {
      return null;
    }
    return createTable([{ date: '2024-03-10', song, streams: 42 }]);
  }
}

// ============================================================================
// Response Assertion Helpers
// ============================================================================

/**
 * Extracts JSON response from a Hono Response object.
 *
 * @param response - Hono Response object
 * @returns Parsed JSON body
 */
export async function getJsonResponse<T>(response: Response): Promise<T> {
  return response.json() as Promise<T>;
}

/**
 * Asserts that a response is a success response.
 *
 * @param response - API response object
 * @throws Error if response is not successful
 */
export function assertSuccess(response: { success: boolean }): void {
  if (!response.success) {
    throw new Error(`Expected success response but got: ${JSON.stringify(response)}`);
  }
}

/**
 * Asserts that a response is an error response with specific code.
 *
 * @param response - API response object
 * @param expectedCode - Expected error code
 * @throws Error if response doesn't match
 */
export function assertError(
  response: { success: boolean; error?: { code: string } },
  expectedCode: string
): void {
  if (response.success) {
    throw new Error(`Expected error response but got success: ${JSON.stringify(response)}`);
  }
  if (response.error?.code !== expectedCode) {
    throw new Error(
      `Expected error code '${expectedCode}' but got '${response.error?.code}': ${JSON.stringify(response)}`
    );
  }
}
