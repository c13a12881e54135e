/**
 * Sample Data Generator
 *
 * Produces realistic-looking streaming statistics for demos, the CLI report
 * and tests: daily streams and followers, platform and audience breakdowns,
 * per-song performance, revenue and engagement by age group.
 *
 * All randomness comes from an injected RandomSource, so a seeded generator
 * always returns the same data set. Daily series are TimeSeriesTables; the
 * breakdowns are frozen categorical tables without a date field.
 *
 * @example
 * ```typescript
 * const generator = new SampleDataGenerator(createSeededRandom(42));
 * const data = generator.getAllSampleData(30, '2024-03-30');
 * data.streamingData.length; // 30
 * ```
 */

import {
  addDays,
  createTable,
  formatDate,
  freezeTable,
  numericValue,
  parseDate,
  sumField,
  weekdayIndex,
  type DateInput,
  type TableRow,
  type TimeSeriesTable,
} from '../transform';
import { catalog as defaultCatalog, type Catalog, type CatalogShare } from './catalog';

// ============================================================================
// Random Source
// ============================================================================

/** Returns a uniformly distributed number in [0, 1) */
export type RandomSource = () => number;

export const DEFAULT_SAMPLE_SEED = 42;

/**
 * Small seeded PRNG (mulberry32). Equal seeds give equal sequences.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ============================================================================
// Constants
// ============================================================================

const BASE_DAILY_STREAMS = 1000;
const BASE_FOLLOWERS = 5000;
const WEEKEND_BOOST = 1.3;
const DAILY_TREND = 0.01;
const FOLLOWER_CONVERSION = 0.02;
const MONTHLY_PROJECTION_GROWTH = 0.07;

/** Everything the dashboard views draw from */
export interface SampleDataSet {
  /** date, streams, followers */
  streamingData: TimeSeriesTable;
  /** platform, percentage, streams */
  platformData: TimeSeriesTable;
  /** country, percentage, listeners */
  geoData: TimeSeriesTable;
  /** age_group, percentage */
  ageData: TimeSeriesTable;
  /** gender, percentage */
  genderData: TimeSeriesTable;
  /** song, streams, avg_completion_rate, saves, shares */
  songData: TimeSeriesTable;
  /** platform, percentage, streams, revenue_per_stream, total_revenue */
  revenueData: TimeSeriesTable;
  /** date, revenue */
  dailyRevenue: TimeSeriesTable;
  /** month, projected_revenue, growth_rate */
  revenueProjection: TimeSeriesTable;
  /** age_group, metric, value (long format, for the heatmap pivot) */
  engagementData: TimeSeriesTable;
}

// ============================================================================
// Generator
// ============================================================================

export class SampleDataGenerator {
  /**
   * @param random - Random source; seeded with DEFAULT_SAMPLE_SEED by default
   * @param catalog - Lookup tables for platforms, audience and songs
   */
  constructor(
    private readonly random: RandomSource = createSeededRandom(DEFAULT_SAMPLE_SEED),
    private readonly catalog: Catalog = defaultCatalog
  ) {}

  /**
   * Daily streams and cumulative followers for the `days` days ending on
   * `endDate`.
   *
   * Streams start around 1000 a day, rise by 1% of the base per day, get a
   * 30% boost on weekends and fluctuate by up to ±15%. Each day about 2% of
   * that day's streams convert into new followers.
   */
  generateStreamingData(days: number, endDate: DateInput = new Date()): TimeSeriesTable {
    const end = parseDate(endDate, 'endDate');
    const rows: TableRow[] = [];
    let followers = BASE_FOLLOWERS;

    for (let i = 0; i < days; i++) {
      const date = addDays(end, i - (days - 1));
      const boost = isWeekend(date) ? WEEKEND_BOOST : 1;
      const fluctuation = this.uniform(0.85, 1.15);
      const trend = 1 + i * DAILY_TREND;

      const streams = Math.trunc(BASE_DAILY_STREAMS * boost * fluctuation * trend);
      followers += Math.trunc(streams * FOLLOWER_CONVERSION * this.uniform(0.8, 1.2));

      rows.push({ date: formatDate(date), streams, followers });
    }

    return createTable(rows);
  }

  /** Splits a stream total across platforms by their catalogue share. */
  generatePlatformData(totalStreams: number): TimeSeriesTable {
    return freezeTable(
      this.catalog.platforms.map((platform) => ({
        platform: platform.name,
        percentage: platform.share,
        streams: Math.trunc(totalStreams * platform.share),
      }))
    );
  }

  /** Splits a listener total across countries. */
  generateGeographicData(totalStreams: number): TimeSeriesTable {
    return freezeTable(
      this.catalog.countries.map((country) => ({
        country: country.name,
        percentage: country.share,
        listeners: Math.trunc(totalStreams * country.share),
      }))
    );
  }

  generateDemographicData(): { ageData: TimeSeriesTable; genderData: TimeSeriesTable } {
    return {
      ageData: shareTable(this.catalog.ageGroups, 'age_group'),
      genderData: shareTable(this.catalog.genders, 'gender'),
    };
  }

  /**
   * Totals for each catalogue song: streams by share, a completion rate of
   * 70-95%, saves of 10-30% and shares of 1-5% of the song's streams.
   */
  generateSongData(totalStreams: number): TimeSeriesTable {
    const streams = this.catalog.songs.map((song) => Math.trunc(totalStreams * song.share));
    const completion = streams.map(() => this.uniform(0.7, 0.95));
    const saves = streams.map((s) => Math.trunc(s * this.uniform(0.1, 0.3)));
    const shares = streams.map((s) => Math.trunc(s * this.uniform(0.01, 0.05)));

    return freezeTable(
      this.catalog.songs.map((song, i) => ({
        song: song.name,
        streams: streams[i],
        avg_completion_rate: completion[i],
        saves: saves[i],
        shares: shares[i],
      }))
    );
  }

  /**
   * Daily streams of one song, derived from the artist's daily streams scaled
   * by the song's share, with a weekend boost and ±20% noise.
   */
  generateSongDailyData(
    songName: string,
    songRatio: number,
    streamingData: TimeSeriesTable
  ): TimeSeriesTable {
    return createTable(
      streamingData.map((row) => {
        const date = parseDate(row.date);
        const boost = isWeekend(date) ? WEEKEND_BOOST : 1;
        const fluctuation = this.uniform(0.8, 1.2);
        const daily = numericValue(row, 'streams') ?? 0;
        return {
          date: formatDate(date),
          song: songName,
          streams: Math.trunc(daily * songRatio * boost * fluctuation),
        };
      })
    );
  }

  /**
   * Daily data for a song from the song table, or null for an unknown song.
   */
  getSongDailyData(
    songName: string,
    songData: TimeSeriesTable,
    streamingData: TimeSeriesTable
  ): TimeSeriesTable | null {
    const row = songData.find((r) => r.song === songName);
    if (!row) {
      return null;
    }
    const total = sumField(songData, 'streams');
    const ratio = total === 0 ? 0 : (numericValue(row, 'streams') ?? 0) / total;
    return this.generateSongDailyData(songName, ratio, streamingData);
  }

  /** Adds per-stream payout and total revenue to platform rows. */
  generateRevenueData(platformData: TimeSeriesTable): TimeSeriesTable {
    return freezeTable(
      platformData.map((row) => {
        const rate = this.revenueRate(row.platform);
        const streams = numericValue(row, 'streams') ?? 0;
        return { ...row, revenue_per_stream: rate, total_revenue: streams * rate };
      })
    );
  }

  /**
   * Daily revenue: each day's streams split by the platform mix of
   * `revenueData` and paid at each platform's rate.
   */
  generateDailyRevenue(
    streamingData: TimeSeriesTable,
    revenueData: TimeSeriesTable
  ): TimeSeriesTable {
    const totalStreams = sumField(revenueData, 'streams');
    const blendedRate =
      totalStreams === 0
        ? 0
        : revenueData.reduce(
            (sum, row) =>
              sum +
              ((numericValue(row, 'streams') ?? 0) / totalStreams) *
                (numericValue(row, 'revenue_per_stream') ?? 0),
            0
          );

    return createTable(
      streamingData.map((row) => ({
        date: row.date,
        revenue: (numericValue(row, 'streams') ?? 0) * blendedRate,
      }))
    );
  }

  /**
   * Projects revenue forward: the current month plus `months - 1` future
   * months, each 7% above the base per month ahead.
   */
  generateRevenueProjection(monthlyRevenue: number, months: number = 4): TimeSeriesTable {
    return freezeTable(
      Array.from({ length: months }, (_, i) => {
        const growthRate = 1 + MONTHLY_PROJECTION_GROWTH * i;
        return {
          month: i === 0 ? 'Current Month' : `Month ${i}`,
          projected_revenue: monthlyRevenue * growthRate,
          growth_rate: growthRate,
        };
      })
    );
  }

  /**
   * Engagement metric values (10-90%) for every age group, one row per
   * (age group, metric) pair.
   */
  generateEngagementByAge(): TimeSeriesTable {
    const rows: TableRow[] = [];
    for (const ageGroup of this.catalog.ageGroups) {
      for (const metric of this.catalog.engagementMetrics) {
        rows.push({ age_group: ageGroup.name, metric, value: this.uniform(0.1, 0.9) });
      }
    }
    return freezeTable(rows);
  }

  /**
   * Generates the complete sample data set for `days` days ending on
   * `endDate`.
   */
  getAllSampleData(days: number, endDate: DateInput = new Date()): SampleDataSet {
    const streamingData = this.generateStreamingData(days, endDate);
    const totalStreams = sumField(streamingData, 'streams');

    const platformData = this.generatePlatformData(totalStreams);
    const geoData = this.generateGeographicData(totalStreams);
    const { ageData, genderData } = this.generateDemographicData();
    const songData = this.generateSongData(totalStreams);
    const revenueData = this.generateRevenueData(platformData);
    const dailyRevenue = this.generateDailyRevenue(streamingData, revenueData);
    const revenueProjection = this.generateRevenueProjection(sumField(dailyRevenue, 'revenue'));
    const engagementData = this.generateEngagementByAge();

    return {
      streamingData,
      platformData,
      geoData,
      ageData,
      genderData,
      songData,
      revenueData,
      dailyRevenue,
      revenueProjection,
      engagementData,
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  private revenueRate(platform: unknown): number {
    return this.catalog.platforms.find((p) => p.name === platform)?.revenuePerStream ?? 0;
  }
}

function isWeekend(date: Date): boolean {
  return weekdayIndex(date) >= 5;
}

function shareTable(entries: readonly CatalogShare[], field: string): TimeSeriesTable {
  return freezeTable(entries.map((entry) => ({ [field]: entry.name, percentage: entry.share })));
}
