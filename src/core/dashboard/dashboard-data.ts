/**
 * Dashboard Data Aggregator
 *
 * Turns the raw tables of a DashboardDataSource into the response shapes of
 * the dashboard views. Every view runs the same pipeline: resolve the period
 * label to a date range, load the tables, then reshape them with the
 * transform core (filter, aggregate, trend, pivot, percentage) into
 * chart-ready series and breakdowns.
 *
 * The aggregator holds no state between calls; the clock is injectable so
 * the period end date can be fixed in tests.
 *
 * @example
 * ```typescript
 * const aggregator = new DashboardDataAggregator(new SampleDataSource(42));
 *
 * const overview = await aggregator.getOverview('Last 30 Days');
 * console.log(`Total streams: ${overview.totals.totalStreams}`);
 *
 * const weekly = await aggregator.getStreams('Last 90 Days', 'weekly');
 * console.log(`Next week: ${weekly.forecast[0]?.value}`);
 * ```
 */

import { calculateConversionRate, calculateRetention, formatGrowth, formatGrowthPct } from '../analytics';
import {
  getAverageDailyRevenue,
  getGrowthMetrics,
  getPerformanceSummary,
  getPlatformRevenueShare,
  getRevenuePerThousand,
  getSaveRate,
  getShareRate,
  getSongEngagementScore,
  type ArtistProfile,
  type PlatformData,
  type RevenueData,
  type SongPerformance,
} from '../models';
import type { SampleDataSet } from '../sample-data';
import {
  DEFAULT_MA_WINDOW,
  InvalidParameterError,
  addDateParts,
  convertToWeekly,
  aggregate,
  cumulativeSum,
  cumulativeSumField,
  filterByRange,
  forecastTable,
  freezeTable,
  getDateRangeForPeriod,
  getDaysFromPeriod,
  getWeekdayName,
  growthRate,
  meanField,
  movingAverage,
  movingAverageField,
  numericValue,
  parseDate,
  percentileRank,
  percentileRankOf,
  pivot,
  sumField,
  toMatrix,
  toPercentage,
  percentageField,
  type TableRow,
  type TimeSeriesTable,
} from '../transform';
import type { DashboardDataSource } from './data-source';
import type {
  AudienceView,
  CategoryShare,
  ChartDataPoint,
  ContentView,
  DashboardOverview,
  HeatmapData,
  PlatformRevenue,
  RevenueView,
  SongSummary,
  StreamsGranularity,
  StreamsView,
  ViewPeriod,
} from './types';

/** Moving average window per streams granularity, in buckets */
const MOVING_AVERAGE_WINDOWS: Record<StreamsGranularity, number> = {
  daily: DEFAULT_MA_WINDOW,
  weekly: 4,
  monthly: 3,
};

/** Number of buckets forecast per streams granularity */
const FORECAST_PERIODS: Record<StreamsGranularity, number> = {
  daily: 7,
  weekly: 4,
  monthly: 3,
};

const OTHER_CATEGORY = 'Other';

export interface DashboardOptions {
  /** Artist shown in the overview */
  artistName?: string;
  /** Returns the current date; the last day of every period */
  now?: () => Date;
}

interface LoadedPeriod {
  view: ViewPeriod;
  data: SampleDataSet;
}

/**
 * Aggregates data for dashboard views.
 */
export class DashboardDataAggregator {
  private readonly artistName: string;
  private readonly now: () => Date;

  /**
   * @param dataSource - Where the raw tables come from
   * @param options - Artist name and clock
   */
  constructor(
    private readonly dataSource: DashboardDataSource,
    options: DashboardOptions = {}
  ) {
    this.artistName = options.artistName ?? 'Sample Artist';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Main dashboard: headline metrics, daily streams with their 7-day
   * average, followers, weekly totals, and the platform, song and weekday
   * breakdowns.
   *
   * @param period - Period label such as "Last 30 Days"
   */
  async getOverview(period: string): Promise<DashboardOverview> {
    const { view, data } = await this.loadPeriod(period);
    const streaming = data.streamingData;

    const profile = this.buildArtistProfile(data);
    const summary = getPerformanceSummary(profile);
    const growth = getGrowthMetrics(profile);

    const firstFollowers = numericValue(streaming[0] ?? {}, 'followers') ?? 0;
    const lastFollowers = summary.totalFollowers;
    const hasOther = data.platformData.some((row) => row.platform === OTHER_CATEGORY);

    const maField = movingAverageField('streams', DEFAULT_MA_WINDOW);

    return {
      ...view,
      totals: {
        totalStreams: summary.totalStreams,
        currentFollowers: lastFollowers,
        followerChange: lastFollowers - firstFollowers,
        followerGrowth: formatGrowth(growth.followerGrowth),
        avgDailyStreams: Math.trunc(summary.avgDailyStreams),
        streamGrowth: halfOverHalfGrowth(streaming, 'streams'),
        platforms: summary.platforms - (hasOther ? 1 : 0),
        topSong: summary.topSong,
      },
      dailyStreams: toSeries(streaming, 'streams'),
      streamsMovingAverage: toSeries(movingAverage(streaming, 'streams', DEFAULT_MA_WINDOW), maField),
      followers: toSeries(streaming, 'followers'),
      weeklyStreams: toSeries(convertToWeekly(streaming, 'date', 'streams'), 'streams'),
      platformDistribution: toShares(data.platformData, 'platform', 'streams'),
      topSongs: toShares(sortByField(data.songData, 'streams'), 'song', 'streams'),
      dayOfWeek: toShares(averageByWeekday(streaming, 'streams'), 'day', 'streams'),
    };
  }

  /**
   * Streams at a daily, weekly or monthly granularity with growth, moving
   * average and running total per bucket, plus a linear forecast.
   */
  async getStreams(period: string, granularity: StreamsGranularity = 'daily'): Promise<StreamsView> {
    const { view, data } = await this.loadPeriod(period);

    const table =
      granularity === 'daily'
        ? data.streamingData
        : aggregate(data.streamingData, 'date', 'streams', granularity, 'sum');

    const window = MOVING_AVERAGE_WINDOWS[granularity];
    const maField = movingAverageField('streams', window);
    const cumField = cumulativeSumField('streams');
    const enriched = cumulativeSum(movingAverage(growthRate(table, 'streams'), 'streams', window), 'streams');

    const latest = numericValue(table[table.length - 1] ?? {}, 'streams');

    return {
      ...view,
      granularity,
      movingAverageWindow: window,
      points: enriched.map((row) => ({
        date: String(row.date),
        streams: numericValue(row, 'streams'),
        growthRate: numericValue(row, 'growth_rate'),
        movingAverage: numericValue(row, maField),
        cumulative: numericValue(row, cumField),
      })),
      forecast: forecastTable(table, 'date', 'streams', FORECAST_PERIODS[granularity], 'linear').map(
        (row) => ({ date: String(row.date), value: numericValue(row, 'streams'), label: 'forecast' })
      ),
      latestPercentile: latest === null ? null : percentileRankOf(table, 'streams', latest),
    };
  }

  /**
   * Geography, age and gender breakdowns and the engagement-by-age heatmap.
   */
  async getAudience(period: string): Promise<AudienceView> {
    const { view, data } = await this.loadPeriod(period);
    const streaming = data.streamingData;

    const firstFollowers = numericValue(streaming[0] ?? {}, 'followers') ?? 0;
    const lastFollowers = numericValue(streaming[streaming.length - 1] ?? {}, 'followers') ?? 0;

    return {
      ...view,
      geography: toShares(sortByField(data.geoData, 'listeners'), 'country', 'listeners'),
      ageGroups: toShares(data.ageData, 'age_group', 'percentage'),
      gender: toShares(data.genderData, 'gender', 'percentage'),
      engagement: toHeatmap(data.engagementData, 'metric', 'age_group', 'value'),
      followerRetention: calculateRetention(firstFollowers, lastFollowers),
    };
  }

  /**
   * Song table ranked by streams, plus daily streams and platform split for
   * one song (the requested one, or the top song).
   *
   * @throws InvalidParameterError if `song` is not in the catalogue
   */
  async getContent(period: string, song?: string): Promise<ContentView> {
    const { view, data } = await this.loadPeriod(period);

    const performances = toSongPerformances(data, this.artistName);
    const songs = performances.map(toSongSummary).sort((a, b) => b.streams - a.streams);

    const selectedName = song ?? songs[0]?.song;
    if (selectedName === undefined) {
      return { ...view, songs, selected: null };
    }

    const selected = songs.find((s) => s.song === selectedName);
    const daily = selected ? await this.dataSource.loadSongDaily(selectedName, data) : null;
    if (!selected || !daily) {
      throw new InvalidParameterError('song', `unknown song '${selectedName}'`);
    }

    const platformSplit = freezeTable(
      data.platformData.map((row) => ({
        platform: row.platform,
        streams: Math.trunc(selected.streams * (numericValue(row, 'percentage') ?? 0)),
      }))
    );

    return {
      ...view,
      songs,
      selected: {
        song: selectedName,
        dailyStreams: toSeries(daily, 'streams'),
        platformBreakdown: toShares(platformSplit, 'platform', 'streams'),
        streamsPercentile: percentileRank(
          songs.map((s) => s.streams),
          selected.streams
        ),
      },
    };
  }

  /**
   * Revenue totals, per-platform earnings and rates, daily and weekly
   * revenue, and the monthly projection.
   */
  async getRevenue(period: string): Promise<RevenueView> {
    const { view, data } = await this.loadPeriod(period);

    const platformBreakdown: PlatformData[] = data.revenueData.map((row) => ({
      platformName: String(row.platform),
      streams: numericValue(row, 'streams') ?? 0,
      revenue: numericValue(row, 'total_revenue') ?? 0,
      avgStreamValue: numericValue(row, 'revenue_per_stream') ?? 0,
    }));

    const revenue: RevenueData = {
      totalRevenue: sumField(data.revenueData, 'total_revenue'),
      platformBreakdown,
      dailyRevenue: data.dailyRevenue.map((row) => ({
        date: String(row.date),
        revenue: numericValue(row, 'revenue') ?? 0,
      })),
    };

    const shares = getPlatformRevenueShare(revenue);
    const byPlatform: PlatformRevenue[] = platformBreakdown.map((platform) => ({
      platform: platform.platformName,
      streams: platform.streams,
      revenue: platform.revenue,
      revenuePerStream: platform.avgStreamValue,
      revenuePerThousand: getRevenuePerThousand(platform),
      share: shares[platform.platformName] ?? 0,
    }));

    return {
      ...view,
      totalRevenue: revenue.totalRevenue,
      avgDailyRevenue: getAverageDailyRevenue(revenue),
      avgRevenuePerStream: calculateConversionRate(
        revenue.totalRevenue,
        sumField(data.revenueData, 'streams')
      ),
      byPlatform,
      dailyRevenue: toSeries(data.dailyRevenue, 'revenue'),
      weeklyRevenue: toSeries(convertToWeekly(data.dailyRevenue, 'date', 'revenue'), 'revenue'),
      projection: data.revenueProjection.map((row, i) => {
        const rate = numericValue(row, 'growth_rate') ?? 1;
        return {
          month: String(row.month),
          projectedRevenue: numericValue(row, 'projected_revenue') ?? 0,
          growthRate: rate,
          growthLabel: i === 0 ? null : formatGrowth(rate - 1),
        };
      }),
    };
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * Resolves the period against the clock and loads its tables. Daily
   * tables are clipped to the period so a data source that returns extra
   * history does not leak into the views.
   */
  private async loadPeriod(period: string): Promise<LoadedPeriod> {
    const today = parseDate(this.now(), 'today');
    const days = getDaysFromPeriod(period);
    const dateRange = getDateRangeForPeriod(period, today);

    const data = await this.dataSource.load(days, today);

    return {
      view: { period, days, dateRange },
      data: {
        ...data,
        streamingData: filterByRange(data.streamingData, 'date', dateRange.start, dateRange.end),
        dailyRevenue: filterByRange(data.dailyRevenue, 'date', dateRange.start, dateRange.end),
      },
    };
  }

  private buildArtistProfile(data: SampleDataSet): ArtistProfile {
    const streaming = data.streamingData;
    const last = streaming[streaming.length - 1];

    return {
      name: this.artistName,
      totalFollowers: last ? numericValue(last, 'followers') ?? 0 : 0,
      totalStreams: sumField(streaming, 'streams'),
      songCount: data.songData.length,
      topSongs: toSongPerformances(data, this.artistName).sort((a, b) => b.totalStreams - a.totalStreams),
      dailyMetrics: streaming.map((row) => ({
        date: String(row.date),
        streams: numericValue(row, 'streams') ?? 0,
        followers: numericValue(row, 'followers') ?? 0,
      })),
      platformDistribution: toRecord(data.platformData, 'platform', 'streams'),
      geographicDistribution: toRecord(data.geoData, 'country', 'listeners'),
    };
  }
}

// ============================================================================
// Table Reshaping
// ============================================================================

function toSeries(table: TimeSeriesTable, valueField: string, dateField: string = 'date'): ChartDataPoint[] {
  return table.map((row) => ({
    date: String(row[dateField]),
    value: numericValue(row, valueField),
  }));
}

function toShares(table: TimeSeriesTable, categoryField: string, valueField: string): CategoryShare[] {
  const pctField = percentageField(valueField);
  return toPercentage(table, valueField).map((row) => ({
    category: String(row[categoryField]),
    value: numericValue(row, valueField) ?? 0,
    percentage: numericValue(row, pctField),
  }));
}

function toHeatmap(
  table: TimeSeriesTable,
  indexField: string,
  columnsField: string,
  valuesField: string
): HeatmapData {
  const pivoted = pivot(table, indexField, columnsField, valuesField, 'mean');
  return {
    rows: [...pivoted.index],
    columns: [...pivoted.columns],
    values: toMatrix(pivoted),
  };
}

function toRecord(table: TimeSeriesTable, keyField: string, valueField: string): Record<string, number> {
  const record: Record<string, number> = {};
  for (const row of table) {
    record[String(row[keyField])] = numericValue(row, valueField) ?? 0;
  }
  return record;
}

function sortByField(table: TimeSeriesTable, field: string): TimeSeriesTable {
  return freezeTable(
    [...table].sort((a, b) => (numericValue(b, field) ?? 0) - (numericValue(a, field) ?? 0))
  );
}

/**
 * Mean of a field per weekday, Monday first. Weekdays with no rows are left
 * out rather than reported as zero.
 */
function averageByWeekday(table: TimeSeriesTable, valueField: string): TimeSeriesTable {
  const withParts = addDateParts(table);
  const rows: TableRow[] = [];

  for (let weekday = 0; weekday < 7; weekday++) {
    const mean = meanField(
      withParts.filter((row) => row.weekday === weekday),
      valueField
    );
    if (mean !== null) {
      rows.push({ day: getWeekdayName(weekday), [valueField]: mean });
    }
  }
  return freezeTable(rows);
}

/**
 * Growth of the second half of a series over the first half, formatted. The
 * middle row of an odd-length series belongs to neither half.
 */
function halfOverHalfGrowth(table: TimeSeriesTable, valueField: string): string {
  const half = Math.floor(table.length / 2);
  const first = sumField(table.slice(0, half), valueField);
  const second = sumField(table.slice(table.length - half), valueField);
  return formatGrowthPct(second, first);
}

// ============================================================================
// Songs
// ============================================================================

function toSongPerformances(data: SampleDataSet, artist: string): SongPerformance[] {
  return data.songData.map((row) => ({
    song: { title: String(row.song), artist },
    totalStreams: numericValue(row, 'streams') ?? 0,
    avgCompletionRate: numericValue(row, 'avg_completion_rate') ?? 0,
    saves: numericValue(row, 'saves') ?? 0,
    shares: numericValue(row, 'shares') ?? 0,
    dailyData: [],
    platformDistribution: {},
  }));
}

function toSongSummary(performance: SongPerformance): SongSummary {
  return {
    song: performance.song.title,
    streams: performance.totalStreams,
    avgCompletionRate: performance.avgCompletionRate,
    saves: performance.saves,
    shares: performance.shares,
    saveRate: getSaveRate(performance),
    shareRate: getShareRate(performance),
    engagementScore: getSongEngagementScore(performance),
  };
}
