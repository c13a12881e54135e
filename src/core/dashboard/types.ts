/**
 * Dashboard Types
 *
 * Response shapes for the four dashboard views (Overview, Audience, Content,
 * Revenue) plus the detailed streams series. Every type is JSON-serialisable
 * and ready for a charting front end: dates are `YYYY-MM-DD` strings and
 * missing values are `null`, which charts render as gaps.
 */

import type { DateRange, Granularity } from '../transform';

/**
 * A single point in a time series chart.
 *
 * @example
 * ```typescript
 * const dataPoints: ChartDataPoint[] = [
 *   { date: '2024-03-01', value: 1240 },
 *   { date: '2024-03-02', value: null },
 *   { date: '2024-03-03', value: 1310, label: 'forecast' },
 * ];
 * ```
 */
export interface ChartDataPoint {
  /** ISO date string in YYYY-MM-DD format */
  date: string;

  /** Value for this date, null where it is undefined */
  value: number | null;

  /** Optional label for tooltips or annotations */
  label?: string;
}

/**
 * One slice of a pie or bar chart.
 */
export interface CategoryShare {
  category: string;
  value: number;
  /** Share of the total in percent (0-100), null when the total is 0 */
  percentage: number | null;
}

/**
 * Dense heatmap grid built from a pivot table. `values[i][j]` belongs to
 * `rows[i]` and `columns[j]`; absent combinations are null.
 */
export interface HeatmapData {
  rows: string[];
  columns: string[];
  values: (number | null)[][];
}

/** Period metadata shared by every view */
export interface ViewPeriod {
  /** The period label as requested, e.g. "Last 30 Days" */
  period: string;
  days: number;
  dateRange: DateRange;
}

// ============================================================================
// Overview
// ============================================================================

export interface OverviewTotals {
  totalStreams: number;
  currentFollowers: number;
  followerChange: number;
  /** Formatted follower growth over the period, e.g. "+4.2%" */
  followerGrowth: string;
  avgDailyStreams: number;
  /** Formatted growth of the second half of the period over the first */
  streamGrowth: string;
  /** Named platforms (the "Other" bucket excluded) */
  platforms: number;
  topSong: string | null;
}

/**
 * Main dashboard: headline metrics, daily and weekly trends and the
 * platform and song breakdowns.
 */
export interface DashboardOverview extends ViewPeriod {
  totals: OverviewTotals;
  dailyStreams: ChartDataPoint[];
  /** Trailing 7-day average of daily streams */
  streamsMovingAverage: ChartDataPoint[];
  followers: ChartDataPoint[];
  /** ISO-week totals dated by the first day of each week */
  weeklyStreams: ChartDataPoint[];
  platformDistribution: CategoryShare[];
  topSongs: CategoryShare[];
  /** Mean streams per weekday, Monday first; weekdays absent from the period are omitted */
  dayOfWeek: CategoryShare[];
}

// ============================================================================
// Streams
// ============================================================================

/** Bucket size of the streams view */
export type StreamsGranularity = 'daily' | Granularity;

export interface StreamsPoint {
  date: string;
  streams: number | null;
  /** Relative change from the previous bucket */
  growthRate: number | null;
  movingAverage: number | null;
  cumulative: number | null;
}

/**
 * Streams series at a chosen granularity with its derived trend columns
 * and a short linear forecast.
 */
export interface StreamsView extends ViewPeriod {
  granularity: StreamsGranularity;
  /** Moving average window, in buckets */
  movingAverageWindow: number;
  points: StreamsPoint[];
  forecast: ChartDataPoint[];
  /** Percentile rank (0-100) of the latest bucket among all buckets */
  latestPercentile: number | null;
}

// ============================================================================
// Audience
// ============================================================================

export interface AudienceView extends ViewPeriod {
  geography: CategoryShare[];
  ageGroups: CategoryShare[];
  gender: CategoryShare[];
  /** Engagement metric by age group */
  engagement: HeatmapData;
  /** Followers on the last day relative to the first (1 means no change) */
  followerRetention: number;
}

// ============================================================================
// Content
// ============================================================================

export interface SongSummary {
  song: string;
  streams: number;
  avgCompletionRate: number;
  saves: number;
  shares: number;
  saveRate: number;
  shareRate: number;
  /** 0-100 */
  engagementScore: number;
}

export interface SongDetail {
  song: string;
  dailyStreams: ChartDataPoint[];
  platformBreakdown: CategoryShare[];
  /** Percentile rank (0-100) of the song's streams among all songs */
  streamsPercentile: number | null;
}

export interface ContentView extends ViewPeriod {
  /** Songs ordered by streams, most streamed first */
  songs: SongSummary[];
  /** Detail of the requested song, or of the top song */
  selected: SongDetail | null;
}

// ============================================================================
// Revenue
// ============================================================================

export interface PlatformRevenue {
  platform: string;
  streams: number;
  revenue: number;
  revenuePerStream: number;
  revenuePerThousand: number;
  /** Share of total revenue (0-1) */
  share: number;
}

export interface RevenueProjection {
  month: string;
  projectedRevenue: number;
  growthRate: number;
  /** e.g. "+7.0%", null for the current month */
  growthLabel: string | null;
}

export interface RevenueView extends ViewPeriod {
  totalRevenue: number;
  avgDailyRevenue: number;
  avgRevenuePerStream: number;
  byPlatform: PlatformRevenue[];
  dailyRevenue: ChartDataPoint[];
  weeklyRevenue: ChartDataPoint[];
  projection: RevenueProjection[];
}
