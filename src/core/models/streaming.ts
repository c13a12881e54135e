/**
 * Streaming Domain Types
 *
 * Daily metrics, songs and the artist profile that ties them together. These
 * are the typed counterparts of the rows carried by a TimeSeriesTable, used
 * where a view needs per-song or per-artist derived numbers.
 *
 * Dates are `YYYY-MM-DD` strings so the objects serialise straight into API
 * responses.
 */

import { calculateEngagementScore, calculateGrowth } from '../analytics';

// ============================================================================
// Types
// ============================================================================

/**
 * One day of streaming activity.
 */
export interface StreamingMetrics {
  /** Calendar date (YYYY-MM-DD) */
  date: string;

  /** Streams on this day */
  streams: number;

  /** Total followers at the end of this day */
  followers: number;

  saves?: number;
  shares?: number;
  likes?: number;
  comments?: number;
}

/**
 * Catalogue information for a song.
 */
export interface Song {
  title: string;
  artist: string;
  album?: string;
  /** Release date (YYYY-MM-DD) */
  releaseDate?: string;
  genre?: string;
  /** International Standard Recording Code */
  isrc?: string;
  durationSeconds?: number;
}

/**
 * Aggregate performance of a single song over the selected period.
 */
export interface SongPerformance {
  song: Song;
  totalStreams: number;
  /** Average share of the track listened to (0-1) */
  avgCompletionRate: number;
  saves: number;
  shares: number;
  dailyData: StreamingMetrics[];
  /** Streams per platform name */
  platformDistribution: Record<string, number>;
}

/**
 * An artist with their catalogue highlights and daily history.
 */
export interface ArtistProfile {
  name: string;
  totalFollowers: number;
  totalStreams: number;
  songCount: number;
  /** Best performing songs, best first */
  topSongs: SongPerformance[];
  /** Daily metrics in date order */
  dailyMetrics: StreamingMetrics[];
  platformDistribution: Record<string, number>;
  geographicDistribution: Record<string, number>;
}

export interface PerformanceSummary {
  name: string;
  totalFollowers: number;
  totalStreams: number;
  songCount: number;
  /** Mean streams per day, 0 without daily metrics */
  avgDailyStreams: number;
  topSong: string | null;
  platforms: number;
  countries: number;
}

export interface GrowthMetrics {
  streamGrowth: number;
  followerGrowth: number;
}

// ============================================================================
// Songs
// ============================================================================

/**
 * Formats a duration as M:SS, or "Unknown" when the duration is missing.
 *
 * @example
 * ```typescript
 * formatDuration(215); // "3:35"
 * ```
 */
export function formatDuration(durationSeconds: number | undefined): string {
  if (durationSeconds === undefined) {
    return 'Unknown';
  }
  const minutes = Math.floor(durationSeconds / 60);
  const seconds = durationSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

/** Saves per stream, 0 for a song without streams */
export function getSaveRate(performance: SongPerformance): number {
  if (performance.totalStreams === 0) return 0;
  return performance.saves / performance.totalStreams;
}

/** Shares per stream, 0 for a song without streams */
export function getShareRate(performance: SongPerformance): number {
  if (performance.totalStreams === 0) return 0;
  return performance.shares / performance.totalStreams;
}

/**
 * Engagement score (0-100) of a song, from its totals and completion rate.
 */
export function getSongEngagementScore(performance: SongPerformance): number {
  return calculateEngagementScore(
    performance.totalStreams,
    performance.saves,
    performance.shares,
    performance.avgCompletionRate
  );
}

// ============================================================================
// Artist
// ============================================================================

export function getPerformanceSummary(profile: ArtistProfile): PerformanceSummary {
  const days = profile.dailyMetrics.length;
  const streams = profile.dailyMetrics.reduce((sum, metric) => sum + metric.streams, 0);

  return {
    name: profile.name,
    totalFollowers: profile.totalFollowers,
    totalStreams: profile.totalStreams,
    songCount: profile.songCount,
    avgDailyStreams: days > 0 ? streams / days : 0,
    topSong: profile.topSongs[0]?.song.title ?? null,
    platforms: Object.keys(profile.platformDistribution).length,
    countries: Object.keys(profile.geographicDistribution).length,
  };
}

/**
 * Growth from the first to the last day of the profile's daily metrics.
 * Fewer than two days, or a zero starting value, counts as no growth.
 */
export function getGrowthMetrics(profile: ArtistProfile): GrowthMetrics {
  const metrics = profile.dailyMetrics;
  const first = metrics[0];
  const last = metrics[metrics.length - 1];
  if (metrics.length < 2 || !first || !last) {
    return { streamGrowth: 0, followerGrowth: 0 };
  }

  return {
    streamGrowth: calculateGrowth(last.streams, first.streams) ?? 0,
    followerGrowth: calculateGrowth(last.followers, first.followers) ?? 0,
  };
}
