/**
 * Core Domain Models - Barrel Export
 *
 * Streaming, song, artist and revenue types plus the metrics derived from
 * them.
 *
 * @example
 * ```typescript
 * import { getPerformanceSummary, type ArtistProfile } from './core/models';
 * ```
 */

export type {
  StreamingMetrics,
  Song,
  SongPerformance,
  ArtistProfile,
  PerformanceSummary,
  GrowthMetrics,
} from './streaming';
export {
  formatDuration,
  getSaveRate,
  getShareRate,
  getSongEngagementScore,
  getPerformanceSummary,
  getGrowthMetrics,
} from './streaming';

export type { PlatformData, DailyRevenue, RevenueData } from './revenue';
export {
  getRevenuePerThousand,
  getPlatformRevenueShare,
  getAverageDailyRevenue,
} from './revenue';
