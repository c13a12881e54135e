/**
 * Core Analytics Module - Barrel Export
 *
 * Scalar metric helpers for dashboard cards and song rankings.
 *
 * @example
 * ```typescript
 * import { calculateGrowth, formatGrowth } from './core/analytics';
 *
 * formatGrowth(calculateGrowth(thisWeek, lastWeek)); // "+4.2%"
 * ```
 */

export {
  calculateGrowth,
  formatGrowth,
  formatGrowthPct,
  calculateConversionRate,
  calculateRetention,
  calculateChurn,
  calculateEngagementScore,
  ENGAGEMENT_REFERENCE,
  ENGAGEMENT_WEIGHTS,
} from './metrics';
