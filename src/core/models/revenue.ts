/**
 * Revenue Domain Types
 *
 * Per-platform earnings and the daily revenue series behind the Revenue view.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Earnings from a single platform over the selected period.
 */
export interface PlatformData {
  platformName: string;
  streams: number;
  revenue: number;
  /** Payout per stream in dollars */
  avgStreamValue: number;
}

export interface DailyRevenue {
  /** Calendar date (YYYY-MM-DD) */
  date: string;
  revenue: number;
}

export interface RevenueData {
  totalRevenue: number;
  platformBreakdown: PlatformData[];
  dailyRevenue: DailyRevenue[];
}

// ============================================================================
// Derived Metrics
// ============================================================================

/**
 * Revenue per thousand streams (RPM), 0 for a platform without streams.
 *
 * @example
 * ```typescript
 * getRevenuePerThousand({ platformName: 'Spotify', streams: 2000, revenue: 8.74, avgStreamValue: 0.00437 });
 * // 4.37
 * ```
 */
export function getRevenuePerThousand(platform: PlatformData): number {
  if (platform.streams === 0) return 0;
  return (platform.revenue * 1000) / platform.streams;
}

/**
 * Share of total revenue (0-1) by platform name. Every platform gets 0 when
 * there is no revenue at all.
 */
export function getPlatformRevenueShare(data: RevenueData): Record<string, number> {
  const total = data.platformBreakdown.reduce((sum, platform) => sum + platform.revenue, 0);

  const shares: Record<string, number> = {};
  for (const platform of data.platformBreakdown) {
    shares[platform.platformName] = total === 0 ? 0 : platform.revenue / total;
  }
  return shares;
}

/** Mean of the daily revenue series, 0 when it is empty */
export function getAverageDailyRevenue(data: RevenueData): number {
  if (data.dailyRevenue.length === 0) return 0;
  const total = data.dailyRevenue.reduce((sum, day) => sum + day.revenue, 0);
  return total / data.dailyRevenue.length;
}
