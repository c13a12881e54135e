/**
 * Scalar Analytics Metrics
 *
 * Small, pure helpers for the headline numbers shown on metric cards:
 * growth between two periods, conversion and retention ratios, and the
 * composite engagement score used to rank songs.
 *
 * Ratios are returned as fractions (0.125 for 12.5%). Ratio helpers that
 * cannot divide return 0, except calculateGrowth, which returns null so a
 * card can show "n/a" rather than a misleading zero.
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Reference points used to normalise engagement inputs to 0-1.
 * Reaching a reference value scores the full weight for that input.
 */
export const ENGAGEMENT_REFERENCE = {
  /** Streams considered high engagement */
  streams: 10_000,
  /** Save rate considered high */
  saveRate: 0.3,
  /** Share rate considered high */
  shareRate: 0.05,
} as const;

/** Weights of streams, saves, shares and completion rate in the score */
export const ENGAGEMENT_WEIGHTS = {
  streams: 0.4,
  saves: 0.2,
  shares: 0.2,
  completion: 0.2,
} as const;

// ============================================================================
// Growth
// ============================================================================

/**
 * Relative change from `previous` to `current`.
 *
 * @returns The growth as a fraction, or null when `previous` is 0
 *
 * @example
 * ```typescript
 * calculateGrowth(1125, 1000); // 0.125
 * calculateGrowth(50, 0);      // null
 * ```
 */
export function calculateGrowth(current: number, previous: number): number | null {
  if (previous === 0) {
    return null;
  }
  return (current - previous) / previous;
}

/**
 * Formats a growth fraction as a signed percentage with one decimal,
 * e.g. "+12.5%" or "-3.0%". Null growth formats as "n/a".
 */
export function formatGrowth(growth: number | null): string {
  if (growth === null || !Number.isFinite(growth)) {
    return 'n/a';
  }
  const sign = growth >= 0 ? '+' : '';
  return `${sign}${(growth * 100).toFixed(1)}%`;
}

/**
 * Growth between two values, formatted for a metric card delta.
 */
export function formatGrowthPct(current: number, previous: number): string {
  return formatGrowth(calculateGrowth(current, previous));
}

// ============================================================================
// Ratios
// ============================================================================

/** numerator / denominator, or 0 when the denominator is 0 */
export function calculateConversionRate(numerator: number, denominator: number): number {
  if (denominator === 0) {
    return 0;
  }
  return numerator / denominator;
}

/** Share of the initial value still present, or 0 when the initial value is 0 */
export function calculateRetention(initialValue: number, currentValue: number): number {
  if (initialValue === 0) {
    return 0;
  }
  return currentValue / initialValue;
}

/** Share of the initial value lost, or 0 when the initial value is 0 */
export function calculateChurn(initialValue: number, currentValue: number): number {
  if (initialValue === 0) {
    return 0;
  }
  return 1 - currentValue / initialValue;
}

// ============================================================================
// Engagement
// ============================================================================

/**
 * Composite engagement score on a 0-100 scale.
 *
 * Streams, save rate and share rate are each normalised against
 * ENGAGEMENT_REFERENCE and capped at 1; the completion rate is used as given
 * (0-1). The four parts are combined with ENGAGEMENT_WEIGHTS. With zero
 * streams the save and share parts score 0.
 *
 * @param streams - Total streams
 * @param saves - Number of saves
 * @param shares - Number of shares
 * @param completionRate - Average completion rate (0-1)
 *
 * @example
 * ```typescript
 * calculateEngagementScore(10_000, 3_000, 500, 0.5); // 90
 * ```
 */
export function calculateEngagementScore(
  streams: number,
  saves: number,
  shares: number,
  completionRate: number
): number {
  const normalizedStreams = Math.min(streams / ENGAGEMENT_REFERENCE.streams, 1);
  const normalizedSaves =
    streams > 0 ? Math.min(saves / (streams * ENGAGEMENT_REFERENCE.saveRate), 1) : 0;
  const normalizedShares =
    streams > 0 ? Math.min(shares / (streams * ENGAGEMENT_REFERENCE.shareRate), 1) : 0;

  const score =
    normalizedStreams * ENGAGEMENT_WEIGHTS.streams +
    normalizedSaves * ENGAGEMENT_WEIGHTS.saves +
    normalizedShares * ENGAGEMENT_WEIGHTS.shares +
    completionRate * ENGAGEMENT_WEIGHTS.completion;

  return score * 100;
}
