/**
 * PercentageNormalizer Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { toPercentage } from './percentage';
import { freezeTable } from './table';

describe('toPercentage', () => {
  const platforms = freezeTable([
    { platform: 'Spotify', streams: 450 },
    { platform: 'Apple Music', streams: 250 },
    { platform: 'YouTube Music', streams: 150 },
    { platform: 'Amazon Music', streams: 100 },
    { platform: 'Other', streams: 50 },
  ]);

  it('uses the column total by default', () => {
    const result = toPercentage(platforms, 'streams');

    expect(result.map((row) => row.streams_pct)).toEqual([45, 25, 15, 10, 5]);
  });

  it('uses an explicit total when given', () => {
    const result = toPercentage(platforms, 'streams', 2000);

    expect(result[0].streams_pct).toBe(22.5);
  });

  it('yields null for a zero total', () => {
    const zeros = freezeTable([{ platform: 'Spotify', streams: 0 }]);

    expect(toPercentage(zeros, 'streams')[0].streams_pct).toBeNull();
  });

  it('yields null for missing values and keeps the original rows', () => {
    const table = freezeTable([
      { platform: 'Spotify', streams: 30 },
      { platform: 'Other', streams: null },
    ]);

    const result = toPercentage(table, 'streams');

    expect(result.map((row) => row.streams_pct)).toEqual([100, null]);
    expect(table[0]).not.toHaveProperty('streams_pct');
  });
});
