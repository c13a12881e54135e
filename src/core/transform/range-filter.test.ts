/**
 * RangeFilter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { filterByRange, filterLastDays } from './range-filter';
import { MalformedDateError } from './errors';
import { freezeTable } from './table';
import { buildLinearTable } from '../../../tests/helpers';

describe('filterByRange', () => {
  const table = buildLinearTable();

  it('returns exactly the last 7 days, inclusive on both bounds', () => {
    const filtered = filterByRange(table, 'date', '2024-03-24', '2024-03-30');

    expect(filtered).toHaveLength(7);
    expect(filtered[0].date).toBe('2024-03-24');
    expect(filtered[filtered.length - 1].date).toBe('2024-03-30');
  });

  it('is idempotent', () => {
    const once = filterByRange(table, 'date', '2024-03-10', '2024-03-15');
    const twice = filterByRange(once, 'date', '2024-03-10', '2024-03-15');

    expect(twice).toEqual(once);
  });

  it('accepts Date bounds and datetime strings', () => {
    const byDate = filterByRange(
      table,
      'date',
      new Date(Date.UTC(2024, 2, 24)),
      new Date(Date.UTC(2024, 2, 30))
    );
    const byDatetime = filterByRange(table, 'date', '2024-03-24T08:15:00Z', '2024-03-30T23:59:59Z');

    expect(byDate).toHaveLength(7);
    expect(byDatetime).toEqual(byDate);
  });

  it('returns an empty table when nothing qualifies', () => {
    expect(filterByRange(table, 'date', '2025-01-01', '2025-01-31')).toEqual([]);
    expect(filterByRange(table, 'date', '2024-03-20', '2024-03-10')).toEqual([]);
    expect(filterByRange(freezeTable([]), 'date', '2024-03-01', '2024-03-02')).toEqual([]);
  });

  it('rejects malformed bounds', () => {
    expect(() => filterByRange(table, 'date', 'last week', '2024-03-30')).toThrow(MalformedDateError);
  });
});

describe('filterLastDays', () => {
  it('keeps the trailing window ending on the given day', () => {
    const filtered = filterLastDays(buildLinearTable(), 'date', 7, '2024-03-30');

    expect(filtered.map((row) => row.value)).toEqual([330, 340, 350, 360, 370, 380, 390]);
  });
});
