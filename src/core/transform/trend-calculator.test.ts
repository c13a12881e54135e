/**
 * TrendCalculator Unit Tests
 *
 * These tests verify the row-wise trend metrics:
 * - Growth rates and the zero-denominator policy
 * - Moving average window alignment
 * - Running totals with gaps
 * - Percentile ranks
 * - Linear and moving-average forecasts
 */

import { describe, it, expect } from 'vitest';
import {
  cumulativeSum,
  forecast,
  forecastTable,
  growthRate,
  linearFit,
  movingAverage,
  percentileRank,
  percentileRankOf,
} from './trend-calculator';
import { InvalidParameterError, UnsupportedMethodError } from './errors';
import { freezeTable } from './table';
import { buildLinearTable, buildTable } from '../../../tests/helpers';

describe('growthRate', () => {
  it('leaves the first row undefined', () => {
    const result = growthRate(buildLinearTable(), 'value');

    expect(result[0].previous_value).toBeNull();
    expect(result[0].growth_rate).toBeNull();
    expect(result[1].previous_value).toBe(100);
    expect(result[1].growth_rate).toBeCloseTo(0.1, 12);
  });

  it('is non-increasing for linearly increasing input', () => {
    const result = growthRate(buildLinearTable(), 'value');
    const rates = result.map((row) => row.growth_rate);

    for (let i = 2; i < rates.length; i++) {
      const current = rates[i];
      const previous = rates[i - 1];
      expect(typeof current).toBe('number');
      expect(typeof previous).toBe('number');
      if (typeof current === 'number' && typeof previous === 'number') {
        expect(current).toBeLessThanOrEqual(previous);
      }
    }
  });

  it('returns null instead of Infinity when the previous value is zero', () => {
    const result = growthRate(buildTable([0, 10, 20]), 'value');

    expect(result.map((row) => row.growth_rate)).toEqual([null, null, 1]);
  });

  it('returns null around missing values', () => {
    const result = growthRate(buildTable([10, null, 20]), 'value');

    expect(result.map((row) => row.growth_rate)).toEqual([null, null, null]);
  });
});

describe('movingAverage', () => {
  it('equals the centre value of the window for linear input', () => {
    const table = buildLinearTable();
    const result = movingAverage(table, 'value', 7);

    for (let i = 0; i < 6; i++) {
      expect(result[i].value_ma7).toBeNull();
    }
    for (let i = 6; i < result.length; i++) {
      expect(result[i].value_ma7).toBeCloseTo(100 + (i - 3) * 10, 9);
    }
  });

  it('names the column after the window', () => {
    const result = movingAverage(buildTable([1, 2, 3]), 'value', 2);

    expect(result.map((row) => row.value_ma2)).toEqual([null, 1.5, 2.5]);
  });

  it('is undefined while the window contains a missing value', () => {
    const result = movingAverage(buildTable([1, null, 3, 5, 7]), 'value', 2);

    expect(result.map((row) => row.value_ma2)).toEqual([null, null, null, 4, 6]);
  });

  it('rejects a non-positive window', () => {
    expect(() => movingAverage(buildTable([1, 2]), 'value', 0)).toThrow(InvalidParameterError);
  });
});

describe('cumulativeSum', () => {
  it('keeps a running total across gaps', () => {
    const result = cumulativeSum(buildTable([1, 2, null, 4]), 'value');

    expect(result.map((row) => row.value_cumsum)).toEqual([1, 3, null, 7]);
  });
});

describe('percentileRank', () => {
  it('counts values at or below the given value', () => {
    expect(percentileRank([10, 20, 30, 40], 20)).toBe(50);
    expect(percentileRank([10, 20, 30, 40], 5)).toBe(0);
    expect(percentileRank([10, 20, 30, 40], 40)).toBe(100);
  });

  it('returns null for an empty dataset', () => {
    expect(percentileRank([], 10)).toBeNull();
  });

  it('reads a table field', () => {
    expect(percentileRankOf(buildLinearTable(10), 'value', 145)).toBe(50);
  });
});

describe('forecast', () => {
  it('extrapolates a least-squares line over row indices', () => {
    const values = forecast(buildLinearTable(), 'value', 3, 'linear');

    expect(values).toHaveLength(3);
    expect(values[0]).toBeCloseTo(400, 9);
    expect(values[1]).toBeCloseTo(410, 9);
    expect(values[2]).toBeCloseTo(420, 9);
  });

  it('repeats the last 7-value moving average', () => {
    // Last seven values are 330..390
    expect(forecast(buildLinearTable(), 'value', 2, 'movingAverage')).toEqual([360, 360]);
  });

  it('shrinks the moving-average window for short tables', () => {
    expect(forecast(buildTable([10, 20, 30]), 'value', 1, 'movingAverage')).toEqual([20]);
  });

  it('fails with the method name for unsupported methods', () => {
    const table = buildLinearTable(5);

    expect(() => forecast(table, 'value', 2, 'exponential')).toThrow(UnsupportedMethodError);
    expect(() => forecast(table, 'value', 2, 'exponential')).toThrow(/'exponential'/);
  });

  it('forecasts null for an empty table', () => {
    const empty = freezeTable([]);

    expect(forecast(empty, 'value', 2, 'linear')).toEqual([null, null]);
    expect(forecast(empty, 'value', 2, 'movingAverage')).toEqual([null, null]);
  });

  it('extrapolates flat from a single row', () => {
    expect(forecast(buildTable([42]), 'value', 2, 'linear')).toEqual([42, 42]);
  });
});

describe('linearFit', () => {
  it('ignores missing values', () => {
    const fit = linearFit([1, null, 5]);

    expect(fit?.slope).toBeCloseTo(2, 12);
    expect(fit?.intercept).toBeCloseTo(1, 12);
  });
});

describe('forecastTable', () => {
  it('dates forecast rows after the last row', () => {
    const rows = forecastTable(buildLinearTable(), 'date', 'value', 2, 'movingAverage');

    expect(rows).toEqual([
      { date: '2024-03-31', value: 360, forecast: 1 },
      { date: '2024-04-01', value: 360, forecast: 1 },
    ]);
  });
});
