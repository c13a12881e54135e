/**
 * Sample Data Generator Unit Tests
 *
 * These tests verify:
 * - Seeded determinism
 * - The daily streaming model (weekend boost, trend, follower growth)
 * - Catalogue-driven breakdowns and revenue
 * - The engagement table feeding the heatmap pivot
 */

import { describe, it, expect } from 'vitest';
import { SampleDataGenerator, createSeededRandom } from './generator';
import { freezeTable, pivot, pivotSize, sumField } from '../transform';
import { sequenceRandom } from '../../../tests/helpers';

describe('createSeededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRandom(7);
    const b = createSeededRandom(7);

    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });
});

describe('SampleDataGenerator', () => {
  describe('generateStreamingData', () => {
    it('applies the weekend boost, trend and follower conversion', () => {
      // Lowest random draw: fluctuation 0.85, follower factor 0.8
      const generator = new SampleDataGenerator(sequenceRandom([0]));

      // 2024-03-02 is a Saturday, 2024-03-04 a Monday
      const data = generator.generateStreamingData(3, '2024-03-04');

      expect(data).toEqual([
        { date: '2024-03-02', streams: 1105, followers: 5017 },
        { date: '2024-03-03', streams: 1116, followers: 5034 },
        { date: '2024-03-04', streams: 867, followers: 5047 },
      ]);
    });

    it('ends on the given date and covers the requested days', () => {
      const data = new SampleDataGenerator().generateStreamingData(30, '2024-03-30');

      expect(data).toHaveLength(30);
      expect(data[0].date).toBe('2024-03-01');
      expect(data[29].date).toBe('2024-03-30');
    });

    it('never loses followers', () => {
      const data = new SampleDataGenerator(createSeededRandom(3)).generateStreamingData(60, '2024-03-30');

      for (let i = 1; i < data.length; i++) {
        expect(Number(data[i].followers)).toBeGreaterThanOrEqual(Number(data[i - 1].followers));
      }
    });
  });

  describe('breakdowns', () => {
    const generator = new SampleDataGenerator(sequenceRandom([0]));

    it('splits streams across platforms', () => {
      const platforms = generator.generatePlatformData(1000);

      expect(platforms.map((row) => [row.platform, row.streams])).toEqual([
        ['Spotify', 450],
        ['Apple Music', 250],
        ['YouTube Music', 150],
        ['Amazon Music', 100],
        ['Other', 50],
      ]);
    });

    it('lists ten countries and the demographic shares', () => {
      const geo = generator.generateGeographicData(1000);
      const { ageData, genderData } = generator.generateDemographicData();

      expect(geo).toHaveLength(10);
      expect(geo[0]).toEqual({ country: 'United States', percentage: 0.35, listeners: 350 });
      expect(ageData.map((row) => row.age_group)).toEqual([
        '13-17',
        '18-24',
        '25-34',
        '35-44',
        '45-54',
        '55+',
      ]);
      expect(genderData[0]).toEqual({ gender: 'Female', percentage: 0.58 });
    });

    it('keeps song metrics at the bottom of their ranges', () => {
      const songs = generator.generateSongData(1000);

      expect(songs[0]).toEqual({
        song: 'Eternal Echoes',
        streams: 300,
        avg_completion_rate: 0.7,
        saves: 30,
        shares: 3,
      });
    });
  });

  describe('revenue', () => {
    const generator = new SampleDataGenerator(sequenceRandom([0]));
    const revenue = generator.generateRevenueData(generator.generatePlatformData(1000));

    it('pays each platform at its rate', () => {
      expect(revenue[0].revenue_per_stream).toBe(0.00437);
      expect(revenue[0].total_revenue).toBeCloseTo(1.9665, 10);
    });

    it('blends platform rates into daily revenue', () => {
      const streaming = freezeTable([{ date: '2024-03-01', streams: 1000 }]);

      const daily = generator.generateDailyRevenue(streaming, revenue);

      expect(daily[0].date).toBe('2024-03-01');
      expect(daily[0].revenue).toBeCloseTo(4.4345, 10);
    });

    it('projects 7% monthly growth', () => {
      const projection = generator.generateRevenueProjection(100);

      expect(projection.map((row) => row.month)).toEqual([
        'Current Month',
        'Month 1',
        'Month 2',
        'Month 3',
      ]);
      const values = projection.map((row) => Number(row.projected_revenue));
      expect(values[0]).toBe(100);
      expect(values[1]).toBeCloseTo(107, 10);
      expect(values[3]).toBeCloseTo(121, 10);
    });
  });

  describe('songs', () => {
    it('returns null daily data for an unknown song', () => {
      const generator = new SampleDataGenerator();
      const data = generator.getAllSampleData(7, '2024-03-30');

      expect(generator.getSongDailyData('Unknown Song', data.songData, data.streamingData)).toBeNull();
    });

    it('scales daily streams by the song share', () => {
      const generator = new SampleDataGenerator(sequenceRandom([0]));
      const streaming = freezeTable([{ date: '2024-03-04', streams: 1000 }]);

      const daily = generator.generateSongDailyData('Solar Flare', 0.2, streaming);

      // weekday, lowest fluctuation 0.8
      expect(daily).toEqual([{ date: '2024-03-04', song: 'Solar Flare', streams: 160 }]);
    });
  });

  describe('getAllSampleData', () => {
    it('is deterministic for a seed', () => {
      const a = new SampleDataGenerator(createSeededRandom(11)).getAllSampleData(30, '2024-03-30');
      const b = new SampleDataGenerator(createSeededRandom(11)).getAllSampleData(30, '2024-03-30');

      expect(a).toEqual(b);
    });

    it('derives breakdowns from the streaming total', () => {
      const data = new SampleDataGenerator().getAllSampleData(30, '2024-03-30');
      const total = sumField(data.streamingData, 'streams');

      expect(data.platformData[0].streams).toBe(Math.trunc(total * 0.45));
      expect(data.dailyRevenue).toHaveLength(30);
    });

    it('produces a full engagement grid', () => {
      const data = new SampleDataGenerator().getAllSampleData(7, '2024-03-30');
      const heatmap = pivot(data.engagementData, 'metric', 'age_group', 'value');

      expect(data.engagementData).toHaveLength(24);
      expect(pivotSize(heatmap)).toBe(24);
      for (const row of data.engagementData) {
        expect(Number(row.value)).toBeGreaterThanOrEqual(0.1);
        expect(Number(row.value)).toBeLessThanOrEqual(0.9);
      }
    });
  });
});
