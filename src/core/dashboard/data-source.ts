/**
 * Dashboard Data Sources
 *
 * The aggregator reads its raw tables through this interface so the views do
 * not care whether the numbers were generated or fetched.
 */

import { SampleDataGenerator, createSeededRandom, type SampleDataSet } from '../sample-data';
import type { TimeSeriesTable } from '../transform';

export interface DashboardDataSource {
  /** Loads every table for the `days` days ending on `endDate` */
  load(days: number, endDate: Date): Promise<SampleDataSet>;

  /** Daily streams of one song, or null when the song is unknown */
  loadSongDaily(song: string, data: SampleDataSet): Promise<TimeSeriesTable | null>;
}

/**
 * Serves generated sample data.
 *
 * Every call starts a fresh generator from the same seed, so the views read
 * from one source always describe the same data set. Without a seed one is
 * drawn when the source is created.
 */
export class SampleDataSource implements DashboardDataSource {
  readonly seed: number;

  constructor(seed?: number) {
    this.seed = seed ?? Math.floor(Math.random() * 2 ** 32);
  }

  async load(days: number, endDate: Date): Promise<SampleDataSet> {
    return this.createGenerator().getAllSampleData(days, endDate);
  }

  async loadSongDaily(song: string, data: SampleDataSet): Promise<TimeSeriesTable | null> {
    return this.createGenerator().getSongDailyData(song, data.songData, data.streamingData);
  }

  private createGenerator(): SampleDataGenerator {
    return new SampleDataGenerator(createSeededRandom(this.seed));
  }
}
