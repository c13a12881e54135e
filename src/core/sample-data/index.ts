/**
 * Sample Data Module - Barrel Export
 */

export {
  SampleDataGenerator,
  createSeededRandom,
  DEFAULT_SAMPLE_SEED,
} from './generator';
export type { RandomSource, SampleDataSet } from './generator';
export { catalog, catalogSchema } from './catalog';
export type { Catalog, CatalogShare, CatalogPlatform } from './catalog';
