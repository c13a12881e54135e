/**
 * Sample Catalogue
 *
 * Fixed lookup tables behind the sample data: platform split and payout
 * rates, audience geography and demographics, and the song list. The tables
 * live in catalog.json and are validated once on load.
 */

import { z } from 'zod';
import rawCatalog from './catalog.json';

const shareSchema = z.object({
  name: z.string().min(1),
  share: z.number().min(0).max(1),
});

const platformSchema = shareSchema.extend({
  /** Payout per stream in dollars */
  revenuePerStream: z.number().nonnegative(),
});

export const catalogSchema = z.object({
  platforms: z.array(platformSchema).min(1),
  countries: z.array(shareSchema).min(1),
  ageGroups: z.array(shareSchema).min(1),
  genders: z.array(shareSchema).min(1),
  songs: z.array(shareSchema).min(1),
  engagementMetrics: z.array(z.string().min(1)).min(1),
});

export type Catalog = z.infer<typeof catalogSchema>;
export type CatalogShare = z.infer<typeof shareSchema>;
export type CatalogPlatform = z.infer<typeof platformSchema>;

export const catalog: Catalog = catalogSchema.parse(rawCatalog);
