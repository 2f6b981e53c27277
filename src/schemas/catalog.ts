/**
 * Catalog Schemas
 *
 * Zones and queries are the two immutable inputs of a crawl. A crawl
 * visits the cross-product of both lists in catalog order.
 */

import { z } from 'zod';
import { CoordinatesSchema, RadiusSchema } from './common.js';

/**
 * Zone: a named circular search region.
 */
export const ZoneSchema = z.object({
  /** Unique zone name, the unit of checkpointing */
  name: z.string().trim().min(1),
  center: CoordinatesSchema,
  radiusM: RadiusSchema,
});

export type Zone = z.infer<typeof ZoneSchema>;

/**
 * Query: one search term and its taxonomy placement.
 *
 * Several queries may describe the same real-world entity type
 * (synonyms, other languages); dedup handles the overlap.
 */
export const QuerySchema = z.object({
  keyword: z.string().trim().min(1),
  category: z.string().trim().min(1),
  subCategory: z.string().trim().min(1),
  /** Per-query search radius; also the record's buffer hint */
  radiusM: RadiusSchema.optional(),
});

export type Query = z.infer<typeof QuerySchema>;

/** Required zone table columns */
export const ZONE_COLUMNS = ['zone_name', 'latitude', 'longitude', 'radius'] as const;

/** Required query table columns */
export const QUERY_COLUMNS = ['keyword', 'category', 'sub_category'] as const;

/** Optional query table columns */
export const OPTIONAL_QUERY_COLUMNS = ['radius'] as const;
