/**
 * Place Record Schema
 *
 * A record is one fully enriched, classified and scored dataset row,
 * keyed by placeId. The output column order is a compatibility contract
 * with downstream GIS tooling.
 */

import { z } from 'zod';

export const PlaceRecordSchema = z.object({
  placeId: z.string().min(1),
  name: z.string(),
  category: z.string().min(1),
  subCategory: z.string().min(1),
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
  address: z.string(),
  vicinity: z.string(),
  rating: z.number().min(0).max(5).optional(),
  reviewCount: z.number().int().nonnegative(),
  website: z.string(),
  phone: z.string(),
  /** Repeated price marker, e.g. "$$" for level 2; empty when unknown */
  priceLevel: z.string().regex(/^\$*$/),
  /** Type tags captured from the search response */
  types: z.array(z.string()),
  isOperational: z.boolean(),
  searchZone: z.string(),
  searchKeyword: z.string(),
  isOpenNow: z.boolean().optional(),
  /** When the record was built (ISO 8601; legacy files may omit the offset) */
  timestamp: z.string().min(1),
  popularityScore: z.number().min(0).max(1),
  bufferRadiusM: z.number().int().positive().optional(),
});

export type PlaceRecord = z.infer<typeof PlaceRecordSchema>;

/**
 * Output columns, in order, paired with the record field they carry.
 */
export const RECORD_COLUMNS = [
  ['place_id', 'placeId'],
  ['name', 'name'],
  ['category', 'category'],
  ['sub_category', 'subCategory'],
  ['latitude', 'latitude'],
  ['longitude', 'longitude'],
  ['address', 'address'],
  ['vicinity', 'vicinity'],
  ['rating', 'rating'],
  ['review_count', 'reviewCount'],
  ['website', 'website'],
  ['phone', 'phone'],
  ['price_level', 'priceLevel'],
  ['types', 'types'],
  ['is_operational', 'isOperational'],
  ['search_zone', 'searchZone'],
  ['search_keyword', 'searchKeyword'],
  ['is_open_now', 'isOpenNow'],
  ['timestamp', 'timestamp'],
  ['popularity_score', 'popularityScore'],
  ['buffer_radius_m', 'bufferRadiusM'],
] as const satisfies ReadonlyArray<readonly [string, keyof PlaceRecord]>;

export type RecordColumn = (typeof RECORD_COLUMNS)[number][0];

/** Column header names in output order */
export const RECORD_COLUMN_NAMES: RecordColumn[] = RECORD_COLUMNS.map(([column]) => column);
