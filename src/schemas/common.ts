/**
 * Common Zod Schemas - Shared types used across the crawler
 */

import { z } from 'zod';

/** Provider maximum search radius in metres */
export const MAX_SEARCH_RADIUS_M = 50_000;

/**
 * ISO8601 timestamp with offset (e.g. 2026-03-01T08:15:00.000Z)
 */
export const ISO8601TimestampSchema = z.string().datetime({ offset: true });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

/**
 * WGS 84 coordinate pair
 */
export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof CoordinatesSchema>;

/**
 * Search radius in whole metres, bounded by the provider maximum
 */
export const RadiusSchema = z.number().int().min(1).max(MAX_SEARCH_RADIUS_M);
