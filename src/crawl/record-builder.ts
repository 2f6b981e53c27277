/**
 * Record Builder
 *
 * Pure assembly of a dataset row from a place detail, the search that
 * found it and the derived fields. Never fetches.
 *
 * @module crawl/record-builder
 */

import { bufferRadiusFor, type CrawlProfile } from '../classify/profiles.js';
import { popularityScore } from '../classify/scorer.js';
import type { PlaceDetail } from '../places/types.js';
import type { PlaceRecord } from '../schemas/record.js';

/** Display marker repeated once per price level */
export const PRICE_MARKER = '$';

export interface RecordContext {
  /** Post-classification category and sub-category */
  category: string;
  subCategory: string;
  zoneName: string;
  keyword: string;
  /** Per-query radius, used as buffer when the profile has no table entry */
  radiusHint?: number;
  /** Name from the search response, used when the detail has none */
  searchName: string;
  /** Type tags from the search response */
  types: readonly string[];
  /** ISO 8601 build time */
  timestamp: string;
}

/**
 * Price level 0-4 as repeated markers ("$$" for 2). Anything else is empty.
 */
export function formatPriceLevel(level: number | undefined): string {
  if (level === undefined || !Number.isInteger(level) || level < 0 || level > 4) {
    return '';
  }
  return PRICE_MARKER.repeat(level);
}

function inRange(value: number | undefined, min: number, max: number): number | undefined {
  return value !== undefined && Number.isFinite(value) && value >= min && value <= max
    ? value
    : undefined;
}

export function buildRecord(
  detail: PlaceDetail,
  context: RecordContext,
  profile: CrawlProfile
): PlaceRecord {
  const rating = inRange(detail.rating, 0, 5);
  const reviews = detail.userRatingsTotal;
  const reviewCount =
    reviews !== undefined && Number.isFinite(reviews) && reviews > 0 ? Math.floor(reviews) : 0;

  return {
    placeId: detail.placeId,
    name: detail.name ?? context.searchName,
    category: context.category,
    subCategory: context.subCategory,
    latitude: inRange(detail.location?.lat, -90, 90),
    longitude: inRange(detail.location?.lng, -180, 180),
    address: detail.formattedAddress ?? '',
    vicinity: detail.vicinity ?? '',
    rating,
    reviewCount,
    website: detail.website ?? '',
    phone: detail.phone ?? '',
    priceLevel: formatPriceLevel(detail.priceLevel),
    types: [...context.types],
    isOperational: (detail.businessStatus ?? 'OPERATIONAL') === 'OPERATIONAL',
    searchZone: context.zoneName,
    searchKeyword: context.keyword,
    isOpenNow: detail.openNow,
    timestamp: context.timestamp,
    popularityScore: popularityScore(rating, detail.userRatingsTotal),
    bufferRadiusM: bufferRadiusFor(profile, context.category, context.subCategory, context.radiusHint),
  };
}
