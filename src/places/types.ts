/**
 * Place Search Provider Types
 *
 * The provider is the external search service. The crawler only depends on
 * this interface; {@link GooglePlacesClient} is the production implementation.
 *
 * @module places/types
 */

/**
 * Geographic point
 */
export interface LatLng {
  lat: number;
  lng: number;
}

export interface NearbySearchRequest {
  location: LatLng;
  /** Metres, at most 50000 */
  radius: number;
  keyword: string;
  language?: string;
  /** Continuation token from a previous page */
  pageToken?: string;
}

/**
 * One hit from a nearby search page
 */
export interface SearchResult {
  placeId: string;
  name: string;
  types: string[];
}

export interface NearbySearchPage {
  results: SearchResult[];
  nextPageToken?: string;
}

/**
 * Enriched place from the detail endpoint. Fields the provider omitted are undefined.
 */
export interface PlaceDetail {
  placeId: string;
  name?: string;
  formattedAddress?: string;
  vicinity?: string;
  location?: LatLng;
  rating?: number;
  userRatingsTotal?: number;
  website?: string;
  phone?: string;
  /** Ordinal 0-4 */
  priceLevel?: number;
  businessStatus?: string;
  openNow?: boolean;
}

/**
 * External place search capability.
 */
export interface PlaceSearchProvider {
  nearbySearch(request: NearbySearchRequest): Promise<NearbySearchPage>;
  placeDetail(placeId: string, fields: readonly string[], language?: string): Promise<PlaceDetail>;
}

/**
 * Raw search hit with the zone and keyword that produced it.
 * Transient: lives for one zone x query iteration.
 */
export interface PlaceCandidate extends SearchResult {
  sourceZone: string;
  sourceKeyword: string;
}

/**
 * Detail fields requested from the provider. Only what a record needs.
 */
export const DETAIL_FIELDS = [
  'place_id',
  'name',
  'formatted_address',
  'geometry',
  'rating',
  'user_ratings_total',
  'website',
  'opening_hours',
  'formatted_phone_number',
  'price_level',
  'business_status',
  'vicinity',
] as const;
