/**
 * Cost Configuration
 *
 * Places API pricing and survey cost estimates.
 * All costs are in USD.
 *
 * @module config/costs
 */

/**
 * API call costs (USD per call)
 */
export const API_COSTS = {
  places: {
    nearbySearch: 0.032, // $32 per 1000 calls
    placeDetails: 0.017, // $17 per 1000 calls
  },
} as const;

export type PlacesCallType = keyof (typeof API_COSTS)['places'];

/**
 * Average detail lookups per search, used when planning a survey.
 * A full three-page search yields up to 60 hits, roughly half of them new.
 */
export const DEFAULT_DETAILS_PER_SEARCH = 30;

/**
 * Cost breakdown for a crawl
 */
export interface CrawlCost {
  nearbySearch: number;
  placeDetails: number;
  total: number;
}

/**
 * Planning estimate for a zone x query survey
 */
export interface CrawlEstimate {
  /** Zone x query combinations */
  searches: number;
  /** Expected Place Details calls */
  detailCalls: number;
  /** Total expected provider calls */
  totalCalls: number;
  /** Sum of zone circle areas in square kilometres (overlaps counted twice) */
  areaKm2: number;
  cost: CrawlCost;
}

/**
 * Calculate cost for a number of calls of one type
 */
export function calculateApiCost(callType: PlacesCallType, callCount: number): number {
  return API_COSTS.places[callType] * callCount;
}

/**
 * Calculate the cost of a crawl from its call counters
 */
export function calculateCrawlCost(nearbyCalls: number, detailCalls: number): CrawlCost {
  const nearbySearch = calculateApiCost('nearbySearch', nearbyCalls);
  const placeDetails = calculateApiCost('placeDetails', detailCalls);
  return { nearbySearch, placeDetails, total: nearbySearch + placeDetails };
}

/**
 * Estimate calls, coverage and cost before running a survey.
 *
 * @param zoneRadiiM - Radius of each zone in metres
 * @param queryCount - Number of catalog queries
 * @param detailsPerSearch - Expected detail lookups per search
 */
export function estimateCrawl(
  zoneRadiiM: readonly number[],
  queryCount: number,
  detailsPerSearch: number = DEFAULT_DETAILS_PER_SEARCH
): CrawlEstimate {
  const searches = zoneRadiiM.length * queryCount;
  const detailCalls = searches * detailsPerSearch;
  const areaKm2 = zoneRadiiM.reduce((sum, radius) => sum + Math.PI * (radius / 1000) ** 2, 0);

  return {
    searches,
    detailCalls,
    totalCalls: searches + detailCalls,
    areaKm2,
    cost: calculateCrawlCost(searches, detailCalls),
  };
}

/**
 * Format a cost for display (e.g. "$1.23")
 */
export function formatCost(cost: number): string {
  return `$${cost.toFixed(2)}`;
}
