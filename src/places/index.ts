/**
 * Place search: provider interface, Google client, rate limiting and retry.
 *
 * @module places
 */

export * from './types.js';
export { GooglePlacesClient, type GooglePlacesClientOptions } from './client.js';
export { RateLimiter, type RateLimiterOptions } from './rate-limiter.js';
export { withRetry, calculateDelay, type RetryOptions } from './retry.js';
export {
  SearchClient,
  toProviderError,
  DEFAULT_MAX_PAGES,
  PAGE_TOKEN_DELAY_MS,
  type SearchClientOptions,
  type SearchAllOptions,
  type SearchAllResult,
  type SearchPageResult,
  type CallCounts,
} from './search-client.js';
export { FakePlaceProvider } from './fake-provider.js';
