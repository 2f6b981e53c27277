/**
 * Search Client
 *
 * Rate-limited wrapper around a {@link PlaceSearchProvider}. Fetches single
 * result pages, follows continuation tokens up to a page cap and fetches
 * place details with bounded retry.
 *
 * @module places/search-client
 */

import {
  ProviderError,
  errorMessage,
  isProviderError,
  isRetryableError,
} from '../errors/index.js';
import type { Zone } from '../schemas/catalog.js';
import { silentLogger, type Logger } from '../crawl/types.js';
import type { RateLimiter } from './rate-limiter.js';
import { withRetry, type RetryOptions } from './retry.js';
import {
  DETAIL_FIELDS,
  type PlaceCandidate,
  type PlaceDetail,
  type PlaceSearchProvider,
} from './types.js';

/** Result pages followed per zone/keyword */
export const DEFAULT_MAX_PAGES = 3;

/** Continuation tokens are not valid immediately after they are issued */
export const PAGE_TOKEN_DELAY_MS = 2000;

export interface SearchClientOptions {
  maxPages?: number;
  pageTokenDelayMs?: number;
  language?: string;
  logger?: Logger;
  /** Sleep implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
  /** Backoff settings for detail lookups */
  retry?: RetryOptions;
}

export interface SearchPageResult {
  candidates: PlaceCandidate[];
  nextPageToken?: string;
}

export interface SearchAllOptions {
  /** Page cap for this search (default: client maxPages) */
  maxPages?: number;
  /** Search radius override in metres (default: zone radius) */
  radiusM?: number;
  /** Stop before the next continuation fetch once aborted */
  signal?: AbortSignal;
}

export interface SearchAllResult {
  candidates: PlaceCandidate[];
  /** Nearby Search calls issued, including a failed continuation */
  callsMade: number;
  /** True when a continuation fetch failed and later pages were dropped */
  truncated: boolean;
}

export interface CallCounts {
  nearbySearch: number;
  placeDetails: number;
  total: number;
}

/**
 * @example
 * ```typescript
 * const search = new SearchClient(provider, new RateLimiter(10));
 * const { candidates } = await search.searchAll(zone, 'vet clinic');
 * const detail = await search.fetchDetail(candidates[0].placeId);
 * ```
 */
export class SearchClient {
  private readonly maxPages: number;
  private readonly pageTokenDelayMs: number;
  private readonly language: string | undefined;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly retry: RetryOptions;
  private nearbyCalls = 0;
  private detailCalls = 0;

  constructor(
    private readonly provider: PlaceSearchProvider,
    private readonly limiter: RateLimiter,
    options: SearchClientOptions = {}
  ) {
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.pageTokenDelayMs = options.pageTokenDelayMs ?? PAGE_TOKEN_DELAY_MS;
    this.language = options.language;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.retry = { sleep: this.sleep, ...options.retry };
  }

  /**
   * Fetch one page of candidates. Does not retry.
   *
   * @throws ProviderError on any provider or transport failure
   */
  async searchPage(
    zone: Zone,
    keyword: string,
    pageToken?: string,
    radiusM: number = zone.radiusM
  ): Promise<SearchPageResult> {
    await this.limiter.acquire();
    this.nearbyCalls++;

    try {
      const page = await this.provider.nearbySearch({
        location: zone.center,
        radius: radiusM,
        keyword,
        language: this.language,
        pageToken,
      });

      return {
        candidates: page.results.map((result) => ({
          ...result,
          sourceZone: zone.name,
          sourceKeyword: keyword,
        })),
        nextPageToken: page.nextPageToken,
      };
    } catch (error) {
      throw toProviderError(error);
    }
  }

  /**
   * Collect candidates across result pages.
   *
   * An error on the first page propagates. An error on a continuation page
   * keeps the pages already collected.
   *
   * @throws ProviderError when the first page fails
   */
  async searchAll(
    zone: Zone,
    keyword: string,
    options: SearchAllOptions = {}
  ): Promise<SearchAllResult> {
    const maxPages = options.maxPages ?? this.maxPages;
    const candidates: PlaceCandidate[] = [];
    let pagesFetched = 0;

    try {
      for await (const page of this.pages(zone, keyword, maxPages, options)) {
        pagesFetched++;
        candidates.push(...page.candidates);
      }
    } catch (error) {
      if (pagesFetched === 0) {
        throw error;
      }
      this.logger.warn(
        `[search] "${keyword}" in ${zone.name}: page ${pagesFetched + 1} failed, ` +
          `keeping ${candidates.length} results (${errorMessage(error)})`
      );
      return { candidates, callsMade: pagesFetched + 1, truncated: true };
    }

    return { candidates, callsMade: pagesFetched, truncated: false };
  }

  /**
   * Fetch the enriched detail for a place, retrying transient failures.
   *
   * @returns The detail, or undefined when the lookup failed
   */
  async fetchDetail(placeId: string): Promise<PlaceDetail | undefined> {
    try {
      return await withRetry(async () => {
        await this.limiter.acquire();
        this.detailCalls++;
        return this.provider.placeDetail(placeId, DETAIL_FIELDS, this.language);
      }, {
        ...this.retry,
        onRetry: (error, attempt, delayMs) =>
          this.logger.debug(
            `[search] Retrying details for ${placeId} (attempt ${attempt}, ${Math.round(delayMs)}ms): ${errorMessage(error)}`
          ),
      });
    } catch (error) {
      this.logger.warn(`[search] Details failed for ${placeId}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Provider calls issued by this client so far, retries included.
   */
  getCallCounts(): CallCounts {
    return {
      nearbySearch: this.nearbyCalls,
      placeDetails: this.detailCalls,
      total: this.nearbyCalls + this.detailCalls,
    };
  }

  /**
   * Lazily yield result pages, stopping at the page cap, at the last page
   * or once the signal is aborted.
   */
  private async *pages(
    zone: Zone,
    keyword: string,
    maxPages: number,
    options: SearchAllOptions
  ): AsyncGenerator<SearchPageResult> {
    let pageToken: string | undefined;

    for (let page = 0; page < maxPages; page++) {
      if (page > 0) {
        if (options.signal?.aborted) {
          return;
        }
        await this.sleep(this.pageTokenDelayMs);
      }

      const result = await this.searchPage(zone, keyword, pageToken, options.radiusM);
      yield result;

      if (!result.nextPageToken) {
        return;
      }
      pageToken = result.nextPageToken;
    }
  }
}

/**
 * Wrap anything a provider throws in a ProviderError.
 */
export function toProviderError(error: unknown): ProviderError {
  if (isProviderError(error)) {
    return error;
  }
  return new ProviderError(
    `Provider call failed: ${errorMessage(error)}`,
    0,
    'UNKNOWN',
    isRetryableError(error),
    { cause: error }
  );
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
