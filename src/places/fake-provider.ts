/**
 * In-memory place search provider for tests and dry runs.
 *
 * Search pages are registered per keyword (optionally per location) and
 * chained with synthetic continuation tokens.
 *
 * @module places/fake-provider
 */

import { ProviderError } from '../errors/index.js';
import type {
  LatLng,
  NearbySearchPage,
  NearbySearchRequest,
  PlaceDetail,
  PlaceSearchProvider,
  SearchResult,
} from './types.js';

const TOKEN_SEPARATOR = '@@';

interface ScriptedFailure {
  error: Error;
  remaining: number;
}

export class FakePlaceProvider implements PlaceSearchProvider {
  /** Every nearby request received, in order */
  readonly nearbyRequests: NearbySearchRequest[] = [];
  /** Every place id looked up, in order */
  readonly detailRequests: string[] = [];

  private readonly searches = new Map<string, SearchResult[][]>();
  private readonly details = new Map<string, PlaceDetail>();
  private readonly failures = new Map<string, ScriptedFailure>();

  /**
   * Register the result pages for a keyword, everywhere or at one location.
   */
  addSearch(keyword: string, pages: SearchResult[][], location?: LatLng): this {
    this.searches.set(searchKey(keyword, location), pages);
    return this;
  }

  addDetail(detail: PlaceDetail): this {
    this.details.set(detail.placeId, detail);
    return this;
  }

  /**
   * Make page `pageIndex` (0-based) of a search throw, `times` times.
   */
  failSearch(
    keyword: string,
    pageIndex: number,
    error: Error,
    options: { location?: LatLng; times?: number } = {}
  ): this {
    this.failures.set(`search:${searchKey(keyword, options.location)}#${pageIndex}`, {
      error,
      remaining: options.times ?? Number.POSITIVE_INFINITY,
    });
    return this;
  }

  failDetail(placeId: string, error: Error, times: number = Number.POSITIVE_INFINITY): this {
    this.failures.set(`detail:${placeId}`, { error, remaining: times });
    return this;
  }

  async nearbySearch(request: NearbySearchRequest): Promise<NearbySearchPage> {
    this.nearbyRequests.push(request);

    let key: string;
    let pageIndex: number;
    if (request.pageToken) {
      const at = request.pageToken.lastIndexOf(TOKEN_SEPARATOR);
      key = request.pageToken.slice(0, at);
      pageIndex = Number(request.pageToken.slice(at + TOKEN_SEPARATOR.length));
    } else {
      const located = searchKey(request.keyword, request.location);
      key = this.searches.has(located) ? located : searchKey(request.keyword);
      pageIndex = 0;
    }

    this.throwScripted(`search:${key}#${pageIndex}`);

    const pages = this.searches.get(key) ?? [];
    const results = pages[pageIndex] ?? [];
    const hasMore = pageIndex + 1 < pages.length;

    return {
      results: results.map((result) => ({ ...result, types: [...result.types] })),
      nextPageToken: hasMore ? `${key}${TOKEN_SEPARATOR}${pageIndex + 1}` : undefined,
    };
  }

  async placeDetail(placeId: string): Promise<PlaceDetail> {
    this.detailRequests.push(placeId);
    this.throwScripted(`detail:${placeId}`);

    const detail = this.details.get(placeId);
    if (!detail) {
      throw new ProviderError(`No such place: ${placeId}`, 404, 'NOT_FOUND', false);
    }
    return { ...detail };
  }

  private throwScripted(key: string): void {
    const failure = this.failures.get(key);
    if (failure && failure.remaining > 0) {
      failure.remaining--;
      throw failure.error;
    }
  }
}

function searchKey(keyword: string, location?: LatLng): string {
  return location ? `${location.lat},${location.lng}|${keyword}` : keyword;
}
