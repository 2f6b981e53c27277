/**
 * Google Places API Client
 *
 * Low-level client for the Places API Nearby Search and Place Details
 * endpoints. Handles request formatting, timeouts, error mapping and
 * API call tracking for cost calculation.
 *
 * @module places/client
 */

import { z } from 'zod';
import { ProviderError } from '../errors/index.js';
import type {
  NearbySearchPage,
  NearbySearchRequest,
  PlaceDetail,
  PlaceSearchProvider,
} from './types.js';

// ============================================================================
// API Response Schemas (Internal)
// ============================================================================

const LocationSchema = z.object({ lat: z.number(), lng: z.number() });

const NearbySearchResponseSchema = z.object({
  status: z.string(),
  results: z
    .array(
      z.object({
        place_id: z.string(),
        name: z.string().default(''),
        types: z.array(z.string()).default([]),
      })
    )
    .default([]),
  next_page_token: z.string().optional(),
  error_message: z.string().optional(),
});

const PlaceDetailsResponseSchema = z.object({
  status: z.string(),
  result: z
    .object({
      place_id: z.string().optional(),
      name: z.string().optional(),
      formatted_address: z.string().optional(),
      vicinity: z.string().optional(),
      geometry: z.object({ location: LocationSchema.optional() }).optional(),
      rating: z.number().optional(),
      user_ratings_total: z.number().optional(),
      website: z.string().optional(),
      formatted_phone_number: z.string().optional(),
      price_level: z.number().optional(),
      business_status: z.string().optional(),
      opening_hours: z.object({ open_now: z.boolean().optional() }).optional(),
    })
    .optional(),
  error_message: z.string().optional(),
});

type PlaceDetailsResult = NonNullable<z.infer<typeof PlaceDetailsResponseSchema>['result']>;

// ============================================================================
// Client Implementation
// ============================================================================

const BASE_URL = 'https://maps.googleapis.com/maps/api/place';

const DEFAULT_TIMEOUT_MS = 10000;

export interface GooglePlacesClientOptions {
  apiKey: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Fetch implementation (default: global fetch) */
  fetchFn?: typeof fetch;
}

/**
 * GooglePlacesClient implements {@link PlaceSearchProvider} over HTTP.
 *
 * @example
 * ```typescript
 * const client = new GooglePlacesClient({ apiKey: requireApiKey() });
 * const page = await client.nearbySearch({
 *   location: { lat: -6.26, lng: 106.81 },
 *   radius: 5000,
 *   keyword: 'vet clinic',
 * });
 * ```
 */
export class GooglePlacesClient implements PlaceSearchProvider {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private callCount = 0;

  constructor(options: GooglePlacesClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Fetch one page of nearby results.
   *
   * A continuation request sends only the page token, as the endpoint
   * ignores every other parameter when one is present.
   *
   * @throws ProviderError on HTTP or API errors
   */
  async nearbySearch(request: NearbySearchRequest): Promise<NearbySearchPage> {
    const params = new URLSearchParams({ key: this.apiKey });

    if (request.pageToken) {
      params.set('pagetoken', request.pageToken);
    } else {
      params.set('location', `${request.location.lat},${request.location.lng}`);
      params.set('radius', String(request.radius));
      params.set('keyword', request.keyword);
      if (request.language) {
        params.set('language', request.language);
      }
    }

    const body = await this.get(`${BASE_URL}/nearbysearch/json?${params.toString()}`);
    const parsed = NearbySearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('Malformed nearby search response', 502, 'INVALID_RESPONSE', false, {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    if (data.status !== 'OK' && data.status !== 'ZERO_RESULTS') {
      this.handleApiError(data.status, data.error_message);
    }

    return {
      results: data.results.map((result) => ({
        placeId: result.place_id,
        name: result.name,
        types: result.types,
      })),
      nextPageToken: data.next_page_token,
    };
  }

  /**
   * Get detailed information about a place, restricted to the given fields.
   *
   * @throws ProviderError on HTTP or API errors
   */
  async placeDetail(
    placeId: string,
    fields: readonly string[],
    language?: string
  ): Promise<PlaceDetail> {
    const params = new URLSearchParams({
      place_id: placeId,
      key: this.apiKey,
      fields: fields.join(','),
    });
    if (language) {
      params.set('language', language);
    }

    const body = await this.get(`${BASE_URL}/details/json?${params.toString()}`);
    const parsed = PlaceDetailsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('Malformed place details response', 502, 'INVALID_RESPONSE', false, {
        cause: parsed.error,
      });
    }

    const data = parsed.data;
    if (data.status !== 'OK') {
      this.handleApiError(data.status, data.error_message);
    }

    return this.parseDetailsResult(placeId, data.result ?? {});
  }

  /**
   * Get the total number of API calls made by this client.
   */
  getCallCount(): number {
    return this.callCount;
  }

  private async get(url: string): Promise<unknown> {
    const response = await this.fetchWithTimeout(url);
    this.callCount++;

    if (!response.ok) {
      await this.handleHttpError(response);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new ProviderError('Response body is not JSON', response.status, 'INVALID_RESPONSE', false, {
        cause: error,
      });
    }
  }

  /**
   * Execute fetch with timeout using AbortController.
   *
   * @throws ProviderError on timeout or transport failure
   */
  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, { signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ProviderError(`Request timed out after ${this.timeoutMs}ms`, 408, 'TIMEOUT', true, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Network error: ${message}`, 0, 'NETWORK_ERROR', true, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Handle HTTP-level errors.
   *
   * @throws ProviderError with appropriate message and retryable flag
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    const isRetryable = response.status === 429 || response.status >= 500;

    let message: string;
    if (response.status === 429) {
      message = `Quota exceeded: ${text}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${text}`;
    } else if (response.status === 401 || response.status === 403) {
      message = 'Authentication failed: Invalid or unauthorized API key';
    } else {
      message = `API error (${response.status}): ${text}`;
    }

    throw new ProviderError(message, response.status, 'HTTP_ERROR', isRetryable);
  }

  /**
   * Handle Places API status errors.
   *
   * @throws ProviderError with appropriate message and retryable flag
   */
  private handleApiError(status: string, errorMessage?: string): never {
    const message = errorMessage ?? `API returned status: ${status}`;
    const isRetryable = status === 'OVER_QUERY_LIMIT' || status === 'UNKNOWN_ERROR';

    let statusCode: number;
    switch (status) {
      case 'OVER_QUERY_LIMIT':
        statusCode = 429;
        break;
      case 'REQUEST_DENIED':
        statusCode = 403;
        break;
      case 'INVALID_REQUEST':
        statusCode = 400;
        break;
      case 'NOT_FOUND':
        statusCode = 404;
        break;
      default:
        statusCode = 500;
    }

    throw new ProviderError(message, statusCode, status, isRetryable);
  }

  private parseDetailsResult(placeId: string, result: PlaceDetailsResult): PlaceDetail {
    return {
      placeId: result.place_id ?? placeId,
      name: result.name,
      formattedAddress: result.formatted_address,
      vicinity: result.vicinity,
      location: result.geometry?.location,
      rating: result.rating,
      userRatingsTotal: result.user_ratings_total,
      website: result.website,
      phone: result.formatted_phone_number,
      priceLevel: result.price_level,
      businessStatus: result.business_status,
      openNow: result.opening_hours?.open_now,
    };
  }
}
