/**
 * Retry Helpers
 *
 * Exponential backoff with jitter for retryable provider errors:
 * 3 retries, 1000ms base, 8000ms max, +/-500ms jitter.
 *
 * @module places/retry
 */

import { isRetryableError } from '../errors/index.js';

// ============================================================================
// Retry Configuration
// ============================================================================

/** Maximum retry attempts for API calls */
export const MAX_RETRIES = 3;

/** Base delay in milliseconds for exponential backoff */
export const BASE_DELAY_MS = 1000;

/** Maximum delay in milliseconds for exponential backoff */
export const MAX_DELAY_MS = 8000;

/** Jitter range in milliseconds (+/-500ms) */
export const JITTER_MS = 500;

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  /** Sleep implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
  /** Random source in [0, 1) (default: Math.random) */
  random?: () => number;
  /** Called before each backoff wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

// ============================================================================
// Retry Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay with jitter.
 *
 * @param attempt - Current attempt number (0-indexed)
 * @returns Delay in milliseconds with jitter, never negative
 */
export function calculateDelay(attempt: number, options: RetryOptions = {}): number {
  const {
    baseDelayMs = BASE_DELAY_MS,
    maxDelayMs = MAX_DELAY_MS,
    jitterMs = JITTER_MS,
    random = Math.random,
  } = options;

  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  // Add jitter: random value between -jitterMs and +jitterMs
  const jitter = (random() * 2 - 1) * jitterMs;
  return Math.max(0, exponential + jitter);
}

/**
 * Execute an async call with retry logic.
 *
 * Only retryable errors (see isRetryableError) are retried.
 *
 * @throws Last error if all retries are exhausted or the error is not retryable
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? MAX_RETRIES;
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= maxRetries) {
        throw error;
      }

      const delay = calculateDelay(attempt, options);
      options.onRetry?.(error, attempt + 1, delay);
      await wait(delay);
    }
  }
}
