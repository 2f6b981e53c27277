/**
 * Error Taxonomy
 *
 * Four error classes cover every failure the crawler distinguishes:
 *
 * - {@link ConfigurationError}: bad catalog, bad environment, missing key.
 *   Fatal and reported before any network call.
 * - {@link ProviderError}: a remote call failed or returned an error status.
 *   Recovered at single-call granularity by the crawl engine.
 * - {@link PersistenceError}: a checkpoint or output write failed. Fatal.
 * - {@link IntegrityError}: a duplicate place_id survived reconciliation. Fatal.
 *
 * @module errors
 */

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Invalid configuration or catalog input.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure of a call to the place search provider.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly status: string,
    public readonly isRetryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

/**
 * Failure to durably write or read crawl state or an output dataset.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Violation of the place_id uniqueness invariant.
 */
export class IntegrityError extends Error {
  constructor(
    message: string,
    public readonly duplicateIds: string[]
  ) {
    super(message);
    this.name = 'IntegrityError';
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export function isIntegrityError(error: unknown): error is IntegrityError {
  return error instanceof IntegrityError;
}

/**
 * Check if an error is likely transient and worth retrying.
 *
 * Provider errors carry their own flag. Plain errors are matched on
 * common network and quota phrases.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('quota') ||
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('fetch failed')
    );
  }

  return false;
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
