/**
 * Crawl Engine Types
 *
 * Shared interfaces for the crawl engine and the components it drives.
 *
 * @module crawl/types
 */

import type { PlaceRecord } from '../schemas/record.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless --verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything. Default for library use and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Crawl State
// ============================================================================

/**
 * Counter map persisted with the checkpoint (e.g. `filtered_irrelevant`)
 */
export type CrawlStats = Record<string, number>;

/**
 * In-memory crawl progress. Owned by the engine for the duration of a run.
 */
export interface CrawlProgress {
  /** Zone names in completion order */
  completedZones: string[];
  /** place_id -> record; never shrinks once a zone completes */
  records: Map<string, PlaceRecord>;
  stats: CrawlStats;
  /** Provider calls across every run of this crawl */
  apiCalls: number;
}

/**
 * Engine lifecycle. `interrupted` is reachable from any `running` state.
 */
export type CrawlState =
  | { status: 'idle' }
  | { status: 'running'; zone: string; zoneIndex: number }
  | { status: 'completed' }
  | { status: 'interrupted'; zone: string | undefined };

// ============================================================================
// Events
// ============================================================================

export type CrawlEvent =
  | { type: 'zone_started'; zone: string; index: number; total: number }
  | {
      type: 'query_completed';
      zone: string;
      keyword: string;
      found: number;
      added: number;
    }
  | { type: 'zone_completed'; zone: string; index: number; total: number; records: number }
  | { type: 'crawl_completed'; records: number; apiCalls: number }
  | { type: 'crawl_interrupted'; completedZones: number; totalZones: number };

export type CrawlEventListener = (event: CrawlEvent) => void;

// ============================================================================
// Results
// ============================================================================

/**
 * Receives the final dataset before the checkpoint is cleared.
 */
export type DatasetSink = (records: readonly PlaceRecord[]) => Promise<void>;

export interface CrawlResult {
  /** Final (or partial, when interrupted) records in insertion order */
  records: PlaceRecord[];
  stats: CrawlStats;
  apiCalls: number;
  completedZones: string[];
  /** True when the run started from a saved checkpoint */
  resumed: boolean;
  /** True when the run stopped on an abort signal */
  interrupted: boolean;
}
