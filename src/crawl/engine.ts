/**
 * Crawl Engine
 *
 * Drives the zone x query double loop: search, dedup, filter, detail
 * lookup, classification, scoring and record assembly. Zones are the unit
 * of checkpointing; a zone is saved only after every one of its queries
 * (detail lookups included) has returned.
 *
 * State machine:
 * ```
 * idle -> running(zone_k) -> ... -> running(zone_n) -> completed
 *              \______________________________/
 *                          interrupted
 * ```
 * A restarted crawl goes from idle straight to the first zone missing from
 * the checkpoint's completed zones.
 *
 * @module crawl/engine
 */

import { isRelevant } from '../classify/relevance.js';
import { refine } from '../classify/classifier.js';
import type { CrawlProfile } from '../classify/profiles.js';
import {
  ConfigurationError,
  PersistenceError,
  errorMessage,
  isPersistenceError,
  isProviderError,
} from '../errors/index.js';
import { withRetry, type RetryOptions } from '../places/retry.js';
import type { SearchAllResult, SearchClient } from '../places/search-client.js';
import type { Query, Zone } from '../schemas/catalog.js';
import type { CheckpointStore } from './checkpoint.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { buildRecord } from './record-builder.js';
import { RecordStore } from './record-store.js';
import {
  silentLogger,
  type CrawlEvent,
  type CrawlEventListener,
  type CrawlResult,
  type CrawlState,
  type CrawlStats,
  type DatasetSink,
  type Logger,
} from './types.js';

// ============================================================================
// Options
// ============================================================================

export interface CrawlEngineOptions {
  profile: CrawlProfile;
  /** Catalog fingerprint; a checkpoint for another catalog is refused */
  catalogHash: string;
  checkpoint: CheckpointStore;
  /** Queries run concurrently inside one zone (default: 1) */
  concurrency?: number;
  /** Page cap per search (default: the search client's) */
  maxPages?: number;
  /** Place ids already held in earlier datasets; never fetched */
  excludePlaceIds?: Iterable<string>;
  logger?: Logger;
  onEvent?: CrawlEventListener;
  /** Clock for record timestamps (default: current time) */
  now?: () => Date;
  /** Backoff settings for retried searches */
  retry?: RetryOptions;
}

export interface RunOptions {
  /** Honoured between query iterations */
  signal?: AbortSignal;
  /** Receives the final dataset before the checkpoint is cleared */
  sink?: DatasetSink;
}

interface CommittedState {
  completedZones: string[];
  records: RecordStore;
  stats: CrawlStats;
  apiCalls: number;
}

function increment(stats: CrawlStats, key: string, by: number = 1): void {
  stats[key] = (stats[key] ?? 0) + by;
}

// ============================================================================
// Engine
// ============================================================================

/**
 * @example
 * ```typescript
 * const engine = new CrawlEngine(search, {
 *   profile: getProfile('market'),
 *   catalogHash: catalog.fingerprint,
 *   checkpoint: new FileCheckpointStore(getCheckpointPath(dataDir, 'south')),
 * });
 * const result = await engine.run(catalog.zones, catalog.queries, {
 *   sink: (records) => writeDataset('south.csv', records),
 * });
 * ```
 */
export class CrawlEngine {
  private readonly profile: CrawlProfile;
  private readonly logger: Logger;
  private readonly limiter: ConcurrencyLimiter;
  private readonly excluded: ReadonlySet<string>;
  private readonly now: () => Date;
  private state: CrawlState = { status: 'idle' };

  constructor(
    private readonly search: SearchClient,
    private readonly options: CrawlEngineOptions
  ) {
    this.profile = options.profile;
    this.logger = options.logger ?? silentLogger;
    this.limiter = new ConcurrencyLimiter(options.concurrency ?? 1);
    this.excluded = new Set(options.excludePlaceIds ?? []);
    this.now = options.now ?? (() => new Date());
  }

  getState(): CrawlState {
    return this.state;
  }

  /**
   * Crawl every zone not yet completed, then hand the dataset to the sink
   * and clear the checkpoint.
   *
   * Provider failures are counted and logged; they never abort the crawl.
   *
   * @throws ConfigurationError if the checkpoint belongs to another catalog
   * @throws PersistenceError if a checkpoint or the sink cannot be written
   */
  async run(
    zones: readonly Zone[],
    queries: readonly Query[],
    runOptions: RunOptions = {}
  ): Promise<CrawlResult> {
    if (this.state.status === 'running') {
      throw new Error('Crawl is already running');
    }

    const { signal, sink } = runOptions;
    const saved = await this.options.checkpoint.load();

    if (saved && saved.catalogHash !== this.options.catalogHash) {
      throw new ConfigurationError('Checkpoint was written for a different zone/query catalog', [
        `checkpoint catalog: ${saved.catalogHash}`,
        `current catalog: ${this.options.catalogHash}`,
        'Start over with --fresh or restore the original catalog files',
      ]);
    }

    const initial = saved?.progress;
    const store = new RecordStore(initial ? initial.records.values() : []);
    const stats: CrawlStats = { ...initial?.stats };
    let apiCalls = initial?.apiCalls ?? 0;
    const completedZones = [...(initial?.completedZones ?? [])];
    const completed = new Set(completedZones);
    let committed: CommittedState = {
      completedZones: [...completedZones],
      records: new RecordStore(store.values()),
      stats: { ...stats },
      apiCalls,
    };

    if (saved) {
      this.logger.info(
        `[crawl] Resuming from checkpoint saved ${saved.savedAt}: ` +
          `${completedZones.length}/${zones.length} zones, ${store.size} records`
      );
    }

    let currentZone: string | undefined;

    try {
      for (const [index, zone] of zones.entries()) {
        if (completed.has(zone.name)) {
          continue;
        }
        if (signal?.aborted) {
          return this.interrupt(committed, zone.name, zones.length, saved !== undefined);
        }

        currentZone = zone.name;
        this.state = { status: 'running', zone: zone.name, zoneIndex: index };
        this.emit({ type: 'zone_started', zone: zone.name, index, total: zones.length });

        const callsBefore = this.search.getCallCounts();
        await this.limiter.map(queries, (query) => this.runQuery(zone, query, store, stats, signal));

        if (signal?.aborted) {
          // Partial zone: drop it, the checkpoint still holds the previous zone boundary
          return this.interrupt(committed, zone.name, zones.length, saved !== undefined);
        }

        const callsAfter = this.search.getCallCounts();
        increment(stats, 'nearby_search_calls', callsAfter.nearbySearch - callsBefore.nearbySearch);
        increment(stats, 'place_details_calls', callsAfter.placeDetails - callsBefore.placeDetails);
        apiCalls += callsAfter.total - callsBefore.total;

        completedZones.push(zone.name);
        completed.add(zone.name);
        await this.options.checkpoint.save(
          { completedZones, records: store.snapshot(), stats, apiCalls },
          this.options.catalogHash
        );
        committed = {
          completedZones: [...completedZones],
          records: new RecordStore(store.values()),
          stats: { ...stats },
          apiCalls,
        };

        this.logger.info(
          `[crawl] Zone ${zone.name} complete (${completedZones.length}/${zones.length}), ${store.size} records`
        );
        this.emit({
          type: 'zone_completed',
          zone: zone.name,
          index,
          total: zones.length,
          records: store.size,
        });
      }
    } catch (error) {
      this.state = { status: 'interrupted', zone: currentZone };
      throw error;
    }

    const records = store.values();

    if (sink) {
      try {
        await sink(records);
      } catch (error) {
        this.state = { status: 'interrupted', zone: undefined };
        if (isPersistenceError(error)) {
          throw error;
        }
        throw new PersistenceError(`Failed to write dataset: ${errorMessage(error)}`, '', {
          cause: error,
        });
      }
    }

    await this.options.checkpoint.clear();
    this.state = { status: 'completed' };
    this.emit({ type: 'crawl_completed', records: records.length, apiCalls });

    return {
      records,
      stats: { ...stats },
      apiCalls,
      completedZones: [...completedZones],
      resumed: saved !== undefined,
      interrupted: false,
    };
  }

  /**
   * One (zone, query) iteration. Provider failures end the iteration with
   * zero results; anything else propagates.
   */
  private async runQuery(
    zone: Zone,
    query: Query,
    store: RecordStore,
    stats: CrawlStats,
    signal: AbortSignal | undefined
  ): Promise<void> {
    if (signal?.aborted) {
      return;
    }

    increment(stats, `searches_${query.category}`);

    let result: SearchAllResult;
    try {
      result = await withRetry(
        () =>
          this.search.searchAll(zone, query.keyword, {
            maxPages: this.options.maxPages,
            radiusM: query.radiusM,
            signal,
          }),
        {
          ...this.options.retry,
          onRetry: (error, attempt) =>
            this.logger.debug(
              `[crawl] Retrying "${query.keyword}" in ${zone.name} (attempt ${attempt}): ${errorMessage(error)}`
            ),
        }
      );
    } catch (error) {
      if (!isProviderError(error)) {
        throw error;
      }
      increment(stats, 'search_failures');
      this.logger.warn(`[crawl] Search "${query.keyword}" in ${zone.name} failed: ${error.message}`);
      this.emit({ type: 'query_completed', zone: zone.name, keyword: query.keyword, found: 0, added: 0 });
      return;
    }

    if (result.truncated) {
      increment(stats, 'search_failures');
    }

    let added = 0;
    for (const candidate of result.candidates) {
      // No new detail lookups once interrupted; the partial zone is discarded
      if (signal?.aborted) {
        break;
      }
      if (this.excluded.has(candidate.placeId)) {
        increment(stats, 'duplicates_avoided');
        continue;
      }
      if (!store.claim(candidate.placeId)) {
        increment(stats, 'duplicates_skipped');
        continue;
      }
      if (!isRelevant(candidate.name, candidate.types, query.category, this.profile.relevance)) {
        store.release(candidate.placeId);
        increment(stats, 'filtered_irrelevant');
        continue;
      }

      const detail = await this.search.fetchDetail(candidate.placeId);
      if (!detail) {
        store.release(candidate.placeId);
        increment(stats, 'detail_failures');
        continue;
      }

      const name = detail.name ?? candidate.name;
      const subCategory = refine(
        name,
        candidate.types,
        query.category,
        query.subCategory,
        this.profile.classification
      );

      store.insert(
        buildRecord(
          { ...detail, placeId: candidate.placeId },
          {
            category: query.category,
            subCategory,
            zoneName: zone.name,
            keyword: query.keyword,
            radiusHint: query.radiusM,
            searchName: candidate.name,
            types: candidate.types,
            timestamp: this.now().toISOString(),
          },
          this.profile
        )
      );
      increment(stats, `found_${query.category}`);
      increment(stats, `found_${subCategory}`);
      added++;
    }

    this.logger.debug(
      `[crawl] "${query.keyword}" in ${zone.name}: ${result.candidates.length} found, ${added} new`
    );
    this.emit({
      type: 'query_completed',
      zone: zone.name,
      keyword: query.keyword,
      found: result.candidates.length,
      added,
    });
  }

  private interrupt(
    committed: CommittedState,
    zone: string,
    totalZones: number,
    resumed: boolean
  ): CrawlResult {
    this.state = { status: 'interrupted', zone };
    this.logger.warn(
      `[crawl] Interrupted in ${zone}; ${committed.completedZones.length}/${totalZones} zones saved`
    );
    this.emit({
      type: 'crawl_interrupted',
      completedZones: committed.completedZones.length,
      totalZones,
    });

    return {
      records: committed.records.values(),
      stats: { ...committed.stats },
      apiCalls: committed.apiCalls,
      completedZones: [...committed.completedZones],
      resumed,
      interrupted: true,
    };
  }

  private emit(event: CrawlEvent): void {
    this.options.onEvent?.(event);
  }
}
