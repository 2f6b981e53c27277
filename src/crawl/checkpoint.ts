/**
 * Checkpoint Store
 *
 * Durable save/restore of crawl progress. Writes go through temp file +
 * rename, so a crash mid-write leaves the previous checkpoint intact.
 *
 * @module crawl/checkpoint
 */

import * as fs from 'node:fs/promises';
import { PersistenceError, errorMessage } from '../errors/index.js';
import { CheckpointSchema, type Checkpoint } from '../schemas/checkpoint.js';
import { migrateSchema } from '../schemas/migrations/index.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { atomicWriteJson, fileExists, readJson } from '../storage/atomic.js';
import type { CrawlProgress } from './types.js';

/**
 * A restored checkpoint
 */
export interface SavedProgress {
  catalogHash: string;
  savedAt: string;
  progress: CrawlProgress;
}

export interface CheckpointStore {
  /** Persist progress; must not return before the state is durable */
  save(progress: CrawlProgress, catalogHash: string): Promise<void>;
  /** Last saved state, or undefined when there is none */
  load(): Promise<SavedProgress | undefined>;
  /** Remove the saved state */
  clear(): Promise<void>;
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Convert progress to its persisted form. Copies everything, so the
 * engine may keep mutating progress afterwards.
 */
export function toCheckpoint(progress: CrawlProgress, catalogHash: string, savedAt: string): Checkpoint {
  return {
    schemaVersion: SCHEMA_VERSIONS.checkpoint,
    catalogHash,
    savedAt,
    completedZones: [...progress.completedZones],
    records: Object.fromEntries(progress.records),
    stats: { ...progress.stats },
    apiCalls: progress.apiCalls,
  };
}

export function fromCheckpoint(checkpoint: Checkpoint): SavedProgress {
  return {
    catalogHash: checkpoint.catalogHash,
    savedAt: checkpoint.savedAt,
    progress: {
      completedZones: [...checkpoint.completedZones],
      records: new Map(Object.entries(checkpoint.records)),
      stats: { ...checkpoint.stats },
      apiCalls: checkpoint.apiCalls,
    },
  };
}

// ============================================================================
// File Store
// ============================================================================

export interface FileCheckpointStoreOptions {
  /** Clock for savedAt (default: Date.now) */
  now?: () => number;
}

/**
 * JSON checkpoint file, validated with zod on load.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly now: () => number;

  constructor(
    readonly filePath: string,
    options: FileCheckpointStoreOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * @throws PersistenceError if the checkpoint cannot be written
   */
  async save(progress: CrawlProgress, catalogHash: string): Promise<void> {
    const checkpoint = toCheckpoint(progress, catalogHash, new Date(this.now()).toISOString());
    try {
      await atomicWriteJson(this.filePath, checkpoint);
    } catch (error) {
      throw new PersistenceError(
        `Failed to save checkpoint: ${errorMessage(error)}`,
        this.filePath,
        { cause: error }
      );
    }
  }

  /**
   * @throws PersistenceError if the file exists but is unreadable or invalid
   */
  async load(): Promise<SavedProgress | undefined> {
    if (!(await fileExists(this.filePath))) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = await readJson(this.filePath);
    } catch (error) {
      throw new PersistenceError(
        `Failed to read checkpoint: ${errorMessage(error)}`,
        this.filePath,
        { cause: error }
      );
    }

    const result = CheckpointSchema.safeParse(migrateSchema(raw, 'checkpoint'));
    if (!result.success) {
      const issues = result.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new PersistenceError(`Invalid checkpoint: ${issues}`, this.filePath, {
        cause: result.error,
      });
    }

    if (result.data.schemaVersion > SCHEMA_VERSIONS.checkpoint) {
      throw new PersistenceError(
        `Checkpoint schema version ${result.data.schemaVersion} is newer than supported version ${SCHEMA_VERSIONS.checkpoint}`,
        this.filePath
      );
    }

    return fromCheckpoint(result.data);
  }

  /**
   * @throws PersistenceError if an existing checkpoint cannot be removed
   */
  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new PersistenceError(
        `Failed to clear checkpoint: ${errorMessage(error)}`,
        this.filePath,
        { cause: error }
      );
    }
  }
}

// ============================================================================
// In-memory Store
// ============================================================================

/**
 * Keeps the serialized checkpoint in memory. For tests and dry runs.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  private saved: Checkpoint | undefined;
  /** Number of successful saves */
  saves = 0;

  async save(progress: CrawlProgress, catalogHash: string): Promise<void> {
    this.saved = structuredClone(toCheckpoint(progress, catalogHash, new Date().toISOString()));
    this.saves++;
  }

  async load(): Promise<SavedProgress | undefined> {
    return this.saved ? fromCheckpoint(structuredClone(this.saved)) : undefined;
  }

  async clear(): Promise<void> {
    this.saved = undefined;
  }

  /**
   * The last saved checkpoint, as it would be written to disk
   */
  peek(): Checkpoint | undefined {
    return this.saved;
  }
}
