/**
 * Reconciler
 *
 * Merges independently produced datasets into one with a globally unique
 * place_id. The first dataset wins every overlap.
 *
 * @module reconcile/reconciler
 */

import { IntegrityError } from '../errors/index.js';
import { silentLogger, type Logger } from '../crawl/types.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import type { MergeInput, MergeReport } from '../schemas/merge-report.js';
import type { PlaceRecord } from '../schemas/record.js';

// ============================================================================
// Types
// ============================================================================

export interface MergeResult {
  /** Merged records, sorted */
  records: PlaceRecord[];
  primarySize: number;
  secondarySize: number;
  /** Secondary records dropped because primary holds their place_id */
  overlap: number;
  finalSize: number;
}

/**
 * A dataset to merge, labelled for the report
 */
export interface LabelledDataset {
  source: string;
  records: readonly PlaceRecord[];
}

export interface MergeAllResult {
  records: PlaceRecord[];
  report: MergeReport;
}

export interface MergeAllOptions {
  logger?: Logger;
  /** Clock for the report timestamp */
  now?: () => Date;
}

// ============================================================================
// Ordering
// ============================================================================

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order by category, then sub_category, then popularity_score descending.
 * Ties keep their input order.
 */
export function compareRecords(a: PlaceRecord, b: PlaceRecord): number {
  return (
    compareText(a.category, b.category) ||
    compareText(a.subCategory, b.subCategory) ||
    b.popularityScore - a.popularityScore
  );
}

/**
 * place_ids that occur more than once, in first-seen order
 */
export function findDuplicateIds(records: readonly PlaceRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const record of records) {
    if (seen.has(record.placeId)) {
      duplicates.add(record.placeId);
    }
    seen.add(record.placeId);
  }
  return [...duplicates];
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Merge two datasets. Secondary records whose place_id appears in primary
 * are dropped.
 *
 * @throws IntegrityError if the merged set still holds a duplicate place_id,
 *   i.e. one of the inputs was not unique to begin with
 */
export function merge(
  primary: readonly PlaceRecord[],
  secondary: readonly PlaceRecord[]
): MergeResult {
  const primaryIds = new Set(primary.map((record) => record.placeId));
  const kept = secondary.filter((record) => !primaryIds.has(record.placeId));
  const combined = [...primary, ...kept];

  const duplicates = findDuplicateIds(combined);
  if (duplicates.length > 0) {
    throw new IntegrityError(
      `Merged dataset has ${duplicates.length} duplicate place_id(s): ${duplicates.slice(0, 5).join(', ')}`,
      duplicates
    );
  }

  return {
    records: combined.sort(compareRecords),
    primarySize: primary.length,
    secondarySize: secondary.length,
    overlap: secondary.length - kept.length,
    finalSize: combined.length,
  };
}

/**
 * Fold merge over datasets in order and build the merge report.
 *
 * @throws IntegrityError on a duplicate place_id inside any input
 * @throws Error when no dataset is given
 */
export function mergeAll(
  datasets: readonly LabelledDataset[],
  options: MergeAllOptions = {}
): MergeAllResult {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  const [first, ...rest] = datasets;
  if (!first) {
    throw new Error('mergeAll needs at least one dataset');
  }

  let merged = merge(first.records, []);
  const inputs: MergeInput[] = [{ source: first.source, records: first.records.length, overlap: 0 }];

  for (const dataset of rest) {
    merged = merge(merged.records, dataset.records);
    inputs.push({ source: dataset.source, records: dataset.records.length, overlap: merged.overlap });
    logger.info(
      `[reconcile] ${dataset.source}: ${dataset.records.length} records, ` +
        `${merged.overlap} already present, ${merged.finalSize} total`
    );
  }

  return {
    records: merged.records,
    report: {
      schemaVersion: SCHEMA_VERSIONS.mergeReport,
      createdAt: now().toISOString(),
      inputs,
      overlap: inputs.reduce((sum, input) => sum + input.overlap, 0),
      finalSize: merged.records.length,
      byCategory: countBy(merged.records, (record) => record.category),
      bySubCategory: countBy(merged.records, (record) => `${record.category}/${record.subCategory}`),
    },
  };
}

/**
 * Count records per key, keys in first-seen order
 */
export function countBy(
  records: readonly PlaceRecord[],
  key: (record: PlaceRecord) => string
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    const k = key(record);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}
