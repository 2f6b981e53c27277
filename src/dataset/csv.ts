/**
 * Dataset CSV I/O
 *
 * Reads and writes the analysis-ready dataset. Column names and order
 * follow RECORD_COLUMNS exactly; GIS imports depend on them.
 *
 * Cell conventions: `types` joined with ", ", booleans as True/False,
 * absent values as empty cells, price level as the "$" marker string.
 *
 * @module dataset/csv
 */

import { ConfigurationError, PersistenceError, errorMessage } from '../errors/index.js';
import {
  PlaceRecordSchema,
  RECORD_COLUMNS,
  RECORD_COLUMN_NAMES,
  type PlaceRecord,
} from '../schemas/record.js';
import { atomicWriteFile } from '../storage/atomic.js';
import { readCsvTable, requireColumns, stringifyCsv } from '../storage/csv.js';
import { silentLogger, type Logger } from '../crawl/types.js';
import { formatPriceLevel } from '../crawl/record-builder.js';

export interface DatasetReadResult {
  /** Records in file order, first occurrence of each place_id */
  records: PlaceRecord[];
  /** Rows dropped because their place_id appeared earlier in the file */
  duplicatesDropped: number;
}

// ============================================================================
// Record <-> Row
// ============================================================================

type CellValue = PlaceRecord[keyof PlaceRecord];

function formatCell(value: CellValue): string {
  if (value === undefined) return '';
  if (Array.isArray(value)) return value.join(', ');
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  return String(value);
}

/**
 * Render a record as CSV cells in column order.
 */
export function recordToRow(record: PlaceRecord): string[] {
  return RECORD_COLUMNS.map(([, field]) => formatCell(record[field]));
}

function optionalNumber(cell: string | undefined): number | undefined {
  const trimmed = cell?.trim() ?? '';
  return trimmed === '' ? undefined : Number(trimmed);
}

/**
 * Older datasets hold the numeric level ("0" to "4") instead of markers.
 */
function legacyPriceLevel(cell: string): string {
  const trimmed = cell.trim();
  return /^[0-4]$/.test(trimmed) ? formatPriceLevel(Number(trimmed)) : cell;
}

function optionalBoolean(cell: string | undefined): boolean | undefined {
  const normalized = cell?.trim().toLowerCase() ?? '';
  if (normalized === '') return undefined;
  return normalized === 'true' || normalized === '1';
}

/**
 * Convert a CSV row back into a validated record.
 *
 * @returns The record, or the validation issues for the row
 */
export function rowToRecord(
  row: Record<string, string>
): { success: true; record: PlaceRecord } | { success: false; issues: string[] } {
  const types = (row.types ?? '')
    .split(',')
    .map((type) => type.trim())
    .filter((type) => type !== '');

  const result = PlaceRecordSchema.safeParse({
    placeId: row.place_id?.trim(),
    name: row.name ?? '',
    category: row.category ?? '',
    subCategory: row.sub_category ?? '',
    latitude: optionalNumber(row.latitude),
    longitude: optionalNumber(row.longitude),
    address: row.address ?? '',
    vicinity: row.vicinity ?? '',
    rating: optionalNumber(row.rating),
    reviewCount: optionalNumber(row.review_count) ?? 0,
    website: row.website ?? '',
    phone: row.phone ?? '',
    priceLevel: legacyPriceLevel(row.price_level ?? ''),
    types,
    isOperational: optionalBoolean(row.is_operational) ?? false,
    searchZone: row.search_zone ?? '',
    searchKeyword: row.search_keyword ?? '',
    isOpenNow: optionalBoolean(row.is_open_now),
    timestamp: row.timestamp ?? '',
    popularityScore: optionalNumber(row.popularity_score) ?? 0,
    bufferRadiusM: optionalNumber(row.buffer_radius_m),
  });

  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }
  return { success: true, record: result.data };
}

// ============================================================================
// File I/O
// ============================================================================

/**
 * Write records to a CSV file atomically.
 *
 * @throws PersistenceError if the file cannot be written
 */
export async function writeDataset(filePath: string, records: readonly PlaceRecord[]): Promise<void> {
  const content = stringifyCsv(RECORD_COLUMN_NAMES, records.map(recordToRow));
  try {
    await atomicWriteFile(filePath, content);
  } catch (error) {
    throw new PersistenceError(`Failed to write dataset: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }
}

/**
 * Read a dataset written by writeDataset (or a compatible tool).
 *
 * Repeated place_ids keep their first row.
 *
 * @throws ConfigurationError on missing columns or invalid rows
 */
export async function readDataset(
  filePath: string,
  logger: Logger = silentLogger
): Promise<DatasetReadResult> {
  const table = await readCsvTable(filePath);
  requireColumns(table, RECORD_COLUMN_NAMES, filePath);

  const records: PlaceRecord[] = [];
  const seen = new Set<string>();
  const problems: string[] = [];
  let duplicatesDropped = 0;

  table.rows.forEach((row, index) => {
    const converted = rowToRecord(row);
    if (!converted.success) {
      problems.push(...converted.issues.map((issue) => `row ${index + 2}: ${issue}`));
      return;
    }

    const { record } = converted;
    if (seen.has(record.placeId)) {
      duplicatesDropped++;
      return;
    }
    seen.add(record.placeId);
    records.push(record);
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid dataset rows in ${filePath}`, problems);
  }
  if (duplicatesDropped > 0) {
    logger.warn(`[dataset] Dropped ${duplicatesDropped} duplicate place_id rows from ${filePath}`);
  }

  return { records, duplicatesDropped };
}
