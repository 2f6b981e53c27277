/**
 * Zone/Query Catalog Loader
 *
 * Reads the zone and query tables a crawl runs over. Column presence is
 * checked before any row, and every row problem is reported at once, so a
 * bad catalog fails before the first provider call.
 *
 * @module catalog/loader
 */

import * as crypto from 'node:crypto';
import type { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import {
  OPTIONAL_QUERY_COLUMNS,
  QUERY_COLUMNS,
  QuerySchema,
  ZONE_COLUMNS,
  ZoneSchema,
  type Query,
  type Zone,
} from '../schemas/catalog.js';
import { readCsvTable, requireColumns } from '../storage/csv.js';

export interface Catalog {
  zones: Zone[];
  queries: Query[];
  /** SHA-256 of zones and queries; ties a checkpoint to its catalog */
  fingerprint: string;
}

/**
 * Parse a numeric cell. Blank cells become NaN so zod rejects them
 * instead of reading them as 0.
 */
function toNumber(cell: string | undefined): number {
  const trimmed = cell?.trim() ?? '';
  return trimmed === '' ? Number.NaN : Number(trimmed);
}

function formatIssues(rowNumber: number, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `row ${rowNumber}: ${field}${issue.message}`;
  });
}

/**
 * Load the zone table (`zone_name, latitude, longitude, radius`).
 *
 * @throws ConfigurationError on missing columns, invalid rows, duplicate
 *   zone names or an empty table
 */
export async function loadZones(filePath: string): Promise<Zone[]> {
  const table = await readCsvTable(filePath);
  requireColumns(table, ZONE_COLUMNS, filePath);

  const zones: Zone[] = [];
  const problems: string[] = [];
  const seen = new Map<string, number>();

  table.rows.forEach((row, index) => {
    // Header is row 1
    const rowNumber = index + 2;
    const result = ZoneSchema.safeParse({
      name: row.zone_name,
      center: { lat: toNumber(row.latitude), lng: toNumber(row.longitude) },
      radiusM: toNumber(row.radius),
    });

    if (!result.success) {
      problems.push(...formatIssues(rowNumber, result.error));
      return;
    }

    const firstRow = seen.get(result.data.name);
    if (firstRow !== undefined) {
      problems.push(`row ${rowNumber}: duplicate zone name "${result.data.name}" (first on row ${firstRow})`);
      return;
    }

    seen.set(result.data.name, rowNumber);
    zones.push(result.data);
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid zones in ${filePath}`, problems);
  }
  if (zones.length === 0) {
    throw new ConfigurationError(`No zones in ${filePath}`);
  }

  return zones;
}

/**
 * Load the query table (`keyword, category, sub_category`, optional `radius`).
 *
 * Rows with a blank keyword are skipped.
 *
 * @throws ConfigurationError on missing columns, invalid rows or an empty table
 */
export async function loadQueries(filePath: string): Promise<Query[]> {
  const table = await readCsvTable(filePath);
  requireColumns(table, QUERY_COLUMNS, filePath);
  const hasRadius = table.columns.includes(OPTIONAL_QUERY_COLUMNS[0]);

  const queries: Query[] = [];
  const problems: string[] = [];

  table.rows.forEach((row, index) => {
    const rowNumber = index + 2;
    if ((row.keyword ?? '').trim() === '') {
      return;
    }

    const radiusCell = hasRadius ? (row.radius ?? '').trim() : '';
    const result = QuerySchema.safeParse({
      keyword: row.keyword,
      category: row.category,
      subCategory: row.sub_category,
      radiusM: radiusCell === '' ? undefined : toNumber(radiusCell),
    });

    if (!result.success) {
      problems.push(...formatIssues(rowNumber, result.error));
      return;
    }
    queries.push(result.data);
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid queries in ${filePath}`, problems);
  }
  if (queries.length === 0) {
    throw new ConfigurationError(`No queries in ${filePath}`);
  }

  return queries;
}

/**
 * Fingerprint a catalog. Any change to zones, queries or their order
 * changes the result.
 */
export function catalogFingerprint(zones: readonly Zone[], queries: readonly Query[]): string {
  const content = JSON.stringify({
    zones: zones.map((zone) => [zone.name, zone.center.lat, zone.center.lng, zone.radiusM]),
    queries: queries.map((query) => [
      query.keyword,
      query.category,
      query.subCategory,
      query.radiusM ?? null,
    ]),
  });
  return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Load both tables and fingerprint them.
 */
export async function loadCatalog(zonesPath: string, queriesPath: string): Promise<Catalog> {
  const zones = await loadZones(zonesPath);
  const queries = await loadQueries(queriesPath);
  return { zones, queries, fingerprint: catalogFingerprint(zones, queries) };
}
