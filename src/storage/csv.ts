/**
 * CSV Table I/O
 *
 * Thin layer over csv-parse and csv-stringify shared by the catalog loader
 * and the dataset reader/writer.
 *
 * @module storage/csv
 */

import * as fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { isErrnoException } from './atomic.js';

const RawTableSchema = z.array(z.array(z.string()));

/**
 * Parsed CSV with a header row
 */
export interface CsvTable {
  /** Header cells, trimmed */
  columns: string[];
  /** One object per data row, keyed by header cell */
  rows: Array<Record<string, string>>;
}

/**
 * Parse CSV text with a header row.
 *
 * @param source - File name used in error messages
 * @throws ConfigurationError on malformed CSV
 */
export function parseCsvTable(content: string, source: string): CsvTable {
  let raw: unknown;
  try {
    raw = parse(content, {
      bom: true,
      columns: false,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Malformed CSV in ${source}`, [message]);
  }

  const parsed = RawTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Malformed CSV in ${source}`, [parsed.error.message]);
  }

  const [header = [], ...body] = parsed.data;
  const columns = header.map((cell) => cell.trim());

  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Read and parse a CSV file with a header row.
 *
 * @throws ConfigurationError if the file is missing or malformed
 */
export async function readCsvTable(filePath: string): Promise<CsvTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`File not found: ${filePath}`);
    }
    throw error;
  }
  return parseCsvTable(content, filePath);
}

/**
 * Check that every required column is present.
 *
 * @throws ConfigurationError naming the missing columns
 */
export function requireColumns(
  table: CsvTable,
  required: readonly string[],
  source: string
): void {
  const present = new Set(table.columns);
  const missing = required.filter((column) => !present.has(column));

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required columns in ${source}: ${missing.join(', ')}`,
      [`Expected columns: ${required.join(', ')}`, `Found columns: ${table.columns.join(', ') || '(none)'}`]
    );
  }
}

/**
 * Render a header and rows as CSV text.
 */
export function stringifyCsv(columns: readonly string[], rows: readonly string[][]): string {
  return stringify([[...columns], ...rows]);
}
