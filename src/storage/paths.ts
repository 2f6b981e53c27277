/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.gridscout/                        # Default data directory
 * └── crawls/
 *     └── <crawl_name>/                # e.g., jakarta-south-market
 *         ├── checkpoint.json          # Zone-granular crawl checkpoint
 *         └── crawl.lock               # Held while a crawl is running
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import { getConfig } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'crawlName')
 * @throws ConfigurationError if the ID is empty or contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (id.trim() === '') {
    throw new ConfigurationError(`${idName} must not be empty`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new ConfigurationError(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Comes from `GRIDSCOUT_DATA_DIR` via the config module,
 * defaulting to `~/.gridscout/`.
 */
export function getDataDir(): string {
  return getConfig().dataDir;
}

/**
 * Gets the directory holding every named crawl.
 *
 * @param dataDir - Root data directory
 */
export function getCrawlsDir(dataDir: string): string {
  return path.join(dataDir, 'crawls');
}

/**
 * Gets the state directory of one named crawl.
 *
 * @param dataDir - Root data directory
 * @param crawlName - Crawl name (used as a directory name)
 * @throws ConfigurationError if crawlName contains path traversal characters
 * @example
 * ```typescript
 * getCrawlDir('/data', 'jakarta-south');
 * // '/data/crawls/jakarta-south'
 * ```
 */
export function getCrawlDir(dataDir: string, crawlName: string): string {
  validateIdSecurity(crawlName, 'crawlName');
  return path.join(getCrawlsDir(dataDir), crawlName);
}

/**
 * Gets the checkpoint file path of a crawl.
 */
export function getCheckpointPath(dataDir: string, crawlName: string): string {
  return path.join(getCrawlDir(dataDir, crawlName), 'checkpoint.json');
}

/**
 * Gets the lock file path of a crawl.
 */
export function getLockPath(dataDir: string, crawlName: string): string {
  return path.join(getCrawlDir(dataDir, crawlName), 'crawl.lock');
}
