/**
 * Storage Layer
 *
 * File-based persistence: atomic writes, crawl state paths, locking and
 * CSV tables.
 *
 * @module storage
 */

export { atomicWriteFile, atomicWriteJson, readJson, fileExists, isErrnoException } from './atomic.js';
export {
  validateIdSecurity,
  getDataDir,
  getCrawlsDir,
  getCrawlDir,
  getCheckpointPath,
  getLockPath,
} from './paths.js';
export { acquireLock, releaseLock, checkLock, withLock, type LockInfo, type LockOptions } from './lock.js';
export { parseCsvTable, readCsvTable, requireColumns, stringifyCsv, type CsvTable } from './csv.js';
