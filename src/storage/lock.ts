/**
 * Crawl Lock Mechanism
 *
 * File-based lock that keeps two processes from running the same named
 * crawl (and writing the same checkpoint) at once.
 *
 * @module storage/lock
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { silentLogger, type Logger } from '../crawl/types.js';
import { isErrnoException } from './atomic.js';

/** Lock metadata stored in the lock file */
const LockInfoSchema = z.object({
  /** PID of the process holding the lock */
  pid: z.number().int(),
  /** When the lock was acquired */
  acquiredAt: z.string(),
  /** What operation is being performed */
  operation: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

/** Default lock timeout in milliseconds (12 hours; a city-wide crawl runs for hours) */
const DEFAULT_LOCK_TIMEOUT_MS = 12 * 60 * 60 * 1000;

/** Default retry interval in milliseconds */
const DEFAULT_RETRY_INTERVAL_MS = 1000;

export interface LockOptions {
  /** Attempts before giving up (default 1: fail fast) */
  maxRetries?: number;
  retryIntervalMs?: number;
  /** Locks older than this are treated as stale */
  timeoutMs?: number;
  logger?: Logger;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Injectable for tests */
  now?: () => number;
}

/**
 * Check whether a process is still running on this host
 */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return !(isErrnoException(error) && error.code === 'ESRCH');
  }
}

/**
 * Read the lock file and return its info if the lock is still valid.
 *
 * Stale locks (too old, or held by a dead process) are removed.
 *
 * @returns Lock info if a valid lock exists, null otherwise
 */
export async function checkLock(
  lockPath: string,
  options: Pick<LockOptions, 'timeoutMs' | 'logger' | 'now'> = {}
): Promise<LockInfo | null> {
  const { timeoutMs = DEFAULT_LOCK_TIMEOUT_MS, logger = silentLogger, now = Date.now } = options;

  let content: string;
  try {
    content = await fs.readFile(lockPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    parsed = undefined;
  }
  const result = LockInfoSchema.safeParse(parsed);

  if (!result.success) {
    logger.warn(`[Lock] Unreadable lock file at ${lockPath}, removing...`);
    await releaseLock(lockPath, logger);
    return null;
  }

  const lockInfo = result.data;
  const ageMs = now() - new Date(lockInfo.acquiredAt).getTime();

  if (Number.isNaN(ageMs) || ageMs > timeoutMs) {
    logger.warn(`[Lock] Stale lock detected (${Math.round(ageMs / 1000)}s old), removing...`);
    await releaseLock(lockPath, logger);
    return null;
  }

  if (lockInfo.pid !== process.pid && !isProcessAlive(lockInfo.pid)) {
    logger.warn(`[Lock] Lock held by exited process ${lockInfo.pid}, removing...`);
    await releaseLock(lockPath, logger);
    return null;
  }

  return lockInfo;
}

/**
 * Acquire a lock
 *
 * @param lockPath - Lock file path
 * @param operation - Description of the operation (e.g., "crawl jakarta-south")
 * @returns True if lock acquired, false if unable to acquire
 */
export async function acquireLock(
  lockPath: string,
  operation: string,
  options: LockOptions = {}
): Promise<boolean> {
  const {
    maxRetries = 1,
    retryIntervalMs = DEFAULT_RETRY_INTERVAL_MS,
    logger = silentLogger,
    sleep = defaultSleep,
    now = Date.now,
  } = options;

  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    const existingLock = await checkLock(lockPath, options);

    if (existingLock) {
      logger.info(
        `[Lock] Locked by PID ${existingLock.pid} for "${existingLock.operation}" ` +
          `(attempt ${attempt + 1}/${maxRetries})`
      );
      if (attempt + 1 < maxRetries) {
        await sleep(retryIntervalMs);
      }
      continue;
    }

    const lockInfo: LockInfo = {
      pid: process.pid,
      acquiredAt: new Date(now()).toISOString(),
      operation,
    };

    try {
      // Exclusive create - fails if file exists
      await fs.writeFile(lockPath, JSON.stringify(lockInfo, null, 2), { flag: 'wx' });
      logger.debug(`[Lock] Acquired lock for "${operation}"`);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        // Another process created the file between our check and write
        continue;
      }
      throw error;
    }
  }

  logger.error(`[Lock] Failed to acquire lock after ${maxRetries} attempts`);
  return false;
}

/**
 * Release a lock
 */
export async function releaseLock(lockPath: string, logger: Logger = silentLogger): Promise<void> {
  try {
    await fs.unlink(lockPath);
    logger.debug('[Lock] Released lock');
  } catch (error) {
    if (!(isErrnoException(error) && error.code === 'ENOENT')) {
      throw error;
    }
  }
}

/**
 * Execute a function while holding a lock
 *
 * The lock is released whether fn resolves or throws.
 *
 * @throws ConfigurationError if the lock is held by another live process
 */
export async function withLock<T>(
  lockPath: string,
  operation: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const acquired = await acquireLock(lockPath, operation, options);

  if (!acquired) {
    const holder = await checkLock(lockPath, options);
    throw new ConfigurationError(
      `Could not acquire lock for "${operation}"`,
      holder ? [`held by PID ${holder.pid} since ${holder.acquiredAt} (${lockPath})`] : [lockPath]
    );
  }

  try {
    return await fn();
  } finally {
    await releaseLock(lockPath, options.logger);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
