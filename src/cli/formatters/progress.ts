/**
 * Progress Formatters
 *
 * Spinner for long-running operations and the crawl event renderer that
 * drives it. Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { CrawlEvent, CrawlEventListener } from '../../crawl/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Print nothing at all (--quiet) */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading catalog...');
 * spinner.start();
 *
 * try {
 *   await loadCatalog(zonesPath, queriesPath);
 *   spinner.succeed('Catalog loaded');
 * } catch (err) {
 *   spinner.fail('Failed to load catalog');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      isSilent: options.silent === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state and elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }

  getText(): string {
    return this.spinner.text;
  }
}

// ============================================================================
// Crawl Progress
// ============================================================================

/**
 * One-line description of a crawl event, or undefined for events that do
 * not change the display.
 */
export function describeCrawlEvent(event: CrawlEvent): string | undefined {
  switch (event.type) {
    case 'zone_started':
      return `Zone ${event.index + 1}/${event.total}: ${event.zone}`;
    case 'query_completed':
      return `Zone ${event.zone}: "${event.keyword}" ${event.found} found, ${event.added} new`;
    case 'zone_completed':
      return `Zone ${event.index + 1}/${event.total} saved: ${event.records} places`;
    case 'crawl_completed':
      return `Crawl complete: ${event.records} places, ${event.apiCalls} API calls`;
    case 'crawl_interrupted':
      return `Interrupted after ${event.completedZones}/${event.totalZones} zones`;
  }
}

/**
 * Listener that mirrors crawl events onto a spinner.
 */
export function createCrawlProgress(spinner: ProgressSpinner): CrawlEventListener {
  return (event) => {
    const text = describeCrawlEvent(event);
    if (text !== undefined) {
      spinner.update(text);
    }
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
