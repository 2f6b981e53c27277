/**
 * CLI Commands Registry
 *
 * Available commands:
 * - crawl: Crawl zones x queries into a dataset (resumable)
 * - merge: Reconcile datasets into one
 * - estimate: Plan calls and cost of a crawl
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCrawlCommand } from './crawl.js';
import { registerEstimateCommand } from './estimate.js';
import { registerMergeCommand } from './merge.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerCrawlCommand(program);
  registerMergeCommand(program);
  registerEstimateCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'crawl --zones <csv> --queries <csv>', description: 'Crawl zones x queries into a dataset' },
    { name: 'merge <primary> <secondary...> --output <csv>', description: 'Merge datasets' },
    { name: 'estimate --zones <csv> --queries <csv>', description: 'Estimate calls and cost' },
  ];
}

export { handleCrawl, type CrawlCommandDeps, type CrawlCommandOptions } from './crawl.js';
export { handleMerge, type MergeCommandOptions } from './merge.js';
export { handleEstimate, type EstimateCommandOptions } from './estimate.js';
