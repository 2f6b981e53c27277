/**
 * Estimate Command
 *
 * Plans a crawl from its catalog without calling the provider.
 *
 * @module cli/commands/estimate
 */

import type { Command } from 'commander';
import { loadCatalog } from '../../catalog/loader.js';
import { estimateCrawl } from '../../config/costs.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatEstimate } from '../formatters/summary.js';
import { parsePositiveInt } from './options.js';

export interface EstimateCommandOptions {
  zones: string;
  queries: string;
  /** Expected detail lookups per search */
  detailsPerSearch?: number;
}

export function registerEstimateCommand(program: Command): void {
  program
    .command('estimate')
    .description('Estimate searches, coverage and cost of a crawl')
    .requiredOption('-z, --zones <csv>', 'Zone table')
    .requiredOption('-k, --queries <csv>', 'Query table')
    .option('--details-per-search <n>', 'Expected detail lookups per search', parsePositiveInt)
    .action(async (options: EstimateCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      base.exitWith(await handleEstimate(options, base));
    });
}

/**
 * Run the estimate command.
 *
 * @returns Exit code
 */
export async function handleEstimate(
  options: EstimateCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  try {
    const { zones, queries } = await loadCatalog(options.zones, options.queries);
    const estimate = estimateCrawl(
      zones.map((zone) => zone.radiusM),
      queries.length,
      options.detailsPerSearch
    );

    base.info(formatEstimate(estimate, zones.length, queries.length));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return base.reportError(error);
  }
}
