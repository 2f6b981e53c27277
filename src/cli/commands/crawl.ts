/**
 * Crawl Command
 *
 * Runs (or resumes) a zone x query crawl and writes the dataset.
 *
 * @module cli/commands/crawl
 */

import { Command, Option } from 'commander';
import * as path from 'node:path';
import { loadCatalog } from '../../catalog/loader.js';
import { PROFILE_NAMES, getProfile } from '../../classify/profiles.js';
import { getConfig, requireApiKey } from '../../config/index.js';
import { CrawlEngine } from '../../crawl/engine.js';
import { FileCheckpointStore } from '../../crawl/checkpoint.js';
import type { CrawlResult } from '../../crawl/types.js';
import { readDataset, writeDataset } from '../../dataset/csv.js';
import { GooglePlacesClient } from '../../places/client.js';
import { RateLimiter } from '../../places/rate-limiter.js';
import { SearchClient } from '../../places/search-client.js';
import type { PlaceSearchProvider } from '../../places/types.js';
import { withLock } from '../../storage/lock.js';
import { getCheckpointPath, getLockPath, validateIdSecurity } from '../../storage/paths.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { createCrawlProgress, createSpinner } from '../formatters/progress.js';
import { formatCrawlSummary } from '../formatters/summary.js';
import { collect, parsePageCap, parsePositiveInt, parsePositiveNumber } from './options.js';

// ============================================================================
// Types
// ============================================================================

export interface CrawlCommandOptions {
  zones: string;
  queries: string;
  /** Crawl name; keys the checkpoint (default: zones file name) */
  name?: string;
  profile: string;
  /** Earlier datasets whose place ids are skipped */
  exclude: string[];
  /** Dataset path (default: <name>.csv) */
  output?: string;
  concurrency: number;
  maxPages?: number;
  /** Provider calls per second */
  rate?: number;
  /** Discard any saved checkpoint first */
  fresh?: boolean;
}

/**
 * Seams for tests: a provider in place of the Places API and a sleep
 * for the rate limiter and page-token delay.
 */
export interface CrawlCommandDeps {
  createProvider?: () => PlaceSearchProvider;
  sleep?: (ms: number) => Promise<void>;
  /** Abort signal in place of SIGINT handling */
  signal?: AbortSignal;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerCrawlCommand(program: Command): void {
  program
    .command('crawl')
    .description('Crawl every zone x query combination into a dataset')
    .requiredOption('-z, --zones <csv>', 'Zone table (zone_name, latitude, longitude, radius)')
    .requiredOption('-k, --queries <csv>', 'Query table (keyword, category, sub_category[, radius])')
    .option('-n, --name <crawl>', 'Crawl name for checkpoint and lock (default: zones file name)')
    .addOption(
      new Option('-p, --profile <profile>', 'Relevance and classification profile')
        .choices(PROFILE_NAMES)
        .default('market')
    )
    .option('-x, --exclude <dataset>', 'Skip places already in this dataset (repeatable)', collect, [])
    .option('-o, --output <csv>', 'Dataset path (default: <name>.csv)')
    .option('-c, --concurrency <n>', 'Queries run at once inside a zone', parsePositiveInt, 1)
    .option('--max-pages <n>', 'Result pages per search (1-3)', parsePageCap)
    .option('--rate <n>', 'Provider calls per second', parsePositiveNumber)
    .option('--fresh', 'Discard a saved checkpoint and start over')
    .action(async (options: CrawlCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      base.exitWith(await handleCrawl(options, base));
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Run the crawl command.
 *
 * @returns Exit code
 */
export async function handleCrawl(
  options: CrawlCommandOptions,
  base: BaseCommand,
  deps: CrawlCommandDeps = {}
): Promise<ExitCode> {
  const spinner = createSpinner('Loading catalog...', { silent: base.isQuiet() });
  const controller = new AbortController();
  const signal = deps.signal ?? controller.signal;
  const onSigint = (): void => {
    spinner.update('Interrupt received, finishing current query...');
    controller.abort();
  };

  try {
    const config = getConfig();
    const profile = getProfile(options.profile);
    const crawlName = options.name ?? path.parse(options.zones).name;
    validateIdSecurity(crawlName, 'Crawl name');
    const output = options.output ?? `${crawlName}.csv`;

    spinner.start();
    const catalog = await loadCatalog(options.zones, options.queries);
    base.debug(`Catalog ${catalog.fingerprint.slice(0, 12)}: ${catalog.zones.length} zones, ${catalog.queries.length} queries`);

    const excluded = new Set<string>();
    for (const file of options.exclude) {
      const { records } = await readDataset(file, base.createLogger());
      for (const record of records) {
        excluded.add(record.placeId);
      }
    }
    if (excluded.size > 0) {
      base.debug(`Excluding ${excluded.size} known places`);
    }

    const provider = deps.createProvider
      ? deps.createProvider()
      : new GooglePlacesClient({ apiKey: requireApiKey(config) });
    const logger = base.createLogger();
    const search = new SearchClient(
      provider,
      new RateLimiter(options.rate ?? config.rateLimit, { sleep: deps.sleep }),
      {
        maxPages: options.maxPages ?? config.maxPages,
        language: config.language ?? profile.language,
        logger,
        sleep: deps.sleep,
      }
    );
    const checkpoint = new FileCheckpointStore(getCheckpointPath(base.dataDir, crawlName));
    const engine = new CrawlEngine(search, {
      profile,
      catalogHash: catalog.fingerprint,
      checkpoint,
      concurrency: options.concurrency,
      excludePlaceIds: excluded,
      logger,
      onEvent: createCrawlProgress(spinner),
      retry: { sleep: deps.sleep },
    });

    process.once('SIGINT', onSigint);
    const result: CrawlResult = await withLock(
      getLockPath(base.dataDir, crawlName),
      `crawl ${crawlName}`,
      async () => {
        if (options.fresh) {
          await checkpoint.clear();
        }
        return engine.run(catalog.zones, catalog.queries, {
          signal,
          sink: (records) => writeDataset(output, records),
        });
      },
      { logger }
    );

    if (result.interrupted) {
      spinner.warn(
        `Interrupted: ${result.completedZones.length}/${catalog.zones.length} zones saved. ` +
          `Run the same command again to resume.`
      );
      return EXIT_CODES.CANCELLED;
    }

    spinner.succeed(`Crawled ${catalog.zones.length} zones`);
    base.blank();
    base.info(
      formatCrawlSummary({ crawlName, profileName: profile.name, datasetPath: output, result })
    );
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (spinner.isSpinning()) {
      spinner.fail('Crawl failed');
    }
    return base.reportError(error);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
