/**
 * gridscout
 *
 * Grid-search crawl of points of interest from a place-search provider,
 * with dedup, relevance filtering, classification, scoring, resumable
 * checkpoints and dataset reconciliation.
 *
 * @module gridscout
 */

export * from './errors/index.js';
export * from './schemas/index.js';
export * from './storage/index.js';
export * from './places/index.js';
export * from './classify/index.js';
export * from './catalog/index.js';
export * from './dataset/index.js';
export * from './crawl/index.js';
export * from './reconcile/index.js';
export {
  getConfig,
  parseEnv,
  resetConfig,
  requireApiKey,
  API_COSTS,
  DEFAULT_DETAILS_PER_SEARCH,
  calculateApiCost,
  calculateCrawlCost,
  estimateCrawl,
  formatCost,
  type Config,
  type CrawlCost,
  type CrawlEstimate,
} from './config/index.js';
