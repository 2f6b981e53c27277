/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export {
  ProgressSpinner,
  createSpinner,
  createCrawlProgress,
  describeCrawlEvent,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

export {
  formatCrawlSummary,
  formatEstimate,
  formatGisInstructions,
  formatMergeSummary,
  type CrawlSummaryInput,
} from './summary.js';
