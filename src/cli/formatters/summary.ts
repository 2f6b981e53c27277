/**
 * Summary Formatters
 *
 * End-of-run reports for the crawl, merge and estimate commands.
 *
 * @module cli/formatters/summary
 */

import chalk from 'chalk';
import { calculateCrawlCost, formatCost, type CrawlEstimate } from '../../config/costs.js';
import type { CrawlResult } from '../../crawl/types.js';
import { countBy } from '../../reconcile/reconciler.js';
import type { MergeReport } from '../../schemas/merge-report.js';

/** Sub-categories listed in the crawl summary */
const TOP_SUB_CATEGORIES = 10;

const LABEL_WIDTH = 22;

function row(label: string, value: string | number): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

/**
 * Count rows, largest first, ties by name
 */
function rankedRows(counts: Record<string, number>, limit?: number): string[] {
  return Object.entries(counts)
    .sort(([a, x], [b, y]) => y - x || (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, limit)
    .map(([name, count]) => row(name, count));
}

/**
 * How to load a dataset into QGIS
 */
export function formatGisInstructions(datasetPath: string): string {
  return [
    chalk.bold('GIS import (QGIS):'),
    `  Layer > Add Layer > Add Delimited Text Layer, file ${datasetPath}`,
    '  X field: longitude   Y field: latitude   CRS: EPSG:4326 (WGS 84)',
    '  Style by category or sub_category; buffer_radius_m sizes catchment buffers',
  ].join('\n');
}

export interface CrawlSummaryInput {
  crawlName: string;
  profileName: string;
  datasetPath: string;
  result: CrawlResult;
}

/**
 * Format a finished crawl.
 *
 * @example
 * ```
 * === Crawl Complete ===
 * Crawl:    south
 * Profile:  market
 * Dataset:  south.csv
 *
 * Results:
 *   Unique places:        42
 *   API calls:            120 (nearby 30, details 90)
 * ...
 * ```
 */
export function formatCrawlSummary(input: CrawlSummaryInput): string {
  const { result } = input;
  const stat = (key: string): number => result.stats[key] ?? 0;
  const nearby = stat('nearby_search_calls');
  const details = stat('place_details_calls');

  const lines: string[] = [
    chalk.bold('=== Crawl Complete ==='),
    `Crawl:    ${chalk.cyan(input.crawlName)}`,
    `Profile:  ${input.profileName}`,
    `Dataset:  ${input.datasetPath}`,
  ];
  if (result.resumed) {
    lines.push(chalk.yellow('Resumed from checkpoint'));
  }

  lines.push(
    '',
    'Results:',
    row('Unique places', result.records.length),
    row('Zones', result.completedZones.length),
    row('API calls', `${result.apiCalls} (nearby ${nearby}, details ${details})`),
    row('Filtered irrelevant', stat('filtered_irrelevant')),
    row('Duplicates skipped', stat('duplicates_skipped')),
    row('Known places skipped', stat('duplicates_avoided')),
    row('Search failures', stat('search_failures')),
    row('Detail failures', stat('detail_failures'))
  );

  if (result.records.length > 0) {
    lines.push(
      '',
      'By category:',
      ...rankedRows(countBy(result.records, (r) => r.category)),
      '',
      `Top ${TOP_SUB_CATEGORIES} sub-categories:`,
      ...rankedRows(countBy(result.records, (r) => r.subCategory), TOP_SUB_CATEGORIES)
    );
  }

  lines.push(
    '',
    `Estimated cost: ${formatCost(calculateCrawlCost(nearby, details).total)}`,
    '',
    formatGisInstructions(input.datasetPath)
  );

  return lines.join('\n');
}

/**
 * Format a merge report.
 */
export function formatMergeSummary(report: MergeReport, outputPath: string): string {
  const lines: string[] = [chalk.bold('=== Merge Complete ==='), `Output:   ${outputPath}`, '', 'Inputs:'];

  for (const input of report.inputs) {
    lines.push(row(input.source, `${input.records} records, ${input.overlap} overlapping`));
  }

  lines.push(
    '',
    row('Overlap dropped', report.overlap),
    row('Final size', report.finalSize),
    '',
    'By category:',
    ...rankedRows(report.byCategory)
  );

  return lines.join('\n');
}

/**
 * Format a pre-crawl estimate.
 */
export function formatEstimate(estimate: CrawlEstimate, zoneCount: number, queryCount: number): string {
  return [
    chalk.bold('=== Crawl Estimate ==='),
    row('Zones', zoneCount),
    row('Queries', queryCount),
    row('Searches', estimate.searches),
    row('Area covered', `${estimate.areaKm2.toFixed(1)} km2 (overlaps counted twice)`),
    row('Detail calls', `${estimate.detailCalls} (estimated)`),
    row('Total calls', estimate.totalCalls),
    row('Estimated cost', formatCost(estimate.cost.total)),
    chalk.dim('  Up to 3 result pages per search; actual calls depend on result density.'),
  ].join('\n');
}
