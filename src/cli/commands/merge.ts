/**
 * Merge Command
 *
 * Reconciles datasets from separate crawls into one file. The first
 * dataset wins every overlap.
 *
 * @module cli/commands/merge
 */

import type { Command } from 'commander';
import { readDataset, writeDataset } from '../../dataset/csv.js';
import { PersistenceError, errorMessage } from '../../errors/index.js';
import { mergeAll, type LabelledDataset } from '../../reconcile/reconciler.js';
import type { MergeReport } from '../../schemas/merge-report.js';
import { atomicWriteJson } from '../../storage/atomic.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatMergeSummary } from '../formatters/summary.js';

export interface MergeCommandOptions {
  output: string;
  /** Write the merge report as JSON here */
  report?: string;
}

export function registerMergeCommand(program: Command): void {
  program
    .command('merge <primary> <secondary...>')
    .description('Merge datasets, keeping the first copy of every place')
    .requiredOption('-o, --output <csv>', 'Merged dataset path')
    .option('-r, --report <json>', 'Also write a JSON merge report')
    .action(async (primary: string, secondary: string[], options: MergeCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      base.exitWith(await handleMerge([primary, ...secondary], options, base));
    });
}

/**
 * @throws PersistenceError if the report cannot be written
 */
async function writeReport(filePath: string, report: MergeReport): Promise<void> {
  try {
    await atomicWriteJson(filePath, report);
  } catch (error) {
    throw new PersistenceError(`Failed to write merge report: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }
}

/**
 * Run the merge command.
 *
 * @param inputs - Dataset paths, primary first
 * @returns Exit code
 */
export async function handleMerge(
  inputs: readonly string[],
  options: MergeCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  try {
    const logger = base.createLogger();
    const datasets: LabelledDataset[] = [];

    for (const source of inputs) {
      const { records, duplicatesDropped } = await readDataset(source, logger);
      if (duplicatesDropped > 0) {
        base.warn(`${source}: dropped ${duplicatesDropped} repeated place_id row(s)`);
      }
      datasets.push({ source, records });
    }

    const { records, report } = mergeAll(datasets, { logger });
    await writeDataset(options.output, records);
    if (options.report) {
      await writeReport(options.report, report);
    }

    base.info(formatMergeSummary(report, options.output));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return base.reportError(error);
  }
}
