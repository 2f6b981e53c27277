/**
 * Merge Report Schema
 *
 * Written beside a merged dataset so the reconciliation can be audited
 * without re-reading the inputs.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema } from './common.js';

const CountSchema = z.number().int().nonnegative();

/**
 * One input dataset, in merge order
 */
export const MergeInputSchema = z.object({
  /** File path or label of the dataset */
  source: z.string().min(1),
  /** Records read from the source */
  records: CountSchema,
  /** Records dropped because an earlier input already held their place_id */
  overlap: CountSchema,
});

export type MergeInput = z.infer<typeof MergeInputSchema>;

export const MergeReportSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.mergeReport),
  createdAt: ISO8601TimestampSchema,
  inputs: z.array(MergeInputSchema).min(1),
  /** Total records dropped as overlap */
  overlap: CountSchema,
  finalSize: CountSchema,
  /** Final records per category */
  byCategory: z.record(z.string(), CountSchema),
  /** Final records per "category/sub_category" */
  bySubCategory: z.record(z.string(), CountSchema),
});

export type MergeReport = z.infer<typeof MergeReportSchema>;
