/**
 * Checkpoint Schema
 *
 * Serialized form of crawl progress. Zones are the unit of checkpointing:
 * a checkpoint always reflects a state between two zones.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema } from './common.js';
import { PlaceRecordSchema } from './record.js';

export const CheckpointSchema = z
  .object({
    schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.checkpoint),

    /** Fingerprint of the zone and query catalog the crawl runs over */
    catalogHash: z.string().min(1),

    /** When the checkpoint was written */
    savedAt: ISO8601TimestampSchema,

    /** Fully processed zone names, in completion order */
    completedZones: z.array(z.string().min(1)),

    /** Records keyed by place_id */
    records: z.record(z.string(), PlaceRecordSchema),

    /** Named run counters */
    stats: z.record(z.string(), z.number().int().nonnegative()),

    /** Provider calls made so far */
    apiCalls: z.number().int().nonnegative(),
  })
  .superRefine((checkpoint, ctx) => {
    if (new Set(checkpoint.completedZones).size !== checkpoint.completedZones.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['completedZones'],
        message: 'completedZones must not repeat a zone',
      });
    }
    for (const [key, record] of Object.entries(checkpoint.records)) {
      if (key !== record.placeId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['records', key],
          message: `record key does not match placeId "${record.placeId}"`,
        });
      }
    }
  });

export type Checkpoint = z.infer<typeof CheckpointSchema>;
