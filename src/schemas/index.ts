/**
 * Zod Schemas for All Data Types
 *
 * Central export point for catalog, record, checkpoint and merge report
 * schemas.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  CoordinatesSchema,
  RadiusSchema,
  MAX_SEARCH_RADIUS_M,
  type ISO8601Timestamp,
  type Coordinates,
} from './common.js';

// ============================================================================
// Catalog
// ============================================================================

export {
  ZoneSchema,
  QuerySchema,
  ZONE_COLUMNS,
  QUERY_COLUMNS,
  OPTIONAL_QUERY_COLUMNS,
  type Zone,
  type Query,
} from './catalog.js';

// ============================================================================
// Records
// ============================================================================

export {
  PlaceRecordSchema,
  RECORD_COLUMNS,
  RECORD_COLUMN_NAMES,
  type PlaceRecord,
  type RecordColumn,
} from './record.js';

// ============================================================================
// Persisted State
// ============================================================================

export { CheckpointSchema, type Checkpoint } from './checkpoint.js';
export {
  MergeReportSchema,
  MergeInputSchema,
  type MergeReport,
  type MergeInput,
} from './merge-report.js';

// ============================================================================
// Migrations
// ============================================================================

export {
  migrateSchema,
  needsMigration,
  registerMigration,
  extractSchemaVersion,
  type Migration,
} from './migrations/index.js';
