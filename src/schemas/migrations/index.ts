/**
 * Schema Migration Framework
 *
 * Lazy migration on read - when loading data with an older schema version,
 * run the migration chain to bring it to the current version.
 */

import { SCHEMA_VERSIONS, type SchemaType } from '../versions.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Migration function type
 * Takes data at version N and returns data at version N+1
 */
export type Migration = (data: unknown) => unknown;

/**
 * Migration registry key format: "schemaType:fromVersion:toVersion"
 */
type MigrationKey = `${SchemaType}:${number}:${number}`;

// ============================================================================
// Migration Registry
// ============================================================================

/**
 * Register migrations when making breaking schema changes.
 *
 * @example
 * // If checkpoint v2 adds a required "profile" field:
 * registerMigration('checkpoint', 1, 2, (data) => ({
 *   ...(data as object),
 *   profile: 'market',
 * }));
 */
const migrations: Map<MigrationKey, Migration> = new Map();

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Check if migration is needed
 *
 * @param data - Raw parsed JSON data
 * @param schemaType - The type of schema
 * @returns true if data version is older than current
 */
export function needsMigration(data: unknown, schemaType: SchemaType): boolean {
  return extractSchemaVersion(data) < SCHEMA_VERSIONS[schemaType];
}

/**
 * Migrate data from its version to current.
 *
 * Versions without a registered migration are assumed forward-compatible
 * (new optional fields only). Data from a newer version is returned as-is
 * and left for schema validation to reject.
 *
 * @param data - Raw parsed JSON data
 * @param schemaType - The type of schema
 * @returns Migrated data at current version
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  const current = SCHEMA_VERSIONS[schemaType];
  let version = extractSchemaVersion(data);
  let migrated = data;

  if (version >= current) {
    return migrated;
  }

  while (version < current) {
    const migration = migrations.get(`${schemaType}:${version}:${version + 1}`);
    if (migration) {
      migrated = migration(migrated);
    }
    version++;
  }

  if (typeof migrated === 'object' && migrated !== null) {
    return { ...migrated, schemaVersion: current };
  }

  return migrated;
}

/**
 * Register a new migration
 *
 * @param schemaType - The schema type this migration applies to
 * @param fromVersion - Source version
 * @param toVersion - Target version (must be fromVersion + 1)
 * @param migration - Migration function
 */
export function registerMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number,
  migration: Migration
): void {
  if (toVersion !== fromVersion + 1) {
    throw new Error(`Migration must increment version by 1. Got ${fromVersion} -> ${toVersion}`);
  }

  const key: MigrationKey = `${schemaType}:${fromVersion}:${toVersion}`;

  if (migrations.has(key)) {
    throw new Error(`Migration already registered for ${key}`);
  }

  migrations.set(key, migration);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract schema version from data, defaulting to 1 if not present
 */
export function extractSchemaVersion(data: unknown): number {
  if (typeof data !== 'object' || data === null || !('schemaVersion' in data)) {
    return 1;
  }

  const version = data.schemaVersion;

  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }

  return 1; // Default to version 1 for legacy data
}
