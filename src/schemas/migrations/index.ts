/**
 * Schema Migration Framework
 *
 * Lazy migration on read - when loading data with an older schema version,
 * run the migration chain to bring it to the current version. The result is
 * still unvalidated; callers parse it with the matching zod schema.
 */

import { getCurrentVersion, type SchemaType } from '../versions.js';

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
 * @example
 * // If searchOutput v2 adds a required "provider" field:
 * registerMigration('searchOutput', 1, 2, (data) => ({
 *   ...(isRecord(data) ? data : {}),
 *   provider: 'maps',
 * }));
 */
const migrations: Map<MigrationKey, Migration> = new Map();

// ============================================================================
// Core Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract schema version from data, defaulting to 1 if not present
 */
export function extractSchemaVersion(data: unknown): number {
  if (!isRecord(data)) {
    return 1;
  }

  const version = data.schemaVersion;
  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }

  return 1;
}

/**
 * Check if migration is needed
 */
export function needsMigration(data: unknown, schemaType: SchemaType): boolean {
  return extractSchemaVersion(data) < getCurrentVersion(schemaType);
}

/**
 * Migrate data from its version to current.
 *
 * Versions without a registered migration are assumed forward-compatible.
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  const current = getCurrentVersion(schemaType);
  let version = extractSchemaVersion(data);
  let migrated = data;

  while (version < current) {
    const migration = migrations.get(`${schemaType}:${version}:${version + 1}`);
    if (migration) {
      migrated = migration(migrated);
    }
    version++;
  }

  if (isRecord(migrated) && extractSchemaVersion(data) < current) {
    return { ...migrated, schemaVersion: current };
  }
  return migrated;
}

/**
 * Register a new migration
 *
 * @throws Error if the step is not exactly one version or already registered
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

export function hasMigration(schemaType: SchemaType, fromVersion: number, toVersion: number): boolean {
  return migrations.has(`${schemaType}:${fromVersion}:${toVersion}`);
}

/**
 * Parse JSON text and migrate it to the current version.
 */
export function loadAndMigrate(json: string, schemaType: SchemaType): unknown {
  const data: unknown = JSON.parse(json);
  return migrateSchema(data, schemaType);
}
