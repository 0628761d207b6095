/**
 * Schema Migration Framework
 *
 * Lazy migration on read - when loading a document with an older
 * schema_version, run the migration chain to bring it to the current version.
 * Also home of the atomic JSON writer shared by every persisted document.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SCHEMA_VERSIONS, type SchemaType } from '../versions.js';
import { isRecord } from '../common.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Migration function type
 * Takes data at version N and returns data at version N+1
 */
export type Migration = (data: Record<string, unknown>) => Record<string, unknown>;

/**
 * Migration registry key format: "schemaType:fromVersion:toVersion"
 */
type MigrationKey = `${SchemaType}:${number}:${number}`;

/**
 * Where each document keeps its version. The entity store nests it under
 * `metadata`, the others keep it at the top level.
 */
const VERSION_LOCATION: Record<SchemaType, 'root' | 'metadata'> = {
  entityStore: 'metadata',
  failureQueue: 'root',
  checkpoint: 'root',
  settings: 'root',
};

// ============================================================================
// Migration Registry
// ============================================================================

/**
 * Register migrations here when making breaking schema changes.
 *
 * @example
 * // If failure queue v2 adds a required "operator_note" field:
 * registerMigration('failureQueue', 1, 2, (data) => ({
 *   ...data,
 *   failed_tasks: ...,
 * }));
 */
const migrations: Map<MigrationKey, Migration> = new Map();

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Read the schema version of a raw document, defaulting to 1 when absent.
 */
export function extractSchemaVersion(data: unknown, schemaType: SchemaType): number {
  if (!isRecord(data)) {
    return 1;
  }
  const holder = VERSION_LOCATION[schemaType] === 'metadata' ? data['metadata'] : data;
  const version = isRecord(holder) ? holder['schema_version'] : undefined;

  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }
  return 1;
}

export function needsMigration(data: unknown, schemaType: SchemaType): boolean {
  return extractSchemaVersion(data, schemaType) < SCHEMA_VERSIONS[schemaType];
}

/**
 * Migrate raw data from its version to current. Non-object input is
 * returned untouched so that schema validation reports it.
 *
 * @example
 * const raw: unknown = JSON.parse(content);
 * const file = FailureQueueFileSchema.parse(migrateSchema(raw, 'failureQueue'));
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  if (!isRecord(data)) {
    return data;
  }

  const current = SCHEMA_VERSIONS[schemaType];
  let version = extractSchemaVersion(data, schemaType);
  if (version >= current) {
    return data;
  }

  let migrated: Record<string, unknown> = data;
  while (version < current) {
    const migration = migrations.get(`${schemaType}:${version}:${version + 1}`);
    if (migration) {
      migrated = migration(migrated);
    }
    // No registered migration: forward-compatible change (new optional fields)
    version++;
  }

  if (VERSION_LOCATION[schemaType] === 'metadata') {
    const metadata = isRecord(migrated['metadata']) ? migrated['metadata'] : {};
    return { ...migrated, metadata: { ...metadata, schema_version: current } };
  }
  return { ...migrated, schema_version: current };
}

/**
 * Register a new migration
 *
 * @throws Error if the step is not exactly one version or is already registered
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

// ============================================================================
// Atomic Write
// ============================================================================

/**
 * Atomically write JSON data to a file
 *
 * Uses temp file + rename pattern: readers see either the previous file or
 * the new one, never a partial write.
 *
 * Note: If the process crashes between temp file creation and rename,
 * orphaned .tmp.* files may remain in the target directory.
 *
 * @param filePath - Target file path
 * @param data - Data to write (will be JSON.stringify'd)
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.unlink(tempPath).catch(() => undefined);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}
