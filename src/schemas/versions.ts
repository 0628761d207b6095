/**
 * Schema Version Registry
 *
 * Every persisted document carries a schema_version field for migration support.
 * Each document type has an independent version number (simple integers).
 */

/**
 * Current schema versions for all persisted documents.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Entity store (entities.json) */
  entityStore: 1,
  /** Failure queue (failed_tasks.json) */
  failureQueue: 1,
  /** In-flight run checkpoint (checkpoint.json) */
  checkpoint: 1,
  /** Pipeline settings (config.json) */
  settings: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

/**
 * Get the current version for a schema type
 */
export function getCurrentVersion(schemaType: SchemaType): number {
  return SCHEMA_VERSIONS[schemaType];
}

export function isCurrentVersion(schemaType: SchemaType, version: number): boolean {
  return version === SCHEMA_VERSIONS[schemaType];
}
