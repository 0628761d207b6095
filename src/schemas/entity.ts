/**
 * Entity Schemas
 *
 * An entity is one unit of work (a track) moving through every stage.
 * The entity store file maps entity ids to entities.
 *
 * @module schemas/entity
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { EntityIdSchema, ErrorKindSchema, ISO8601TimestampSchema } from './common.js';
import { StageNameSchema, StageRecordSchema, createStageRecord, type StageName } from './stage.js';

// ============================================================================
// Error History
// ============================================================================

/** Maximum number of error history entries kept per entity */
export const MAX_ERROR_HISTORY = 10;

export const ErrorHistoryEntrySchema = z.object({
  timestamp: ISO8601TimestampSchema,
  stage: StageNameSchema,
  kind: ErrorKindSchema,
  message: z.string(),
});

export type ErrorHistoryEntry = z.infer<typeof ErrorHistoryEntrySchema>;

/**
 * Append an entry and evict the oldest beyond the bound.
 */
export function appendErrorHistory(
  history: readonly ErrorHistoryEntry[],
  entry: ErrorHistoryEntry
): ErrorHistoryEntry[] {
  return [...history, entry].slice(-MAX_ERROR_HISTORY);
}

// ============================================================================
// Entity
// ============================================================================

export const EntityStagesSchema = z.object({
  music: StageRecordSchema,
  image: StageRecordSchema,
  video: StageRecordSchema,
});

export type EntityStages = z.infer<typeof EntityStagesSchema>;

export const EntitySchema = z.object({
  id: EntityIdSchema,
  stages: EntityStagesSchema,
  error_history: z.array(ErrorHistoryEntrySchema).max(MAX_ERROR_HISTORY),
  created_at: ISO8601TimestampSchema,
  updated_at: ISO8601TimestampSchema,
});

export type Entity = z.infer<typeof EntitySchema>;

/**
 * Build a new entity with every stage pending.
 *
 * @param id - Entity id
 * @param stageMetadata - Initial metadata per stage (prompt, title, style...)
 * @param now - Creation timestamp
 */
export function createEntity(
  id: string,
  stageMetadata: Partial<Record<StageName, Record<string, unknown>>> = {},
  now: string = new Date().toISOString()
): Entity {
  return EntitySchema.parse({
    id,
    stages: {
      music: createStageRecord(stageMetadata.music),
      image: createStageRecord(stageMetadata.image),
      video: createStageRecord(stageMetadata.video),
    },
    error_history: [],
    created_at: now,
    updated_at: now,
  });
}

// ============================================================================
// Store File
// ============================================================================

export const EntityStoreMetadataSchema = z.object({
  total_entities: z.number().int().nonnegative(),
  last_updated: ISO8601TimestampSchema.nullable(),
  schema_version: z.number().int().positive(),
});

export const EntityStoreFileSchema = z
  .object({
    entities: z.record(EntitySchema),
    metadata: EntityStoreMetadataSchema,
  })
  .refine(
    (file) => Object.entries(file.entities).every(([key, entity]) => key === entity.id),
    { message: 'Entity keys must match entity ids', path: ['entities'] }
  );

export type EntityStoreFile = z.infer<typeof EntityStoreFileSchema>;

export function createEmptyStoreFile(): EntityStoreFile {
  return {
    entities: {},
    metadata: {
      total_entities: 0,
      last_updated: null,
      schema_version: SCHEMA_VERSIONS.entityStore,
    },
  };
}
