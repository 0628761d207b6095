/**
 * Checkpoint Schema
 *
 * Singleton record of an in-flight run. Its presence at startup means the
 * previous run did not finish cleanly.
 *
 * @module schemas/checkpoint
 */

import { z } from 'zod';
import { EntityIdSchema, ISO8601TimestampSchema } from './common.js';
import { StageNameSchema } from './stage.js';

/**
 * The scope of the run that owns the checkpoint, replayed on resume.
 */
export const RunScopeSchema = z.object({
  mode: z.enum(['pipeline', 'stage']),
  stages: z.array(StageNameSchema).min(1),
  force: z.boolean(),
  limit: z.number().int().positive().nullable(),
});

export type RunScope = z.infer<typeof RunScopeSchema>;

export const CheckpointSchema = z.object({
  schema_version: z.number().int().positive(),
  is_running: z.boolean(),
  started_at: ISO8601TimestampSchema,
  current_stage: StageNameSchema,
  current_entity_id: EntityIdSchema.nullable(),
  completed_ids: z.array(EntityIdSchema),
  pending_ids: z.array(EntityIdSchema),
  last_updated: ISO8601TimestampSchema,
  run: RunScopeSchema,
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;
