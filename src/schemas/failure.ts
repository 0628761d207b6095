/**
 * Failure Queue Schemas
 *
 * @module schemas/failure
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { EntityIdSchema, ErrorKindSchema, ISO8601TimestampSchema } from './common.js';
import { StageNameSchema } from './stage.js';

/**
 * A terminally failed (entity, stage) pair awaiting operator retry.
 */
export const FailedTaskSchema = z.object({
  entity_id: EntityIdSchema,
  stage: StageNameSchema,
  failed_at: ISO8601TimestampSchema,
  error_kind: ErrorKindSchema,
  error_message: z.string(),
  attempt_count: z.number().int().nonnegative(),
});

export type FailedTask = z.infer<typeof FailedTaskSchema>;

export const FailureQueueFileSchema = z
  .object({
    schema_version: z.number().int().positive(),
    failed_tasks: z.array(FailedTaskSchema),
    last_updated: ISO8601TimestampSchema.nullable(),
  })
  .refine(
    (file) =>
      new Set(file.failed_tasks.map((t) => `${t.entity_id}\u0000${t.stage}`)).size ===
      file.failed_tasks.length,
    { message: 'At most one failed task per (entity, stage)', path: ['failed_tasks'] }
  );

export type FailureQueueFile = z.infer<typeof FailureQueueFileSchema>;

export function createEmptyFailureQueueFile(): FailureQueueFile {
  return {
    schema_version: SCHEMA_VERSIONS.failureQueue,
    failed_tasks: [],
    last_updated: null,
  };
}
