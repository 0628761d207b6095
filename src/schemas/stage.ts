/**
 * Stage Schemas
 *
 * The three pipeline stages, their fixed order, and the per-stage status
 * record stored on every entity.
 *
 * @module schemas/stage
 */

import { z } from 'zod';
import { ISO8601TimestampSchema } from './common.js';

// ============================================================================
// Stage Names
// ============================================================================

/**
 * Stages in execution order. Never reordered.
 */
export const STAGE_ORDER = ['music', 'image', 'video'] as const;

export const StageNameSchema = z.enum(STAGE_ORDER);

export type StageName = z.infer<typeof StageNameSchema>;

/**
 * Human-readable labels for each stage.
 */
export const STAGE_LABELS: Record<StageName, string> = {
  music: 'Music',
  image: 'Cover Image',
  video: 'Video',
};

/**
 * Type guard for stage names coming from untyped input (CLI arguments, JSON).
 */
export function isStageName(value: string): value is StageName {
  return StageNameSchema.safeParse(value).success;
}

/**
 * Stages that must be satisfied before the given stage may run.
 */
export function upstreamStages(stage: StageName): StageName[] {
  return STAGE_ORDER.slice(0, STAGE_ORDER.indexOf(stage));
}

// ============================================================================
// Stage Status
// ============================================================================

export const STAGE_STATUSES = ['pending', 'processing', 'completed', 'failed', 'skipped'] as const;

export const StageStatusSchema = z.enum(STAGE_STATUSES);

export type StageStatus = z.infer<typeof StageStatusSchema>;

/**
 * Statuses under which a stage counts as done for downstream stages.
 * A skipped stage adopted an artifact that already existed.
 */
export const SATISFIED_STATUSES: readonly StageStatus[] = ['completed', 'skipped'];

// ============================================================================
// Stage Record
// ============================================================================

/**
 * Per-entity, per-stage progress record.
 */
export const StageRecordSchema = z.object({
  status: StageStatusSchema,
  /** Artifact produced or adopted by this stage */
  artifact_path: z.string().min(1).nullable(),
  /** Retries consumed in the current failure episode */
  attempt_count: z.number().int().nonnegative(),
  /** Opaque stage payload (prompt, style, duration, ...) */
  metadata: z.record(z.unknown()),
  completed_at: ISO8601TimestampSchema.nullable(),
});

export type StageRecord = z.infer<typeof StageRecordSchema>;

/**
 * Create a fresh pending stage record.
 */
export function createStageRecord(metadata: Record<string, unknown> = {}): StageRecord {
  return {
    status: 'pending',
    artifact_path: null,
    attempt_count: 0,
    metadata,
    completed_at: null,
  };
}

export function isSatisfied(record: StageRecord): boolean {
  return SATISFIED_STATUSES.includes(record.status);
}
