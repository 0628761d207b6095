/**
 * Stage Dependencies and Work Selection
 *
 * The stages have linear dependencies:
 * Music → Cover Image → Video
 *
 * A stage may leave `pending` only once every upstream stage is satisfied
 * (completed, or skipped by adopting an existing artifact).
 *
 * @module pipeline/dependencies
 */

import type { Entity } from '../schemas/entity.js';
import {
  isSatisfied,
  upstreamStages,
  type StageName,
  type StageStatus,
} from '../schemas/stage.js';

// ============================================================================
// Prerequisites
// ============================================================================

/**
 * Upstream stages of `stage` that the entity has not yet satisfied.
 */
export function unmetPrerequisites(entity: Entity, stage: StageName): StageName[] {
  return upstreamStages(stage).filter((upstream) => !isSatisfied(entity.stages[upstream]));
}

export function prerequisitesMet(entity: Entity, stage: StageName): boolean {
  return unmetPrerequisites(entity, stage).length === 0;
}

// ============================================================================
// Work Selection
// ============================================================================

/** Statuses picked up by a normal (non-forced) batch */
export const WORK_STATUSES: readonly StageStatus[] = ['pending', 'processing'];

export interface WorkSelection {
  /** Entities to drive through the stage, in order */
  work: Entity[];
  /** Entities already satisfied and left alone */
  satisfied: Entity[];
  /** Entities that need the stage but wait on an upstream stage */
  blocked: Entity[];
}

export interface SelectionOptions {
  force?: boolean;
  limit?: number;
}

/**
 * Partition entities for a stage batch.
 *
 * Without force, only pending and interrupted (processing) records are
 * picked; failed records wait for an explicit retry. With force, every
 * entity whose prerequisites are met is picked. `limit` caps the work list.
 */
export function selectWork(
  entities: readonly Entity[],
  stage: StageName,
  options: SelectionOptions = {}
): WorkSelection {
  const selection: WorkSelection = { work: [], satisfied: [], blocked: [] };

  for (const entity of entities) {
    const record = entity.stages[stage];

    if (!options.force && isSatisfied(record)) {
      selection.satisfied.push(entity);
      continue;
    }
    if (!options.force && !WORK_STATUSES.includes(record.status)) {
      continue;
    }
    if (!prerequisitesMet(entity, stage)) {
      selection.blocked.push(entity);
      continue;
    }
    selection.work.push(entity);
  }

  if (options.limit !== undefined && selection.work.length > options.limit) {
    selection.work = selection.work.slice(0, options.limit);
  }
  return selection;
}
