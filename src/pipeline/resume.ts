/**
 * Resume Logic
 *
 * Turns a checkpoint left by an interrupted run into the plan for
 * continuing it.
 *
 * @module pipeline/resume
 */

import type { Checkpoint } from '../schemas/checkpoint.js';
import type { StageName } from '../schemas/stage.js';

export interface ResumePlan {
  /** Stage the interrupted run was in */
  stage: StageName;
  /** Entities still to process in that stage, in original order */
  pendingIds: string[];
  /** Entities the interrupted run already finished in that stage */
  completedIds: string[];
  /** Stages left to run, starting with `stage` */
  stages: StageName[];
}

/**
 * Entities still owed work: (pending ∪ {current}) − completed, order kept,
 * with the in-flight entity first.
 */
export function derivePendingIds(checkpoint: Checkpoint): string[] {
  const completed = new Set(checkpoint.completed_ids);
  const ordered =
    checkpoint.current_entity_id === null
      ? checkpoint.pending_ids
      : [checkpoint.current_entity_id, ...checkpoint.pending_ids];

  return [...new Set(ordered)].filter((id) => !completed.has(id));
}

export function createResumePlan(checkpoint: Checkpoint): ResumePlan {
  const scopeStages = checkpoint.run.stages;
  const from = scopeStages.indexOf(checkpoint.current_stage);

  return {
    stage: checkpoint.current_stage,
    pendingIds: derivePendingIds(checkpoint),
    completedIds: [...checkpoint.completed_ids],
    stages: from >= 0 ? scopeStages.slice(from) : [checkpoint.current_stage],
  };
}
