/**
 * Artifact Reconciliation
 *
 * Finds satisfied stages whose artifact is gone from disk and applies the
 * configured action:
 * - `warn`: report only
 * - `remove`: delete the entity and its failure queue entries
 * - `mark_missing`: reset the stage to pending so the next run regenerates it
 *
 * @module reconcile
 */

import { EntityNotFoundError } from '../pipeline/errors.js';
import type { PipelineContext } from '../pipeline/context.js';
import type { MissingArtifactAction } from '../schemas/settings.js';
import {
  STAGE_ORDER,
  createStageRecord,
  isSatisfied,
  type StageName,
  type StageStatus,
} from '../schemas/stage.js';
import { fileExists } from '../storage/atomic.js';
import type { EntityStore } from '../storage/entity-store.js';

// ============================================================================
// Types
// ============================================================================

export interface MissingArtifact {
  entityId: string;
  stage: StageName;
  status: StageStatus;
  artifactPath: string;
}

export interface ReconcileReport {
  action: MissingArtifactAction;
  missing: MissingArtifact[];
  /** Entities deleted by `remove` */
  removedEntities: string[];
  /** Stages reset by `mark_missing` */
  resetStages: number;
}

export type ReconcileContext = Pick<PipelineContext, 'store' | 'failures' | 'logger'>;

// ============================================================================
// Detection
// ============================================================================

/**
 * Satisfied stages whose recorded artifact no longer exists, in store order.
 */
export async function findMissingArtifacts(store: EntityStore): Promise<MissingArtifact[]> {
  const missing: MissingArtifact[] = [];

  for (const entity of await store.list()) {
    for (const stage of STAGE_ORDER) {
      const record = entity.stages[stage];
      if (!isSatisfied(record) || record.artifact_path === null) {
        continue;
      }
      if (!(await fileExists(record.artifact_path))) {
        missing.push({
          entityId: entity.id,
          stage,
          status: record.status,
          artifactPath: record.artifact_path,
        });
      }
    }
  }

  return missing;
}

// ============================================================================
// Actions
// ============================================================================

export async function reconcileArtifacts(
  ctx: ReconcileContext,
  action: MissingArtifactAction
): Promise<ReconcileReport> {
  const missing = await findMissingArtifacts(ctx.store);
  const report: ReconcileReport = { action, missing, removedEntities: [], resetStages: 0 };

  for (const item of missing) {
    ctx.logger.warn(`${item.entityId}: ${item.stage} artifact is missing: ${item.artifactPath}`);
  }

  if (action === 'remove') {
    const ids = [...new Set(missing.map((item) => item.entityId))];
    for (const id of ids) {
      if (await ctx.store.delete(id)) {
        await ctx.failures.removeEntity(id);
        report.removedEntities.push(id);
        ctx.logger.info(`Removed ${id}`);
      }
    }
  } else if (action === 'mark_missing') {
    for (const item of missing) {
      await ctx.store.upsert(item.entityId, (current) => {
        if (current === null) {
          throw new EntityNotFoundError(item.entityId);
        }
        const record = current.stages[item.stage];
        if (record.artifact_path !== item.artifactPath) {
          return current;
        }
        current.stages[item.stage] = createStageRecord({
          ...record.metadata,
          missing_artifact: item.artifactPath,
        });
        return current;
      });
      report.resetStages++;
      ctx.logger.info(`Reset ${item.entityId} ${item.stage} to pending`);
    }
  }

  return report;
}
