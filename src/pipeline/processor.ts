/**
 * Stage Processor
 *
 * Drives one entity through one stage: skip logic, the capability call,
 * retries per the retry policy, and the resulting store updates.
 *
 * Side effects are confined to the entity store and the failure queue.
 * The processor never touches the checkpoint.
 *
 * Status transitions:
 * ```
 * pending ──> processing ──> completed
 *    │            │  ▲
 *    │            │  └── retry (attempt_count + 1)
 *    │            └────> failed ──> processing (retry command)
 *    └── artifact exists ──> skipped
 * ```
 *
 * @module pipeline/processor
 */

import { setTimeout as timersSetTimeout } from 'node:timers/promises';
import { appendErrorHistory, type Entity } from '../schemas/entity.js';
import { isSatisfied, type StageName } from '../schemas/stage.js';
import type { EntityStore } from '../storage/entity-store.js';
import type { FailureQueue } from '../storage/failure-queue.js';
import { unmetPrerequisites } from './dependencies.js';
import {
  CapabilityError,
  EntityNotFoundError,
  PrerequisiteNotMetError,
  describeFailure,
} from './errors.js';
import type { EventChannel } from './events.js';
import type { RetryPolicy } from './retry-policy.js';
import type {
  CapabilityContext,
  CapabilityResult,
  Logger,
  SleepFn,
  StageCapability,
  StageResult,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface StageProcessorDeps {
  store: EntityStore;
  failures: FailureQueue;
  retryPolicy: RetryPolicy;
  events: EventChannel;
  logger: Logger;
  dataDir: string;
  sleep?: SleepFn;
  now?: () => Date;
}

export interface ProcessOptions {
  /** Re-run a stage that is already satisfied */
  force?: boolean;
  /** Cancels retry waits; the capability call itself is never interrupted */
  signal?: AbortSignal;
}

/**
 * Default cancellable sleep.
 */
export const defaultSleep: SleepFn = async (ms, signal) => {
  await timersSetTimeout(ms, undefined, { signal });
};

// ============================================================================
// Stage Processor
// ============================================================================

export class StageProcessor {
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(private readonly deps: StageProcessorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Process one entity through one stage.
   *
   * @throws EntityNotFoundError if the entity does not exist
   * @throws PrerequisiteNotMetError if an upstream stage is not satisfied
   */
  async process(
    entityId: string,
    stage: StageName,
    capability: StageCapability,
    options: ProcessOptions = {}
  ): Promise<StageResult> {
    const { store, failures, logger } = this.deps;
    const force = options.force ?? false;

    const entity = await store.get(entityId);
    if (entity === null) {
      throw new EntityNotFoundError(entityId);
    }

    const missing = unmetPrerequisites(entity, stage);
    if (missing.length > 0) {
      throw new PrerequisiteNotMetError(entityId, stage, missing);
    }

    const record = entity.stages[stage];
    if (!force && isSatisfied(record)) {
      return {
        outcome: 'skipped',
        entityId,
        stage,
        reason: 'already_satisfied',
        artifactPath: record.artifact_path,
      };
    }

    const context: CapabilityContext = { dataDir: this.deps.dataDir, logger };

    if (!force && record.status === 'pending' && capability.findExisting) {
      const existing = await this.findExisting(capability, entity, context);
      if (existing !== null) {
        await store.upsert(entityId, (current) => {
          const next = requireEntity(current, entityId);
          const r = next.stages[stage];
          r.status = 'skipped';
          r.artifact_path = existing;
          r.attempt_count = 0;
          r.completed_at = this.now().toISOString();
          return next;
        });
        await failures.remove(entityId, stage);
        logger.debug(`${stage}: adopted existing artifact for ${entityId}: ${existing}`);
        return { outcome: 'skipped', entityId, stage, reason: 'artifact_exists', artifactPath: existing };
      }
    }

    // Enter the episode. An interrupted episode keeps its retry count.
    let current = await store.upsert(entityId, (value) => {
      const next = requireEntity(value, entityId);
      const r = next.stages[stage];
      if (r.status !== 'processing') {
        r.attempt_count = 0;
      }
      r.status = 'processing';
      return next;
    });

    let retries = current.stages[stage].attempt_count;
    let waitedMs = 0;

    for (;;) {
      // Only the capability call is classified; store errors propagate.
      const attempt = await this.attempt(capability, current, context);

      if (attempt.ok) {
        const { result } = attempt;
        await store.upsert(entityId, (value) => {
          const next = requireEntity(value, entityId);
          const r = next.stages[stage];
          r.status = 'completed';
          r.artifact_path = result.artifactPath;
          r.attempt_count = 0;
          r.completed_at = this.now().toISOString();
          r.metadata = { ...r.metadata, ...result.metadata };
          return next;
        });
        await failures.remove(entityId, stage);

        return { outcome: 'generated', entityId, stage, artifactPath: result.artifactPath, retries };
      }

      const failure = attempt.error;
      const { kind, message } = describeFailure(failure);
      const retryAfterMs = failure instanceof CapabilityError ? (failure.retryAfterMs ?? 0) : 0;
      const decision = this.deps.retryPolicy.decide(kind, retries, waitedMs, retryAfterMs);

      if (decision.action === 'give_up') {
        logger.warn(`${stage} failed for ${entityId} (${kind}): ${message}; ${decision.reason}`);
        const attemptCount = retries;
        await store.upsert(entityId, (value) => {
          const next = requireEntity(value, entityId);
          next.stages[stage].status = 'failed';
          next.stages[stage].attempt_count = attemptCount;
          next.error_history = appendErrorHistory(next.error_history, {
            timestamp: this.now().toISOString(),
            stage,
            kind,
            message,
          });
          return next;
        });
        await failures.add(entityId, stage, message, { kind, attemptCount });

        return {
          outcome: 'failed',
          entityId,
          stage,
          terminal: true,
          errorKind: kind,
          errorMessage: message,
          retries,
        };
      }

      const { delayMs } = decision;
      retries++;
      const attemptCount = retries;
      current = await store.upsert(entityId, (value) => {
        const next = requireEntity(value, entityId);
        next.stages[stage].attempt_count = attemptCount;
        return next;
      });

      this.deps.events.emit({
        type: 'entity:retry',
        stage,
        entityId,
        kind,
        message,
        attempt: retries,
        delayMs,
      });
      logger.debug(`${stage} retry ${retries} for ${entityId} in ${delayMs}ms (${kind}: ${message})`);

      try {
        await this.sleep(delayMs, options.signal);
      } catch (error) {
        if (options.signal?.aborted) {
          return { outcome: 'cancelled', entityId, stage };
        }
        throw error;
      }
      waitedMs += delayMs;
    }
  }

  private async attempt(
    capability: StageCapability,
    entity: Entity,
    context: CapabilityContext
  ): Promise<{ ok: true; result: CapabilityResult } | { ok: false; error: unknown }> {
    try {
      return { ok: true, result: await capability.execute(entity, context) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private async findExisting(
    capability: StageCapability,
    entity: Entity,
    context: CapabilityContext
  ): Promise<string | null> {
    if (!capability.findExisting) {
      return null;
    }
    try {
      return await capability.findExisting(entity, context);
    } catch (error) {
      this.deps.logger.warn(
        `${capability.stage}: could not check for an existing artifact of ${entity.id}: ` +
          describeFailure(error).message
      );
      return null;
    }
  }
}

function requireEntity(entity: Entity | null, entityId: string): Entity {
  if (entity === null) {
    throw new EntityNotFoundError(entityId);
  }
  return entity;
}
