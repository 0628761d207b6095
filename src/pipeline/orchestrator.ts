/**
 * Pipeline Orchestrator
 *
 * Top-level coordinator. Enforces the stage order, drives batches of
 * entities through the stage processor, keeps the checkpoint current and
 * aggregates results into run reports.
 *
 * Key behaviors:
 * - Per-entity failures never abort a batch; only preflight problems
 *   (missing capability, failed health check, corrupt store) do
 * - Cancellation is observed between entities; the checkpoint survives it
 * - The checkpoint is cleared only after every stage in scope finished
 * - A pending checkpoint blocks new runs until resumed or discarded
 *
 * @module pipeline/orchestrator
 */

import type { Checkpoint, RunScope } from '../schemas/checkpoint.js';
import type { Entity } from '../schemas/entity.js';
import { STAGE_ORDER, isSatisfied, type StageName } from '../schemas/stage.js';
import type { EntityStatistics } from '../storage/entity-store.js';
import { StoreCorruptError, StoreLockError } from '../storage/errors.js';
import type { FailureSummary } from '../storage/failure-queue.js';
import type { PipelineContext } from './context.js';
import { prerequisitesMet, selectWork } from './dependencies.js';
import {
  EntityNotFoundError,
  FatalPipelineError,
  PrerequisiteNotMetError,
} from './errors.js';
import { estimateRemainingMs, type EventListener } from './events.js';
import { EntityPool } from './pool.js';
import { StageProcessor } from './processor.js';
import { createResumePlan, type ResumePlan } from './resume.js';
import type {
  BatchOptions,
  DryRunPlan,
  DryRunStagePlan,
  HealthStatus,
  RetryOptions,
  RetryReport,
  RunOptions,
  RunReport,
  RunStatus,
  StageCapability,
  StageReport,
  StageResult,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineStatus {
  statistics: EntityStatistics;
  failures: FailureSummary;
  /** Checkpoint of an unfinished run, if any */
  checkpoint: Checkpoint | null;
}

type ReportExtras = Pick<RunReport, 'fatalError' | 'checkpoint' | 'plan'>;

// ============================================================================
// Pipeline Orchestrator
// ============================================================================

/**
 * @example
 * ```typescript
 * const ctx = createPipelineContext({ dataDir, capabilities });
 * const orchestrator = new PipelineOrchestrator(ctx);
 *
 * const report = await orchestrator.run({ limit: 10 });
 * if (report.status === 'resume_required') {
 *   await orchestrator.resume();
 * }
 * ```
 */
export class PipelineOrchestrator {
  private readonly processor: StageProcessor;

  constructor(private readonly ctx: PipelineContext) {
    this.processor = new StageProcessor({
      store: ctx.store,
      failures: ctx.failures,
      retryPolicy: ctx.retryPolicy,
      events: ctx.events,
      logger: ctx.logger,
      dataDir: ctx.dataDir,
      sleep: ctx.sleep,
      now: ctx.now,
    });
  }

  /**
   * Register a progress listener.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: EventListener): () => void {
    return this.ctx.events.subscribe(listener);
  }

  // ==========================================================================
  // Runs
  // ==========================================================================

  /**
   * Run every stage in order, minus the ones flagged in `options.skip`.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const stages = STAGE_ORDER.filter((stage) => options.skip?.[stage] !== true);
    return this.start(
      { mode: 'pipeline', stages, force: options.force ?? false, limit: options.limit ?? null },
      options
    );
  }

  /**
   * Run a single stage. The report's `stages` holds exactly that stage.
   */
  async runStage(stage: StageName, options: BatchOptions & { resume?: boolean } = {}): Promise<RunReport> {
    return this.start(
      { mode: 'stage', stages: [stage], force: options.force ?? false, limit: options.limit ?? null },
      options
    );
  }

  /**
   * Continue the run recorded in the checkpoint: its stage first, with the
   * entities it still owed, then the remaining stages of its scope.
   * Force and limit come from the checkpoint.
   */
  async resume(options: Pick<BatchOptions, 'concurrency' | 'signal'> = {}): Promise<RunReport> {
    const startedAt = this.ctx.now();
    const checkpoint = await this.ctx.checkpoints.load();
    if (checkpoint === null) {
      return this.buildReport('no_checkpoint', startedAt, [], false);
    }

    const plan = createResumePlan(checkpoint);
    this.ctx.logger.info(
      `Resuming ${checkpoint.run.mode} run from ${plan.stage}: ` +
        `${plan.completedIds.length} done, ${plan.pendingIds.length} remaining`
    );

    return this.execute(checkpoint.run, options, plan, startedAt, checkpoint.started_at);
  }

  private async start(scope: RunScope, options: RunOptions): Promise<RunReport> {
    const startedAt = this.ctx.now();

    if (scope.stages.length === 0) {
      return this.buildReport('completed', startedAt, [], false);
    }

    if (options.dryRun) {
      const plan = await this.plan(scope.stages, { force: scope.force, limit: scope.limit ?? undefined });
      return this.buildReport('dry_run', startedAt, [], false, { plan });
    }

    const checkpoint = await this.ctx.checkpoints.load();
    if (checkpoint !== null) {
      if (options.resume) {
        return this.resume(options);
      }
      return this.buildReport('resume_required', startedAt, [], false, { checkpoint });
    }

    return this.execute(scope, options, null, startedAt);
  }

  private async execute(
    scope: RunScope,
    options: Pick<BatchOptions, 'concurrency' | 'signal'>,
    resumePlan: ResumePlan | null,
    startedAt: Date,
    originalStartedAt?: string
  ): Promise<RunReport> {
    const stages = resumePlan ? resumePlan.stages : scope.stages;
    const resumed = resumePlan !== null;

    try {
      await this.preflight(stages);
    } catch (error) {
      if (error instanceof FatalPipelineError) {
        this.ctx.logger.error(error.message);
        return this.buildReport('fatal', startedAt, [], resumed, { fatalError: error.message });
      }
      throw error;
    }

    this.ctx.checkpoints.begin(scope, originalStartedAt ?? startedAt.toISOString());
    this.ctx.events.emit({ type: 'run:start', stages, resumed });
    this.ctx.events.drain();

    const reports: StageReport[] = [];
    let status: RunStatus = 'completed';
    let fatalError: string | undefined;

    try {
      for (const stage of stages) {
        if (options.signal?.aborted) {
          status = 'cancelled';
          break;
        }
        const resumeState = resumePlan !== null && stage === resumePlan.stage ? resumePlan : null;
        const report = await this.runBatch(stage, scope, options, resumeState);
        reports.push(report);
        if (report.cancelled) {
          status = 'cancelled';
          break;
        }
      }
    } catch (error) {
      if (!(error instanceof StoreCorruptError || error instanceof StoreLockError)) {
        throw error;
      }
      // Checkpoint kept: the run can be resumed once the store is repaired
      status = 'fatal';
      fatalError = error.message;
      this.ctx.logger.error(error.message);
    }

    if (status === 'completed') {
      await this.ctx.checkpoints.clear();
    }

    const report = this.buildReport(status, startedAt, reports, resumed, { fatalError });
    this.ctx.events.emit({ type: 'run:done', report });
    this.ctx.events.drain();
    return report;
  }

  // ==========================================================================
  // Stage Batch
  // ==========================================================================

  private async runBatch(
    stage: StageName,
    scope: RunScope,
    options: Pick<BatchOptions, 'concurrency' | 'signal'>,
    resumeState: ResumePlan | null
  ): Promise<StageReport> {
    const { checkpoints, events, logger } = this.ctx;
    const capability = this.requireCapability(stage);
    const force = scope.force;
    const signal = options.signal;
    const batchStart = this.ctx.now().getTime();

    const report: StageReport = {
      stage,
      total: 0,
      generated: 0,
      skipped: 0,
      failed: 0,
      blocked: 0,
      cancelled: false,
      failures: [],
      durationMs: 0,
    };

    const entities = await this.ctx.store.list();
    const completed: string[] = [];
    let workIds: string[];

    if (resumeState !== null) {
      // Finished before the interruption; counted, not redone
      completed.push(...resumeState.completedIds);
      report.skipped += resumeState.completedIds.length;

      const byId = new Map(entities.map((entity) => [entity.id, entity]));
      workIds = [];
      for (const id of resumeState.pendingIds) {
        const entity = byId.get(id);
        if (entity === undefined) {
          logger.warn(`${stage}: entity "${id}" from the checkpoint no longer exists`);
        } else if (!force && isSatisfied(entity.stages[stage])) {
          report.skipped++;
          completed.push(id);
        } else if (!prerequisitesMet(entity, stage)) {
          report.blocked++;
        } else {
          workIds.push(id);
        }
      }
    } else {
      const selection = selectWork(entities, stage, { force, limit: scope.limit ?? undefined });
      workIds = selection.work.map((entity) => entity.id);
      report.skipped = selection.satisfied.length;
      report.blocked = selection.blocked.length;
    }

    report.total = workIds.length;
    const pending = [...workIds];
    const inFlight: string[] = [];
    let done = 0;

    await checkpoints.save(stage, null, completed, pending);
    events.emit({ type: 'stage:start', stage, total: report.total });
    events.drain();

    const settle = async (entityId: string, finished: boolean): Promise<void> => {
      removeItem(inFlight, entityId);
      removeItem(pending, entityId);
      if (finished) {
        completed.push(entityId);
      }
      await checkpoints.save(stage, inFlight[0] ?? null, completed, pending);
      events.drain();
    };

    const processOne = async (entityId: string): Promise<void> => {
      if (signal?.aborted) {
        report.cancelled = true;
        return;
      }

      inFlight.push(entityId);
      let result: StageResult;
      try {
        result = await this.processor.process(entityId, stage, capability, { force, signal });
      } catch (error) {
        if (error instanceof EntityNotFoundError) {
          logger.warn(`${stage}: entity "${entityId}" was removed during the run`);
          await settle(entityId, false);
          return;
        }
        if (error instanceof PrerequisiteNotMetError) {
          logger.warn(error.message);
          report.blocked++;
          await settle(entityId, false);
          return;
        }
        removeItem(inFlight, entityId);
        throw error;
      }

      if (result.outcome === 'cancelled') {
        // Stays pending; the record stays 'processing' and resumes its episode
        removeItem(inFlight, entityId);
        report.cancelled = true;
        return;
      }

      tally(report, result);
      done++;
      events.emit({
        type: 'entity:done',
        stage,
        entityId,
        outcome: result.outcome,
        current: done,
        total: report.total,
        etaMs: estimateRemainingMs(this.ctx.now().getTime() - batchStart, done, report.total),
      });
      await settle(entityId, true);
    };

    const pool = new EntityPool(options.concurrency ?? this.ctx.concurrency);
    await pool.drain(workIds, processOne, () => report.cancelled);

    report.durationMs = this.ctx.now().getTime() - batchStart;
    events.emit({ type: 'stage:done', report });
    events.drain();
    return report;
  }

  // ==========================================================================
  // Retry Failed
  // ==========================================================================

  /**
   * Re-run failure queue entries, optionally filtered by stage and entity.
   * Successful entries leave the queue; entries of deleted entities are
   * dropped and counted as orphaned.
   *
   * @throws FatalPipelineError if a needed capability is missing or unhealthy
   */
  async retryFailed(options: RetryOptions = {}): Promise<RetryReport> {
    const { store, failures, logger, events } = this.ctx;
    const tasks = (await failures.list())
      .filter((task) => options.stage === undefined || task.stage === options.stage)
      .filter((task) => options.entityId === undefined || task.entity_id === options.entityId)
      .sort((a, b) => STAGE_ORDER.indexOf(a.stage) - STAGE_ORDER.indexOf(b.stage));

    const report: RetryReport = {
      attempted: 0,
      succeeded: 0,
      failed: 0,
      orphaned: 0,
      blocked: 0,
      cancelled: false,
      failures: [],
    };
    if (tasks.length === 0) {
      return report;
    }

    await this.preflight([...new Set(tasks.map((task) => task.stage))]);

    for (const task of tasks) {
      if (options.signal?.aborted) {
        report.cancelled = true;
        break;
      }

      const entity = await store.get(task.entity_id);
      if (entity === null) {
        logger.warn(`Dropping failed ${task.stage} task of missing entity "${task.entity_id}"`);
        await failures.remove(task.entity_id, task.stage);
        report.orphaned++;
        continue;
      }
      if (isSatisfied(entity.stages[task.stage])) {
        await failures.remove(task.entity_id, task.stage);
        report.succeeded++;
        continue;
      }
      if (!prerequisitesMet(entity, task.stage)) {
        report.blocked++;
        continue;
      }

      report.attempted++;
      const capability = this.requireCapability(task.stage);
      const result = await this.processor.process(task.entity_id, task.stage, capability, {
        signal: options.signal,
      });
      events.drain();

      if (result.outcome === 'cancelled') {
        report.cancelled = true;
        break;
      }
      if (result.outcome === 'failed') {
        report.failed++;
        report.failures.push({
          entityId: result.entityId,
          stage: result.stage,
          kind: result.errorKind,
          message: result.errorMessage,
        });
      } else {
        report.succeeded++;
      }
    }

    return report;
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  /**
   * Simulate a run without touching any store, assuming every attempted
   * stage succeeds.
   */
  async plan(stages: readonly StageName[], options: Pick<BatchOptions, 'force' | 'limit'> = {}): Promise<DryRunPlan> {
    const entities: Entity[] = structuredClone(await this.ctx.store.list());
    const planned: DryRunStagePlan[] = [];

    for (const stage of stages) {
      const selection = selectWork(entities, stage, options);
      planned.push({
        stage,
        eligible: selection.work.map((entity) => entity.id),
        satisfied: selection.satisfied.length,
        blocked: selection.blocked.map((entity) => entity.id),
      });
      for (const entity of selection.work) {
        entity.stages[stage].status = 'completed';
      }
    }

    return { stages: planned };
  }

  async status(): Promise<PipelineStatus> {
    const [statistics, failures, checkpoint] = await Promise.all([
      this.ctx.store.statistics(),
      this.ctx.failures.summary(),
      this.ctx.checkpoints.load(),
    ]);
    return { statistics, failures, checkpoint };
  }

  /**
   * Structural checks before a batch: stores readable, and every stage in
   * scope has a healthy capability.
   *
   * @throws FatalPipelineError describing the first problem found
   */
  async preflight(stages: readonly StageName[]): Promise<void> {
    try {
      await this.ctx.store.load();
      await this.ctx.failures.load();
    } catch (error) {
      if (error instanceof StoreCorruptError) {
        throw new FatalPipelineError(error.message, { cause: error });
      }
      throw error;
    }

    for (const stage of stages) {
      const capability = this.ctx.capabilities[stage];
      if (capability === undefined) {
        throw new FatalPipelineError(`No capability configured for stage "${stage}"`);
      }
      if (!capability.healthCheck) {
        continue;
      }

      let health: HealthStatus;
      try {
        health = await capability.healthCheck();
      } catch (error) {
        throw new FatalPipelineError(
          `${stage} capability (${capability.provider}) health check failed: ` +
            (error instanceof Error ? error.message : String(error)),
          { cause: error }
        );
      }
      if (!health.ok) {
        throw new FatalPipelineError(
          `${stage} capability (${capability.provider}) is unavailable: ${health.detail}`
        );
      }
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private requireCapability(stage: StageName): StageCapability {
    const capability = this.ctx.capabilities[stage];
    if (capability === undefined) {
      throw new FatalPipelineError(`No capability configured for stage "${stage}"`);
    }
    return capability;
  }

  private buildReport(
    status: RunStatus,
    startedAt: Date,
    stages: StageReport[],
    resumed: boolean,
    extras: ReportExtras = {}
  ): RunReport {
    const finishedAt = this.ctx.now();
    const report: RunReport = {
      status,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      stages,
      totals: {
        generated: sum(stages, (s) => s.generated),
        skipped: sum(stages, (s) => s.skipped),
        failed: sum(stages, (s) => s.failed),
        blocked: sum(stages, (s) => s.blocked),
      },
      resumed,
    };
    if (extras.fatalError !== undefined) report.fatalError = extras.fatalError;
    if (extras.checkpoint !== undefined) report.checkpoint = extras.checkpoint;
    if (extras.plan !== undefined) report.plan = extras.plan;
    return report;
  }
}

function tally(report: StageReport, result: StageResult): void {
  switch (result.outcome) {
    case 'generated':
      report.generated++;
      break;
    case 'skipped':
      report.skipped++;
      break;
    case 'failed':
      report.failed++;
      report.failures.push({
        entityId: result.entityId,
        stage: result.stage,
        kind: result.errorKind,
        message: result.errorMessage,
      });
      break;
    case 'cancelled':
      break;
  }
}

function removeItem(list: string[], item: string): void {
  const index = list.indexOf(item);
  if (index >= 0) {
    list.splice(index, 1);
  }
}

function sum(stages: readonly StageReport[], pick: (s: StageReport) => number): number {
  return stages.reduce((total, stage) => total + pick(stage), 0);
}
