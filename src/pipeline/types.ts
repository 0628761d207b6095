/**
 * Pipeline Type Definitions
 *
 * Contracts between the orchestrator, the stage processor and the stage
 * capabilities, plus the shapes of run results.
 *
 * @module pipeline/types
 */

import type { Checkpoint } from '../schemas/checkpoint.js';
import type { ErrorKind } from '../schemas/common.js';
import type { Entity } from '../schemas/entity.js';
import type { StageName } from '../schemas/stage.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline components.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything. Default for library callers and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Stage Capability
// ============================================================================

/**
 * Runtime context handed to a capability invocation.
 */
export interface CapabilityContext {
  /** Base data directory; artifacts are written beneath it */
  dataDir: string;
  logger: Logger;
}

/**
 * Successful capability output.
 */
export interface CapabilityResult {
  /** Path of the produced artifact */
  artifactPath: string;
  /** Merged into the stage record's metadata */
  metadata?: Record<string, unknown>;
}

export interface HealthStatus {
  ok: boolean;
  detail: string;
}

/**
 * The work performed for one stage of one entity.
 *
 * `execute` throws a CapabilityError carrying a classified kind on failure;
 * any other thrown value is treated as kind `unknown`.
 */
export interface StageCapability {
  readonly stage: StageName;
  /** Provider identifier, for display only */
  readonly provider: string;

  execute(entity: Entity, context: CapabilityContext): Promise<CapabilityResult>;

  /**
   * Report an artifact that already exists for this entity, so a pending
   * stage can be adopted without regenerating it.
   */
  findExisting?(entity: Entity, context: CapabilityContext): Promise<string | null>;

  /** Structural check run before a batch starts (binary present, key set...) */
  healthCheck?(): Promise<HealthStatus>;
}

export type CapabilityMap = Partial<Record<StageName, StageCapability>>;

/**
 * Cancellable wait. Rejects with an AbortError when the signal fires.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

// ============================================================================
// Stage Result
// ============================================================================

interface StageResultBase {
  entityId: string;
  stage: StageName;
}

/**
 * Outcome of processing one entity through one stage.
 */
export type StageResult =
  | (StageResultBase & {
      outcome: 'generated';
      artifactPath: string;
      /** Retries consumed before success */
      retries: number;
    })
  | (StageResultBase & {
      outcome: 'skipped';
      reason: 'already_satisfied' | 'artifact_exists';
      artifactPath: string | null;
    })
  | (StageResultBase & {
      outcome: 'failed';
      terminal: true;
      errorKind: ErrorKind;
      errorMessage: string;
      retries: number;
    })
  | (StageResultBase & {
      outcome: 'cancelled';
    });

export type StageOutcome = StageResult['outcome'];

// ============================================================================
// Run Options
// ============================================================================

/**
 * Options shared by every batch operation.
 */
export interface BatchOptions {
  /** Re-run stages that are already satisfied */
  force?: boolean;
  /** Maximum number of entities processed per stage */
  limit?: number;
  /** Entities processed in parallel within a stage (default: 1) */
  concurrency?: number;
  /** Checked between entities and during retry waits */
  signal?: AbortSignal;
  /** Show what would run without touching any store */
  dryRun?: boolean;
}

export interface RunOptions extends BatchOptions {
  /** Stages to leave out of this run */
  skip?: Partial<Record<StageName, boolean>>;
  /** Continue a pending checkpoint instead of reporting it */
  resume?: boolean;
}

// ============================================================================
// Reports
// ============================================================================

export interface StageFailure {
  entityId: string;
  stage: StageName;
  kind: ErrorKind;
  message: string;
}

/**
 * Aggregate result of one stage batch.
 */
export interface StageReport {
  stage: StageName;
  /** Entities selected for processing */
  total: number;
  generated: number;
  skipped: number;
  failed: number;
  /** Pending entities whose upstream stages are not yet satisfied */
  blocked: number;
  /** The batch stopped early on cancellation */
  cancelled: boolean;
  failures: StageFailure[];
  durationMs: number;
}

export interface RunTotals {
  generated: number;
  skipped: number;
  failed: number;
  blocked: number;
}

export type RunStatus =
  | 'completed'
  | 'cancelled'
  | 'fatal'
  | 'resume_required'
  | 'no_checkpoint'
  | 'dry_run';

export interface DryRunStagePlan {
  stage: StageName;
  /** Entities that would be processed, in order */
  eligible: string[];
  /** Entities already satisfied, not re-run */
  satisfied: number;
  /** Entities waiting on an upstream stage */
  blocked: string[];
}

export interface DryRunPlan {
  stages: DryRunStagePlan[];
}

export interface RunReport {
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  stages: StageReport[];
  totals: RunTotals;
  /** The run continued a checkpoint */
  resumed: boolean;
  /** Set when status is 'fatal' */
  fatalError?: string;
  /** Set when status is 'resume_required' */
  checkpoint?: Checkpoint;
  /** Set when status is 'dry_run' */
  plan?: DryRunPlan;
}

export interface RetryOptions {
  stage?: StageName;
  entityId?: string;
  signal?: AbortSignal;
}

export interface RetryReport {
  attempted: number;
  succeeded: number;
  failed: number;
  /** Queue entries whose entity no longer exists */
  orphaned: number;
  /** Queue entries whose upstream stages are no longer satisfied */
  blocked: number;
  cancelled: boolean;
  failures: StageFailure[];
}
