/**
 * Pipeline
 *
 * Stage ordering, per-entity processing with classified retries,
 * checkpoint/resume and run reporting.
 *
 * @module pipeline
 */

export {
  type Logger,
  silentLogger,
  type CapabilityContext,
  type CapabilityResult,
  type HealthStatus,
  type StageCapability,
  type CapabilityMap,
  type SleepFn,
  type StageResult,
  type StageOutcome,
  type BatchOptions,
  type RunOptions,
  type StageFailure,
  type StageReport,
  type RunTotals,
  type RunStatus,
  type DryRunStagePlan,
  type DryRunPlan,
  type RunReport,
  type RetryOptions,
  type RetryReport,
} from './types.js';

export {
  CapabilityError,
  PrerequisiteNotMetError,
  EntityNotFoundError,
  FatalPipelineError,
  describeFailure,
} from './errors.js';

export {
  type RetryDecision,
  type RetryTable,
  DEFAULT_RETRY_TABLE,
  RetryPolicy,
} from './retry-policy.js';

export {
  type PipelineEvent,
  type PipelineEventType,
  type EventListener,
  EventChannel,
  estimateRemainingMs,
} from './events.js';

export {
  unmetPrerequisites,
  prerequisitesMet,
  selectWork,
  WORK_STATUSES,
  type WorkSelection,
  type SelectionOptions,
} from './dependencies.js';

export { EntityPool, type EntityWorker } from './pool.js';
export { StageProcessor, defaultSleep, type StageProcessorDeps, type ProcessOptions } from './processor.js';
export { CheckpointManager, type CheckpointManagerOptions } from './checkpoint.js';
export { derivePendingIds, createResumePlan, type ResumePlan } from './resume.js';
export { createPipelineContext, type PipelineContext, type CreateContextOptions } from './context.js';
export { PipelineOrchestrator, type PipelineStatus } from './orchestrator.js';
