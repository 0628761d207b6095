/**
 * Zod Schemas for All Persisted Data
 *
 * Central export point for all schema definitions used in the pipeline.
 */

export { SCHEMA_VERSIONS, getCurrentVersion, isCurrentVersion, type SchemaType } from './versions.js';

export {
  ISO8601TimestampSchema,
  EntityIdSchema,
  ErrorKindSchema,
  ERROR_KINDS,
  nowISO,
  isRecord,
  type ISO8601Timestamp,
  type EntityId,
  type ErrorKind,
} from './common.js';

export {
  STAGE_ORDER,
  STAGE_LABELS,
  STAGE_STATUSES,
  SATISFIED_STATUSES,
  StageNameSchema,
  StageStatusSchema,
  StageRecordSchema,
  createStageRecord,
  isSatisfied,
  isStageName,
  upstreamStages,
  type StageName,
  type StageStatus,
  type StageRecord,
} from './stage.js';

export {
  MAX_ERROR_HISTORY,
  ErrorHistoryEntrySchema,
  EntitySchema,
  EntityStoreFileSchema,
  appendErrorHistory,
  createEntity,
  createEmptyStoreFile,
  type ErrorHistoryEntry,
  type Entity,
  type EntityStages,
  type EntityStoreFile,
} from './entity.js';

export {
  FailedTaskSchema,
  FailureQueueFileSchema,
  createEmptyFailureQueueFile,
  type FailedTask,
  type FailureQueueFile,
} from './failure.js';

export { CheckpointSchema, RunScopeSchema, type Checkpoint, type RunScope } from './checkpoint.js';

export {
  migrateSchema,
  needsMigration,
  registerMigration,
  hasMigration,
  extractSchemaVersion,
  type Migration,
} from './migrations/index.js';

export {
  SettingsSchema,
  RetryRuleSchema,
  RetryPolicyOverridesSchema,
  MusicSettingsSchema,
  ImageSettingsSchema,
  VideoSettingsSchema,
  MissingArtifactActionSchema,
  MISSING_ARTIFACT_ACTIONS,
  VideoQualitySchema,
  VIDEO_QUALITIES,
  type Settings,
  type SettingsInput,
  type RetryRule,
  type RetryPolicyOverrides,
  type MusicSettings,
  type ImageSettings,
  type VideoSettings,
  type MissingArtifactAction,
  type VideoQuality,
} from './settings.js';
