/**
 * Storage Layer
 *
 * Persisted state of the pipeline: entity store, failure queue, settings,
 * reports and the path layout they share.
 *
 * @module storage
 */

export { atomicWriteJson, readJsonIfExists, fileExists, isErrnoException, InvalidJsonError } from './atomic.js';
export { StoreCorruptError, StoreLockError } from './errors.js';
export { FileLock, type FileLockOptions } from './lock.js';
export {
  getDataDir,
  resolveStoragePaths,
  getArtifactDir,
  getArtifactPath,
  validateIdSecurity,
  type StoragePaths,
} from './paths.js';
export {
  EntityStore,
  type EntityMutation,
  type EntityStatistics,
  type EntityStoreOptions,
} from './entity-store.js';
export {
  FailureQueue,
  type FailureDetails,
  type FailureSummary,
  type FailureQueueOptions,
} from './failure-queue.js';
export { DEFAULT_SETTINGS, loadSettings, saveSettings } from './config.js';
export { saveReport, listReports, reportFileName } from './reports.js';
