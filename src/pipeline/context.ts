/**
 * Pipeline Context
 *
 * Everything the orchestrator needs, built once per process and passed
 * explicitly. There are no module-level singletons.
 *
 * @module pipeline/context
 */

import type { Settings } from '../schemas/settings.js';
import { DEFAULT_SETTINGS } from '../storage/config.js';
import { EntityStore } from '../storage/entity-store.js';
import { FailureQueue } from '../storage/failure-queue.js';
import type { FileLockOptions } from '../storage/lock.js';
import { resolveStoragePaths, type StoragePaths } from '../storage/paths.js';
import { CheckpointManager } from './checkpoint.js';
import { EventChannel } from './events.js';
import { defaultSleep } from './processor.js';
import { RetryPolicy } from './retry-policy.js';
import { silentLogger, type CapabilityMap, type Logger, type SleepFn } from './types.js';

export interface PipelineContext {
  dataDir: string;
  paths: StoragePaths;
  settings: Settings;
  store: EntityStore;
  failures: FailureQueue;
  checkpoints: CheckpointManager;
  capabilities: CapabilityMap;
  retryPolicy: RetryPolicy;
  logger: Logger;
  events: EventChannel;
  sleep: SleepFn;
  now: () => Date;
  /** Default entities in flight per stage */
  concurrency: number;
}

export interface CreateContextOptions {
  dataDir: string;
  capabilities: CapabilityMap;
  settings?: Settings;
  logger?: Logger;
  /** Replaces the policy built from settings.retryPolicy */
  retryPolicy?: RetryPolicy;
  sleep?: SleepFn;
  now?: () => Date;
  lock?: FileLockOptions;
}

export function createPipelineContext(options: CreateContextOptions): PipelineContext {
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const paths = resolveStoragePaths(options.dataDir);
  const shared = { logger, now, lock: options.lock };

  return {
    dataDir: options.dataDir,
    paths,
    settings,
    store: new EntityStore(paths, shared),
    failures: new FailureQueue(paths, shared),
    checkpoints: new CheckpointManager(paths, shared),
    capabilities: options.capabilities,
    retryPolicy: options.retryPolicy ?? RetryPolicy.withOverrides(settings.retryPolicy),
    logger,
    events: new EventChannel(logger),
    sleep: options.sleep ?? defaultSleep,
    now,
    concurrency: settings.concurrency,
  };
}
