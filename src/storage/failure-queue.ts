/**
 * Failure Queue
 *
 * Durable list of terminally failed (entity, stage) pairs awaiting operator
 * retry. At most one entry per pair: a repeat failure updates the entry.
 * Entries leave the queue when a later attempt succeeds or when an operator
 * dismisses them; they never expire.
 *
 * @module storage/failure-queue
 */

import {
  FailureQueueFileSchema,
  createEmptyFailureQueueFile,
  type FailedTask,
  type FailureQueueFile,
} from '../schemas/failure.js';
import type { StageName } from '../schemas/stage.js';
import type { ErrorKind } from '../schemas/common.js';
import { migrateSchema } from '../schemas/migrations/index.js';
import type { Logger } from '../pipeline/types.js';
import { atomicWriteJson, InvalidJsonError, readJsonIfExists } from './atomic.js';
import { describeIssues } from './entity-store.js';
import { StoreCorruptError } from './errors.js';
import { FileLock, type FileLockOptions } from './lock.js';
import type { StoragePaths } from './paths.js';

export interface FailureDetails {
  kind: ErrorKind;
  /** Retries consumed in the failed episode */
  attemptCount: number;
}

export interface FailureSummary {
  total: number;
  byStage: Record<StageName, number>;
}

export interface FailureQueueOptions {
  logger?: Logger;
  lock?: FileLockOptions;
  now?: () => Date;
}

type FailureQueuePaths = Pick<StoragePaths, 'failureQueue' | 'failureQueueLock'>;

export class FailureQueue {
  private readonly lock: FileLock;
  private readonly now: () => Date;

  constructor(
    private readonly paths: FailureQueuePaths,
    options: FailureQueueOptions = {}
  ) {
    this.lock = new FileLock(paths.failureQueueLock, { logger: options.logger, ...options.lock });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws StoreCorruptError if the file is not valid JSON or fails validation
   */
  async load(): Promise<FailureQueueFile> {
    let raw: unknown;
    try {
      raw = await readJsonIfExists(this.paths.failureQueue);
    } catch (error) {
      if (error instanceof InvalidJsonError) {
        throw new StoreCorruptError(this.paths.failureQueue, 'invalid JSON', { cause: error });
      }
      throw error;
    }

    if (raw === null) {
      return createEmptyFailureQueueFile();
    }

    const parsed = FailureQueueFileSchema.safeParse(migrateSchema(raw, 'failureQueue'));
    if (!parsed.success) {
      throw new StoreCorruptError(this.paths.failureQueue, describeIssues(parsed.error), {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * Record a terminal failure, replacing any existing entry for the pair.
   */
  async add(
    entityId: string,
    stage: StageName,
    message: string,
    details: FailureDetails
  ): Promise<FailedTask> {
    return this.lock.withLock(`add ${entityId}/${stage}`, async () => {
      const file = await this.load();
      const task: FailedTask = {
        entity_id: entityId,
        stage,
        failed_at: this.now().toISOString(),
        error_kind: details.kind,
        error_message: message,
        attempt_count: details.attemptCount,
      };

      const index = file.failed_tasks.findIndex((t) => matches(t, entityId, stage));
      if (index >= 0) {
        file.failed_tasks[index] = task;
      } else {
        file.failed_tasks.push(task);
      }

      await this.save(file);
      return task;
    });
  }

  async list(): Promise<FailedTask[]> {
    const file = await this.load();
    return file.failed_tasks;
  }

  async get(entityId: string, stage: StageName): Promise<FailedTask | null> {
    const tasks = await this.list();
    return tasks.find((t) => matches(t, entityId, stage)) ?? null;
  }

  /**
   * Remove the entry for a pair. Returns false (and writes nothing) when
   * there was none.
   */
  async remove(entityId: string, stage: StageName): Promise<boolean> {
    if ((await this.get(entityId, stage)) === null) {
      return false;
    }

    return this.lock.withLock(`remove ${entityId}/${stage}`, async () => {
      const file = await this.load();
      const remaining = file.failed_tasks.filter((t) => !matches(t, entityId, stage));
      if (remaining.length === file.failed_tasks.length) {
        return false;
      }
      await this.save({ ...file, failed_tasks: remaining });
      return true;
    });
  }

  /**
   * Remove every entry belonging to an entity (used when the entity is deleted).
   *
   * @returns Number of entries removed
   */
  async removeEntity(entityId: string): Promise<number> {
    return this.lock.withLock(`remove ${entityId}`, async () => {
      const file = await this.load();
      const remaining = file.failed_tasks.filter((t) => t.entity_id !== entityId);
      const removed = file.failed_tasks.length - remaining.length;
      if (removed > 0) {
        await this.save({ ...file, failed_tasks: remaining });
      }
      return removed;
    });
  }

  async summary(): Promise<FailureSummary> {
    const tasks = await this.list();
    const byStage: Record<StageName, number> = { music: 0, image: 0, video: 0 };
    for (const task of tasks) {
      byStage[task.stage]++;
    }
    return { total: tasks.length, byStage };
  }

  private async save(file: FailureQueueFile): Promise<void> {
    await atomicWriteJson(this.paths.failureQueue, {
      ...file,
      last_updated: this.now().toISOString(),
    });
  }
}

function matches(task: FailedTask, entityId: string, stage: StageName): boolean {
  return task.entity_id === entityId && task.stage === stage;
}
