/**
 * Checkpoint Manager
 *
 * Records in-flight run progress so a crash mid-batch can resume without
 * redoing finished work. The checkpoint is a singleton file: created when a
 * run starts, rewritten after every entity, deleted when the run finishes
 * without being cancelled.
 *
 * @module pipeline/checkpoint
 */

import * as fs from 'node:fs/promises';
import { CheckpointSchema, type Checkpoint, type RunScope } from '../schemas/checkpoint.js';
import type { StageName } from '../schemas/stage.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { migrateSchema } from '../schemas/migrations/index.js';
import { atomicWriteJson, isErrnoException, readJsonIfExists } from '../storage/atomic.js';
import { FileLock, type FileLockOptions } from '../storage/lock.js';
import type { StoragePaths } from '../storage/paths.js';
import type { Logger } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckpointManagerOptions {
  logger?: Logger;
  lock?: FileLockOptions;
  now?: () => Date;
}

type CheckpointPaths = Pick<StoragePaths, 'checkpoint' | 'checkpointLock'>;

// ============================================================================
// Checkpoint Manager
// ============================================================================

export class CheckpointManager {
  private readonly lock: FileLock;
  private readonly logger: Logger | undefined;
  private readonly now: () => Date;
  private active: { run: RunScope; startedAt: string } | null = null;

  constructor(
    private readonly paths: CheckpointPaths,
    options: CheckpointManagerOptions = {}
  ) {
    this.lock = new FileLock(paths.checkpointLock, { logger: options.logger, ...options.lock });
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Start tracking a run. Subsequent saves carry this scope and start time.
   *
   * @param startedAt - Original start time when continuing a checkpoint
   */
  begin(run: RunScope, startedAt: string = this.now().toISOString()): void {
    this.active = { run, startedAt };
  }

  /**
   * Persist progress. Arguments are copied before this call returns, so the
   * caller may keep mutating its arrays; saves land in call order.
   *
   * @param stage - Stage being processed
   * @param currentId - Entity in flight, or null between entities
   * @param completed - Entities finished in this stage (any outcome)
   * @param pending - Entities not yet finished, in processing order
   * @throws Error if begin() was not called
   */
  async save(
    stage: StageName,
    currentId: string | null,
    completed: readonly string[],
    pending: readonly string[]
  ): Promise<Checkpoint> {
    if (this.active === null) {
      throw new Error('CheckpointManager.begin() must be called before save()');
    }

    const checkpoint: Checkpoint = CheckpointSchema.parse({
      schema_version: SCHEMA_VERSIONS.checkpoint,
      is_running: true,
      started_at: this.active.startedAt,
      current_stage: stage,
      current_entity_id: currentId,
      completed_ids: [...new Set(completed)],
      pending_ids: [...pending],
      last_updated: this.now().toISOString(),
      run: this.active.run,
    });

    await this.lock.withLock('checkpoint save', () => atomicWriteJson(this.paths.checkpoint, checkpoint));
    return checkpoint;
  }

  /**
   * Load the pending checkpoint.
   *
   * @returns The checkpoint, or null when absent, not running, or unreadable
   */
  async load(): Promise<Checkpoint | null> {
    let raw: unknown;
    try {
      raw = await readJsonIfExists(this.paths.checkpoint);
    } catch (error) {
      this.logger?.warn(
        `Ignoring unreadable checkpoint ${this.paths.checkpoint}: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
    if (raw === null) {
      return null;
    }

    const parsed = CheckpointSchema.safeParse(migrateSchema(raw, 'checkpoint'));
    if (!parsed.success) {
      this.logger?.warn(`Ignoring invalid checkpoint ${this.paths.checkpoint}`);
      return null;
    }
    return parsed.data.is_running ? parsed.data : null;
  }

  async exists(): Promise<boolean> {
    return (await this.load()) !== null;
  }

  /**
   * Delete the checkpoint and stop tracking the run.
   */
  async clear(): Promise<void> {
    await this.lock.withLock('checkpoint clear', async () => {
      try {
        await fs.unlink(this.paths.checkpoint);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'ENOENT') {
          throw error;
        }
      }
    });
    this.active = null;
  }
}
