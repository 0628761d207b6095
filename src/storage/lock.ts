/**
 * Store Writer Lock
 *
 * Serializes load-mutate-save cycles on a persisted document. Two layers:
 * - an in-process promise queue, so concurrent pool workers never interleave
 * - an exclusive lock file, so two processes never interleave
 *
 * Stale lock files (older than the stale timeout) are removed.
 *
 * @module storage/lock
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../pipeline/types.js';
import { isErrnoException } from './atomic.js';
import { StoreLockError } from './errors.js';

/** Lock metadata stored in the lock file */
interface LockInfo {
  /** PID of the process holding the lock */
  pid: number;
  /** When the lock was acquired */
  acquiredAt: string;
  /** What operation is being performed */
  operation: string;
}

export interface FileLockOptions {
  /** Age after which a lock file is considered abandoned (default: 30s) */
  staleMs?: number;
  /** Wait between acquisition attempts (default: 50ms) */
  retryIntervalMs?: number;
  /** Attempts before giving up with StoreLockError (default: 200) */
  maxRetries?: number;
  logger?: Logger;
}

const DEFAULT_STALE_MS = 30 * 1000;
const DEFAULT_RETRY_INTERVAL_MS = 50;
const DEFAULT_MAX_RETRIES = 200;

export class FileLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly staleMs: number;
  private readonly retryIntervalMs: number;
  private readonly maxRetries: number;
  private readonly logger: Logger | undefined;

  constructor(
    readonly lockPath: string,
    options: FileLockOptions = {}
  ) {
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.logger = options.logger;
  }

  /**
   * Execute a function while holding the lock.
   *
   * Callers in this process run strictly one after another, in call order.
   * The lock is always released, even if fn throws.
   *
   * @throws StoreLockError if the lock file could not be acquired
   */
  async withLock<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      await this.acquire(operation);
      try {
        return await fn();
      } finally {
        await this.releaseFile();
      }
    } finally {
      release();
    }
  }

  private async acquire(operation: string): Promise<void> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    let holder: LockInfo | null = null;
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const info: LockInfo = {
        pid: process.pid,
        acquiredAt: new Date().toISOString(),
        operation,
      };

      try {
        await fs.writeFile(this.lockPath, JSON.stringify(info), { flag: 'wx' });
        return;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }

      holder = await this.readHolder();
      if (holder === null) {
        continue;
      }
      if (this.isStale(holder)) {
        this.logger?.warn(
          `[Lock] Removing stale lock ${this.lockPath} (PID ${holder.pid}, "${holder.operation}")`
        );
        await this.releaseFile();
        continue;
      }

      await delay(this.retryIntervalMs);
    }

    throw new StoreLockError(this.lockPath, holder?.pid ?? null, this.maxRetries);
  }

  private isStale(holder: LockInfo): boolean {
    const acquiredAt = new Date(holder.acquiredAt).getTime();
    return Number.isNaN(acquiredAt) || Date.now() - acquiredAt > this.staleMs;
  }

  /**
   * Read the current holder, or null when the lock file vanished. A lock
   * file without readable content is dated by its mtime.
   */
  private async readHolder(): Promise<LockInfo | null> {
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'pid' in parsed &&
        'acquiredAt' in parsed &&
        'operation' in parsed &&
        typeof parsed.pid === 'number' &&
        typeof parsed.acquiredAt === 'string' &&
        typeof parsed.operation === 'string'
      ) {
        return { pid: parsed.pid, acquiredAt: parsed.acquiredAt, operation: parsed.operation };
      }
    } catch {
      // Half-written: the holder is between create and write, or crashed there
    }

    try {
      const stat = await fs.stat(this.lockPath);
      return { pid: -1, acquiredAt: stat.mtime.toISOString(), operation: 'unknown' };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private async releaseFile(): Promise<void> {
    try {
      await fs.unlink(this.lockPath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }
  }
}
