/**
 * Storage Errors
 *
 * @module storage/errors
 */

/**
 * A persisted document exists but cannot be trusted (invalid JSON or schema).
 * Never recovered from silently: the operator must restore it (the entity
 * store keeps a `.bak` copy of its previous state).
 */
export class StoreCorruptError extends Error {
  constructor(
    public readonly filePath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Store file is corrupt: ${filePath} (${detail})`, options);
    this.name = 'StoreCorruptError';
  }
}

/**
 * The writer lock could not be acquired within the bounded wait.
 */
export class StoreLockError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly holderPid: number | null,
    attempts: number
  ) {
    super(
      `Could not acquire lock ${lockPath} after ${attempts} attempts` +
        (holderPid !== null ? ` (held by PID ${holderPid})` : '')
    );
    this.name = 'StoreLockError';
  }
}
