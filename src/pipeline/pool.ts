/**
 * Entity Pool
 *
 * Runs the entities of one stage batch with at most `size` in flight.
 * Entities start in order. Once the stop predicate holds, or an entity
 * throws, no further entity starts; those already running finish.
 *
 * @module pipeline/pool
 */

export type EntityWorker = (entityId: string) => Promise<void>;

/**
 * @example
 * ```typescript
 * const pool = new EntityPool(ctx.concurrency);
 * await pool.drain(workIds, (id) => processOne(id), () => report.cancelled);
 * ```
 */
export class EntityPool {
  readonly size: number;

  /**
   * @throws Error if size is not a positive integer
   */
  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  /**
   * Feed every id to `worker`. Resolves when all started work settled;
   * rejects with the first thrown error after the rest settled.
   *
   * @param stopped - Checked before each entity starts
   */
  async drain(ids: readonly string[], worker: EntityWorker, stopped: () => boolean = () => false): Promise<void> {
    const queue = [...ids];
    const errors: unknown[] = [];

    const lane = async (): Promise<void> => {
      while (errors.length === 0 && !stopped()) {
        const entityId = queue.shift();
        if (entityId === undefined) {
          return;
        }
        try {
          await worker(entityId);
        } catch (error) {
          errors.push(error);
        }
      }
    };

    const lanes = Math.min(this.size, queue.length);
    await Promise.all(Array.from({ length: lanes }, () => lane()));

    if (errors.length > 0) {
      throw errors[0];
    }
  }
}
