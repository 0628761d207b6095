/**
 * Music Request Limiter
 *
 * Client-side quota for generation requests: at most `perMinute` in any
 * sliding 60s window (callers wait for a slot) and `perDay` per local
 * calendar day (callers are refused until midnight). Counts live in memory
 * for the life of the process.
 *
 * @module workers/music/limiter
 */

import { CapabilityError } from '../../pipeline/errors.js';
import type { SleepFn } from '../../pipeline/types.js';

const WINDOW_MS = 60_000;

export interface RequestLimiterOptions {
  perMinute: number;
  perDay: number;
  sleep: SleepFn;
  now?: () => Date;
}

export class RequestLimiter {
  private readonly now: () => Date;
  /** Start times of requests in the current window, oldest first */
  private recent: number[] = [];
  private day: string | null = null;
  private dailyCount = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: RequestLimiterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Wait for a free slot and claim it. Concurrent callers are served in
   * order.
   *
   * @throws CapabilityError (rate_limit) once the daily quota is used up;
   *   its retryAfterMs is the time left until local midnight
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.take(signal));
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async take(signal: AbortSignal | undefined): Promise<void> {
    const now = this.now();
    this.rollDay(now);

    if (this.dailyCount >= this.options.perDay) {
      throw new CapabilityError(
        'rate_limit',
        `Daily music request limit reached (${this.options.perDay}); resets at midnight`,
        { retryAfterMs: untilMidnight(now) }
      );
    }

    this.prune(now.getTime());
    if (this.recent.length >= this.options.perMinute) {
      await this.options.sleep(this.recent[0] + WINDOW_MS - now.getTime(), signal);
      this.prune(this.now().getTime());
    }

    this.recent.push(this.now().getTime());
    this.dailyCount++;
  }

  private prune(nowMs: number): void {
    this.recent = this.recent.filter((started) => nowMs - started < WINDOW_MS);
  }

  private rollDay(now: Date): void {
    const day = now.toDateString();
    if (day !== this.day) {
      this.day = day;
      this.dailyCount = 0;
    }
  }
}

function untilMidnight(now: Date): number {
  const midnight = new Date(now);
  midnight.setHours(24, 0, 0, 0);
  return midnight.getTime() - now.getTime();
}
