/**
 * Retry Policy
 *
 * Pure decision function mapping (error kind, attempts so far, time already
 * waited) to "retry after a delay" or "give up".
 *
 * | kind           | retries | delays              |
 * |----------------|---------|---------------------|
 * | network        | 3       | 0s, 2s, 4s          |
 * | timeout        | 3       | 5s, 10s, 20s        |
 * | rate_limit     | 5       | 60s, total <= 5 min |
 * | authentication | 0       | -                   |
 * | server_error   | 3       | 10s, 20s, 40s       |
 * | local_io       | 2       | 1s                  |
 * | unknown        | 0       | -                   |
 *
 * @module pipeline/retry-policy
 */

import { ERROR_KINDS, type ErrorKind } from '../schemas/common.js';
import type { RetryPolicyOverrides, RetryRule } from '../schemas/settings.js';

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'give_up'; reason: string };

export type RetryTable = Record<ErrorKind, RetryRule>;

export const DEFAULT_RETRY_TABLE: RetryTable = {
  network: { maxAttempts: 3, delaysMs: [0, 2000, 4000] },
  timeout: { maxAttempts: 3, delaysMs: [5000, 10000, 20000] },
  rate_limit: { maxAttempts: 5, delaysMs: [60000], maxTotalWaitMs: 5 * 60 * 1000 },
  authentication: { maxAttempts: 0, delaysMs: [] },
  server_error: { maxAttempts: 3, delaysMs: [10000, 20000, 40000] },
  local_io: { maxAttempts: 2, delaysMs: [1000] },
  unknown: { maxAttempts: 0, delaysMs: [] },
};

export class RetryPolicy {
  readonly table: RetryTable;

  constructor(table: RetryTable = DEFAULT_RETRY_TABLE) {
    this.table = table;
  }

  /**
   * Build a policy from the defaults with per-kind overrides applied.
   */
  static withOverrides(overrides: RetryPolicyOverrides = {}): RetryPolicy {
    const table: RetryTable = { ...DEFAULT_RETRY_TABLE };
    for (const kind of ERROR_KINDS) {
      const override = overrides[kind];
      if (override) {
        table[kind] = { ...table[kind], ...override };
      }
    }
    return new RetryPolicy(table);
  }

  /**
   * @param kind - Classified error kind
   * @param attemptCount - Retries already consumed in this episode
   * @param waitedMs - Delay already spent in this episode
   * @param minDelayMs - Floor on the delay, e.g. a server's Retry-After; the
   *   total wait cap applies to the raised delay
   */
  decide(kind: ErrorKind, attemptCount: number, waitedMs = 0, minDelayMs = 0): RetryDecision {
    const rule = this.table[kind];

    if (attemptCount >= rule.maxAttempts || rule.delaysMs.length === 0) {
      return {
        action: 'give_up',
        reason:
          rule.maxAttempts === 0
            ? `${kind} errors are not retried`
            : `retry limit reached (${rule.maxAttempts})`,
      };
    }

    const delayMs = Math.max(rule.delaysMs[Math.min(attemptCount, rule.delaysMs.length - 1)], minDelayMs);
    if (rule.maxTotalWaitMs !== undefined && waitedMs + delayMs > rule.maxTotalWaitMs) {
      return {
        action: 'give_up',
        reason: `total retry wait would exceed ${Math.round(rule.maxTotalWaitMs / 1000)}s`,
      };
    }

    return { action: 'retry', delayMs };
  }
}
