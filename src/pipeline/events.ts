/**
 * Progress Events
 *
 * The orchestrator queues events while it works and drains them to
 * listeners at safe points (after each entity, at stage and run
 * boundaries). Listener failures are logged and never reach the pipeline.
 *
 * @module pipeline/events
 */

import type { ErrorKind } from '../schemas/common.js';
import type { StageName } from '../schemas/stage.js';
import type { Logger, RunReport, StageOutcome, StageReport } from './types.js';

export type PipelineEvent =
  | { type: 'run:start'; stages: StageName[]; resumed: boolean }
  | { type: 'stage:start'; stage: StageName; total: number }
  | {
      type: 'entity:retry';
      stage: StageName;
      entityId: string;
      kind: ErrorKind;
      message: string;
      attempt: number;
      delayMs: number;
    }
  | {
      type: 'entity:done';
      stage: StageName;
      entityId: string;
      outcome: StageOutcome;
      current: number;
      total: number;
      /** Estimated time left in the stage, null until one entity finished */
      etaMs: number | null;
    }
  | { type: 'stage:done'; report: StageReport }
  | { type: 'run:done'; report: RunReport };

export type PipelineEventType = PipelineEvent['type'];

export type EventListener = (event: PipelineEvent) => void;

export class EventChannel {
  private readonly listeners = new Set<EventListener>();
  private queue: PipelineEvent[] = [];

  constructor(private readonly logger: Logger) {}

  /**
   * Register a listener.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: PipelineEvent): void {
    this.queue.push(event);
  }

  /**
   * Deliver queued events in order.
   */
  drain(): void {
    const pending = this.queue;
    this.queue = [];
    for (const event of pending) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          this.logger.warn(
            `Progress listener failed on ${event.type}: ${error instanceof Error ? error.message : String(error)}`
          );
        }
      }
    }
  }

  get pendingCount(): number {
    return this.queue.length;
  }
}

/**
 * Estimate remaining time from the average duration so far.
 */
export function estimateRemainingMs(
  elapsedMs: number,
  done: number,
  total: number
): number | null {
  if (done <= 0) {
    return null;
  }
  return Math.round((elapsedMs / done) * Math.max(total - done, 0));
}
