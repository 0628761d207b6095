/**
 * Pipeline Errors
 *
 * @module pipeline/errors
 */

import type { ErrorKind } from '../schemas/common.js';
import type { StageName } from '../schemas/stage.js';

/**
 * A capability failure carrying its classified kind. The only error shape
 * the stage processor interprets; anything else is treated as `unknown`.
 */
export class CapabilityError extends Error {
  /** Server-suggested minimum wait (Retry-After) */
  readonly retryAfterMs: number | undefined;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options: { cause?: unknown; retryAfterMs?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CapabilityError';
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Raised when a stage is invoked before its upstream stages are satisfied.
 * An orchestration bug: never retried, surfaced immediately.
 */
export class PrerequisiteNotMetError extends Error {
  constructor(
    public readonly entityId: string,
    public readonly stage: StageName,
    public readonly missing: StageName[]
  ) {
    super(
      `Cannot run ${stage} for "${entityId}": upstream stage(s) not satisfied: ${missing.join(', ')}`
    );
    this.name = 'PrerequisiteNotMetError';
  }
}

export class EntityNotFoundError extends Error {
  constructor(public readonly entityId: string) {
    super(`Entity not found: ${entityId}`);
    this.name = 'EntityNotFoundError';
  }
}

/**
 * A structural problem that stops a batch before it starts (missing
 * capability, failed health check, corrupt store).
 */
export class FatalPipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalPipelineError';
  }
}

/**
 * Convert any thrown value into a kind and message.
 */
export function describeFailure(error: unknown): { kind: ErrorKind; message: string } {
  if (error instanceof CapabilityError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'unknown', message: error.message || error.name };
  }
  return { kind: 'unknown', message: String(error) };
}
