/**
 * Transport Error Classification
 *
 * Adapters translate HTTP statuses, fetch failures, SDK errors and file
 * system errors into CapabilityError kinds here. The pipeline core only ever
 * sees the kind.
 *
 * @module workers/errors
 */

import type { ErrorKind } from '../schemas/common.js';
import { CapabilityError } from '../pipeline/errors.js';
import { isErrnoException } from '../storage/atomic.js';

/** Socket-level failures reported through `error.code` or `error.cause.code` */
const NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Map an HTTP status to an error kind.
 */
export function classifyHttpStatus(status: number): ErrorKind {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 408) return 'timeout';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'server_error';
  return 'unknown';
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 *
 * @returns undefined when absent or unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(date - now, 0);
}

/**
 * Build the error for a non-2xx HTTP response.
 */
export function httpStatusError(
  status: number,
  detail: string,
  retryAfter?: string | null
): CapabilityError {
  const kind = classifyHttpStatus(status);
  let message: string;
  if (kind === 'rate_limit') {
    message = `Rate limit exceeded: ${detail}`;
  } else if (kind === 'server_error') {
    message = `Server error (${status}): ${detail}`;
  } else if (status === 401) {
    message = 'Authentication failed: Invalid API key';
  } else if (status === 403) {
    message = `Access forbidden: ${detail}`;
  } else {
    message = `API error (${status}): ${detail}`;
  }
  return new CapabilityError(kind, message, { retryAfterMs: parseRetryAfter(retryAfter) });
}

/**
 * Classify an error thrown while talking to a service.
 *
 * @param action - What was being attempted, prefixed to the message
 */
export function classifyTransportError(error: unknown, action: string): CapabilityError {
  if (error instanceof CapabilityError) {
    return error;
  }
  const detail = errorProperty(error, 'message') ?? String(error);

  if (isAbortError(error)) {
    return new CapabilityError('timeout', `${action} timed out`, { cause: error });
  }

  const code = errorCode(error);
  if (code === 'ETIMEDOUT') {
    return new CapabilityError('timeout', `${action} timed out`, { cause: error });
  }
  if (code !== undefined && NETWORK_CODES.has(code)) {
    return new CapabilityError('network', `${action} failed: ${code}`, { cause: error });
  }
  // undici reports every connection failure as TypeError('fetch failed')
  if (errorProperty(error, 'name') === 'TypeError' && detail === 'fetch failed') {
    return new CapabilityError('network', `${action} failed: network error`, { cause: error });
  }
  if (isErrnoException(error) && error.syscall !== undefined) {
    return localIoError(error, action);
  }

  return new CapabilityError('unknown', `${action} failed: ${detail}`, { cause: error });
}

/**
 * Whether a thrown value is an aborted or timed-out operation.
 */
export function isAbortError(error: unknown): boolean {
  const name = errorProperty(error, 'name');
  return name === 'AbortError' || name === 'TimeoutError';
}

/**
 * Wrap a file system failure.
 */
export function localIoError(error: unknown, action: string): CapabilityError {
  const detail = errorProperty(error, 'message') ?? String(error);
  return new CapabilityError('local_io', `${action} failed: ${detail}`, { cause: error });
}

function errorCode(error: unknown): string | undefined {
  if (isErrnoException(error) && error.code !== undefined) {
    return error.code;
  }
  const cause = typeof error === 'object' && error !== null && 'cause' in error ? error.cause : undefined;
  if (isErrnoException(cause) && cause.code !== undefined) {
    return cause.code;
  }
  return undefined;
}

/**
 * A string `name` or `message` of a thrown value, whatever realm it came from.
 */
function errorProperty(error: unknown, key: 'name' | 'message'): string | undefined {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}
