/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2026-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({
  message: 'Must be a valid ISO8601 timestamp',
  offset: true,
});

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Entity Identifier
// ============================================

/**
 * Entity ids double as artifact file names, so they are restricted to a
 * filesystem-safe alphabet and may not start with a dot.
 */
export const EntityIdSchema = z
  .string()
  .min(1, 'Entity id must not be empty')
  .max(128, 'Entity id must be at most 128 characters')
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
    'Entity id may only contain letters, digits, ".", "_" and "-", and must start with a letter or digit'
  );

export type EntityId = z.infer<typeof EntityIdSchema>;

// ============================================
// Error Kinds
// ============================================

/**
 * Classified failure kinds. Capabilities classify their own transport
 * errors; the core only ever sees one of these.
 */
export const ERROR_KINDS = [
  'network',
  'timeout',
  'rate_limit',
  'authentication',
  'server_error',
  'local_io',
  'unknown',
] as const;

export const ErrorKindSchema = z.enum(ERROR_KINDS);

export type ErrorKind = z.infer<typeof ErrorKindSchema>;

// ============================================
// Helpers
// ============================================

/**
 * Returns the current time as ISO8601 string
 */
export function nowISO(): string {
  return new Date().toISOString();
}

/**
 * Narrow an unknown value to a plain object record
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
