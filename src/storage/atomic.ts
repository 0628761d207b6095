/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';

export { atomicWriteJson } from '../schemas/migrations/index.js';

/**
 * Raised when a file exists but does not contain valid JSON.
 */
export class InvalidJsonError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Invalid JSON in file: ${filePath}`, { cause });
    this.name = 'InvalidJsonError';
  }
}

/**
 * Read and parse a JSON file, returning null when it does not exist.
 *
 * @throws InvalidJsonError if the file exists but is not valid JSON
 */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
  const content = await readTextIfExists(filePath);
  return content === null ? null : parseJson(filePath, content);
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Narrow an unknown thrown value to a Node errno error.
 *
 * Checks the shape rather than `instanceof Error`: errors raised by Node's
 * built-ins come from another realm under a sandboxed loader such as Jest's.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function parseJson(filePath: string, content: string): unknown {
  try {
    const data: unknown = JSON.parse(content);
    return data;
  } catch (error) {
    throw new InvalidJsonError(filePath, error);
  }
}
