/**
 * Artifact file helpers shared by the capabilities.
 *
 * @module workers/artifacts
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileExists } from '../storage/atomic.js';
import { localIoError } from './errors.js';

/**
 * Write artifact bytes through a temp file and rename, so a crash never
 * leaves a truncated artifact at the final path.
 *
 * @throws CapabilityError (local_io) on any file system failure
 */
export async function writeArtifact(filePath: string, data: Uint8Array): Promise<string> {
  const tempPath = `${filePath}.partial`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw localIoError(error, `Writing ${filePath}`);
  }
  return filePath;
}

/**
 * Path of an existing non-empty artifact, or null.
 */
export async function existingArtifact(filePath: string): Promise<string | null> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  const stats = await fs.stat(filePath);
  return stats.size > 0 ? filePath : null;
}

/**
 * Read a string field from stage metadata.
 */
export function metadataString(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}
