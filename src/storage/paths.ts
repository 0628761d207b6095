/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.trackforge/                      # Default data directory
 * ├── config.json                     # Pipeline settings
 * ├── db/
 * │   ├── entities.json               # Entity store
 * │   ├── entities.json.bak           # Previous entity store snapshot
 * │   ├── failed_tasks.json           # Failure queue
 * │   ├── checkpoint.json             # In-flight run (absent when idle)
 * │   └── *.lock                      # Writer lock files
 * ├── artifacts/
 * │   ├── music/<entity_id>.mp3
 * │   ├── image/<entity_id>.png
 * │   └── video/<entity_id>.mp4       # plus <entity_id>_thumb.jpg
 * └── reports/
 *     └── pipeline_report_YYYYMMDD_HHMMSS.txt
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';
import type { StageName } from '../schemas/stage.js';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'entityId')
 * @throws {Error} If the ID contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Uses `TRACKFORGE_DATA_DIR` if set, otherwise defaults to `~/.trackforge/`.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Absolute path to the data directory
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const envDir = env.TRACKFORGE_DATA_DIR;

  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.trackforge');
}

/**
 * Every location the pipeline reads or writes, resolved against one data
 * directory.
 */
export interface StoragePaths {
  dataDir: string;
  dbDir: string;
  entityStore: string;
  entityStoreBackup: string;
  entityStoreLock: string;
  failureQueue: string;
  failureQueueLock: string;
  checkpoint: string;
  checkpointLock: string;
  settings: string;
  artifactsDir: string;
  reportsDir: string;
}

export function resolveStoragePaths(dataDir: string): StoragePaths {
  const dbDir = path.join(dataDir, 'db');
  const entityStore = path.join(dbDir, 'entities.json');
  const failureQueue = path.join(dbDir, 'failed_tasks.json');
  const checkpoint = path.join(dbDir, 'checkpoint.json');

  return {
    dataDir,
    dbDir,
    entityStore,
    entityStoreBackup: `${entityStore}.bak`,
    entityStoreLock: `${entityStore}.lock`,
    failureQueue,
    failureQueueLock: `${failureQueue}.lock`,
    checkpoint,
    checkpointLock: `${checkpoint}.lock`,
    settings: path.join(dataDir, 'config.json'),
    artifactsDir: path.join(dataDir, 'artifacts'),
    reportsDir: path.join(dataDir, 'reports'),
  };
}

/**
 * Gets the artifact directory for a stage.
 */
export function getArtifactDir(dataDir: string, stage: StageName): string {
  return path.join(dataDir, 'artifacts', stage);
}

/**
 * Gets the artifact path for an entity's stage output.
 *
 * @param extension - File extension without the dot (e.g. 'mp3')
 * @throws {Error} If entityId contains path traversal characters
 */
export function getArtifactPath(
  dataDir: string,
  stage: StageName,
  entityId: string,
  extension: string
): string {
  validateIdSecurity(entityId, 'entityId');
  return path.join(getArtifactDir(dataDir, stage), `${entityId}.${extension}`);
}
