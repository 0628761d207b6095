/**
 * Entity Store
 *
 * Durable mapping from entity id to per-stage status records; the sole
 * source of truth for what has been done.
 *
 * Writes hold the store lock around load-mutate-save, back up the previous
 * file to `entities.json.bak` and replace the file atomically. Reads take no
 * lock and always see the last committed snapshot.
 *
 * @module storage/entity-store
 */

import * as fs from 'node:fs/promises';
import type { ZodError } from 'zod';
import {
  EntitySchema,
  EntityStoreFileSchema,
  createEmptyStoreFile,
  createEntity,
  type Entity,
  type EntityStoreFile,
} from '../schemas/entity.js';
import {
  STAGE_ORDER,
  isSatisfied,
  type StageName,
  type StageStatus,
} from '../schemas/stage.js';
import { migrateSchema } from '../schemas/migrations/index.js';
import type { Logger } from '../pipeline/types.js';
import { atomicWriteJson, InvalidJsonError, isErrnoException, readJsonIfExists } from './atomic.js';
import { StoreCorruptError } from './errors.js';
import { FileLock, type FileLockOptions } from './lock.js';
import type { StoragePaths } from './paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Mutation applied under the store lock. Receives a private copy of the
 * current entity (null when absent) and returns the entity to persist.
 */
export type EntityMutation = (current: Entity | null) => Entity;

export interface EntityStatistics {
  total: number;
  byStage: Record<StageName, Record<StageStatus, number>>;
  /** Entities with every stage satisfied */
  fullyCompleted: number;
}

export interface EntityStoreOptions {
  logger?: Logger;
  lock?: FileLockOptions;
  now?: () => Date;
}

type EntityStorePaths = Pick<StoragePaths, 'entityStore' | 'entityStoreBackup' | 'entityStoreLock'>;

// ============================================================================
// Entity Store
// ============================================================================

export class EntityStore {
  private readonly lock: FileLock;
  private readonly now: () => Date;

  constructor(
    private readonly paths: EntityStorePaths,
    options: EntityStoreOptions = {}
  ) {
    this.lock = new FileLock(paths.entityStoreLock, { logger: options.logger, ...options.lock });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load and validate the whole store. A missing file is an empty store.
   *
   * @throws StoreCorruptError if the file is not valid JSON or fails validation
   */
  async load(): Promise<EntityStoreFile> {
    let raw: unknown;
    try {
      raw = await readJsonIfExists(this.paths.entityStore);
    } catch (error) {
      if (error instanceof InvalidJsonError) {
        throw new StoreCorruptError(this.paths.entityStore, 'invalid JSON', { cause: error });
      }
      throw error;
    }

    if (raw === null) {
      return createEmptyStoreFile();
    }

    const parsed = EntityStoreFileSchema.safeParse(migrateSchema(raw, 'entityStore'));
    if (!parsed.success) {
      throw new StoreCorruptError(this.paths.entityStore, describeIssues(parsed.error), {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async get(id: string): Promise<Entity | null> {
    const file = await this.load();
    return file.entities[id] ?? null;
  }

  /**
   * All entities, in insertion order.
   */
  async list(): Promise<Entity[]> {
    const file = await this.load();
    return Object.values(file.entities);
  }

  /**
   * Entities whose record for `stage` has one of the given statuses,
   * in insertion order.
   */
  async query(stage: StageName, status: StageStatus | readonly StageStatus[]): Promise<Entity[]> {
    const wanted: readonly StageStatus[] = typeof status === 'string' ? [status] : status;
    const entities = await this.list();
    return entities.filter((entity) => wanted.includes(entity.stages[stage].status));
  }

  /**
   * Atomically apply a mutation to one entity and persist it.
   *
   * When the mutation changes nothing the file is left untouched.
   *
   * @throws Error if the mutation returns an entity with a different id
   * @throws ZodError if the mutated entity is invalid (nothing is written)
   */
  async upsert(id: string, mutation: EntityMutation): Promise<Entity> {
    return this.lock.withLock(`upsert ${id}`, async () => {
      const file = await this.load();
      const current = file.entities[id] ?? null;
      const next = mutation(current === null ? null : structuredClone(current));

      if (next.id !== id) {
        throw new Error(`Mutation changed entity id from "${id}" to "${next.id}"`);
      }

      if (current !== null && sameContent(current, next)) {
        return current;
      }

      const stamped = EntitySchema.parse({ ...next, updated_at: this.now().toISOString() });
      file.entities[id] = stamped;
      await this.save(file);
      return stamped;
    });
  }

  /**
   * Add a new entity with every stage pending.
   *
   * @returns The new entity, or null if the id is already registered
   */
  async register(
    id: string,
    stageMetadata: Partial<Record<StageName, Record<string, unknown>>> = {}
  ): Promise<Entity | null> {
    let created = false;
    const entity = await this.upsert(id, (current) => {
      if (current !== null) {
        return current;
      }
      created = true;
      return createEntity(id, stageMetadata, this.now().toISOString());
    });
    return created ? entity : null;
  }

  /**
   * Remove an entity. Returns false when it did not exist.
   */
  async delete(id: string): Promise<boolean> {
    return this.lock.withLock(`delete ${id}`, async () => {
      const file = await this.load();
      if (!(id in file.entities)) {
        return false;
      }
      delete file.entities[id];
      await this.save(file);
      return true;
    });
  }

  async statistics(): Promise<EntityStatistics> {
    const entities = await this.list();
    const byStage: Record<StageName, Record<StageStatus, number>> = {
      music: emptyStatusCounts(),
      image: emptyStatusCounts(),
      video: emptyStatusCounts(),
    };

    let fullyCompleted = 0;
    for (const entity of entities) {
      for (const stage of STAGE_ORDER) {
        byStage[stage][entity.stages[stage].status]++;
      }
      if (STAGE_ORDER.every((stage) => isSatisfied(entity.stages[stage]))) {
        fullyCompleted++;
      }
    }

    return { total: entities.length, byStage, fullyCompleted };
  }

  private async save(file: EntityStoreFile): Promise<void> {
    const toWrite: EntityStoreFile = {
      entities: file.entities,
      metadata: {
        ...file.metadata,
        total_entities: Object.keys(file.entities).length,
        last_updated: this.now().toISOString(),
      },
    };

    try {
      await fs.copyFile(this.paths.entityStore, this.paths.entityStoreBackup);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }

    await atomicWriteJson(this.paths.entityStore, toWrite);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function emptyStatusCounts(): Record<StageStatus, number> {
  return { pending: 0, processing: 0, completed: 0, failed: 0, skipped: 0 };
}

/**
 * Compare two entities ignoring updated_at.
 */
function sameContent(a: Entity, b: Entity): boolean {
  return JSON.stringify({ ...a, updated_at: '' }) === JSON.stringify({ ...b, updated_at: '' });
}

export function describeIssues(error: ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}
