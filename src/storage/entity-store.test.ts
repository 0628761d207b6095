/**
 * Entity Store Tests
 *
 * @module storage/entity-store.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { EntityStore } from './entity-store.js';
import { StoreCorruptError } from './errors.js';
import { resolveStoragePaths, type StoragePaths } from './paths.js';
import type { Entity } from '../schemas/entity.js';

const T0 = new Date('2026-03-01T10:00:00.000Z');

describe('EntityStore', () => {
  let tempDir: string;
  let paths: StoragePaths;
  let store: EntityStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'entity-store-test-'));
    paths = resolveStoragePaths(tempDir);
    store = new EntityStore(paths, { now: () => T0 });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const completeMusic = (entity: Entity | null): Entity => {
    if (entity === null) throw new Error('missing');
    entity.stages.music.status = 'completed';
    entity.stages.music.artifact_path = '/a/t.mp3';
    return entity;
  };

  describe('reads', () => {
    it('treats a missing file as an empty store', async () => {
      expect(await store.list()).toEqual([]);
      expect(await store.get('t1')).toBeNull();
    });

    it('raises StoreCorruptError for invalid JSON', async () => {
      await fs.mkdir(paths.dbDir, { recursive: true });
      await fs.writeFile(paths.entityStore, '{"entities": {');

      await expect(store.list()).rejects.toBeInstanceOf(StoreCorruptError);
    });

    it('raises StoreCorruptError for a schema violation', async () => {
      await fs.mkdir(paths.dbDir, { recursive: true });
      await fs.writeFile(paths.entityStore, JSON.stringify({ entities: [], metadata: {} }));

      await expect(store.get('t1')).rejects.toBeInstanceOf(StoreCorruptError);
    });
  });

  describe('register', () => {
    it('creates a pending entity and writes the store file', async () => {
      const entity = await store.register('t1', { music: { prompt: 'lofi' } });

      expect(entity?.stages.music.metadata).toEqual({ prompt: 'lofi' });
      expect(entity?.created_at).toBe(T0.toISOString());

      const file = JSON.parse(await fs.readFile(paths.entityStore, 'utf-8'));
      expect(Object.keys(file.entities)).toEqual(['t1']);
      expect(file.metadata).toEqual({
        total_entities: 1,
        last_updated: T0.toISOString(),
        schema_version: 1,
      });
    });

    it('returns null for an existing id and keeps the original', async () => {
      await store.register('t1', { music: { prompt: 'first' } });
      const again = await store.register('t1', { music: { prompt: 'second' } });

      expect(again).toBeNull();
      expect((await store.get('t1'))?.stages.music.metadata).toEqual({ prompt: 'first' });
    });
  });

  describe('upsert', () => {
    it('applies the mutation and stamps updated_at', async () => {
      await store.register('t1');
      const later = new Date('2026-03-01T11:00:00.000Z');
      const laterStore = new EntityStore(paths, { now: () => later });

      const updated = await laterStore.upsert('t1', completeMusic);

      expect(updated.stages.music.status).toBe('completed');
      expect(updated.updated_at).toBe(later.toISOString());
      expect(updated.created_at).toBe(T0.toISOString());
      expect((await store.get('t1'))?.stages.music.status).toBe('completed');
    });

    it('hands the mutation a private copy', async () => {
      await store.register('t1');
      const before = await store.get('t1');

      await expect(
        store.upsert('t1', (current) => {
          if (current === null) throw new Error('missing');
          current.stages.music.attempt_count = -1;
          return current;
        })
      ).rejects.toThrow();

      expect(await store.get('t1')).toEqual(before);
    });

    it('rejects a mutation that changes the id', async () => {
      await store.register('t1');

      await expect(
        store.upsert('t1', (current) => {
          if (current === null) throw new Error('missing');
          return { ...current, id: 't2' };
        })
      ).rejects.toThrow('Mutation changed entity id from "t1" to "t2"');
    });

    it('backs up the previous file before overwriting', async () => {
      await store.register('t1');
      const firstContent = await fs.readFile(paths.entityStore, 'utf-8');

      await store.upsert('t1', completeMusic);

      expect(await fs.readFile(paths.entityStoreBackup, 'utf-8')).toBe(firstContent);
    });

    it('does not rewrite the file when nothing changed', async () => {
      await store.register('t1');
      const before = await fs.stat(paths.entityStore);
      const content = await fs.readFile(paths.entityStore, 'utf-8');

      await store.upsert('t1', (current) => {
        if (current === null) throw new Error('missing');
        return current;
      });

      expect(await fs.readFile(paths.entityStore, 'utf-8')).toBe(content);
      expect((await fs.stat(paths.entityStore)).mtimeMs).toBe(before.mtimeMs);
    });

    it('serializes concurrent writers without losing updates', async () => {
      await store.register('t1');

      await Promise.all(
        Array.from({ length: 10 }, () =>
          store.upsert('t1', (current) => {
            if (current === null) throw new Error('missing');
            current.stages.music.attempt_count++;
            return current;
          })
        )
      );

      expect((await store.get('t1'))?.stages.music.attempt_count).toBe(10);
    });
  });

  describe('query', () => {
    it('filters by stage status in insertion order', async () => {
      await store.register('a');
      await store.register('b');
      await store.register('c');
      await store.upsert('b', completeMusic);

      const pending = await store.query('music', 'pending');
      const any = await store.query('music', ['pending', 'completed']);

      expect(pending.map((e) => e.id)).toEqual(['a', 'c']);
      expect(any.map((e) => e.id)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('delete', () => {
    it('removes an entity and reports whether it existed', async () => {
      await store.register('t1');

      expect(await store.delete('t1')).toBe(true);
      expect(await store.delete('t1')).toBe(false);
      expect(await store.list()).toEqual([]);
    });
  });

  describe('statistics', () => {
    it('counts statuses per stage and fully completed entities', async () => {
      await store.register('a');
      await store.register('b');
      await store.upsert('a', (entity) => {
        if (entity === null) throw new Error('missing');
        entity.stages.music.status = 'completed';
        entity.stages.image.status = 'skipped';
        entity.stages.video.status = 'completed';
        return entity;
      });

      const stats = await store.statistics();

      expect(stats.total).toBe(2);
      expect(stats.fullyCompleted).toBe(1);
      expect(stats.byStage.music).toEqual({
        pending: 1,
        processing: 0,
        completed: 1,
        failed: 0,
        skipped: 0,
      });
      expect(stats.byStage.image.skipped).toBe(1);
    });
  });
});
