/**
 * Schema Tests
 *
 * @module schemas/schemas.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  EntityIdSchema,
  EntityStoreFileSchema,
  FailureQueueFileSchema,
  CheckpointSchema,
  MAX_ERROR_HISTORY,
  appendErrorHistory,
  createEntity,
  createEmptyStoreFile,
  isSatisfied,
  isStageName,
  upstreamStages,
  migrateSchema,
  needsMigration,
  registerMigration,
  extractSchemaVersion,
  type ErrorHistoryEntry,
} from './index.js';

const NOW = '2026-03-01T10:00:00.000Z';

describe('EntityIdSchema', () => {
  it('accepts filesystem-safe ids', () => {
    expect(EntityIdSchema.parse('track-001')).toBe('track-001');
    expect(EntityIdSchema.parse('Night_Drive.v2')).toBe('Night_Drive.v2');
  });

  it('rejects path traversal and separators', () => {
    expect(EntityIdSchema.safeParse('../etc').success).toBe(false);
    expect(EntityIdSchema.safeParse('a/b').success).toBe(false);
    expect(EntityIdSchema.safeParse('a\\b').success).toBe(false);
    expect(EntityIdSchema.safeParse('.hidden').success).toBe(false);
    expect(EntityIdSchema.safeParse('').success).toBe(false);
  });
});

describe('stage helpers', () => {
  it('lists upstream stages in order', () => {
    expect(upstreamStages('music')).toEqual([]);
    expect(upstreamStages('image')).toEqual(['music']);
    expect(upstreamStages('video')).toEqual(['music', 'image']);
  });

  it('treats completed and skipped as satisfied', () => {
    const entity = createEntity('t1', {}, NOW);
    expect(isSatisfied(entity.stages.music)).toBe(false);
    expect(isSatisfied({ ...entity.stages.music, status: 'completed' })).toBe(true);
    expect(isSatisfied({ ...entity.stages.music, status: 'skipped' })).toBe(true);
    expect(isSatisfied({ ...entity.stages.music, status: 'failed' })).toBe(false);
    expect(isSatisfied({ ...entity.stages.music, status: 'processing' })).toBe(false);
  });

  it('recognizes stage names', () => {
    expect(isStageName('video')).toBe(true);
    expect(isStageName('audio')).toBe(false);
  });
});

describe('createEntity', () => {
  it('creates every stage pending with the given metadata', () => {
    const entity = createEntity('t1', { music: { prompt: 'calm piano' } }, NOW);

    expect(entity.stages.music).toEqual({
      status: 'pending',
      artifact_path: null,
      attempt_count: 0,
      metadata: { prompt: 'calm piano' },
      completed_at: null,
    });
    expect(entity.stages.image.metadata).toEqual({});
    expect(entity.error_history).toEqual([]);
    expect(entity.created_at).toBe(NOW);
    expect(entity.updated_at).toBe(NOW);
  });

  it('rejects an invalid id', () => {
    expect(() => createEntity('bad/id', {}, NOW)).toThrow();
  });
});

describe('appendErrorHistory', () => {
  it(`keeps only the most recent ${MAX_ERROR_HISTORY} entries`, () => {
    let history: ErrorHistoryEntry[] = [];
    for (let i = 0; i < 12; i++) {
      history = appendErrorHistory(history, {
        timestamp: NOW,
        stage: 'music',
        kind: 'network',
        message: `failure ${i}`,
      });
    }

    expect(history).toHaveLength(10);
    expect(history[0].message).toBe('failure 2');
    expect(history[9].message).toBe('failure 11');
  });
});

describe('EntityStoreFileSchema', () => {
  it('accepts an empty store', () => {
    expect(EntityStoreFileSchema.safeParse(createEmptyStoreFile()).success).toBe(true);
  });

  it('rejects a key that does not match the entity id', () => {
    const file = createEmptyStoreFile();
    file.entities['other'] = createEntity('t1', {}, NOW);
    expect(EntityStoreFileSchema.safeParse(file).success).toBe(false);
  });
});

describe('FailureQueueFileSchema', () => {
  it('rejects duplicate (entity, stage) entries', () => {
    const task = {
      entity_id: 't1',
      stage: 'music',
      failed_at: NOW,
      error_kind: 'network',
      error_message: 'boom',
      attempt_count: 3,
    };
    const result = FailureQueueFileSchema.safeParse({
      schema_version: 1,
      failed_tasks: [task, task],
      last_updated: NOW,
    });
    expect(result.success).toBe(false);
  });
});

describe('CheckpointSchema', () => {
  it('requires a non-empty run scope', () => {
    const checkpoint = {
      schema_version: 1,
      is_running: true,
      started_at: NOW,
      current_stage: 'music',
      current_entity_id: null,
      completed_ids: [],
      pending_ids: ['t1'],
      last_updated: NOW,
      run: { mode: 'pipeline', stages: [], force: false, limit: null },
    };
    expect(CheckpointSchema.safeParse(checkpoint).success).toBe(false);
    expect(
      CheckpointSchema.safeParse({ ...checkpoint, run: { ...checkpoint.run, stages: ['music'] } })
        .success
    ).toBe(true);
  });
});

describe('migrations', () => {
  it('reads the version from the metadata block for the entity store', () => {
    expect(extractSchemaVersion({ metadata: { schema_version: 1 } }, 'entityStore')).toBe(1);
    expect(extractSchemaVersion({}, 'failureQueue')).toBe(1);
  });

  it('leaves current documents unchanged', () => {
    const file = createEmptyStoreFile();
    expect(needsMigration(file, 'entityStore')).toBe(false);
    expect(migrateSchema(file, 'entityStore')).toBe(file);
  });

  it('passes non-object input through for validation to reject', () => {
    expect(migrateSchema('garbage', 'checkpoint')).toBe('garbage');
  });

  it('refuses migrations that skip versions', () => {
    expect(() => registerMigration('settings', 1, 3, (data) => data)).toThrow(
      'Migration must increment version by 1. Got 1 -> 3'
    );
  });
});
