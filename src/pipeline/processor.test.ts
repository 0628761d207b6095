/**
 * Stage Processor Tests
 *
 * @module pipeline/processor.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { EntityStore } from '../storage/entity-store.js';
import { StoreLockError } from '../storage/errors.js';
import { FailureQueue } from '../storage/failure-queue.js';
import { resolveStoragePaths } from '../storage/paths.js';
import { CapabilityError, EntityNotFoundError, PrerequisiteNotMetError } from './errors.js';
import { EventChannel, type PipelineEvent } from './events.js';
import { StageProcessor } from './processor.js';
import { RetryPolicy } from './retry-policy.js';
import { silentLogger, type SleepFn } from './types.js';
import {
  FakeCapability,
  artifactPathFor,
  recordingSleep,
} from '../../tests/helpers/fake-capability.js';

const T0 = new Date('2026-03-01T10:00:00.000Z');

describe('StageProcessor', () => {
  let tempDir: string;
  let store: EntityStore;
  let failures: FailureQueue;
  let events: EventChannel;
  let seen: PipelineEvent[];
  let delays: number[];
  let music: FakeCapability;
  let image: FakeCapability;

  const createProcessor = (sleep: SleepFn): StageProcessor =>
    new StageProcessor({
      store,
      failures,
      retryPolicy: new RetryPolicy(),
      events,
      logger: silentLogger,
      dataDir: tempDir,
      sleep,
      now: () => T0,
    });

  let processor: StageProcessor;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'processor-test-'));
    const paths = resolveStoragePaths(tempDir);
    store = new EntityStore(paths, { now: () => T0 });
    failures = new FailureQueue(paths, { now: () => T0 });
    events = new EventChannel(silentLogger);
    seen = [];
    events.subscribe((event) => seen.push(event));

    const recorder = recordingSleep();
    delays = recorder.delays;
    processor = createProcessor(recorder.sleep);

    music = new FakeCapability('music');
    image = new FakeCapability('image');
    await store.register('t1', { music: { prompt: 'rain on tin roofs' } });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('success', () => {
    it('completes the stage and records the artifact', async () => {
      const result = await processor.process('t1', 'music', music);

      const artifactPath = artifactPathFor(tempDir, 'music', 't1');
      expect(result).toEqual({
        outcome: 'generated',
        entityId: 't1',
        stage: 'music',
        artifactPath,
        retries: 0,
      });

      const record = (await store.get('t1'))?.stages.music;
      expect(record).toEqual({
        status: 'completed',
        artifact_path: artifactPath,
        attempt_count: 0,
        metadata: { prompt: 'rain on tin roofs', provider: 'fake' },
        completed_at: T0.toISOString(),
      });
    });

    it('clears an earlier failure queue entry', async () => {
      await failures.add('t1', 'music', 'old failure', { kind: 'network', attemptCount: 3 });

      await processor.process('t1', 'music', music);

      expect(await failures.list()).toEqual([]);
    });

    it('skips a satisfied stage without calling the capability', async () => {
      await processor.process('t1', 'music', music);
      const again = await processor.process('t1', 'music', music);

      expect(again).toMatchObject({ outcome: 'skipped', reason: 'already_satisfied' });
      expect(music.calls).toEqual(['t1']);
    });

    it('re-runs a satisfied stage when forced', async () => {
      await processor.process('t1', 'music', music);
      const again = await processor.process('t1', 'music', music, { force: true });

      expect(again.outcome).toBe('generated');
      expect(music.calls).toEqual(['t1', 't1']);
    });

    it('adopts an existing artifact for a pending stage', async () => {
      music.existing.set('t1', '/library/t1.mp3');

      const result = await processor.process('t1', 'music', music);

      expect(result).toEqual({
        outcome: 'skipped',
        entityId: 't1',
        stage: 'music',
        reason: 'artifact_exists',
        artifactPath: '/library/t1.mp3',
      });
      expect(music.calls).toEqual([]);
      const record = (await store.get('t1'))?.stages.music;
      expect(record?.status).toBe('skipped');
      expect(record?.artifact_path).toBe('/library/t1.mp3');
    });
  });

  describe('store errors', () => {
    it('propagates a store failure after a successful call instead of failing the stage', async () => {
      jest.spyOn(failures, 'remove').mockRejectedValueOnce(new StoreLockError('/tmp/failed.lock', null, 3));

      await expect(processor.process('t1', 'music', music)).rejects.toBeInstanceOf(StoreLockError);

      const record = (await store.get('t1'))?.stages.music;
      expect(record?.status).toBe('completed');
      expect(record?.artifact_path).toBe(artifactPathFor(tempDir, 'music', 't1'));
      expect(await failures.list()).toEqual([]);
      expect(music.calls).toEqual(['t1']);
    });
  });

  describe('retries', () => {
    it('retries transient errors with the scheduled delays', async () => {
      music.script(
        't1',
        new CapabilityError('network', 'connection reset'),
        new CapabilityError('network', 'connection reset'),
        'ok'
      );

      const result = await processor.process('t1', 'music', music);

      expect(result).toMatchObject({ outcome: 'generated', retries: 2 });
      expect(delays).toEqual([0, 2000]);
      expect(music.calls).toHaveLength(3);
      expect((await store.get('t1'))?.stages.music.attempt_count).toBe(0);

      events.drain();
      expect(seen.map((e) => (e.type === 'entity:retry' ? e.attempt : null))).toEqual([1, 2]);
    });

    it('waits at least as long as the server asks', async () => {
      music.script('t1', new CapabilityError('rate_limit', 'slow down', { retryAfterMs: 90_000 }), 'ok');

      await processor.process('t1', 'music', music);

      expect(delays).toEqual([90_000]);
    });

    it('gives up when the server asks for more than the total wait cap', async () => {
      music.script('t1', new CapabilityError('rate_limit', 'slow down', { retryAfterMs: 3_600_000 }), 'ok');

      const result = await processor.process('t1', 'music', music);

      expect(result).toEqual({
        outcome: 'failed',
        entityId: 't1',
        stage: 'music',
        terminal: true,
        errorKind: 'rate_limit',
        errorMessage: 'slow down',
        retries: 0,
      });
      expect(delays).toEqual([]);
      expect(music.calls).toEqual(['t1']);
    });

    it('fails terminally once retries run out', async () => {
      const reset = (): CapabilityError => new CapabilityError('network', 'connection reset');
      music.script('t1', reset(), reset(), reset(), reset());

      const result = await processor.process('t1', 'music', music);

      expect(result).toEqual({
        outcome: 'failed',
        entityId: 't1',
        stage: 'music',
        terminal: true,
        errorKind: 'network',
        errorMessage: 'connection reset',
        retries: 3,
      });
      expect(delays).toEqual([0, 2000, 4000]);

      const entity = await store.get('t1');
      expect(entity?.stages.music.status).toBe('failed');
      expect(entity?.stages.music.attempt_count).toBe(3);
      expect(entity?.error_history).toEqual([
        { timestamp: T0.toISOString(), stage: 'music', kind: 'network', message: 'connection reset' },
      ]);
      expect(await failures.get('t1', 'music')).toEqual({
        entity_id: 't1',
        stage: 'music',
        failed_at: T0.toISOString(),
        error_kind: 'network',
        error_message: 'connection reset',
        attempt_count: 3,
      });
    });

    it('gives up on authentication errors without waiting', async () => {
      music.script('t1', new CapabilityError('authentication', 'invalid API key'));

      const result = await processor.process('t1', 'music', music);

      expect(result).toMatchObject({ outcome: 'failed', errorKind: 'authentication', retries: 0 });
      expect(delays).toEqual([]);
      expect((await store.get('t1'))?.stages.music.attempt_count).toBe(0);
    });

    it('classifies plain errors as unknown', async () => {
      music.script('t1', new Error('something odd'));

      const result = await processor.process('t1', 'music', music);

      expect(result).toMatchObject({ outcome: 'failed', errorKind: 'unknown', errorMessage: 'something odd' });
    });

    it('starts a fresh episode for a previously failed stage', async () => {
      music.script('t1', new CapabilityError('authentication', 'invalid API key'));
      await processor.process('t1', 'music', music);

      music.script('t1', new CapabilityError('timeout', 'took too long'), 'ok');
      const result = await processor.process('t1', 'music', music);

      expect(result).toMatchObject({ outcome: 'generated', retries: 1 });
      expect(delays).toEqual([5000]);
    });
  });

  describe('cancellation', () => {
    it('stops during a retry wait and leaves the stage processing', async () => {
      const controller = new AbortController();
      const cancellingSleep: SleepFn = async () => {
        controller.abort();
        throw new Error('The operation was aborted');
      };
      music.script('t1', new CapabilityError('server_error', 'bad gateway'));

      const result = await createProcessor(cancellingSleep).process('t1', 'music', music, {
        signal: controller.signal,
      });

      expect(result).toEqual({ outcome: 'cancelled', entityId: 't1', stage: 'music' });
      const record = (await store.get('t1'))?.stages.music;
      expect(record?.status).toBe('processing');
      expect(record?.attempt_count).toBe(1);
    });

    it('keeps the retry count of an interrupted episode', async () => {
      await store.upsert('t1', (current) => {
        if (current === null) throw new Error('missing');
        current.stages.music.status = 'processing';
        current.stages.music.attempt_count = 2;
        return current;
      });
      const reset = (): CapabilityError => new CapabilityError('network', 'connection reset');
      music.script('t1', reset(), reset());

      const result = await processor.process('t1', 'music', music);

      expect(result).toMatchObject({ outcome: 'failed', retries: 3 });
      expect(delays).toEqual([4000]);
    });
  });

  describe('preconditions', () => {
    it('rejects an unknown entity', async () => {
      await expect(processor.process('ghost', 'music', music)).rejects.toBeInstanceOf(EntityNotFoundError);
    });

    it('rejects a stage whose upstream stage is unsatisfied', async () => {
      await expect(processor.process('t1', 'image', image)).rejects.toBeInstanceOf(PrerequisiteNotMetError);
      expect(image.calls).toEqual([]);
    });
  });
});
