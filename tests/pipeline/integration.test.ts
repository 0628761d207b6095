/**
 * Pipeline Integration Tests
 *
 * End-to-end runs against a real data directory with in-process
 * capabilities: the baseline scenarios plus the cross-cutting properties
 * (status lattice, resume equivalence, error history bound, partial-failure
 * isolation, retry to success).
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { readFileSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createPipelineContext, type PipelineContext } from '../../src/pipeline/context.js';
import { CapabilityError } from '../../src/pipeline/errors.js';
import { PipelineOrchestrator } from '../../src/pipeline/orchestrator.js';
import { EntityStoreFileSchema } from '../../src/schemas/entity.js';
import { STAGE_ORDER, type StageStatus } from '../../src/schemas/stage.js';
import {
  createFakeCapabilities,
  recordingSleep,
  type FakeCapabilities,
} from '../helpers/fake-capability.js';

describe('pipeline integration', () => {
  let dataDir: string;
  let caps: FakeCapabilities;
  let delays: number[];
  let ctx: PipelineContext;
  let orchestrator: PipelineOrchestrator;

  /** A fresh context over the same directory, as a new process would build */
  const restart = (dir: string = dataDir): void => {
    const recorded = recordingSleep();
    delays = recorded.delays;
    ctx = createPipelineContext({ dataDir: dir, capabilities: caps, sleep: recorded.sleep });
    orchestrator = new PipelineOrchestrator(ctx);
  };

  const register = async (...ids: string[]): Promise<void> => {
    for (const id of ids) {
      await ctx.store.register(id, { music: { prompt: `prompt for ${id}` } });
    }
  };

  const finalStatuses = async (): Promise<Record<string, StageStatus[]>> => {
    const statuses: Record<string, StageStatus[]> = {};
    for (const entity of await ctx.store.list()) {
      statuses[entity.id] = STAGE_ORDER.map((stage) => entity.stages[stage].status);
    }
    return statuses;
  };

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'trackforge-integration-'));
    caps = createFakeCapabilities();
    restart();
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // Scenarios
  // ==========================================================================

  it('runs an empty entity set without error', async () => {
    const report = await orchestrator.run();

    expect(report.status).toBe('completed');
    expect(report.totals).toEqual({ generated: 0, skipped: 0, failed: 0, blocked: 0 });
  });

  it('completes every stage of one entity and clears the checkpoint', async () => {
    await register('t1');

    await orchestrator.run();

    expect(await finalStatuses()).toEqual({ t1: ['completed', 'completed', 'completed'] });
    expect(await ctx.checkpoints.exists()).toBe(false);
  });

  it('recovers from two network errors without a failure entry', async () => {
    await register('t1');
    caps.image.script(
      't1',
      new CapabilityError('network', 'connection reset'),
      new CapabilityError('network', 'connection reset')
    );

    await orchestrator.run();

    const entity = await ctx.store.get('t1');
    expect(entity?.stages.image.status).toBe('completed');
    expect(entity?.stages.image.attempt_count).toBe(0);
    expect(caps.image.calls).toEqual(['t1', 't1', 't1']);
    expect(delays).toEqual([0, 2000]);
    expect(await ctx.failures.list()).toEqual([]);
  });

  it('fails immediately on an authentication error', async () => {
    await register('t1');
    caps.image.script('t1', new CapabilityError('authentication', 'Missing required API key: OPENAI_API_KEY'));

    await orchestrator.run();

    const entity = await ctx.store.get('t1');
    expect(entity?.stages.image.status).toBe('failed');
    expect(entity?.stages.image.attempt_count).toBe(0);
    expect(caps.image.calls).toEqual(['t1']);
    const queue = await ctx.failures.list();
    expect(queue.map((task) => [task.entity_id, task.stage, task.error_kind])).toEqual([
      ['t1', 'image', 'authentication'],
    ]);
  });

  it('resumes after a crash without redoing finished work', async () => {
    await register('a', 'b');
    // A got through music and image before the process died; B never started
    for (const stage of ['music', 'image'] as const) {
      await ctx.store.upsert('a', (entity) => {
        if (entity === null) {
          throw new Error('missing a');
        }
        entity.stages[stage].status = 'completed';
        entity.stages[stage].artifact_path = path.join(dataDir, 'artifacts', stage, 'a.out');
        return entity;
      });
    }
    ctx.checkpoints.begin({ mode: 'pipeline', stages: [...STAGE_ORDER], force: false, limit: null });
    await ctx.checkpoints.save('music', 'b', ['a'], ['b']);

    restart();
    const report = await orchestrator.resume();

    expect(report.status).toBe('completed');
    expect(report.resumed).toBe(true);
    expect(caps.music.calls).toEqual(['b']);
    expect(caps.image.calls).toEqual(['b']);
    expect(caps.video.calls).toEqual(['a', 'b']);
    expect(await finalStatuses()).toEqual({
      a: ['completed', 'completed', 'completed'],
      b: ['completed', 'completed', 'completed'],
    });
    expect(await ctx.checkpoints.exists()).toBe(false);
  });

  // ==========================================================================
  // Properties
  // ==========================================================================

  it('only runs a stage once its upstream stage is satisfied', async () => {
    await register('t1', 't2');
    const seen: string[] = [];
    const record = (stage: 'music' | 'image' | 'video') => (entityId: string): void => {
      const file = EntityStoreFileSchema.parse(
        JSON.parse(readFileSync(ctx.paths.entityStore, 'utf-8'))
      );
      const stages = file.entities[entityId]?.stages;
      seen.push(`${stage}:${entityId}:${STAGE_ORDER.map((name) => stages?.[name].status).join(',')}`);
    };
    caps.music.onExecute = record('music');
    caps.image.onExecute = record('image');
    caps.video.onExecute = record('video');

    await orchestrator.run();

    expect(seen).toEqual([
      'music:t1:processing,pending,pending',
      'music:t2:processing,pending,pending',
      'image:t1:completed,processing,pending',
      'image:t2:completed,processing,pending',
      'video:t1:completed,completed,processing',
      'video:t2:completed,completed,processing',
    ]);
  });

  it('reaches the same final state whether or not the run was interrupted', async () => {
    const ids = ['t1', 't2', 't3', 't4'];

    const referenceDir = await fs.mkdtemp(path.join(os.tmpdir(), 'trackforge-reference-'));
    try {
      restart(referenceDir);
      await register(...ids);
      await orchestrator.run();
      const reference = await finalStatuses();

      caps = createFakeCapabilities();
      restart(dataDir);
      await register(...ids);
      const controller = new AbortController();
      caps.music.onExecute = (entityId) => {
        if (entityId === 't2') {
          controller.abort();
        }
      };

      const interrupted = await orchestrator.run({ signal: controller.signal });
      expect(interrupted.status).toBe('cancelled');
      expect(await ctx.checkpoints.exists()).toBe(true);

      restart(dataDir);
      const resumed = await orchestrator.resume();

      expect(resumed.status).toBe('completed');
      expect(await finalStatuses()).toEqual(reference);
      // every entity's music was generated exactly once
      expect(caps.music.calls).toEqual(ids);
    } finally {
      await fs.rm(referenceDir, { recursive: true, force: true });
    }
  });

  it('keeps only the ten most recent errors', async () => {
    await register('t1');
    const errors = Array.from(
      { length: 12 },
      (_, i) => new CapabilityError('authentication', `denied ${i + 1}`)
    );
    caps.music.script('t1', ...errors);

    await orchestrator.runStage('music');
    for (let i = 0; i < 11; i++) {
      await orchestrator.retryFailed();
    }

    const entity = await ctx.store.get('t1');
    expect(entity?.error_history.map((entry) => entry.message)).toEqual(
      Array.from({ length: 10 }, (_, i) => `denied ${i + 3}`)
    );
    expect(await ctx.failures.list()).toHaveLength(1);
  });

  it('isolates one always-failing entity', async () => {
    await register('t1', 't2', 't3');
    // the first attempt plus three retries
    caps.image.script(
      't2',
      ...Array.from({ length: 4 }, () => new CapabilityError('server_error', 'Server error (503): overloaded'))
    );

    const report = await orchestrator.run();

    expect(report.totals.failed).toBe(1);
    expect(delays).toEqual([10000, 20000, 40000]);
    expect(await finalStatuses()).toEqual({
      t1: ['completed', 'completed', 'completed'],
      t2: ['completed', 'failed', 'pending'],
      t3: ['completed', 'completed', 'completed'],
    });
    const queue = await ctx.failures.list();
    expect(queue.map((task) => [task.entity_id, task.stage, task.attempt_count])).toEqual([['t2', 'image', 3]]);
  });

  it('completes a failed stage on retry and empties the queue', async () => {
    await register('t1');
    caps.image.script('t1', new CapabilityError('authentication', 'Missing required API key: OPENAI_API_KEY'));
    await orchestrator.run();

    const retry = await orchestrator.retryFailed();
    await orchestrator.run();

    expect(retry).toMatchObject({ attempted: 1, succeeded: 1, failed: 0 });
    expect(await ctx.failures.list()).toEqual([]);
    expect(await finalStatuses()).toEqual({ t1: ['completed', 'completed', 'completed'] });
  });
});
