/**
 * Command Handler Tests
 *
 * Drives each command handler against a temp data directory with
 * in-process capabilities.
 *
 * @module cli/commands/commands.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  createFakeCapabilities,
  recordingSleep,
  type FakeCapabilities,
} from '../../../tests/helpers/fake-capability.js';
import { createPipelineContext, type PipelineContext } from '../../pipeline/context.js';
import { CapabilityError } from '../../pipeline/errors.js';
import { createStageRecord } from '../../schemas/stage.js';
import { BaseCommand, EXIT_CODES } from '../base-command.js';
import type { CliDeps } from '../runtime.js';
import { handleAdd } from './entity/add.js';
import { handleList } from './entity/list.js';
import { handleShow } from './entity/show.js';
import { handleRemove } from './entity/remove.js';
import { handleFailedDismiss, handleFailedList } from './failed.js';
import { handleReconcile } from './reconcile.js';
import { handleResume } from './resume.js';
import { handleRetry } from './retry.js';
import { handleRun } from './run.js';
import { handleScan } from './scan.js';
import { handleStage } from './stage.js';
import { handleStatus } from './status.js';

// ============================================================================
// Test Setup
// ============================================================================

let dataDir: string;
let fakes: FakeCapabilities;
let deps: CliDeps;
let ctx: PipelineContext;
let base: BaseCommand;
let logSpy: jest.SpiedFunction<typeof console.log>;
let warnSpy: jest.SpiedFunction<typeof console.warn>;
let errorSpy: jest.SpiedFunction<typeof console.error>;

beforeEach(async () => {
  dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'trackforge-cli-'));
  fakes = createFakeCapabilities();
  deps = {
    env: { TRACKFORGE_DATA_DIR: dataDir },
    capabilities: fakes,
    sleep: recordingSleep().sleep,
    isInteractive: () => false,
  };
  ctx = createPipelineContext({ dataDir, capabilities: fakes });
  base = new BaseCommand({});

  logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  logSpy.mockRestore();
  warnSpy.mockRestore();
  errorSpy.mockRestore();
  await fs.rm(dataDir, { recursive: true, force: true });
});

/** Every printed line, in order; multi-line messages are split */
function logged(): string[] {
  return logSpy.mock.calls.flatMap((args) => args.map(String).join(' ').split('\n'));
}

function errors(): string[] {
  return errorSpy.mock.calls.map((args) => args.map(String).join(' '));
}

async function addTracks(...ids: string[]): Promise<void> {
  for (const id of ids) {
    await ctx.store.register(id, { music: { prompt: `prompt for ${id}` } });
  }
}

// ============================================================================
// Entity Commands
// ============================================================================

describe('entity add', () => {
  it('registers a track with its music metadata', async () => {
    const code = await handleAdd('rainy-day', { prompt: 'lofi with rain', title: 'Rainy', style: 'lofi' }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const entity = await ctx.store.get('rainy-day');
    expect(entity?.stages.music).toEqual(
      createStageRecord({ prompt: 'lofi with rain', title: 'Rainy', style: 'lofi' })
    );
    expect(entity?.stages.image.status).toBe('pending');
  });

  it('refuses a duplicate id', async () => {
    await addTracks('t1');

    const code = await handleAdd('t1', { prompt: 'again' }, base, deps);

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(errors()).toEqual(['Error: Entity "t1" already exists']);
  });

  it('rejects an id that is not filesystem safe', async () => {
    const code = await handleAdd('../escape', { prompt: 'x' }, base, deps);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(await ctx.store.list()).toEqual([]);
  });
});

describe('entity list', () => {
  it('prints one row per track', async () => {
    await addTracks('t1', 't2');

    const code = await handleList({ format: 'table' }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const lines = logged();
    expect(lines).toContain(`${'t1'.padEnd(24)}${'pending'.padEnd(12).repeat(3)}`);
    expect(lines).toContain('Total: 2 tracks');
  });

  it('filters on a stage status', async () => {
    await addTracks('t1', 't2');
    await ctx.store.upsert('t1', (entity) => {
      if (entity === null) {
        throw new Error('missing');
      }
      entity.stages.music.status = 'failed';
      return entity;
    });

    await handleList({ stage: 'music', status: 'failed', format: 'json' }, base, deps);

    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toEqual([expect.objectContaining({ id: 't1' })]);
  });

  it('needs --status with --stage', async () => {
    const code = await handleList({ stage: 'music' }, base, deps);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(errors()).toEqual(['Error: --stage needs --status']);
  });
});

describe('entity show and remove', () => {
  it('returns NOT_FOUND for an unknown track', async () => {
    expect(await handleShow('ghost', {}, base, deps)).toBe(EXIT_CODES.NOT_FOUND);
    expect(await handleRemove('ghost', base, deps)).toBe(EXIT_CODES.NOT_FOUND);
  });

  it('shows the stage records of a track', async () => {
    await addTracks('t1');

    await handleShow('t1', { format: 'json' }, base, deps);

    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ id: 't1', stages: { music: { metadata: { prompt: 'prompt for t1' } } } });
  });

  it('removes a track together with its failed tasks', async () => {
    await addTracks('t1', 't2');
    await ctx.failures.add('t1', 'music', 'boom', { kind: 'unknown', attemptCount: 1 });

    const code = await handleRemove('t1', base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect((await ctx.store.list()).map((entity) => entity.id)).toEqual(['t2']);
    expect(await ctx.failures.list()).toEqual([]);
  });
});

// ============================================================================
// Run Commands
// ============================================================================

describe('run', () => {
  it('drives every track through every stage and saves a report', async () => {
    await addTracks('t1', 't2');

    const code = await handleRun({}, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(fakes.music.calls).toEqual(['t1', 't2']);
    expect(fakes.video.calls).toEqual(['t1', 't2']);
    expect(logged()).toContain('Totals: 6 generated, 0 skipped, 0 failed, 0 blocked');

    const reports = await fs.readdir(path.join(dataDir, 'reports'));
    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatch(/^pipeline_report_\d{8}_\d{6}\.txt$/);
    expect(await ctx.checkpoints.exists()).toBe(false);
  });

  it('exits with PARTIAL_FAILURE when a track fails terminally', async () => {
    await addTracks('t1', 't2');
    fakes.image.script('t2', new CapabilityError('authentication', 'Missing required API key: OPENAI_API_KEY'));

    const code = await handleRun({}, base, deps);

    expect(code).toBe(EXIT_CODES.PARTIAL_FAILURE);
    expect(fakes.video.calls).toEqual(['t1']);
    expect(logged()).toContain('Totals: 4 generated, 0 skipped, 1 failed, 1 blocked');
    expect(logged()).toContain(
      '  t2 / Cover Image [authentication] Missing required API key: OPENAI_API_KEY'
    );
  });

  it('exits with FATAL when a capability is unhealthy', async () => {
    await addTracks('t1');
    fakes.video.health = { ok: false, detail: 'ffmpeg not found' };

    const code = await handleRun({}, base, deps);

    expect(code).toBe(EXIT_CODES.FATAL);
    expect(fakes.music.calls).toEqual([]);
  });

  it('skips the stages it is told to', async () => {
    await addTracks('t1');

    await handleRun({ skipVideo: true }, base, deps);

    expect(fakes.image.calls).toEqual(['t1']);
    expect(fakes.video.calls).toEqual([]);
  });

  it('changes nothing on a dry run', async () => {
    await addTracks('t1');

    const code = await handleRun({ dryRun: true }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(fakes.music.calls).toEqual([]);
    expect(logged()).toContain('Music: 1 to process, 0 already done, 0 blocked');
    expect((await ctx.store.get('t1'))?.stages.music.status).toBe('pending');
  });

  it('rejects --resume with --discard-checkpoint', async () => {
    const code = await handleRun({ resume: true, discardCheckpoint: true }, base, deps);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
  });

  describe('with an interrupted run pending', () => {
    beforeEach(async () => {
      await addTracks('t1', 't2');
      const checkpoints = createPipelineContext({ dataDir, capabilities: fakes }).checkpoints;
      checkpoints.begin({ mode: 'pipeline', stages: ['music', 'image', 'video'], force: false, limit: null });
      await checkpoints.save('music', null, [], ['t2']);
    });

    it('stops with RESUME_REQUIRED when nobody can be asked', async () => {
      const code = await handleRun({}, base, deps);

      expect(code).toBe(EXIT_CODES.RESUME_REQUIRED);
      expect(fakes.music.calls).toEqual([]);
      expect(await ctx.checkpoints.exists()).toBe(true);
    });

    it('continues the checkpoint when the user says yes', async () => {
      const confirm = jest.fn<(question: string) => Promise<boolean>>().mockResolvedValue(true);

      const code = await handleRun({}, base, { ...deps, isInteractive: () => true, confirm });

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(confirm).toHaveBeenCalledWith('Resume it? [Y/n] ');
      // only the entity the checkpoint still owed at the music stage
      expect(fakes.music.calls).toEqual(['t2']);
    });

    it('starts over when the user says no', async () => {
      const confirm = jest.fn<(question: string) => Promise<boolean>>().mockResolvedValue(false);

      const code = await handleRun({}, base, { ...deps, isInteractive: () => true, confirm });

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(fakes.music.calls).toEqual(['t1', 't2']);
      expect(await ctx.checkpoints.exists()).toBe(false);
    });

    it('discards the checkpoint on request', async () => {
      const code = await handleRun({ discardCheckpoint: true }, base, deps);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(fakes.music.calls).toEqual(['t1', 't2']);
    });

    it('is continued by the resume command', async () => {
      const code = await handleResume({}, base, deps);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(fakes.music.calls).toEqual(['t2']);
      // t1 never got its music, so only t2 moves on
      expect(fakes.image.calls).toEqual(['t2']);
      expect(await ctx.checkpoints.exists()).toBe(false);
    });
  });
});

describe('stage', () => {
  it('runs only the named stage', async () => {
    await addTracks('t1');

    const code = await handleStage('music', {}, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(fakes.music.calls).toEqual(['t1']);
    expect(fakes.image.calls).toEqual([]);
    expect(logged()).toContain('  Music: 1 generated, 0 skipped, 0 failed, 0 blocked (of 1)');
  });

  it('rejects an unknown stage', async () => {
    const code = await handleStage('lyrics', {}, base, deps);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(errors()).toEqual(['Error: Unknown stage "lyrics". Expected one of: music, image, video']);
  });
});

describe('resume', () => {
  it('reports when there is nothing to resume', async () => {
    const code = await handleResume({}, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(logged()).toContain('No interrupted run to resume.');
  });
});

// ============================================================================
// Failure Queue Commands
// ============================================================================

describe('retry', () => {
  it('reports an empty queue', async () => {
    const code = await handleRetry({}, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(logged()).toEqual(['No failed tasks to retry.']);
  });

  it('retries a failed task to success', async () => {
    await addTracks('t1');
    fakes.music.script('t1', new CapabilityError('authentication', 'Missing required API key: SUNO_API_KEY'));
    await handleStage('music', {}, base, deps);
    expect(await ctx.failures.list()).toHaveLength(1);
    logSpy.mockClear();

    const code = await handleRetry({ stage: 'music' }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(logged()).toContain('Retried 1: 1 succeeded, 0 failed, 0 blocked, 0 orphaned');
    expect(await ctx.failures.list()).toEqual([]);
    expect((await ctx.store.get('t1'))?.stages.music.status).toBe('completed');
  });

  it('exits with PARTIAL_FAILURE when a retry fails again', async () => {
    await addTracks('t1');
    const denied = new CapabilityError('authentication', 'Missing required API key: SUNO_API_KEY');
    fakes.music.script('t1', denied, denied);
    await handleStage('music', {}, base, deps);

    const code = await handleRetry({}, base, deps);

    expect(code).toBe(EXIT_CODES.PARTIAL_FAILURE);
    expect(await ctx.failures.list()).toHaveLength(1);
  });

  it('rejects an unknown stage filter', async () => {
    expect(await handleRetry({ stage: 'lyrics' }, base, deps)).toBe(EXIT_CODES.USAGE_ERROR);
  });
});

describe('failed', () => {
  it('lists failed tasks as JSON', async () => {
    await ctx.failures.add('t1', 'image', 'content policy', { kind: 'unknown', attemptCount: 1 });

    const code = await handleFailedList({ format: 'json' }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toEqual([
      expect.objectContaining({ entity_id: 't1', stage: 'image', error_message: 'content policy' }),
    ]);
  });

  it('dismisses a failed task', async () => {
    await ctx.failures.add('t1', 'image', 'content policy', { kind: 'unknown', attemptCount: 1 });

    expect(await handleFailedDismiss('t1', 'image', base, deps)).toBe(EXIT_CODES.SUCCESS);
    expect(await ctx.failures.list()).toEqual([]);
    expect(await handleFailedDismiss('t1', 'image', base, deps)).toBe(EXIT_CODES.NOT_FOUND);
  });
});

// ============================================================================
// Inspection Commands
// ============================================================================

describe('status', () => {
  it('prints statistics as JSON', async () => {
    await addTracks('t1', 't2');
    await handleStage('music', { limit: 1 }, base, deps);
    logSpy.mockClear();

    const code = await handleStatus({ format: 'json' }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      statistics: { total: 2, fullyCompleted: 0, byStage: { music: { completed: 1, pending: 1 } } },
      failures: { total: 0 },
      checkpoint: null,
    });
  });

  it('rejects an unknown format', async () => {
    expect(await handleStatus({ format: 'yaml' }, base, deps)).toBe(EXIT_CODES.USAGE_ERROR);
  });
});

describe('reconcile', () => {
  it('reports when every artifact is present', async () => {
    await addTracks('t1');

    const code = await handleReconcile({}, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(logged()).toEqual(['[OK] Every recorded artifact is present.']);
  });

  it('resets stages whose artifact is gone with --action mark-missing', async () => {
    await addTracks('t1');
    // the fake music capability records a path without writing the file
    await handleStage('music', {}, base, deps);

    const code = await handleReconcile({ action: 'mark-missing' }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect((await ctx.store.get('t1'))?.stages.music.status).toBe('pending');
    expect(logged()).toContain('Reset 1 stage to pending; the next run regenerates them.');
  });

  it('rejects an unknown action', async () => {
    expect(await handleReconcile({ action: 'delete' }, base, deps)).toBe(EXIT_CODES.USAGE_ERROR);
  });

  it('runs before a pipeline run when the settings ask for it', async () => {
    await addTracks('t1');
    await handleStage('music', {}, base, deps);
    await fs.writeFile(
      ctx.paths.settings,
      JSON.stringify({ reconcile: { action: 'mark_missing', beforeRun: true } })
    );

    const code = await handleRun({}, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(fakes.music.calls).toEqual(['t1', 't1']);
    expect(warnSpy.mock.calls.map((args) => String(args[0]))).toContain(
      'Warning: 1 recorded artifact(s) missing (action: mark_missing)'
    );
  });
});

describe('scan', () => {
  it('registers audio files so only the image and video stages run', async () => {
    const folder = path.join(dataDir, 'incoming');
    await fs.mkdir(folder);
    await fs.writeFile(path.join(folder, 't1.mp3'), 'audio');
    await fs.writeFile(path.join(folder, 't2.wav'), 'audio');

    const code = await handleScan(folder, {}, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(logged()).toContain('Added: 2');
    expect(logged()).toContain('[OK] 2 track(s) ready for the image and video stages.');

    await handleRun({}, base, deps);
    expect(fakes.music.calls).toEqual([]);
    expect([...fakes.image.calls].sort()).toEqual(['t1', 't2']);
  });

  it('writes nothing on a dry run', async () => {
    const folder = path.join(dataDir, 'incoming');
    await fs.mkdir(folder);
    await fs.writeFile(path.join(folder, 't1.mp3'), 'audio');

    const code = await handleScan(folder, { dryRun: true }, base, deps);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(logged()).toContain('Dry run: nothing was written.');
    expect(await ctx.store.get('t1')).toBeNull();
  });

  it('reports a missing folder', async () => {
    const folder = path.join(dataDir, 'nowhere');

    expect(await handleScan(folder, {}, base, deps)).toBe(EXIT_CODES.NOT_FOUND);
    expect(errors()).toEqual([`Error: Not a folder: ${folder}`]);
  });
});
