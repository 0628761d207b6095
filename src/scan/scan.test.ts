/**
 * Music Folder Scan Tests
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createPipelineContext, type PipelineContext } from '../pipeline/context.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { registerFromFolder, scanMusicFolder } from './index.js';

const NOW = new Date('2026-03-01T10:00:00.000Z');

const INVALID_ID =
  'Entity id may only contain letters, digits, ".", "_" and "-", and must start with a letter or digit';

describe('scan', () => {
  let tempDir: string;
  let folder: string;
  let ctx: PipelineContext;
  let warn: jest.Mock<Logger['warn']>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-test-'));
    folder = path.join(tempDir, 'incoming');
    await fs.mkdir(folder);
    warn = jest.fn<Logger['warn']>();
    ctx = createPipelineContext({
      dataDir: path.join(tempDir, 'data'),
      capabilities: {},
      logger: { ...silentLogger, warn },
      now: () => NOW,
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      await fs.writeFile(path.join(folder, name), 'audio');
    }
  }

  describe('scanMusicFolder', () => {
    it('lists audio files by entity id', async () => {
      await touch('b-side.wav', 'a-side.mp3', 'c-side.FLAC', 'notes.txt', '.hidden.mp3');
      await fs.mkdir(path.join(folder, 'nested.mp3'));

      const scan = await scanMusicFolder(folder);

      expect(scan.tracks).toEqual([
        { entityId: 'a-side', filePath: path.join(folder, 'a-side.mp3') },
        { entityId: 'b-side', filePath: path.join(folder, 'b-side.wav') },
        { entityId: 'c-side', filePath: path.join(folder, 'c-side.FLAC') },
      ]);
      expect(scan.skipped).toEqual([]);
    });

    it('skips names that are not entity ids and duplicate extensions', async () => {
      await touch('my song.mp3', 't1.flac', 't1.mp3');

      const scan = await scanMusicFolder(folder);

      expect(scan.tracks).toEqual([{ entityId: 't1', filePath: path.join(folder, 't1.mp3') }]);
      expect(scan.skipped).toEqual([
        { fileName: 'my song.mp3', reason: INVALID_ID },
        { fileName: 't1.flac', reason: 'same track as t1.mp3' },
      ]);
    });

    it('fails for a missing folder', async () => {
      await expect(scanMusicFolder(path.join(tempDir, 'nowhere'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('registerFromFolder', () => {
    it('registers new tracks with the file adopted as the music artifact', async () => {
      await touch('t1.mp3');

      const report = await registerFromFolder(ctx, folder);

      expect(report).toEqual({
        folder,
        added: ['t1'],
        adopted: [],
        unchanged: [],
        skipped: [],
      });
      const entity = await ctx.store.get('t1');
      expect(entity?.stages.music).toEqual({
        status: 'skipped',
        artifact_path: path.join(folder, 't1.mp3'),
        attempt_count: 0,
        metadata: { title: 't1', source_file: path.join(folder, 't1.mp3') },
        completed_at: '2026-03-01T10:00:00.000Z',
      });
      expect(entity?.stages.image.status).toBe('pending');
    });

    it('adopts the file for an entity whose music stage failed', async () => {
      await touch('t1.mp3');
      await ctx.store.register('t1', { music: { prompt: 'piano' } });
      await ctx.store.upsert('t1', (current) => {
        if (current === null) throw new Error('no entity t1');
        current.stages.music.status = 'failed';
        current.stages.music.attempt_count = 3;
        return current;
      });
      await ctx.failures.add('t1', 'music', 'boom', { kind: 'server_error', attemptCount: 3 });

      const report = await registerFromFolder(ctx, folder);

      expect(report.adopted).toEqual(['t1']);
      const music = (await ctx.store.get('t1'))?.stages.music;
      expect(music?.status).toBe('skipped');
      expect(music?.attempt_count).toBe(0);
      expect(music?.metadata).toEqual({ prompt: 'piano', source_file: path.join(folder, 't1.mp3') });
      expect(await ctx.failures.list()).toEqual([]);
    });

    it('leaves entities whose music is already done', async () => {
      await touch('t1.mp3');
      await ctx.store.register('t1');
      await ctx.store.upsert('t1', (current) => {
        if (current === null) throw new Error('no entity t1');
        current.stages.music.status = 'completed';
        current.stages.music.artifact_path = '/data/music/t1.mp3';
        return current;
      });

      const report = await registerFromFolder(ctx, folder);

      expect(report.unchanged).toEqual(['t1']);
      expect((await ctx.store.get('t1'))?.stages.music.artifact_path).toBe('/data/music/t1.mp3');
    });

    it('reports without writing on a dry run', async () => {
      await touch('t1.mp3', 't2.wav', 'bad name.mp3');
      await ctx.store.register('t2');

      const report = await registerFromFolder(ctx, folder, { dryRun: true });

      expect(report.added).toEqual(['t1']);
      expect(report.adopted).toEqual(['t2']);
      expect(await ctx.store.get('t1')).toBeNull();
      expect((await ctx.store.get('t2'))?.stages.music.status).toBe('pending');
      expect(warn).toHaveBeenCalledWith(`scan: skipped bad name.mp3: ${INVALID_ID}`);
    });
  });
});
