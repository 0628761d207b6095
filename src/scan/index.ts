/**
 * Music Folder Scan
 *
 * Registers audio files that were produced outside the pipeline. Each file's
 * name without extension becomes the entity id and the file is adopted as
 * the music artifact (`skipped`), so only the image and video stages run.
 *
 * @module scan
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { PipelineContext } from '../pipeline/context.js';
import { EntityIdSchema } from '../schemas/common.js';
import { createEntity } from '../schemas/entity.js';
import { isSatisfied } from '../schemas/stage.js';

// ============================================================================
// Types
// ============================================================================

/** In preference order when one name exists with several extensions */
export const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.flac'] as const;

export interface ScannedTrack {
  entityId: string;
  /** Absolute path of the audio file */
  filePath: string;
}

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface FolderScan {
  tracks: ScannedTrack[];
  skipped: SkippedFile[];
}

export interface ScanReport {
  folder: string;
  /** New entities */
  added: string[];
  /** Existing entities whose music stage now points at the file */
  adopted: string[];
  /** Existing entities whose music stage was already done */
  unchanged: string[];
  skipped: SkippedFile[];
}

export type ScanContext = Pick<PipelineContext, 'store' | 'failures' | 'logger' | 'now'>;

// ============================================================================
// Folder Listing
// ============================================================================

/**
 * List the audio files directly inside `folder`, sorted by entity id.
 * Hidden files and other extensions are ignored. Names that are not valid
 * entity ids, and extra extensions of a name already seen, are reported in
 * `skipped`.
 *
 * @throws Error (ENOENT, ENOTDIR) when the folder cannot be read
 */
export async function scanMusicFolder(folder: string): Promise<FolderScan> {
  const root = path.resolve(folder);
  const entries = await fs.readdir(root, { withFileTypes: true });
  const byId = new Map<string, { rank: number; fileName: string }>();
  const skipped: SkippedFile[] = [];

  const candidates = entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => ({ fileName: entry.name, rank: extensionRank(entry.name) }))
    .filter((candidate) => candidate.rank >= 0)
    .sort((a, b) => a.rank - b.rank || a.fileName.localeCompare(b.fileName));

  for (const { fileName, rank } of candidates) {
    const stem = fileName.slice(0, -AUDIO_EXTENSIONS[rank].length);
    const id = EntityIdSchema.safeParse(stem);
    if (!id.success) {
      skipped.push({ fileName, reason: id.error.issues[0]?.message ?? 'invalid entity id' });
      continue;
    }
    const seen = byId.get(id.data);
    if (seen) {
      skipped.push({ fileName, reason: `same track as ${seen.fileName}` });
      continue;
    }
    byId.set(id.data, { rank, fileName });
  }

  const tracks = [...byId.entries()]
    .map(([entityId, { fileName }]) => ({ entityId, filePath: path.join(root, fileName) }))
    .sort((a, b) => a.entityId.localeCompare(b.entityId));

  return { tracks, skipped };
}

function extensionRank(fileName: string): number {
  const extension = path.extname(fileName).toLowerCase();
  return AUDIO_EXTENSIONS.findIndex((candidate) => candidate === extension);
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Scan `folder` and register or adopt every track found. With `dryRun`
 * the report is computed without writing.
 */
export async function registerFromFolder(
  ctx: ScanContext,
  folder: string,
  options: { dryRun?: boolean } = {}
): Promise<ScanReport> {
  const scan = await scanMusicFolder(folder);
  const report: ScanReport = {
    folder: path.resolve(folder),
    added: [],
    adopted: [],
    unchanged: [],
    skipped: scan.skipped,
  };

  for (const item of scan.skipped) {
    ctx.logger.warn(`scan: skipped ${item.fileName}: ${item.reason}`);
  }

  for (const track of scan.tracks) {
    const outcome = options.dryRun ? await planTrack(ctx, track) : await adoptTrack(ctx, track);
    report[outcome].push(track.entityId);
  }

  return report;
}

type TrackOutcome = 'added' | 'adopted' | 'unchanged';

async function planTrack(ctx: ScanContext, track: ScannedTrack): Promise<TrackOutcome> {
  const current = await ctx.store.get(track.entityId);
  if (current === null) {
    return 'added';
  }
  return isSatisfied(current.stages.music) ? 'unchanged' : 'adopted';
}

async function adoptTrack(ctx: ScanContext, track: ScannedTrack): Promise<TrackOutcome> {
  const { entityId, filePath } = track;
  const result: { outcome: TrackOutcome } = { outcome: 'unchanged' };

  await ctx.store.upsert(entityId, (current) => {
    const timestamp = ctx.now().toISOString();
    const next = current ?? createEntity(entityId, { music: { title: entityId } }, timestamp);
    const record = next.stages.music;
    if (current !== null && isSatisfied(record)) {
      return next;
    }

    result.outcome = current === null ? 'added' : 'adopted';
    record.status = 'skipped';
    record.artifact_path = filePath;
    record.attempt_count = 0;
    record.metadata = { ...record.metadata, source_file: filePath };
    record.completed_at = timestamp;
    return next;
  });

  const { outcome } = result;
  if (outcome === 'adopted') {
    await ctx.failures.remove(entityId, 'music');
  }
  if (outcome !== 'unchanged') {
    ctx.logger.debug(`scan: ${outcome} ${entityId} from ${filePath}`);
  }
  return outcome;
}
