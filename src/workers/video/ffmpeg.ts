/**
 * FFmpeg Video Service
 *
 * Renders a still cover image over an audio track and grabs thumbnails by
 * spawning the ffmpeg binary.
 *
 * @module workers/video/ffmpeg
 */

import { spawn } from 'node:child_process';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CapabilityError } from '../../pipeline/errors.js';
import type { HealthStatus } from '../../pipeline/types.js';
import type { VideoQuality } from '../../schemas/settings.js';
import { isErrnoException } from '../../storage/atomic.js';
import type { VideoComposeParams, VideoService } from '../types.js';
import { localIoError } from '../errors.js';

// ============================================================================
// Process Runner
// ============================================================================

export interface CommandResult {
  /** Exit code, null when killed by a signal */
  code: number | null;
  stdout: string;
  stderr: string;
  /** The process was killed after exceeding its timeout */
  timedOut: boolean;
}

/**
 * Runs a command to completion. Rejects only when the process cannot be
 * started (e.g. ENOENT for a missing binary).
 */
export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/** Keeps the tail of stderr; ffmpeg is chatty */
const MAX_CAPTURE = 64 * 1024;

export const spawnRunner: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], timeout: timeoutMs });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => {
      stdout = (stdout + chunk.toString()).slice(-MAX_CAPTURE);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-MAX_CAPTURE);
    });
    child.on('error', reject);
    child.on('close', (code, signal) => {
      resolve({ code, stdout, stderr, timedOut: code === null && signal === 'SIGTERM' });
    });
  });

// ============================================================================
// Service
// ============================================================================

/** x264 rate factor and speed preset per quality level */
export const VIDEO_QUALITY_PRESETS: Readonly<Record<VideoQuality, { crf: number; preset: string }>> = {
  fast: { crf: 28, preset: 'ultrafast' },
  normal: { crf: 23, preset: 'medium' },
  high: { crf: 18, preset: 'slow' },
};

export interface FfmpegServiceOptions {
  ffmpegPath: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

export class FfmpegVideoService implements VideoService {
  private readonly runner: CommandRunner;

  constructor(private readonly options: FfmpegServiceOptions) {
    this.runner = options.runner ?? spawnRunner;
  }

  async compose(
    imagePath: string,
    audioPath: string,
    outputPath: string,
    params: VideoComposeParams
  ): Promise<string> {
    const [width, height] = params.resolution.split('x');
    const { crf, preset } = VIDEO_QUALITY_PRESETS[params.quality];
    const args = [
      '-y',
      '-loop', '1',
      '-i', imagePath,
      '-i', audioPath,
      '-c:v', params.videoCodec,
      '-preset', preset,
      '-crf', String(crf),
      '-tune', 'stillimage',
      '-vf', `scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
      '-pix_fmt', 'yuv420p',
      '-c:a', params.audioCodec,
      '-b:a', params.audioBitrate,
      '-shortest',
      outputPath,
    ];
    await this.render('Video render', args, outputPath);
    return outputPath;
  }

  async thumbnail(videoPath: string, outputPath: string, timestamp: string): Promise<string> {
    const args = ['-y', '-ss', timestamp, '-i', videoPath, '-vframes', '1', outputPath];
    await this.render('Thumbnail', args, outputPath);
    return outputPath;
  }

  async healthCheck(params: Pick<VideoComposeParams, 'videoCodec' | 'audioCodec'>): Promise<HealthStatus> {
    const { ffmpegPath } = this.options;

    let version: CommandResult;
    try {
      version = await this.runner(ffmpegPath, ['-version'], 10_000);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { ok: false, detail: `ffmpeg not found at "${ffmpegPath}"` };
      }
      throw error;
    }
    if (version.code !== 0) {
      return { ok: false, detail: `"${ffmpegPath} -version" exited with code ${version.code}` };
    }

    const encoders = await this.runner(ffmpegPath, ['-hide_banner', '-encoders'], 10_000);
    const missing = [params.videoCodec, params.audioCodec].filter(
      (codec) => !new RegExp(`\\s${escapeRegExp(codec)}\\s`).test(encoders.stdout)
    );
    if (missing.length > 0) {
      return { ok: false, detail: `ffmpeg lacks encoder(s): ${missing.join(', ')}` };
    }

    return { ok: true, detail: version.stdout.split('\n')[0]?.trim() ?? 'ffmpeg' };
  }

  private async render(action: string, args: string[], outputPath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
    } catch (error) {
      throw localIoError(error, `Creating ${path.dirname(outputPath)}`);
    }

    let result: CommandResult;
    try {
      result = await this.runner(this.options.ffmpegPath, args, this.options.timeoutMs);
    } catch (error) {
      throw localIoError(error, `${action}: starting ${this.options.ffmpegPath}`);
    }

    if (result.timedOut) {
      await fs.rm(outputPath, { force: true });
      throw new CapabilityError(
        'timeout',
        `${action} did not finish within ${Math.round(this.options.timeoutMs / 1000)}s`
      );
    }
    if (result.code !== 0) {
      await fs.rm(outputPath, { force: true });
      throw new CapabilityError('unknown', `${action} failed: ffmpeg exited with code ${result.code}: ${lastLine(result.stderr)}`);
    }
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1]?.trim() || 'no output';
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
