/**
 * Service Interfaces
 *
 * Narrow contracts between the stage capabilities and the external
 * services behind them. Each has one production adapter; tests substitute
 * in-process fakes.
 *
 * @module workers/types
 */

import type { HealthStatus } from '../pipeline/types.js';
import type { VideoQuality } from '../schemas/settings.js';

// ============================================================================
// Music
// ============================================================================

export type MusicJobState = 'pending' | 'processing' | 'completed' | 'failed';

export interface MusicJobStatus {
  state: MusicJobState;
  /** Download location, set once completed */
  artifactUrl?: string;
  /** Provider's failure reason, set once failed */
  error?: string;
  /** 0-100, when the provider reports it */
  progress?: number;
}

export interface MusicGenerationParams {
  model: string;
  durationSeconds: number;
  instrumental: boolean;
  style?: string;
  title?: string;
}

export interface MusicService {
  /**
   * Submit a generation job.
   *
   * @returns Provider job id
   */
  submit(prompt: string, params: MusicGenerationParams): Promise<string>;
  poll(jobId: string): Promise<MusicJobStatus>;
  /**
   * Download a finished artifact to `destination`.
   *
   * @returns The destination path
   */
  fetch(artifactUrl: string, destination: string): Promise<string>;
}

// ============================================================================
// Image
// ============================================================================

export interface ImageGenerationParams {
  model: string;
  size: '1024x1024' | '1792x1024' | '1024x1792';
  quality: 'standard' | 'hd';
}

export interface ImageService {
  /**
   * Generate one image.
   *
   * @returns Encoded image bytes (PNG)
   */
  generate(prompt: string, params: ImageGenerationParams): Promise<Buffer>;
}

// ============================================================================
// Video
// ============================================================================

export interface VideoComposeParams {
  /** WIDTHxHEIGHT */
  resolution: string;
  videoCodec: string;
  audioCodec: string;
  audioBitrate: string;
  quality: VideoQuality;
}

export interface VideoService {
  /**
   * Render a still image over an audio track.
   *
   * @returns The output path
   */
  compose(
    imagePath: string,
    audioPath: string,
    outputPath: string,
    params: VideoComposeParams
  ): Promise<string>;

  /**
   * Grab a single frame at `timestamp` (HH:MM:SS).
   *
   * @returns The output path
   */
  thumbnail(videoPath: string, outputPath: string, timestamp: string): Promise<string>;

  /** Binary present and able to encode with the configured codecs */
  healthCheck(params: Pick<VideoComposeParams, 'videoCodec' | 'audioCodec'>): Promise<HealthStatus>;
}
