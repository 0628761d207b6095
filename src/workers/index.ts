/**
 * Stage Capabilities
 *
 * Adapters that fulfil the music, cover image and video stages, and the
 * registry that selects them from configuration.
 *
 * @module workers
 */

export type {
  MusicJobState,
  MusicJobStatus,
  MusicGenerationParams,
  MusicService,
  ImageGenerationParams,
  ImageService,
  VideoComposeParams,
  VideoService,
} from './types.js';

export {
  classifyHttpStatus,
  parseRetryAfter,
  httpStatusError,
  classifyTransportError,
  localIoError,
} from './errors.js';

export { writeArtifact, existingArtifact, metadataString } from './artifacts.js';

export { HttpMusicClient, type HttpMusicClientOptions } from './music/client.js';
export { MusicCapability, type MusicCapabilityOptions } from './music/capability.js';
export { RequestLimiter, type RequestLimiterOptions } from './music/limiter.js';

export { OpenAiImageClient, classifyOpenAiError, type ImagesApi, type OpenAiImageClientOptions } from './image/client.js';
export { ImageCapability, type ImageCapabilityOptions } from './image/capability.js';
export { buildImagePrompt, STYLE_PRESETS, QUALITY_SUFFIX, type StylePreset, type ImagePrompt } from './image/prompts.js';

export {
  FfmpegVideoService,
  VIDEO_QUALITY_PRESETS,
  spawnRunner,
  type CommandRunner,
  type CommandResult,
  type FfmpegServiceOptions,
} from './video/ffmpeg.js';
export { VideoCapability, type VideoCapabilityOptions } from './video/capability.js';

export { createCapabilities, apiKeyCheck, type CapabilityDeps } from './registry.js';
