/**
 * Capability Registry
 *
 * Builds the stage capabilities for the providers named in the
 * configuration. Each provider has one factory; the pipeline core never
 * branches on provider identity.
 *
 * @module workers/registry
 */

import { ConfigError, requireApiKey, type ApiKeyName, type AppConfig } from '../config/index.js';
import type { CapabilityMap, HealthStatus, SleepFn } from '../pipeline/types.js';
import type { Settings } from '../schemas/settings.js';
import { defaultSleep } from '../pipeline/processor.js';
import { OpenAiImageClient } from './image/client.js';
import { ImageCapability } from './image/capability.js';
import { HttpMusicClient } from './music/client.js';
import { RequestLimiter } from './music/limiter.js';
import { MusicCapability } from './music/capability.js';
import type { ImageService, MusicService, VideoService } from './types.js';
import { FfmpegVideoService } from './video/ffmpeg.js';
import { VideoCapability } from './video/capability.js';

export interface CapabilityDeps {
  config: AppConfig;
  settings: Settings;
  /** Poll wait for long-running jobs */
  sleep?: SleepFn;
  /** Replace a provider's service (tests, embedding) */
  services?: {
    music?: MusicService;
    image?: ImageService;
    video?: VideoService;
  };
}

/**
 * Build one capability per stage.
 */
export function createCapabilities(deps: CapabilityDeps): CapabilityMap {
  const { config, settings } = deps;
  const sleep = deps.sleep ?? defaultSleep;

  const music = new MusicCapability({
    provider: config.providers.music,
    settings: settings.music,
    sleep,
    service:
      deps.services?.music ??
      new HttpMusicClient({
        apiKey: config.apiKeys.suno,
        baseUrl: config.music.baseUrl,
        timeoutMs: settings.music.requestTimeoutMs,
        limiter: new RequestLimiter({
          perMinute: settings.music.requestsPerMinute,
          perDay: settings.music.dailyLimit,
          sleep,
        }),
      }),
    healthCheck: deps.services?.music ? undefined : apiKeyCheck(config, 'suno'),
  });

  const image = new ImageCapability({
    provider: config.providers.image,
    settings: settings.image,
    service:
      deps.services?.image ??
      new OpenAiImageClient({
        apiKey: config.apiKeys.openai,
        timeoutMs: settings.image.requestTimeoutMs,
      }),
    healthCheck: deps.services?.image ? undefined : apiKeyCheck(config, 'openai'),
  });

  const video = new VideoCapability({
    provider: config.providers.video,
    settings: settings.video,
    service:
      deps.services?.video ??
      new FfmpegVideoService({
        ffmpegPath: config.video.ffmpegPath,
        timeoutMs: settings.video.timeoutMs,
      }),
  });

  return { music, image, video };
}

/**
 * Health check that passes when the provider's API key is configured.
 */
export function apiKeyCheck(config: AppConfig, api: ApiKeyName): () => Promise<HealthStatus> {
  return async () => {
    try {
      requireApiKey(config, api);
      return { ok: true, detail: `${api} API key configured` };
    } catch (error) {
      if (error instanceof ConfigError) {
        return { ok: false, detail: error.message };
      }
      throw error;
    }
  };
}
