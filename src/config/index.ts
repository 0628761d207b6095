/**
 * Configuration Module
 *
 * Loads and validates environment variables (API keys, provider selection,
 * data directory). Uses Zod for runtime validation with sensible defaults.
 * Pipeline tuning lives in `<dataDir>/config.json`; see storage/config.
 *
 * `.env` is loaded by the CLI entry point through `dotenv/config`.
 *
 * @module config
 */

import { z } from 'zod';
import { getDataDir } from '../storage/paths.js';

// ============================================================================
// Providers
// ============================================================================

export const MUSIC_PROVIDERS = ['http'] as const;
export const IMAGE_PROVIDERS = ['openai'] as const;
export const VIDEO_PROVIDERS = ['ffmpeg'] as const;

export type MusicProvider = (typeof MUSIC_PROVIDERS)[number];
export type ImageProvider = (typeof IMAGE_PROVIDERS)[number];
export type VideoProvider = (typeof VIDEO_PROVIDERS)[number];

// ============================================================================
// Environment Schema
// ============================================================================

/** Empty strings count as unset */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const envSchema = z.object({
  // API keys (optional at load time; checked before a stage runs)
  SUNO_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,

  // Service endpoints and binaries
  SUNO_API_BASE_URL: z.string().url().default('https://api.suno.ai'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),

  // Provider selection
  MUSIC_PROVIDER: z.enum(MUSIC_PROVIDERS).default('http'),
  IMAGE_PROVIDER: z.enum(IMAGE_PROVIDERS).default('openai'),
  VIDEO_PROVIDER: z.enum(VIDEO_PROVIDERS).default('ffmpeg'),

  // Data directory
  TRACKFORGE_DATA_DIR: optionalString,

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

// ============================================================================
// Config
// ============================================================================

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  isProduction: boolean;
  isTest: boolean;
  dataDir: string;
  apiKeys: {
    suno: string | undefined;
    openai: string | undefined;
  };
  providers: {
    music: MusicProvider;
    image: ImageProvider;
    video: VideoProvider;
  };
  music: { baseUrl: string };
  video: { ffmpegPath: string };
}

export type ApiKeyName = keyof AppConfig['apiKeys'];

const API_KEY_VARIABLES: Record<ApiKeyName, string> = {
  suno: 'SUNO_API_KEY',
  openai: 'OPENAI_API_KEY',
};

/**
 * Invalid environment or missing required setting.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application config from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param dataDirOverride - Takes precedence over TRACKFORGE_DATA_DIR (--data-dir)
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  dataDirOverride?: string
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${problems}`, { cause: parsed.error });
  }

  const vars = parsed.data;
  const dataDir = getDataDir({
    TRACKFORGE_DATA_DIR: dataDirOverride ?? vars.TRACKFORGE_DATA_DIR,
  });

  return {
    nodeEnv: vars.NODE_ENV,
    isProduction: vars.NODE_ENV === 'production',
    isTest: vars.NODE_ENV === 'test',
    dataDir,
    apiKeys: {
      suno: vars.SUNO_API_KEY,
      openai: vars.OPENAI_API_KEY,
    },
    providers: {
      music: vars.MUSIC_PROVIDER,
      image: vars.IMAGE_PROVIDER,
      video: vars.VIDEO_PROVIDER,
    },
    music: { baseUrl: vars.SUNO_API_BASE_URL.replace(/\/+$/, '') },
    video: { ffmpegPath: vars.FFMPEG_PATH },
  };
}

/**
 * Check if a specific API is configured
 */
export function hasApiKey(config: AppConfig, api: ApiKeyName): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(config: AppConfig, api: ApiKeyName): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new ConfigError(
      `Missing required API key: ${API_KEY_VARIABLES[api]}. Please set it in your .env file.`
    );
  }
  return key;
}
