/**
 * Pipeline Settings Schema
 *
 * Operator-tunable settings stored in `<dataDir>/config.json`. Every field
 * has a default, so an empty object (or a missing file) is a valid config.
 *
 * @module schemas/settings
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';

// ============================================================================
// Retry Rules
// ============================================================================

/**
 * Retry rule for one error kind.
 *
 * The delay before retry n (0-based) is `delaysMs[min(n, delaysMs.length - 1)]`.
 */
export const RetryRuleSchema = z.object({
  /** Retries allowed before giving up (0 = give up immediately) */
  maxAttempts: z.number().int().nonnegative(),
  delaysMs: z.array(z.number().int().nonnegative()),
  /** Cap on the summed delay of one episode */
  maxTotalWaitMs: z.number().int().positive().optional(),
});

export type RetryRule = z.infer<typeof RetryRuleSchema>;

const RetryRuleOverrideSchema = RetryRuleSchema.partial().optional();

export const RetryPolicyOverridesSchema = z
  .object({
    network: RetryRuleOverrideSchema,
    timeout: RetryRuleOverrideSchema,
    rate_limit: RetryRuleOverrideSchema,
    authentication: RetryRuleOverrideSchema,
    server_error: RetryRuleOverrideSchema,
    local_io: RetryRuleOverrideSchema,
    unknown: RetryRuleOverrideSchema,
  })
  .strict();

export type RetryPolicyOverrides = z.infer<typeof RetryPolicyOverridesSchema>;

// ============================================================================
// Stage Settings
// ============================================================================

export const MusicSettingsSchema = z.object({
  model: z.string().min(1).default('chirp-v3-5'),
  durationSeconds: z.number().int().positive().default(180),
  instrumental: z.boolean().default(false),
  /** Delay between job status polls */
  pollIntervalMs: z.number().int().positive().default(5000),
  /** Give up waiting for a job after this long */
  timeoutMs: z.number().int().positive().default(10 * 60 * 1000),
  /** Per-request HTTP timeout */
  requestTimeoutMs: z.number().int().positive().default(30 * 1000),
  extension: z.string().regex(/^[a-z0-9]+$/).default('mp3'),
  /** Generation requests allowed in any 60s window */
  requestsPerMinute: z.number().int().positive().default(10),
  /** Generation requests allowed per local calendar day */
  dailyLimit: z.number().int().positive().default(60),
});

export type MusicSettings = z.infer<typeof MusicSettingsSchema>;

export const ImageSettingsSchema = z.object({
  model: z.string().min(1).default('dall-e-3'),
  size: z.enum(['1024x1024', '1792x1024', '1024x1792']).default('1792x1024'),
  quality: z.enum(['standard', 'hd']).default('hd'),
  /** Style preset used when an entity names none */
  defaultStyle: z.string().min(1).default('cinematic'),
  requestTimeoutMs: z.number().int().positive().default(120 * 1000),
});

export type ImageSettings = z.infer<typeof ImageSettingsSchema>;

export const VIDEO_QUALITIES = ['fast', 'normal', 'high'] as const;

export const VideoQualitySchema = z.enum(VIDEO_QUALITIES);

export type VideoQuality = z.infer<typeof VideoQualitySchema>;

export const VideoSettingsSchema = z.object({
  resolution: z
    .string()
    .regex(/^\d+x\d+$/, 'Resolution must be WIDTHxHEIGHT')
    .default('1920x1080'),
  videoCodec: z.string().min(1).default('libx264'),
  audioCodec: z.string().min(1).default('aac'),
  audioBitrate: z.string().regex(/^\d+k$/).default('192k'),
  /** Encoder speed/size trade-off, see VIDEO_QUALITY_PRESETS */
  quality: VideoQualitySchema.default('normal'),
  /** Thumbnail frame position (HH:MM:SS) */
  thumbnailAt: z
    .string()
    .regex(/^\d{2}:\d{2}:\d{2}$/)
    .default('00:00:05'),
  timeoutMs: z.number().int().positive().default(10 * 60 * 1000),
});

export type VideoSettings = z.infer<typeof VideoSettingsSchema>;

export const MISSING_ARTIFACT_ACTIONS = ['warn', 'remove', 'mark_missing'] as const;

export const MissingArtifactActionSchema = z.enum(MISSING_ARTIFACT_ACTIONS);

export type MissingArtifactAction = z.infer<typeof MissingArtifactActionSchema>;

// ============================================================================
// Settings
// ============================================================================

export const SettingsSchema = z.object({
  schema_version: z.number().int().positive().default(SCHEMA_VERSIONS.settings),
  /** Entities processed in parallel within a stage */
  concurrency: z.number().int().min(1).max(16).default(1),
  retryPolicy: RetryPolicyOverridesSchema.default({}),
  music: MusicSettingsSchema.default({}),
  image: ImageSettingsSchema.default({}),
  video: VideoSettingsSchema.default({}),
  reconcile: z
    .object({
      action: MissingArtifactActionSchema.default('warn'),
      /** Check artifacts at the start of every `run` */
      beforeRun: z.boolean().default(false),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
