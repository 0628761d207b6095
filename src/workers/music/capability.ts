/**
 * Music Stage Capability
 *
 * Submits a generation job, polls until it finishes (or the wait budget is
 * spent) and downloads the audio into the artifact directory.
 *
 * @module workers/music/capability
 */

import { CapabilityError } from '../../pipeline/errors.js';
import type {
  CapabilityContext,
  CapabilityResult,
  HealthStatus,
  SleepFn,
  StageCapability,
} from '../../pipeline/types.js';
import type { Entity } from '../../schemas/entity.js';
import type { MusicSettings } from '../../schemas/settings.js';
import { getArtifactPath } from '../../storage/paths.js';
import { existingArtifact, metadataString } from '../artifacts.js';
import type { MusicService } from '../types.js';

export interface MusicCapabilityOptions {
  service: MusicService;
  settings: MusicSettings;
  provider: string;
  /** Wait between polls */
  sleep: SleepFn;
  now?: () => number;
  healthCheck?: () => Promise<HealthStatus>;
}

export class MusicCapability implements StageCapability {
  readonly stage = 'music' as const;
  readonly provider: string;
  readonly healthCheck?: () => Promise<HealthStatus>;

  private readonly now: () => number;
  /** Jobs submitted but not yet downloaded, by entity id */
  private readonly outstanding = new Map<string, { jobId: string; prompt: string }>();

  constructor(private readonly options: MusicCapabilityOptions) {
    this.provider = options.provider;
    this.now = options.now ?? Date.now;
    if (options.healthCheck) {
      this.healthCheck = options.healthCheck;
    }
  }

  async execute(entity: Entity, context: CapabilityContext): Promise<CapabilityResult> {
    const { service, settings } = this.options;
    const metadata = entity.stages.music.metadata;

    const prompt = metadataString(metadata, 'prompt');
    if (prompt === undefined) {
      throw new CapabilityError('unknown', `No music prompt in metadata of "${entity.id}"`);
    }

    const jobId = await this.submitOnce(entity, prompt, context);
    const artifactUrl = await this.waitForCompletion(jobId, entity.id, context);
    const destination = this.artifactPath(entity, context);
    const artifactPath = await service.fetch(artifactUrl, destination);
    this.outstanding.delete(entity.id);

    return {
      artifactPath,
      metadata: { job_id: jobId, model: settings.model, duration_seconds: settings.durationSeconds },
    };
  }

  /**
   * An audio file already at the artifact path is adopted as-is.
   */
  async findExisting(entity: Entity, context: CapabilityContext): Promise<string | null> {
    return existingArtifact(this.artifactPath(entity, context));
  }

  /**
   * Submit a job for the entity, or pick up the one a failed poll or
   * download left behind, so a retried attempt never pays for a second
   * generation of the same prompt.
   */
  private async submitOnce(entity: Entity, prompt: string, context: CapabilityContext): Promise<string> {
    const pending = this.outstanding.get(entity.id);
    if (pending !== undefined && pending.prompt === prompt) {
      context.logger.debug(`music: resuming job ${pending.jobId} for ${entity.id}`);
      return pending.jobId;
    }

    const { service, settings } = this.options;
    const metadata = entity.stages.music.metadata;
    const jobId = await service.submit(prompt, {
      model: metadataString(metadata, 'model') ?? settings.model,
      durationSeconds: settings.durationSeconds,
      instrumental: metadata.instrumental === true || settings.instrumental,
      style: metadataString(metadata, 'style'),
      title: metadataString(metadata, 'title'),
    });
    this.outstanding.set(entity.id, { jobId, prompt });
    context.logger.debug(`music: job ${jobId} submitted for ${entity.id}`);
    return jobId;
  }

  private async waitForCompletion(jobId: string, entityId: string, context: CapabilityContext): Promise<string> {
    const { service, settings, sleep } = this.options;
    const deadline = this.now() + settings.timeoutMs;

    for (;;) {
      const status = await service.poll(jobId);

      if (status.state === 'completed') {
        if (status.artifactUrl === undefined) {
          throw new CapabilityError('server_error', `Music job ${jobId} completed without an audio URL`);
        }
        return status.artifactUrl;
      }
      if (status.state === 'failed') {
        this.outstanding.delete(entityId);
        throw new CapabilityError(
          'server_error',
          `Music job ${jobId} failed: ${status.error ?? 'no reason given'}`
        );
      }
      if (this.now() >= deadline) {
        throw new CapabilityError(
          'timeout',
          `Music job ${jobId} did not finish within ${Math.round(settings.timeoutMs / 1000)}s`
        );
      }

      if (status.progress !== undefined) {
        context.logger.debug(`music: ${entityId} job ${jobId} at ${status.progress}%`);
      }
      await sleep(settings.pollIntervalMs);
    }
  }

  private artifactPath(entity: Entity, context: CapabilityContext): string {
    return getArtifactPath(context.dataDir, 'music', entity.id, this.options.settings.extension);
  }
}
