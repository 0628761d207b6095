/**
 * Video Stage Capability
 *
 * Composes the cover image and the audio track into a video, then grabs a
 * thumbnail. A failed thumbnail is logged and does not fail the stage.
 *
 * @module workers/video/capability
 */

import { CapabilityError } from '../../pipeline/errors.js';
import type {
  CapabilityContext,
  CapabilityResult,
  HealthStatus,
  StageCapability,
} from '../../pipeline/types.js';
import type { Entity } from '../../schemas/entity.js';
import type { VideoSettings } from '../../schemas/settings.js';
import { fileExists } from '../../storage/atomic.js';
import { getArtifactPath } from '../../storage/paths.js';
import { existingArtifact } from '../artifacts.js';
import type { VideoService } from '../types.js';

export interface VideoCapabilityOptions {
  service: VideoService;
  settings: VideoSettings;
  provider: string;
}

export class VideoCapability implements StageCapability {
  readonly stage = 'video' as const;
  readonly provider: string;

  constructor(private readonly options: VideoCapabilityOptions) {
    this.provider = options.provider;
  }

  async execute(entity: Entity, context: CapabilityContext): Promise<CapabilityResult> {
    const { service, settings } = this.options;
    const audioPath = await requireInput(entity, 'music');
    const imagePath = await requireInput(entity, 'image');

    const outputPath = getArtifactPath(context.dataDir, 'video', entity.id, 'mp4');
    await service.compose(imagePath, audioPath, outputPath, {
      resolution: settings.resolution,
      videoCodec: settings.videoCodec,
      audioCodec: settings.audioCodec,
      audioBitrate: settings.audioBitrate,
      quality: settings.quality,
    });

    const metadata: Record<string, unknown> = { resolution: settings.resolution, quality: settings.quality };
    const thumbnailPath = getArtifactPath(context.dataDir, 'video', entity.id, 'jpg');
    try {
      metadata.thumbnail_path = await service.thumbnail(outputPath, thumbnailPath, settings.thumbnailAt);
    } catch (error) {
      context.logger.warn(
        `video: no thumbnail for ${entity.id}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return { artifactPath: outputPath, metadata };
  }

  async findExisting(entity: Entity, context: CapabilityContext): Promise<string | null> {
    return existingArtifact(getArtifactPath(context.dataDir, 'video', entity.id, 'mp4'));
  }

  async healthCheck(): Promise<HealthStatus> {
    return this.options.service.healthCheck({
      videoCodec: this.options.settings.videoCodec,
      audioCodec: this.options.settings.audioCodec,
    });
  }
}

/**
 * Artifact of an upstream stage, which must still be on disk.
 */
async function requireInput(entity: Entity, stage: 'music' | 'image'): Promise<string> {
  const artifactPath = entity.stages[stage].artifact_path;
  if (artifactPath === null) {
    throw new CapabilityError('unknown', `No ${stage} artifact recorded for "${entity.id}"`);
  }
  if (!(await fileExists(artifactPath))) {
    throw new CapabilityError('local_io', `${stage} artifact of "${entity.id}" is missing: ${artifactPath}`);
  }
  return artifactPath;
}
