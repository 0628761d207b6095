/**
 * Cover Image Stage Capability
 *
 * @module workers/image/capability
 */

import type {
  CapabilityContext,
  CapabilityResult,
  HealthStatus,
  StageCapability,
} from '../../pipeline/types.js';
import type { Entity } from '../../schemas/entity.js';
import type { ImageSettings } from '../../schemas/settings.js';
import { getArtifactPath } from '../../storage/paths.js';
import { existingArtifact, writeArtifact } from '../artifacts.js';
import type { ImageService } from '../types.js';
import { buildImagePrompt } from './prompts.js';

export interface ImageCapabilityOptions {
  service: ImageService;
  settings: ImageSettings;
  provider: string;
  healthCheck?: () => Promise<HealthStatus>;
}

export class ImageCapability implements StageCapability {
  readonly stage = 'image' as const;
  readonly provider: string;
  readonly healthCheck?: () => Promise<HealthStatus>;

  constructor(private readonly options: ImageCapabilityOptions) {
    this.provider = options.provider;
    if (options.healthCheck) {
      this.healthCheck = options.healthCheck;
    }
  }

  async execute(entity: Entity, context: CapabilityContext): Promise<CapabilityResult> {
    const { service, settings } = this.options;
    const { prompt, style } = buildImagePrompt(entity, settings.defaultStyle);
    context.logger.debug(`image: prompt for ${entity.id}: ${prompt}`);

    const bytes = await service.generate(prompt, {
      model: settings.model,
      size: settings.size,
      quality: settings.quality,
    });
    const artifactPath = await writeArtifact(artifactPathOf(entity, context), bytes);

    return {
      artifactPath,
      metadata: { prompt, style, model: settings.model, size: settings.size },
    };
  }

  async findExisting(entity: Entity, context: CapabilityContext): Promise<string | null> {
    return existingArtifact(artifactPathOf(entity, context));
  }
}

function artifactPathOf(entity: Entity, context: CapabilityContext): string {
  return getArtifactPath(context.dataDir, 'image', entity.id, 'png');
}
