/**
 * Cover Image Prompts
 *
 * Builds image prompts from entity metadata. A style names a preset scene;
 * title and mood are woven in when present. An explicit `prompt` in the
 * image metadata replaces the preset scene.
 *
 * @module workers/image/prompts
 */

import type { Entity } from '../../schemas/entity.js';
import { metadataString } from '../artifacts.js';

export interface StylePreset {
  scene: string;
  keywords: readonly string[];
}

export const STYLE_PRESETS: Readonly<Record<string, StylePreset>> = {
  cinematic: {
    scene: 'A wide cinematic landscape at golden hour',
    keywords: ['dramatic sky', 'soft haze', 'depth of field'],
  },
  celtic: {
    scene: 'Rolling green hills under a pale morning sky',
    keywords: ['ancient stone circle', 'misty forest', 'moonlight'],
  },
  lofi: {
    scene: 'A cozy room by a rainy window',
    keywords: ['warm lamp light', 'coffee cup', 'house plants'],
  },
  jazz: {
    scene: 'A smoky late-night bar in the city',
    keywords: ['neon reflections', 'piano keys', 'brass instruments'],
  },
  ambient: {
    scene: 'A vast quiet landscape under a starry sky',
    keywords: ['aurora', 'calm ocean waves', 'distant mountains'],
  },
  classical: {
    scene: 'A grand concert hall before the performance',
    keywords: ['elegant chandelier', 'velvet curtains', 'polished wood'],
  },
};

export const QUALITY_SUFFIX =
  'High quality, 4K resolution, cinematic lighting, professional photography, no text, no watermark.';

export interface ImagePrompt {
  prompt: string;
  /** Preset actually used; null when an explicit prompt was given */
  style: string | null;
}

/**
 * Build the image prompt for an entity.
 *
 * Reads `prompt`, `style`, `mood` and `title` from the image metadata,
 * falling back to the music metadata for style, mood and title. Unknown
 * styles use the default preset.
 */
export function buildImagePrompt(entity: Entity, defaultStyle: string): ImagePrompt {
  const image = entity.stages.image.metadata;
  const music = entity.stages.music.metadata;
  const pick = (key: string): string | undefined =>
    metadataString(image, key) ?? metadataString(music, key);

  const title = pick('title');
  const mood = pick('mood');
  const explicit = metadataString(image, 'prompt');

  if (explicit !== undefined) {
    return { prompt: `${explicit}. ${QUALITY_SUFFIX}`, style: null };
  }

  const requested = pick('style');
  const style =
    requested !== undefined && requested.toLowerCase() in STYLE_PRESETS
      ? requested.toLowerCase()
      : resolveDefaultStyle(defaultStyle);
  const preset = STYLE_PRESETS[style] ?? STYLE_PRESETS.cinematic;

  let prompt = `${preset.scene}, featuring ${preset.keywords.join(', ')}`;
  if (mood !== undefined) prompt += `, ${mood} mood`;
  if (title !== undefined) prompt += `, inspired by "${title}"`;

  return { prompt: `${prompt}. ${QUALITY_SUFFIX}`, style };
}

function resolveDefaultStyle(defaultStyle: string): string {
  const key = defaultStyle.toLowerCase();
  return key in STYLE_PRESETS ? key : 'cinematic';
}
