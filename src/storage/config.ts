/**
 * Pipeline Settings Storage
 *
 * Settings stored at `<dataDir>/config.json`.
 *
 * @module storage/config
 */

import { SettingsSchema, type Settings, type SettingsInput } from '../schemas/settings.js';
import { migrateSchema } from '../schemas/migrations/index.js';
import { atomicWriteJson, readJsonIfExists } from './atomic.js';

/**
 * Default settings when no config file exists
 */
export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

/**
 * Save settings to disk
 *
 * @param filePath - Path of config.json
 * @param settings - Settings to save (defaults are filled in)
 */
export async function saveSettings(filePath: string, settings: SettingsInput): Promise<Settings> {
  const validated = SettingsSchema.parse(settings);
  await atomicWriteJson(filePath, validated);
  return validated;
}

/**
 * Load settings from disk
 *
 * Returns default settings if the file doesn't exist.
 *
 * @param filePath - Path of config.json
 * @throws Error if the file exists but is invalid
 */
export async function loadSettings(filePath: string): Promise<Settings> {
  const data = await readJsonIfExists(filePath);
  if (data === null) {
    return DEFAULT_SETTINGS;
  }
  return SettingsSchema.parse(migrateSchema(data, 'settings'));
}
