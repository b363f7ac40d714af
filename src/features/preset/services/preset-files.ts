/**
 * Preset file access: read one preset, save by id, or pick one from a directory.
 */

import fs from 'fs/promises';
import path from 'path';
import { config } from '@/lib/config';
import { ConfigError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { parsePreset, serializePreset } from './preset-codec';
import type { Preset } from '../types';

const log = createLogger('PresetFiles');

export const PRESET_EXTENSION = '.toml';

/**
 * Read and validate a preset file
 * @throws ConfigError when the file cannot be read or is not a valid preset
 */
export async function readPresetFile(filePath: string): Promise<Preset> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read preset ${filePath}`, 'InvalidPreset', [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parsePreset(text, filePath);
}

/**
 * Write a preset as <id>.toml inside a directory
 * @returns the written file path
 */
export async function savePreset(directory: string, preset: Preset): Promise<string> {
  if (!/^[\w.-]+$/.test(preset.metadata.id) || preset.metadata.id.startsWith('.')) {
    throw new ConfigError('Cannot save preset', 'InvalidPreset', [
      `id: "${preset.metadata.id}" is not usable as a file name`,
    ]);
  }

  await fs.mkdir(directory, { recursive: true });
  const filePath = path.join(directory, `${preset.metadata.id}${PRESET_EXTENSION}`);
  await fs.writeFile(filePath, serializePreset(preset), 'utf8');
  log.debug(`Saved ${filePath}`);
  return filePath;
}

/**
 * List preset files of a directory, sorted by name
 */
export async function listPresetFiles(directory: string = config.presetsDir): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === PRESET_EXTENSION)
    .map((entry) => path.join(directory, entry.name))
    .sort();
}

/**
 * Pick a random preset from a directory, the configured presets directory by default
 * @param random - source of numbers in [0, 1)
 */
export async function pickPresetFromDirectory(
  directory: string = config.presetsDir,
  random: () => number = Math.random
): Promise<{ path: string; preset: Preset }> {
  const files = await listPresetFiles(directory);
  if (files.length === 0) {
    throw new ConfigError(`No ${PRESET_EXTENSION} presets in ${directory}`, 'InvalidPreset');
  }

  const index = Math.min(files.length - 1, Math.floor(random() * files.length));
  const picked = files[index];
  log.info(`Picked ${path.basename(picked)} of ${files.length} presets`);
  return { path: picked, preset: await readPresetFile(picked) };
}
