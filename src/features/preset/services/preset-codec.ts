/**
 * Preset Codec
 *
 * Reads and writes the TOML preset format. parsePreset(serializePreset(p))
 * yields a preset equal to p.
 */

import { parse, stringify, TomlError } from 'smol-toml';
import { ConfigError } from '@/lib/errors';
import { formatDuration } from '@/utils/duration-utils';
import { PASS_IDS } from '../constants';
import { formatValidationErrors, validatePreset } from '../schemas/preset-schema';
import type { InputSpec, PassSpec, Preset } from '../types';

type TomlTable = Record<string, unknown>;

/**
 * Parse preset TOML text
 * @throws ConfigError (InvalidPreset) on malformed TOML or schema violations
 */
export function parsePreset(text: string, source = 'preset'): Preset {
  let document: TomlTable;
  try {
    document = parse(text);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ConfigError(`Malformed TOML in ${source}`, 'InvalidPreset', [
        `line ${error.line}, column ${error.column}: ${firstLine(error.message)}`,
      ]);
    }
    throw error;
  }

  return presetFromDocument(document, source);
}

/**
 * Validate an already parsed document (e.g. from JSON or a test fixture)
 */
export function presetFromDocument(document: unknown, source = 'preset'): Preset {
  const validation = validatePreset(document);
  if (!validation.success || !validation.data) {
    const issues = validation.errors ? formatValidationErrors(validation.errors) : [];
    throw new ConfigError(`Invalid ${source}`, 'InvalidPreset', issues);
  }
  return validation.data;
}

/**
 * Serialize a preset to TOML text
 */
export function serializePreset(preset: Preset): string {
  const { metadata, settings } = preset;
  const document: TomlTable = {
    id: metadata.id,
    name: metadata.name,
    author: metadata.author,
    description: metadata.description,
    resolution_scale: settings.resolutionScale,
    filter_mode: settings.filterMode,
    layout_mode: settings.layoutMode,
    interval_between_frames: formatDuration(settings.intervalBetweenFrames),
    crossfade_overlap_ratio: settings.crossfadeOverlapRatio,
    time_scale: settings.timeScale,
    time_offset: formatDuration(settings.timeOffset),
    screen_bounds_policy: settings.screenBoundsPolicy,
    monitor_selection: [...settings.monitorSelection],
  };

  for (const id of PASS_IDS) {
    const pass = preset.passes[id];
    if (pass) {
      document[id] = passToTable(pass);
    }
  }

  return stringify(document);
}

function passToTable(pass: PassSpec): TomlTable {
  const table: TomlTable = { shader: pass.shader };
  const slots = Object.keys(pass.inputs)
    .map(Number)
    .sort((a, b) => a - b);

  for (const slot of slots) {
    table[`input_${slot}`] = inputToTable(pass.inputs[slot]);
  }
  return table;
}

function inputToTable(input: InputSpec): TomlTable {
  const table: TomlTable = {
    type: input.type,
    name: input.name,
    wrap: input.wrap,
    filter: input.filter,
    vflip: input.vflip,
  };
  if (input.type === 'misc' && input.frame !== undefined) {
    table.frame = input.frame;
  }
  return table;
}

function firstLine(message: string): string {
  return message.split('\n', 1)[0];
}
