/**
 * Zod Validation Schemas for Preset Files
 *
 * Validates the parsed TOML document and maps its snake_case keys onto the
 * Preset model. Input reference checks that need the whole preset (unknown
 * buffer names, slot ranges, dangling references) are left to the graph builder.
 */

import { z } from 'zod';
import { parseDuration } from '@/utils/duration-utils';
import { DEFAULT_METADATA, DEFAULT_SETTINGS } from '../constants';
import type { InputSpec, PassId, PassSpec, Preset } from '../types';

// ============================================================================
// Shared Schemas
// ============================================================================

const wrapModeSchema = z.enum(['clamp', 'repeat']);

const filterModeSchema = z.enum(['linear', 'nearest', 'mipmap']);

const layoutModeSchema = z.enum(['stretch', 'center', 'repeat', 'mirrored_repeat']);

const screenBoundsPolicySchema = z.enum(['all_monitors', 'selection_monitors', 'cloned']);

const inputTypeSchema = z.enum([
  'misc',
  'texture',
  'cubemap',
  'volume',
  'keyboard',
  'video',
  'music',
  'music_stream',
  'webcam',
  'microphone',
]);

/** Duration string ("2s", "1m 30s") to seconds */
const durationSchema = z.string().transform((value, ctx) => {
  const seconds = parseDuration(value);
  if (seconds === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid duration "${value}" (expected e.g. "2s", "500ms", "1m 30s")`,
    });
    return z.NEVER;
  }
  return seconds;
});

// ============================================================================
// Pass Schemas
// ============================================================================

const INPUT_KEY = /^input_(\d+)$/;

const inputSchema = z
  .object({
    type: inputTypeSchema.default('misc'),
    name: z.string().default(''),
    wrap: wrapModeSchema.default('clamp'),
    filter: filterModeSchema.default('linear'),
    vflip: z.boolean().default(false),
    frame: z.enum(['previous', 'current']).optional(),
  })
  .strict()
  .transform((raw, ctx): InputSpec => {
    const base = { name: raw.name, wrap: raw.wrap, filter: raw.filter, vflip: raw.vflip };

    if (raw.type === 'misc') {
      return raw.frame ? { type: 'misc', ...base, frame: raw.frame } : { type: 'misc', ...base };
    }

    if (raw.frame !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['frame'],
        message: `"frame" only applies to misc (buffer) inputs, not ${raw.type}`,
      });
    }
    return { type: raw.type, ...base };
  });

const passSchema = z
  .object({
    shader: z.string().default(''),
  })
  .catchall(z.unknown())
  .transform((raw, ctx): PassSpec => {
    const inputs: Record<number, InputSpec> = {};

    for (const [key, value] of Object.entries(raw)) {
      if (key === 'shader') continue;

      const match = INPUT_KEY.exec(key);
      if (!match) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Unrecognized key (expected "shader" or "input_N")`,
        });
        continue;
      }

      const parsed = inputSchema.safeParse(value);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key, ...issue.path],
            message: issue.message,
          });
        }
        continue;
      }
      inputs[Number(match[1])] = parsed.data;
    }

    return { shader: raw.shader, inputs };
  });

// ============================================================================
// Preset Schema
// ============================================================================

export const presetSchema = z
  .object({
    id: z.string().default(DEFAULT_METADATA.id),
    name: z.string().default(DEFAULT_METADATA.name),
    author: z.string().default(DEFAULT_METADATA.author),
    description: z.string().default(DEFAULT_METADATA.description),

    resolution_scale: z.number().positive().finite().default(DEFAULT_SETTINGS.resolutionScale),
    filter_mode: filterModeSchema.default(DEFAULT_SETTINGS.filterMode),
    layout_mode: layoutModeSchema.default(DEFAULT_SETTINGS.layoutMode),
    interval_between_frames: durationSchema.default('0s'),
    crossfade_overlap_ratio: z.number().min(0).max(1).default(DEFAULT_SETTINGS.crossfadeOverlapRatio),
    time_scale: z.number().min(0).finite().default(DEFAULT_SETTINGS.timeScale),
    time_offset: durationSchema.default('0s'),
    screen_bounds_policy: screenBoundsPolicySchema.default(DEFAULT_SETTINGS.screenBoundsPolicy),
    monitor_selection: z.array(z.string().min(1)).default([...DEFAULT_SETTINGS.monitorSelection]),

    common: passSchema.optional(),
    buffer_a: passSchema.optional(),
    buffer_b: passSchema.optional(),
    buffer_c: passSchema.optional(),
    buffer_d: passSchema.optional(),
    cube_a: passSchema.optional(),
    image: passSchema.optional(),
  })
  .strict()
  .transform((raw): Preset => {
    const passes: Partial<Record<PassId, PassSpec>> = {};
    const declared: Array<[PassId, PassSpec | undefined]> = [
      ['common', raw.common],
      ['buffer_a', raw.buffer_a],
      ['buffer_b', raw.buffer_b],
      ['buffer_c', raw.buffer_c],
      ['buffer_d', raw.buffer_d],
      ['cube_a', raw.cube_a],
      ['image', raw.image],
    ];
    for (const [id, pass] of declared) {
      if (pass) passes[id] = pass;
    }

    return {
      metadata: {
        id: raw.id,
        name: raw.name,
        author: raw.author,
        description: raw.description,
      },
      settings: {
        resolutionScale: raw.resolution_scale,
        filterMode: raw.filter_mode,
        layoutMode: raw.layout_mode,
        intervalBetweenFrames: raw.interval_between_frames,
        crossfadeOverlapRatio: raw.crossfade_overlap_ratio,
        timeScale: raw.time_scale,
        timeOffset: raw.time_offset,
        screenBoundsPolicy: raw.screen_bounds_policy,
        monitorSelection: raw.monitor_selection,
      },
      passes,
    };
  });

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate a parsed preset document
 */
export function validatePreset(data: unknown): {
  success: boolean;
  data?: Preset;
  errors?: z.ZodError;
} {
  const result = presetSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Format Zod errors into human-readable messages
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? `${path}: ` : ''}${issue.message}`;
  });
}
