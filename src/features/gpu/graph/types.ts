/**
 * Render Graph Type Definitions
 */

import type {
  AssetInputType,
  BufferPassId,
  FrameTiming,
  PassiveInputType,
  PresetMetadata,
  PresetSettings,
  RenderPassId,
  SamplerSettings,
} from '@/features/preset/types';
import type { CompileError } from '@/lib/errors';
import type { ProgramHandle } from '../backend/types';

/**
 * Reads another buffer pass (or the pass's own buffer).
 * 'previous' binds the front buffer, 'current' the buffer written earlier this frame.
 */
export interface BufferChannel {
  kind: 'buffer';
  slot: number;
  source: BufferPassId;
  frame: FrameTiming;
  sampler: SamplerSettings;
}

/** A predefined asset or an image file */
export interface AssetChannel {
  kind: 'asset';
  slot: number;
  assetType: AssetInputType;
  name: string;
  sampler: SamplerSettings;
}

export interface KeyboardChannel {
  kind: 'keyboard';
  slot: number;
  sampler: SamplerSettings;
}

/** Audio and video inputs: kept for round-tripping, never bound */
export interface PassiveChannel {
  kind: 'passive';
  slot: number;
  inputType: PassiveInputType;
  name: string;
}

export type ChannelBinding = BufferChannel | AssetChannel | KeyboardChannel | PassiveChannel;

export type PassKind = 'buffer' | 'cube' | 'image';

export interface PlannedPass {
  id: RenderPassId;
  kind: PassKind;
  /** Shader text as written (the built-in shader when image has none) */
  shader: string;
  usesDefaultShader: boolean;
  /** Sorted by slot; unused slots are absent */
  channels: ChannelBinding[];
}

/**
 * Immutable execution plan of one preset load
 */
export interface RenderGraph {
  metadata: PresetMetadata;
  settings: PresetSettings;
  /** Prepended to every pass */
  common: string;
  /** Execution order */
  passes: PlannedPass[];
  /** Non-fatal findings while building */
  warnings: string[];
}

/**
 * A planned pass with the program it runs. A pass whose shader failed to
 * compile runs its fallback program and keeps the error.
 */
export interface CompiledPass {
  plan: PlannedPass;
  program: ProgramHandle;
  compileError: CompileError | null;
}
