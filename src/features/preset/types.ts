/**
 * Preset Type Definitions
 *
 * A preset is the user-facing description of a multipass shader wallpaper:
 * metadata, global settings, and the passes with their channel wiring.
 */

/** Pass identifiers as they appear in preset files */
export type PassId = 'common' | 'buffer_a' | 'buffer_b' | 'buffer_c' | 'buffer_d' | 'cube_a' | 'image';

/** Passes that produce an image (common only contributes source text) */
export type RenderPassId = Exclude<PassId, 'common'>;

/** Passes that own a feedback buffer another pass can read */
export type BufferPassId = Exclude<RenderPassId, 'image'>;

/** Names a buffer-reference input uses to point at a buffer pass */
export type BufferName = 'Buffer A' | 'Buffer B' | 'Buffer C' | 'Buffer D' | 'Cubemap A';

export type WrapMode = 'clamp' | 'repeat';

export type FilterMode = 'linear' | 'nearest' | 'mipmap';

export type LayoutMode = 'stretch' | 'center' | 'repeat' | 'mirrored_repeat';

export type ScreenBoundsPolicy = 'all_monitors' | 'selection_monitors' | 'cloned';

/**
 * Which frame of a referenced buffer an input reads.
 * 'current' reads what the referenced pass wrote earlier in the same frame.
 */
export type FrameTiming = 'previous' | 'current';

export type AssetInputType = 'texture' | 'cubemap' | 'volume';

/** Recognized in configuration but never bound to GPU work */
export type PassiveInputType = 'video' | 'music' | 'music_stream' | 'webcam' | 'microphone';

export type InputType = 'misc' | 'keyboard' | AssetInputType | PassiveInputType;

export interface SamplerSettings {
  wrap: WrapMode;
  filter: FilterMode;
  vflip: boolean;
}

interface InputSpecBase extends SamplerSettings {
  name: string;
}

/** Reference to another pass's output (or the pass's own, for feedback) */
export interface BufferInputSpec extends InputSpecBase {
  type: 'misc';
  /** Overrides the timing derived from execution order */
  frame?: FrameTiming;
}

export interface AssetInputSpec extends InputSpecBase {
  type: AssetInputType;
}

export interface KeyboardInputSpec extends InputSpecBase {
  type: 'keyboard';
}

export interface PassiveInputSpec extends InputSpecBase {
  type: PassiveInputType;
}

export type InputSpec = BufferInputSpec | AssetInputSpec | KeyboardInputSpec | PassiveInputSpec;

export interface PassSpec {
  shader: string;
  /** Channel slot -> input. Slots outside 0..3 are rejected when the graph is built. */
  inputs: Readonly<Record<number, InputSpec>>;
}

export interface PresetMetadata {
  id: string;
  name: string;
  author: string;
  description: string;
}

export interface PresetSettings {
  /** Render resolution relative to the screen canvas, > 0 */
  resolutionScale: number;
  /** Filter used when mapping the rendered canvas onto monitors */
  filterMode: FilterMode;
  layoutMode: LayoutMode;
  /** Seconds between rendered frames; 0 renders on every tick */
  intervalBetweenFrames: number;
  /** Fraction of the interval spent cross-fading, in [0, 1] */
  crossfadeOverlapRatio: number;
  timeScale: number;
  /** Seconds added to simulation time */
  timeOffset: number;
  screenBoundsPolicy: ScreenBoundsPolicy;
  /** Connector names, or "*" for every monitor */
  monitorSelection: string[];
}

export interface Preset {
  metadata: PresetMetadata;
  settings: PresetSettings;
  passes: Partial<Record<PassId, PassSpec>>;
}
