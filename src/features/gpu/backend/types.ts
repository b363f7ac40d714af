/**
 * GPU Backend Types
 *
 * The GPU is an external collaborator. Everything the render pipeline needs
 * from it goes through RenderBackend, so a WebGL host and the in-memory
 * headless backend are interchangeable.
 */

import type { FilterMode } from '@/features/preset/types';
import type { LayoutMapping, Monitor } from '@/features/layout/types';

export type BackendName = 'headless' | 'webgl2';

export type TextureFormat = 'rgba8unorm' | 'rgba16float' | 'r8unorm';

export type TextureKind = '2d' | 'cube' | '3d';

export interface TextureHandle {
  readonly id: string;
  readonly kind: TextureKind;
  readonly width: number;
  readonly height: number;
  /** Layers of a 3D texture; 1 otherwise */
  readonly depth: number;
  readonly format: TextureFormat;
}

export interface TextureDescriptor {
  kind: TextureKind;
  width: number;
  height: number;
  depth?: number;
  format: TextureFormat;
}

export interface ProgramHandle {
  readonly id: string;
}

/** Compile outcome; `line` is 1-based within the submitted source */
export type CompileResult =
  | { ok: true; program: ProgramHandle }
  | { ok: false; line: number | null; message: string };

export interface SamplerState {
  wrap: 'clamp' | 'repeat' | 'mirrored_repeat';
  filter: FilterMode;
  vflip: boolean;
}

export interface ChannelDescriptor {
  slot: number;
  texture: TextureHandle;
  sampler: SamplerState;
}

export type UniformValue = number | readonly number[];

export interface DrawDescriptor {
  program: ProgramHandle;
  target: TextureHandle;
  /** Cube face 0..5 when the target is a cube texture */
  face?: number;
  channels: ChannelDescriptor[];
  uniforms: Readonly<Record<string, UniformValue>>;
}

export interface PresentDescriptor {
  monitor: Monitor;
  mapping: LayoutMapping;
  filter: FilterMode;
  /** Newest rendered image */
  image: TextureHandle;
  /** Image shown before `image`; blended in while `blend` < 1 */
  previous: TextureHandle | null;
  /** Weight of `image` against `previous`, in [0, 1] */
  blend: number;
}

export interface BackendCapabilities {
  readonly maxTextureSize: number;
  readonly supports3DTextures: boolean;
  readonly supportsFloatTargets: boolean;
}

export interface RenderBackend {
  readonly name: BackendName;
  readonly capabilities: BackendCapabilities;

  compileProgram(source: string): CompileResult;
  destroyProgram(program: ProgramHandle): void;

  createTexture(descriptor: TextureDescriptor): TextureHandle;
  /** Replace texel data; `face` selects a cube face */
  uploadPixels(handle: TextureHandle, data: Uint8Array, face?: number): void;
  clearTexture(handle: TextureHandle): void;
  destroyTexture(handle: TextureHandle): void;

  beginFrame(): void;
  endFrame(): void;
  /** May throw on a device failure; the caller drops the frame */
  draw(descriptor: DrawDescriptor): void;
  present(descriptor: PresentDescriptor): void;

  readPixels(handle: TextureHandle, face?: number): Uint8Array;

  destroy(): void;
}

export function bytesPerTexel(format: TextureFormat): number {
  switch (format) {
    case 'rgba8unorm':
      return 4;
    case 'rgba16float':
      return 8;
    case 'r8unorm':
      return 1;
  }
}
