/**
 * Built-in uniforms of a pass draw
 */

import { MAX_INPUT_SLOTS } from '@/features/preset/constants';
import type { MouseUniform } from '@/features/input/mouse-state';
import type { TimeState } from '@/features/player/clock/time-source';
import type { TextureHandle, UniformValue } from '../backend/types';

export const SAMPLE_RATE = 44100;

export interface FrameUniformInput {
  time: TimeState;
  /** Render target size in pixels */
  width: number;
  height: number;
  mouse: MouseUniform;
  date: Date;
}

/**
 * iDate: year, month (0-based), day of month, seconds since local midnight
 */
export function dateUniform(date: Date): [number, number, number, number] {
  const seconds =
    date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds() + date.getMilliseconds() / 1000;
  return [date.getFullYear(), date.getMonth(), date.getDate(), seconds];
}

/**
 * iChannelResolution as 4 vec3s; unbound slots are zero
 */
export function channelResolutions(textures: ReadonlyMap<number, TextureHandle>): number[] {
  const values: number[] = [];
  for (let slot = 0; slot < MAX_INPUT_SLOTS; slot++) {
    const texture = textures.get(slot);
    if (texture) {
      values.push(texture.width, texture.height, texture.kind === '3d' ? texture.depth : 1);
    } else {
      values.push(0, 0, 0);
    }
  }
  return values;
}

/**
 * Uniform values of one draw. `cubeFace` is set for cube face draws.
 */
export function passUniforms(
  frame: FrameUniformInput,
  textures: ReadonlyMap<number, TextureHandle>,
  cubeFace: number | null = null
): Record<string, UniformValue> {
  const uniforms: Record<string, UniformValue> = {
    iResolution: [frame.width, frame.height, 1],
    iTime: frame.time.time,
    iGlobalTime: frame.time.time,
    iTimeDelta: frame.time.delta,
    iFrameRate: frame.time.frameRate,
    iFrame: frame.time.frame,
    iMouse: [...frame.mouse],
    iDate: dateUniform(frame.date),
    iChannelTime: new Array<number>(MAX_INPUT_SLOTS).fill(frame.time.time),
    iChannelResolution: channelResolutions(textures),
    iSampleRate: SAMPLE_RATE,
  };

  if (cubeFace !== null) {
    uniforms.iCubeFace = cubeFace;
  }
  return uniforms;
}
