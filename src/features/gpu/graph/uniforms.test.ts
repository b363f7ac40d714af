import { describe, it, expect } from 'vitest';
import type { TextureHandle } from '../backend/types';
import { channelResolutions, dateUniform, passUniforms } from './uniforms';

function texture(id: string, width: number, height: number, kind: TextureHandle['kind'] = '2d', depth = 1): TextureHandle {
  return { id, kind, width, height, depth, format: 'rgba8unorm' };
}

describe('dateUniform', () => {
  it('uses a 0-based month and seconds since midnight', () => {
    expect(dateUniform(new Date(2024, 2, 9, 1, 2, 3, 500))).toEqual([2024, 2, 9, 3723.5]);
  });
});

describe('channelResolutions', () => {
  it('fills four vec3 entries with zeros for unbound slots', () => {
    const textures = new Map([
      [0, texture('a', 640, 360)],
      [2, texture('v', 32, 32, '3d', 16)],
    ]);

    expect(channelResolutions(textures)).toEqual([640, 360, 1, 0, 0, 0, 32, 32, 16, 0, 0, 0]);
  });
});

describe('passUniforms', () => {
  const frame = {
    time: { time: 2.5, delta: 0.5, frame: 7, frameRate: 60 },
    width: 800,
    height: 600,
    mouse: [10, 20, 30, -40] as [number, number, number, number],
    date: new Date(2024, 0, 1, 0, 0, 1),
  };

  it('derives the built-in uniforms from the frame', () => {
    expect(passUniforms(frame, new Map())).toEqual({
      iResolution: [800, 600, 1],
      iTime: 2.5,
      iGlobalTime: 2.5,
      iTimeDelta: 0.5,
      iFrameRate: 60,
      iFrame: 7,
      iMouse: [10, 20, 30, -40],
      iDate: [2024, 0, 1, 1],
      iChannelTime: [2.5, 2.5, 2.5, 2.5],
      iChannelResolution: [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
      iSampleRate: 44100,
    });
  });

  it('adds the face index for cube draws', () => {
    expect(passUniforms(frame, new Map(), 3).iCubeFace).toBe(3);
    expect(passUniforms(frame, new Map())).not.toHaveProperty('iCubeFace');
  });
});
