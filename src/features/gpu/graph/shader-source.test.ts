import { describe, it, expect } from 'vitest';
import { DEFAULT_IMAGE_SHADER } from '@/features/preset/constants';
import {
  assemblePassSource,
  fallbackPassSource,
  locateSourceLine,
  samplerTypeFor,
} from './shader-source';
import type { ChannelBinding } from './types';

const SAMPLER = { wrap: 'clamp' as const, filter: 'linear' as const, vflip: false };
const SHADER = 'void mainImage(out vec4 c, in vec2 p)\n{\n    c = vec4(1.0);\n}\n\n';

function lineOf(source: string, line: number): string {
  return source.split('\n')[line - 1];
}

describe('assemblePassSource', () => {
  it('places the pass shader after the prelude', () => {
    const assembled = assemblePassSource({ kind: 'image', shader: SHADER, channels: [] }, '');

    expect(assembled.commonStartLine).toBe(25);
    expect(assembled.shaderStartLine).toBe(25);
    expect(assembled.shaderLineCount).toBe(4);
    expect(lineOf(assembled.source, 1)).toBe('#version 300 es');
    expect(lineOf(assembled.source, 25)).toBe('void mainImage(out vec4 c, in vec2 p)');
    expect(assembled.source).toContain('mainImage(color, gl_FragCoord.xy);');
  });

  it('prepends common text', () => {
    const assembled = assemblePassSource(
      { kind: 'buffer', shader: SHADER, channels: [] },
      'float k = 1.0;\nfloat twice(float x) { return 2.0 * x; }\n'
    );

    expect(assembled.commonStartLine).toBe(25);
    expect(assembled.shaderStartLine).toBe(28);
    expect(lineOf(assembled.source, 26)).toBe('float twice(float x) { return 2.0 * x; }');
    expect(lineOf(assembled.source, 27)).toBe('');
    expect(lineOf(assembled.source, 28)).toBe('void mainImage(out vec4 c, in vec2 p)');
  });

  it('declares each channel with its sampler type', () => {
    const channels: ChannelBinding[] = [
      { kind: 'buffer', slot: 0, source: 'cube_a', frame: 'current', sampler: SAMPLER },
      { kind: 'asset', slot: 2, assetType: 'volume', name: 'RGBA Noise3D', sampler: SAMPLER },
    ];
    const { source } = assemblePassSource({ kind: 'image', shader: SHADER, channels }, '');

    expect(source).toContain(
      [
        'uniform samplerCube iChannel0;',
        'uniform sampler2D iChannel1;',
        'uniform sampler3D iChannel2;',
        'uniform sampler2D iChannel3;',
      ].join('\n')
    );
  });

  it('gives cube passes a per-face entry point', () => {
    const { source } = assemblePassSource(
      { kind: 'cube', shader: 'void mainCubemap(out vec4 c, in vec2 p, in vec3 o, in vec3 d) { c = vec4(d, 1.0); }', channels: [] },
      ''
    );

    expect(source).toContain('uniform int iCubeFace;');
    expect(source).toContain('mainCubemap(color, gl_FragCoord.xy, vec3(0.0), normalize(cubeFaceDirection(iCubeFace, uv)));');
    expect(source).not.toContain('mainImage(color');
  });
});

describe('samplerTypeFor', () => {
  it('uses samplerCube for cubemaps and sampler2D for unbound slots', () => {
    expect(samplerTypeFor({ kind: 'asset', slot: 0, assetType: 'cubemap', name: 'Forest', sampler: SAMPLER })).toBe(
      'samplerCube'
    );
    expect(samplerTypeFor({ kind: 'keyboard', slot: 0, sampler: SAMPLER })).toBe('sampler2D');
    expect(samplerTypeFor(undefined)).toBe('sampler2D');
  });
});

describe('locateSourceLine', () => {
  const assembled = assemblePassSource({ kind: 'image', shader: SHADER, channels: [] }, 'float k;\nfloat j;');

  it('maps lines back to their section', () => {
    expect(locateSourceLine(assembled, 3)).toEqual({ section: 'prelude', line: 3 });
    expect(locateSourceLine(assembled, 26)).toEqual({ section: 'common', line: 2 });
    expect(locateSourceLine(assembled, 30)).toEqual({ section: 'shader', line: 3 });
    expect(locateSourceLine(assembled, 33)).toEqual({ section: 'entry', line: 2 });
  });
});

describe('fallbackPassSource', () => {
  it('uses the built-in shader for image', () => {
    const { source } = fallbackPassSource({ kind: 'image', channels: [] });

    expect(source).toContain(DEFAULT_IMAGE_SHADER.trimEnd());
  });

  it('passes channel 0 through for buffers reading a 2D input', () => {
    const { source } = fallbackPassSource({
      kind: 'buffer',
      channels: [{ kind: 'buffer', slot: 0, source: 'buffer_a', frame: 'previous', sampler: SAMPLER }],
    });

    expect(source).toContain('fragColor = texture(iChannel0, fragCoord / iResolution.xy);');
  });

  it('writes transparent black when channel 0 is not a 2D input', () => {
    const { source } = fallbackPassSource({
      kind: 'buffer',
      channels: [{ kind: 'asset', slot: 0, assetType: 'cubemap', name: 'Forest', sampler: SAMPLER }],
    });

    expect(source).toContain('fragColor = vec4(0.0);');
    expect(source).toContain('uniform sampler2D iChannel0;');
  });
});
