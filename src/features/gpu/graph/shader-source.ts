/**
 * Shader Source Assembly
 *
 * Wraps a pass's mainImage/mainCubemap into a complete GLSL ES 3.00 fragment
 * program: built-in uniforms, one sampler per channel, the common text, the
 * pass text, and an entry point.
 */

import { DEFAULT_IMAGE_SHADER, MAX_INPUT_SLOTS } from '@/features/preset/constants';
import type { ChannelBinding, PlannedPass } from './types';

export type SamplerType = 'sampler2D' | 'samplerCube' | 'sampler3D';

export interface AssembledSource {
  source: string;
  /** 1-based line of the first common line in `source` */
  commonStartLine: number;
  /** 1-based line of the first pass shader line in `source` */
  shaderStartLine: number;
  shaderLineCount: number;
}

/** Where a line of an assembled source came from */
export type SourceLocation =
  | { section: 'prelude'; line: number }
  | { section: 'common'; line: number }
  | { section: 'shader'; line: number }
  | { section: 'entry'; line: number };

export const FRAGMENT_OUTPUT = 'shaderpaperFragColor';

const UNIFORM_DECLARATIONS = `uniform vec3 iResolution;
uniform float iTime;
uniform float iGlobalTime;
uniform float iTimeDelta;
uniform float iFrameRate;
uniform int iFrame;
uniform vec4 iMouse;
uniform vec4 iDate;
uniform float iChannelTime[4];
uniform vec3 iChannelResolution[4];
uniform float iSampleRate;`;

const IMAGE_ENTRY = `void main()
{
    vec4 color = vec4(0.0, 0.0, 0.0, 1.0);
    mainImage(color, gl_FragCoord.xy);
    ${FRAGMENT_OUTPUT} = color;
}`;

// Face order +X, -X, +Y, -Y, +Z, -Z; uv spans [-1, 1] across the face
const CUBE_ENTRY = `uniform int iCubeFace;

vec3 cubeFaceDirection(int face, vec2 uv)
{
    if (face == 0) return vec3(1.0, -uv.y, -uv.x);
    if (face == 1) return vec3(-1.0, -uv.y, uv.x);
    if (face == 2) return vec3(uv.x, 1.0, uv.y);
    if (face == 3) return vec3(uv.x, -1.0, -uv.y);
    if (face == 4) return vec3(uv.x, -uv.y, 1.0);
    return vec3(-uv.x, -uv.y, -1.0);
}

void main()
{
    vec2 uv = gl_FragCoord.xy / iResolution.xy * 2.0 - 1.0;
    vec4 color = vec4(0.0, 0.0, 0.0, 1.0);
    mainCubemap(color, gl_FragCoord.xy, vec3(0.0), normalize(cubeFaceDirection(iCubeFace, uv)));
    ${FRAGMENT_OUTPUT} = color;
}`;

/**
 * GLSL sampler type a channel is declared with
 */
export function samplerTypeFor(channel: ChannelBinding | undefined): SamplerType {
  if (!channel) return 'sampler2D';

  switch (channel.kind) {
    case 'buffer':
      return channel.source === 'cube_a' ? 'samplerCube' : 'sampler2D';
    case 'asset':
      if (channel.assetType === 'cubemap') return 'samplerCube';
      return channel.assetType === 'volume' ? 'sampler3D' : 'sampler2D';
    case 'keyboard':
    case 'passive':
      return 'sampler2D';
  }
}

function countLines(text: string): number {
  return text === '' ? 0 : text.split('\n').length;
}

function buildPrelude(channels: readonly ChannelBinding[]): string {
  const samplers: string[] = [];
  for (let slot = 0; slot < MAX_INPUT_SLOTS; slot++) {
    const channel = channels.find((c) => c.slot === slot);
    samplers.push(`uniform ${samplerTypeFor(channel)} iChannel${slot};`);
  }

  return [
    '#version 300 es',
    'precision highp float;',
    'precision highp int;',
    'precision highp sampler3D;',
    'precision highp samplerCube;',
    '',
    UNIFORM_DECLARATIONS,
    samplers.join('\n'),
    '',
    `out vec4 ${FRAGMENT_OUTPUT};`,
    '',
  ].join('\n');
}

/**
 * Assemble the full program source for a pass
 */
export function assemblePassSource(
  pass: Pick<PlannedPass, 'kind' | 'shader' | 'channels'>,
  common: string
): AssembledSource {
  const prelude = buildPrelude(pass.channels);
  const commonText = common.replace(/\s+$/, '');
  const shaderText = pass.shader.replace(/\s+$/, '');
  const entry = pass.kind === 'cube' ? CUBE_ENTRY : IMAGE_ENTRY;

  const commonStartLine = countLines(prelude) + 1;
  const commonLines = countLines(commonText);
  // A blank line separates each section
  const shaderStartLine = commonStartLine + (commonLines > 0 ? commonLines + 1 : 0);

  const sections = [prelude];
  if (commonLines > 0) sections.push(commonText, '');
  sections.push(shaderText, '', entry, '');

  return {
    source: sections.join('\n'),
    commonStartLine,
    shaderStartLine,
    shaderLineCount: countLines(shaderText),
  };
}

/**
 * Map a line of an assembled source back to the section it came from
 */
export function locateSourceLine(assembled: AssembledSource, line: number): SourceLocation {
  if (line < assembled.commonStartLine) {
    return { section: 'prelude', line };
  }
  if (line < assembled.shaderStartLine) {
    return { section: 'common', line: line - assembled.commonStartLine + 1 };
  }
  if (line < assembled.shaderStartLine + assembled.shaderLineCount) {
    return { section: 'shader', line: line - assembled.shaderStartLine + 1 };
  }
  return { section: 'entry', line: line - assembled.shaderStartLine - assembled.shaderLineCount + 1 };
}

/**
 * Program a pass runs when its own shader does not compile. Common is left
 * out since it may be what broke.
 */
export function fallbackPassSource(pass: Pick<PlannedPass, 'kind' | 'channels'>): AssembledSource {
  if (pass.kind === 'image') {
    return assemblePassSource({ kind: 'image', shader: DEFAULT_IMAGE_SHADER, channels: [] }, '');
  }

  if (pass.kind === 'cube') {
    return assemblePassSource(
      {
        kind: 'cube',
        shader:
          'void mainCubemap(out vec4 fragColor, in vec2 fragCoord, in vec3 rayOri, in vec3 rayDir)\n{\n    fragColor = vec4(0.0);\n}',
        channels: [],
      },
      ''
    );
  }

  const first = pass.channels.find((channel) => channel.slot === 0);
  const passThrough = first !== undefined && first.kind !== 'passive' && samplerTypeFor(first) === 'sampler2D';
  const body = passThrough
    ? '    fragColor = texture(iChannel0, fragCoord / iResolution.xy);'
    : '    fragColor = vec4(0.0);';

  return assemblePassSource(
    {
      kind: 'buffer',
      shader: `void mainImage(out vec4 fragColor, in vec2 fragCoord)\n{\n${body}\n}`,
      channels: passThrough && first ? [first] : [],
    },
    ''
  );
}
