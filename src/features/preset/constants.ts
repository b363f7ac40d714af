import type {
  BufferName,
  BufferPassId,
  PassId,
  PresetMetadata,
  PresetSettings,
  RenderPassId,
} from './types';

export const PASS_IDS: readonly PassId[] = [
  'common',
  'buffer_a',
  'buffer_b',
  'buffer_c',
  'buffer_d',
  'cube_a',
  'image',
];

/** Fixed execution order of rendering passes */
export const RENDER_ORDER: readonly RenderPassId[] = [
  'buffer_a',
  'buffer_b',
  'buffer_c',
  'buffer_d',
  'cube_a',
  'image',
];

export const BUFFER_PASS_BY_NAME: Readonly<Record<BufferName, BufferPassId>> = {
  'Buffer A': 'buffer_a',
  'Buffer B': 'buffer_b',
  'Buffer C': 'buffer_c',
  'Buffer D': 'buffer_d',
  'Cubemap A': 'cube_a',
};

export const MAX_INPUT_SLOTS = 4;

export const DEFAULT_IMAGE_SHADER = `void mainImage(out vec4 fragColor, in vec2 fragCoord)
{
    vec2 uv = fragCoord / iResolution.xy;
    vec3 col = 0.5 + 0.5 * cos(iTime + uv.xyx + vec3(0, 2, 4));
    fragColor = vec4(col, 1.0);
}
`;

export const DEFAULT_METADATA: Readonly<PresetMetadata> = {
  id: '',
  name: '',
  author: '',
  description: '',
};

export const DEFAULT_SETTINGS: Readonly<PresetSettings> = {
  resolutionScale: 1,
  filterMode: 'linear',
  layoutMode: 'stretch',
  intervalBetweenFrames: 0,
  crossfadeOverlapRatio: 0,
  timeScale: 1,
  timeOffset: 0,
  screenBoundsPolicy: 'all_monitors',
  monitorSelection: ['*'],
};

export function isBufferName(name: string): name is BufferName {
  return Object.hasOwn(BUFFER_PASS_BY_NAME, name);
}
