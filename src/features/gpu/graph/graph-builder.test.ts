import { describe, it, expect } from 'vitest';
import { DEFAULT_IMAGE_SHADER, DEFAULT_METADATA, DEFAULT_SETTINGS } from '@/features/preset/constants';
import { parsePreset, serializePreset } from '@/features/preset/services/preset-codec';
import type { InputSpec, PassId, PassSpec, Preset } from '@/features/preset/types';
import { BuildError, ConfigError } from '@/lib/errors';
import { GraphBuilder, buildRenderGraph } from './graph-builder';

const SHADER = 'void mainImage(out vec4 c, in vec2 p) { c = vec4(0.0); }';

function makePreset(passes: Partial<Record<PassId, PassSpec>>): Preset {
  return {
    metadata: { ...DEFAULT_METADATA, id: 'test' },
    settings: { ...DEFAULT_SETTINGS, monitorSelection: ['*'] },
    passes,
  };
}

function pass(inputs: Record<number, InputSpec> = {}, shader = SHADER): PassSpec {
  return { shader, inputs };
}

function buffer(name: string, frame?: 'previous' | 'current'): InputSpec {
  const base = { type: 'misc' as const, name, wrap: 'clamp' as const, filter: 'linear' as const, vflip: false };
  return frame ? { ...base, frame } : base;
}

function asset(type: 'texture' | 'cubemap' | 'volume', name: string): InputSpec {
  return { type, name, wrap: 'repeat', filter: 'mipmap', vflip: true };
}

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('GraphBuilder', () => {
  const builder = new GraphBuilder();

  describe('execution order', () => {
    it('runs buffers, then cube_a, then image', () => {
      const graph = builder.build(
        makePreset({
          image: pass(),
          cube_a: pass(),
          buffer_d: pass(),
          buffer_b: pass(),
          buffer_a: pass(),
          buffer_c: pass(),
          common: pass(),
        })
      );

      expect(graph.passes.map((p) => p.id)).toEqual([
        'buffer_a',
        'buffer_b',
        'buffer_c',
        'buffer_d',
        'cube_a',
        'image',
      ]);
      expect(graph.passes.map((p) => p.kind)).toEqual(['buffer', 'buffer', 'buffer', 'buffer', 'cube', 'image']);
    });

    it('leaves out passes without shader text', () => {
      const graph = builder.build(makePreset({ buffer_a: pass({}, '  \n'), buffer_b: pass(), image: pass() }));

      expect(graph.passes.map((p) => p.id)).toEqual(['buffer_b', 'image']);
    });

    it('always includes image, with the built-in shader when it has none', () => {
      const graph = builder.build(makePreset({}));

      expect(graph.passes).toEqual([
        { id: 'image', kind: 'image', shader: DEFAULT_IMAGE_SHADER, usesDefaultShader: true, channels: [] },
      ]);
    });

    it('keeps common as text only', () => {
      const graph = builder.build(makePreset({ common: pass({}, 'float k = 1.0;'), image: pass() }));

      expect(graph.common).toBe('float k = 1.0;');
      expect(graph.passes.map((p) => p.id)).toEqual(['image']);
    });
  });

  describe('buffer references', () => {
    it('reads earlier passes in the current frame and later ones in the previous frame', () => {
      const graph = builder.build(
        makePreset({
          buffer_a: pass({ 0: buffer('Buffer B') }),
          buffer_b: pass(),
          image: pass({ 0: buffer('Buffer A'), 1: buffer('Buffer B', 'previous') }),
        })
      );

      expect(graph.passes[0].channels).toEqual([
        {
          kind: 'buffer',
          slot: 0,
          source: 'buffer_b',
          frame: 'previous',
          sampler: { wrap: 'clamp', filter: 'linear', vflip: false },
        },
      ]);
      expect(graph.passes[2].channels.map((c) => (c.kind === 'buffer' ? [c.source, c.frame] : null))).toEqual([
        ['buffer_a', 'current'],
        ['buffer_b', 'previous'],
      ]);
    });

    it('accepts self references as feedback', () => {
      const graph = builder.build(makePreset({ buffer_a: pass({ 0: buffer('Buffer A') }), image: pass() }));

      expect(graph.passes[0].channels[0]).toMatchObject({ source: 'buffer_a', frame: 'previous' });
      expect(graph.warnings).toEqual([]);
    });

    it('turns a current-frame self reference into feedback with a warning', () => {
      const graph = builder.build(makePreset({ buffer_a: pass({ 2: buffer('Buffer A', 'current') }), image: pass() }));

      expect(graph.passes[0].channels[0]).toMatchObject({ slot: 2, frame: 'previous' });
      expect(graph.warnings).toEqual(['buffer_a input_2 reads its own output; using the previous frame']);
    });

    it('maps Cubemap A to cube_a', () => {
      const graph = builder.build(makePreset({ cube_a: pass(), image: pass({ 0: buffer('Cubemap A') }) }));

      expect(graph.passes[1].channels[0]).toMatchObject({ source: 'cube_a', frame: 'current' });
    });

    it('rejects passes reading each other in the current frame', () => {
      const error = catchError(() =>
        builder.build(
          makePreset({
            buffer_a: pass({ 0: buffer('Buffer B', 'current') }),
            buffer_b: pass({ 0: buffer('Buffer A') }),
            image: pass(),
          })
        )
      );

      expect(error).toBeInstanceOf(BuildError);
      expect(error).toMatchObject({
        code: 'CyclicCurrentFrameDependency',
        passes: ['buffer_a', 'buffer_b'],
        message: "Passes buffer_a, buffer_b read each other's current frame",
      });
    });

    it('finds longer same-frame cycles', () => {
      const error = catchError(() =>
        builder.build(
          makePreset({
            buffer_a: pass({ 0: buffer('Buffer C', 'current') }),
            buffer_b: pass({ 0: buffer('Buffer A') }),
            buffer_c: pass({ 0: buffer('Buffer B') }),
            image: pass(),
          })
        )
      );

      expect(error).toMatchObject({
        code: 'CyclicCurrentFrameDependency',
        passes: ['buffer_a', 'buffer_b', 'buffer_c'],
      });
    });

    it('rejects a current-frame read of a later pass', () => {
      const error = catchError(() =>
        builder.build(makePreset({ buffer_a: pass({ 0: buffer('Buffer B', 'current') }), buffer_b: pass(), image: pass() }))
      );

      expect(error).toMatchObject({
        code: 'ForwardCurrentFrameReference',
        passes: ['buffer_a', 'buffer_b'],
      });
    });

    it('rejects references to passes without shader text', () => {
      const error = catchError(() => builder.build(makePreset({ image: pass({ 1: buffer('Buffer C') }) })));

      expect(error).toBeInstanceOf(BuildError);
      expect(error).toMatchObject({
        code: 'DanglingBufferReference',
        message: 'image input_1 reads buffer_c, which has no shader',
      });
    });

    it('rejects unknown buffer names', () => {
      const error = catchError(() => builder.build(makePreset({ image: pass({ 0: buffer('Buffer Z') }) })));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: 'InvalidInputReference' });
    });
  });

  describe('other inputs', () => {
    it('resolves predefined assets and file paths', () => {
      const graph = builder.build(
        makePreset({
          image: pass({ 0: asset('texture', 'Wood'), 1: asset('cubemap', 'Forest'), 3: asset('texture', 'img/sky.png') }),
        })
      );

      expect(graph.passes[0].channels).toEqual([
        { kind: 'asset', slot: 0, assetType: 'texture', name: 'Wood', sampler: { wrap: 'repeat', filter: 'mipmap', vflip: true } },
        { kind: 'asset', slot: 1, assetType: 'cubemap', name: 'Forest', sampler: { wrap: 'repeat', filter: 'mipmap', vflip: true } },
        { kind: 'asset', slot: 3, assetType: 'texture', name: 'img/sky.png', sampler: { wrap: 'repeat', filter: 'mipmap', vflip: true } },
      ]);
    });

    it('rejects asset names that are neither predefined nor paths', () => {
      const error = catchError(() => builder.build(makePreset({ image: pass({ 0: asset('volume', 'Wood') }) })));

      expect(error).toMatchObject({
        code: 'InvalidInputReference',
        issues: ['input_0: "Wood" is neither a predefined volume nor a file path'],
      });
    });

    it('binds keyboard inputs', () => {
      const graph = builder.build(
        makePreset({ image: pass({ 1: { type: 'keyboard', name: '', wrap: 'clamp', filter: 'nearest', vflip: false } }) })
      );

      expect(graph.passes[0].channels).toEqual([
        { kind: 'keyboard', slot: 1, sampler: { wrap: 'clamp', filter: 'nearest', vflip: false } },
      ]);
    });

    it('keeps audio and video inputs without binding them', () => {
      const graph = builder.build(
        makePreset({ image: pass({ 0: { type: 'music', name: 'track.ogg', wrap: 'clamp', filter: 'linear', vflip: false } }) })
      );

      expect(graph.passes[0].channels).toEqual([{ kind: 'passive', slot: 0, inputType: 'music', name: 'track.ogg' }]);
      expect(graph.warnings).toEqual(['image input_0: music inputs are not rendered']);
    });

    it('rejects slots outside 0..3', () => {
      const error = catchError(() => builder.build(makePreset({ image: pass({ 4: buffer('Buffer A') }) })));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        code: 'InvalidInputSlot',
        issues: ['input_4: slots range from input_0 to input_3'],
      });
    });

    it('rejects settings outside their ranges', () => {
      const preset = makePreset({ image: pass() });
      const error = catchError(() =>
        builder.build({
          ...preset,
          settings: { ...preset.settings, timeOffset: Infinity, crossfadeOverlapRatio: 2 },
        })
      );

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        code: 'InvalidPreset',
        issues: [
          'time_offset: must be finite, got Infinity',
          'crossfade_overlap_ratio: must be within [0, 1], got 2',
        ],
      });
    });

    it('orders channels by slot', () => {
      const graph = builder.build(
        makePreset({ buffer_a: pass(), image: pass({ 3: buffer('Buffer A'), 0: asset('texture', 'Stars') }) })
      );

      expect(graph.passes[1].channels.map((c) => c.slot)).toEqual([0, 3]);
    });
  });

  it('builds an equal graph from a serialized and reloaded preset', () => {
    const preset = makePreset({
      common: pass({}, 'float k = 1.0;'),
      buffer_a: pass({ 0: buffer('Buffer A'), 1: asset('texture', 'Rusty Metal') }),
      cube_a: pass({ 0: buffer('Buffer A') }),
      image: pass({ 0: buffer('Buffer A'), 1: buffer('Cubemap A'), 2: { type: 'keyboard', name: '', wrap: 'clamp', filter: 'linear', vflip: false } }),
    });

    const reloaded = parsePreset(serializePreset(preset));

    expect(buildRenderGraph(reloaded)).toEqual(buildRenderGraph(preset));
  });
});
