/**
 * Graph Builder
 *
 * Turns a preset into a render graph. Passes run in the fixed order
 * buffer_a..buffer_d, cube_a, image; only reads of a pass's current-frame
 * output constrain that order, so feedback through previous-frame reads
 * needs no cycle handling.
 */

import {
  BUFFER_PASS_BY_NAME,
  DEFAULT_IMAGE_SHADER,
  MAX_INPUT_SLOTS,
  RENDER_ORDER,
  isBufferName,
} from '@/features/preset/constants';
import { isPredefinedAsset, looksLikeFilePath } from '@/features/preset/utils/predefined-assets';
import type { FrameTiming, InputSpec, PassSpec, Preset, PresetSettings, RenderPassId } from '@/features/preset/types';
import { BuildError, ConfigError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import type { BufferChannel, ChannelBinding, PassKind, PlannedPass, RenderGraph } from './types';

const log = createLogger('GraphBuilder');

interface CurrentFrameEdge {
  reader: RenderPassId;
  source: RenderPassId;
}

function passKind(id: RenderPassId): PassKind {
  if (id === 'image') return 'image';
  return id === 'cube_a' ? 'cube' : 'buffer';
}

function hasShader(pass: PassSpec | undefined): pass is PassSpec {
  return pass !== undefined && pass.shader.trim() !== '';
}

/**
 * Builds render graphs from presets
 */
export class GraphBuilder {
  /**
   * Build the execution plan for a preset
   * @throws ConfigError for out-of-range settings or unknown input names or slots
   * @throws BuildError for dangling or unsatisfiable current-frame references
   */
  build(preset: Preset): RenderGraph {
    this.checkSettings(preset.settings);
    const active = this.activePasses(preset);
    const warnings: string[] = [];

    const passes: PlannedPass[] = [];
    for (const [id, spec] of active) {
      passes.push({
        id,
        kind: passKind(id),
        shader: hasShader(spec) ? spec.shader : DEFAULT_IMAGE_SHADER,
        usesDefaultShader: !hasShader(spec),
        channels: this.resolveChannels(id, spec, active, warnings),
      });
    }

    this.checkCurrentFrameEdges(passes);

    for (const warning of warnings) {
      log.warn(warning);
    }

    return {
      metadata: { ...preset.metadata },
      settings: { ...preset.settings, monitorSelection: [...preset.settings.monitorSelection] },
      common: preset.passes.common?.shader ?? '',
      passes,
      warnings,
    };
  }

  /**
   * Presets built in code skip the file schema, so its numeric ranges are
   * checked again here.
   */
  private checkSettings(settings: PresetSettings): void {
    const issues: string[] = [];
    const { resolutionScale, timeScale, timeOffset, intervalBetweenFrames, crossfadeOverlapRatio } = settings;

    if (!Number.isFinite(resolutionScale) || resolutionScale <= 0) {
      issues.push(`resolution_scale: must be a finite number greater than 0, got ${resolutionScale}`);
    }
    if (!Number.isFinite(timeScale) || timeScale < 0) {
      issues.push(`time_scale: must be a finite number of at least 0, got ${timeScale}`);
    }
    if (!Number.isFinite(timeOffset)) {
      issues.push(`time_offset: must be finite, got ${timeOffset}`);
    }
    if (!Number.isFinite(intervalBetweenFrames) || intervalBetweenFrames < 0) {
      issues.push(`interval_between_frames: must be finite and at least 0, got ${intervalBetweenFrames}`);
    }
    if (!(crossfadeOverlapRatio >= 0 && crossfadeOverlapRatio <= 1)) {
      issues.push(`crossfade_overlap_ratio: must be within [0, 1], got ${crossfadeOverlapRatio}`);
    }

    if (issues.length > 0) {
      throw new ConfigError('Invalid preset settings', 'InvalidPreset', issues);
    }
  }

  /**
   * Passes with shader text, in execution order. image is always present.
   */
  private activePasses(preset: Preset): Map<RenderPassId, PassSpec | undefined> {
    const active = new Map<RenderPassId, PassSpec | undefined>();
    for (const id of RENDER_ORDER) {
      const spec = preset.passes[id];
      if (id === 'image' || hasShader(spec)) {
        active.set(id, spec);
      }
    }
    return active;
  }

  private resolveChannels(
    reader: RenderPassId,
    spec: PassSpec | undefined,
    active: ReadonlyMap<RenderPassId, PassSpec | undefined>,
    warnings: string[]
  ): ChannelBinding[] {
    if (!spec) return [];

    const channels: ChannelBinding[] = [];
    for (const key of Object.keys(spec.inputs)) {
      const slot = Number(key);
      if (!Number.isInteger(slot) || slot < 0 || slot >= MAX_INPUT_SLOTS) {
        throw new ConfigError(`Invalid input slot in ${reader}`, 'InvalidInputSlot', [
          `input_${key}: slots range from input_0 to input_${MAX_INPUT_SLOTS - 1}`,
        ]);
      }
      channels.push(this.resolveInput(reader, slot, spec.inputs[slot], active, warnings));
    }

    return channels.sort((a, b) => a.slot - b.slot);
  }

  private resolveInput(
    reader: RenderPassId,
    slot: number,
    input: InputSpec,
    active: ReadonlyMap<RenderPassId, PassSpec | undefined>,
    warnings: string[]
  ): ChannelBinding {
    const sampler = { wrap: input.wrap, filter: input.filter, vflip: input.vflip };

    switch (input.type) {
      case 'misc': {
        if (!isBufferName(input.name)) {
          throw new ConfigError(`Invalid input reference in ${reader}`, 'InvalidInputReference', [
            `input_${slot}: "${input.name}" is not one of ${Object.keys(BUFFER_PASS_BY_NAME).join(', ')}`,
          ]);
        }

        const source = BUFFER_PASS_BY_NAME[input.name];
        if (!active.has(source)) {
          throw new BuildError(
            `${reader} input_${slot} reads ${source}, which has no shader`,
            'DanglingBufferReference',
            [reader, source]
          );
        }

        let frame: FrameTiming =
          input.frame ?? (RENDER_ORDER.indexOf(source) < RENDER_ORDER.indexOf(reader) ? 'current' : 'previous');
        if (source === reader && frame === 'current') {
          warnings.push(`${reader} input_${slot} reads its own output; using the previous frame`);
          frame = 'previous';
        }

        const channel: BufferChannel = { kind: 'buffer', slot, source, frame, sampler };
        return channel;
      }

      case 'texture':
      case 'cubemap':
      case 'volume': {
        const name = input.name.trim();
        if (name === '' || !(isPredefinedAsset(input.type, name) || looksLikeFilePath(name))) {
          throw new ConfigError(`Invalid input reference in ${reader}`, 'InvalidInputReference', [
            `input_${slot}: "${input.name}" is neither a predefined ${input.type} nor a file path`,
          ]);
        }
        return { kind: 'asset', slot, assetType: input.type, name, sampler };
      }

      case 'keyboard':
        return { kind: 'keyboard', slot, sampler };

      case 'video':
      case 'music':
      case 'music_stream':
      case 'webcam':
      case 'microphone':
        warnings.push(`${reader} input_${slot}: ${input.type} inputs are not rendered`);
        return { kind: 'passive', slot, inputType: input.type, name: input.name };
    }
  }

  /**
   * Backward current-frame reads are satisfied by the fixed order. A forward
   * one is either part of a same-frame cycle or cannot be satisfied at all.
   */
  private checkCurrentFrameEdges(passes: readonly PlannedPass[]): void {
    const order = (id: RenderPassId): number => RENDER_ORDER.indexOf(id);
    const edges: CurrentFrameEdge[] = [];
    for (const pass of passes) {
      for (const channel of pass.channels) {
        if (channel.kind === 'buffer' && channel.frame === 'current') {
          edges.push({ reader: pass.id, source: channel.source });
        }
      }
    }

    for (const edge of edges) {
      if (order(edge.source) < order(edge.reader)) continue;

      const cycle = this.findCurrentFramePath(edges, edge.source, edge.reader);
      if (cycle) {
        const involved = [...new Set([edge.reader, ...cycle])].sort((a, b) => order(a) - order(b));
        throw new BuildError(
          `Passes ${involved.join(', ')} read each other's current frame`,
          'CyclicCurrentFrameDependency',
          involved
        );
      }

      throw new BuildError(
        `${edge.reader} reads the current frame of ${edge.source}, which runs after it`,
        'ForwardCurrentFrameReference',
        [edge.reader, edge.source]
      );
    }
  }

  /**
   * Path from `from` to `to` following "reads current frame of" edges, if any
   */
  private findCurrentFramePath(
    edges: readonly CurrentFrameEdge[],
    from: RenderPassId,
    to: RenderPassId
  ): RenderPassId[] | null {
    const visited = new Set<RenderPassId>();

    const visit = (id: RenderPassId, path: RenderPassId[]): RenderPassId[] | null => {
      if (id === to) return path;
      if (visited.has(id)) return null;
      visited.add(id);

      for (const edge of edges) {
        if (edge.reader !== id) continue;
        const found = visit(edge.source, [...path, edge.source]);
        if (found) return found;
      }
      return null;
    };

    return visit(from, [from]);
  }
}

const defaultBuilder = new GraphBuilder();

/**
 * Build the render graph of a preset with a shared builder
 */
export function buildRenderGraph(preset: Preset): RenderGraph {
  return defaultBuilder.build(preset);
}
