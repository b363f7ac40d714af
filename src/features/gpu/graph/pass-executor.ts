/**
 * Pass Executor
 *
 * Runs the passes of a render graph against a set of resource slots. Each
 * pass draws into its own write target; inputs are bound per frame:
 * - buffer, current frame: the source's write target, already drawn this frame
 * - buffer, previous frame: the source's front target
 * - asset: the uploaded texture (or its placeholder)
 * - keyboard: the shared key state texture
 * Passive inputs stay unbound.
 */

import type { SamplerSettings } from '@/features/preset/types';
import { CompileError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import type { AssetTextures } from '../assets/asset-textures';
import type { ChannelDescriptor, RenderBackend, SamplerState, TextureHandle } from '../backend/types';
import { CUBE_FACE_SIZE, type ResourceSlots } from './resource-slots';
import { assemblePassSource, fallbackPassSource, locateSourceLine } from './shader-source';
import type { ChannelBinding, CompiledPass, PlannedPass, RenderGraph } from './types';
import { passUniforms, type FrameUniformInput } from './uniforms';

const log = createLogger('PassExecutor');

const CUBE_FACES = 6;

/**
 * A draw that failed on the device, tagged with the pass it belongs to
 */
export class PassDrawError extends Error {
  constructor(
    public readonly pass: string,
    public readonly failure: unknown
  ) {
    super(`${pass}: ${failure instanceof Error ? failure.message : String(failure)}`);
    this.name = 'PassDrawError';
  }
}

export interface CompiledGraph {
  passes: CompiledPass[];
  errors: CompileError[];
}

/**
 * Compile every pass of a graph. A pass whose shader fails to compile gets
 * its fallback program; the error is returned alongside.
 */
export function compileGraph(backend: RenderBackend, graph: Pick<RenderGraph, 'passes' | 'common'>): CompiledGraph {
  const passes: CompiledPass[] = [];
  const errors: CompileError[] = [];

  try {
    for (const plan of graph.passes) {
      const compiled = compilePass(backend, plan, graph.common);
      passes.push(compiled);
      if (compiled.compileError) {
        log.warn(compiled.compileError.message);
        errors.push(compiled.compileError);
      }
    }
  } catch (error) {
    releasePrograms(backend, passes);
    throw error;
  }

  return { passes, errors };
}

function compilePass(backend: RenderBackend, plan: PlannedPass, common: string): CompiledPass {
  const assembled = assemblePassSource(plan, common);
  const result = backend.compileProgram(assembled.source);
  if (result.ok) {
    return { plan, program: result.program, compileError: null };
  }

  let compileError: CompileError;
  if (result.line === null) {
    compileError = new CompileError(plan.id, result.message, null);
  } else {
    const location = locateSourceLine(assembled, result.line);
    compileError =
      location.section === 'shader'
        ? new CompileError(plan.id, result.message, location.line)
        : new CompileError(plan.id, `${location.section} line ${location.line}: ${result.message}`, null);
  }

  const fallback = backend.compileProgram(fallbackPassSource(plan).source);
  if (!fallback.ok) {
    throw new Error(`Fallback program for ${plan.id} failed to compile: ${fallback.message}`);
  }
  return { plan, program: fallback.program, compileError };
}

function releasePrograms(backend: RenderBackend, passes: readonly CompiledPass[]): void {
  for (const pass of passes) {
    backend.destroyProgram(pass.program);
  }
}

function samplerState(settings: SamplerSettings): SamplerState {
  return { wrap: settings.wrap, filter: settings.filter, vflip: settings.vflip };
}

export interface ExecutorResources {
  assets: AssetTextures;
  /** Shared key state texture; keyboard inputs stay unbound without one */
  keyboard: TextureHandle | null;
}

/**
 * Executes compiled passes; owns their programs
 */
export class PassExecutor {
  private backend: RenderBackend;
  private compiled: CompiledPass[];
  private resources: ExecutorResources;
  private disposed = false;

  constructor(backend: RenderBackend, compiled: CompiledPass[], resources: ExecutorResources) {
    this.backend = backend;
    this.compiled = compiled;
    this.resources = resources;
  }

  get passes(): readonly CompiledPass[] {
    return this.compiled;
  }

  /**
   * Draw every pass of one frame into the slots' write targets. Nothing is
   * committed; the caller commits once the whole frame succeeded.
   * @throws PassDrawError when the backend fails a draw
   */
  execute(slots: ResourceSlots, frame: Omit<FrameUniformInput, 'width' | 'height'>): void {
    const size = slots.size;

    for (const pass of this.compiled) {
      const channels = this.bindChannels(pass.plan, slots);
      const textures = new Map(channels.map((channel): [number, TextureHandle] => [channel.slot, channel.texture]));
      const target = slots.writeTarget(pass.plan.id);

      try {
        if (pass.plan.kind === 'cube') {
          const faceFrame = { ...frame, width: CUBE_FACE_SIZE, height: CUBE_FACE_SIZE };
          for (let face = 0; face < CUBE_FACES; face++) {
            this.backend.draw({
              program: pass.program,
              target,
              face,
              channels,
              uniforms: passUniforms(faceFrame, textures, face),
            });
          }
        } else {
          this.backend.draw({
            program: pass.program,
            target,
            channels,
            uniforms: passUniforms({ ...frame, width: size.width, height: size.height }, textures),
          });
        }
      } catch (error) {
        throw new PassDrawError(pass.plan.id, error);
      }
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    releasePrograms(this.backend, this.compiled);
  }

  private bindChannels(plan: PlannedPass, slots: ResourceSlots): ChannelDescriptor[] {
    const descriptors: ChannelDescriptor[] = [];
    for (const channel of plan.channels) {
      const texture = this.resolveTexture(channel, slots);
      if (texture && channel.kind !== 'passive') {
        descriptors.push({ slot: channel.slot, texture, sampler: samplerState(channel.sampler) });
      }
    }
    return descriptors;
  }

  private resolveTexture(channel: ChannelBinding, slots: ResourceSlots): TextureHandle | null {
    switch (channel.kind) {
      case 'buffer':
        return channel.frame === 'current' ? slots.writeTarget(channel.source) : slots.current(channel.source);
      case 'asset':
        return this.resources.assets.get(channel.assetType, channel.name);
      case 'keyboard':
        return this.resources.keyboard;
      case 'passive':
        return null;
    }
  }
}
