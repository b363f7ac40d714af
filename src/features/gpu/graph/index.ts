/**
 * Render Graph Module
 *
 * Preset -> execution plan -> compiled passes drawn against ping-pong targets.
 */

export type {
  AssetChannel,
  BufferChannel,
  ChannelBinding,
  CompiledPass,
  KeyboardChannel,
  PassKind,
  PassiveChannel,
  PlannedPass,
  RenderGraph,
} from './types';

export { GraphBuilder, buildRenderGraph } from './graph-builder';
export { CUBE_FACE_SIZE, ResourceSlots } from './resource-slots';
export type { SlotSize } from './resource-slots';
export {
  FRAGMENT_OUTPUT,
  assemblePassSource,
  fallbackPassSource,
  locateSourceLine,
  samplerTypeFor,
} from './shader-source';
export type { AssembledSource, SamplerType, SourceLocation } from './shader-source';
export { SAMPLE_RATE, channelResolutions, dateUniform, passUniforms } from './uniforms';
export type { FrameUniformInput } from './uniforms';
export { PassDrawError, PassExecutor, compileGraph } from './pass-executor';
export type { CompiledGraph, ExecutorResources } from './pass-executor';
