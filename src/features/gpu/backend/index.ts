/**
 * GPU Render Backend
 *
 * The interface the pipeline renders through, plus the in-memory implementation.
 */

export type {
  BackendCapabilities,
  BackendName,
  ChannelDescriptor,
  CompileResult,
  DrawDescriptor,
  PresentDescriptor,
  ProgramHandle,
  RenderBackend,
  SamplerState,
  TextureDescriptor,
  TextureFormat,
  TextureHandle,
  TextureKind,
  UniformValue,
} from './types';
export { bytesPerTexel } from './types';
export { HeadlessBackend } from './headless-backend';
export type { DrawRecord, PresentRecord } from './headless-backend';
