/**
 * shaderpaper
 *
 * Multipass shader wallpapers: presets, render graphs, frame timing and
 * monitor layout, driven through a pluggable render backend.
 */

export * from './features/preset';
export * from './features/layout';
export * from './features/input';
export * from './features/player';
export * from './features/gpu';
export * from './features/runtime';

export { parseDuration, formatDuration } from './utils/duration-utils';
export {
  BuildError,
  CompileError,
  ConfigError,
  RuntimeGPUError,
  ShaderPaperError,
  isShaderPaperError,
} from './lib/errors';
export type { BuildErrorCode, ConfigErrorCode } from './lib/errors';
export { createLogger, getLogLevel, setLogLevel, LogLevel } from './lib/logger';
