/**
 * Error taxonomy for preset loading, graph building and rendering.
 *
 * ConfigError and BuildError reject a whole preset (a running graph keeps
 * running on reload). CompileError is local to one pass. RuntimeGPUError is a
 * dropped frame until it repeats often enough to become fatal.
 */

export type ConfigErrorCode = 'InvalidPreset' | 'InvalidInputReference' | 'InvalidInputSlot';

export type BuildErrorCode =
  | 'DanglingBufferReference'
  | 'CyclicCurrentFrameDependency'
  | 'ForwardCurrentFrameReference';

export abstract class ShaderPaperError extends Error {
  abstract readonly code: string;
}

export class ConfigError extends ShaderPaperError {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class BuildError extends ShaderPaperError {
  constructor(
    message: string,
    public readonly code: BuildErrorCode,
    /** Passes involved, in execution order */
    public readonly passes: readonly string[]
  ) {
    super(message);
    this.name = 'BuildError';
  }
}

export class CompileError extends ShaderPaperError {
  readonly code = 'CompileError';

  constructor(
    public readonly pass: string,
    public readonly detail: string,
    /** 1-based line within the pass's own shader text, when it falls there */
    public readonly line: number | null
  ) {
    super(line !== null ? `${pass}:${line}: ${detail}` : `${pass}: ${detail}`);
    this.name = 'CompileError';
  }
}

export class RuntimeGPUError extends ShaderPaperError {
  readonly code = 'RuntimeGPUError';

  constructor(
    public readonly pass: string,
    public readonly failure: unknown,
    public readonly consecutive: number,
    public readonly fatal: boolean
  ) {
    super(
      `GPU failure in ${pass} (${consecutive} consecutive)${fatal ? ', giving up' : ''}: ${describeCause(failure)}`
    );
    this.name = 'RuntimeGPUError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function isShaderPaperError(error: unknown): error is ShaderPaperError {
  return error instanceof ShaderPaperError;
}
