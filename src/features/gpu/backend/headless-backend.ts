/**
 * Headless Render Backend
 *
 * In-memory backend for hosts without a GPU context (tests, dry runs).
 * Programs are validated but not executed: draws and presents are recorded.
 * A `#error` directive in a program source fails compilation, as a GLSL
 * preprocessor would.
 */

import {
  bytesPerTexel,
  type BackendCapabilities,
  type CompileResult,
  type DrawDescriptor,
  type PresentDescriptor,
  type ProgramHandle,
  type RenderBackend,
  type TextureDescriptor,
  type TextureHandle,
} from './types';

interface HeadlessTexture {
  handle: TextureHandle;
  /** One buffer per cube face (one for other kinds); allocated on first write */
  layers: Array<Uint8Array | null>;
}

export interface DrawRecord {
  program: string;
  target: string;
  face: number | null;
  channels: Array<{ slot: number; texture: string }>;
  uniforms: DrawDescriptor['uniforms'];
}

export interface PresentRecord {
  monitor: string;
  image: string;
  previous: string | null;
  blend: number;
}

export class HeadlessBackend implements RenderBackend {
  readonly name = 'headless' as const;

  readonly capabilities: BackendCapabilities = {
    maxTextureSize: 16384,
    supports3DTextures: true,
    supportsFloatTargets: true,
  };

  /** Draws issued since the last beginFrame */
  readonly draws: DrawRecord[] = [];
  /** Presents issued since the last beginFrame */
  readonly presents: PresentRecord[] = [];

  private textures: Map<string, HeadlessTexture> = new Map();
  private programs: Map<string, string> = new Map();
  private nextTextureId = 0;
  private nextProgramId = 0;
  private inFrame = false;
  private framesCompleted = 0;

  compileProgram(source: string): CompileResult {
    const lines = source.split('\n');
    for (let index = 0; index < lines.length; index++) {
      const directive = /^\s*#\s*error\b(.*)$/.exec(lines[index]);
      if (directive) {
        return { ok: false, line: index + 1, message: directive[1].trim() || '#error' };
      }
    }

    if (!/\bvoid\s+main\s*\(/.test(source)) {
      return { ok: false, line: null, message: 'missing entry point main()' };
    }

    const id = `headless_prog_${this.nextProgramId++}`;
    this.programs.set(id, source);
    return { ok: true, program: { id } };
  }

  destroyProgram(program: ProgramHandle): void {
    this.programs.delete(program.id);
  }

  createTexture(descriptor: TextureDescriptor): TextureHandle {
    const { kind, width, height, format } = descriptor;
    const depth = kind === '3d' ? (descriptor.depth ?? 1) : 1;
    const limit = this.capabilities.maxTextureSize;
    if (width < 1 || height < 1 || depth < 1 || width > limit || height > limit || depth > limit) {
      throw new Error(`Unsupported texture size ${width}x${height}x${depth}`);
    }

    const id = `headless_tex_${this.nextTextureId++}`;
    const handle: TextureHandle = { id, kind, width, height, depth, format };
    this.textures.set(id, { handle, layers: new Array<Uint8Array | null>(kind === 'cube' ? 6 : 1).fill(null) });
    return handle;
  }

  uploadPixels(handle: TextureHandle, data: Uint8Array, face = 0): void {
    const texture = this.getTexture(handle);
    const expected = this.layerSize(texture.handle);
    if (data.byteLength !== expected) {
      throw new Error(`Expected ${expected} bytes for ${handle.id}, got ${data.byteLength}`);
    }
    this.checkLayer(texture, face);
    texture.layers[face] = new Uint8Array(data);
  }

  clearTexture(handle: TextureHandle): void {
    const texture = this.getTexture(handle);
    texture.layers.fill(null);
  }

  destroyTexture(handle: TextureHandle): void {
    this.textures.delete(handle.id);
  }

  beginFrame(): void {
    if (this.inFrame) {
      throw new Error('beginFrame called twice without endFrame');
    }
    this.inFrame = true;
    this.draws.length = 0;
    this.presents.length = 0;
  }

  endFrame(): void {
    if (!this.inFrame) {
      throw new Error('endFrame called outside a frame');
    }
    this.inFrame = false;
    this.framesCompleted++;
  }

  draw(descriptor: DrawDescriptor): void {
    if (!this.programs.has(descriptor.program.id)) {
      throw new Error(`Program not found: ${descriptor.program.id}`);
    }
    const target = this.getTexture(descriptor.target);
    const face = descriptor.face ?? 0;
    this.checkLayer(target, face);
    for (const channel of descriptor.channels) {
      if (channel.texture.id === target.handle.id) {
        throw new Error(`Texture ${channel.texture.id} is both read and written`);
      }
      this.getTexture(channel.texture);
    }

    this.draws.push({
      program: descriptor.program.id,
      target: target.handle.id,
      face: descriptor.face ?? null,
      channels: descriptor.channels.map((channel) => ({ slot: channel.slot, texture: channel.texture.id })),
      uniforms: descriptor.uniforms,
    });
  }

  present(descriptor: PresentDescriptor): void {
    this.getTexture(descriptor.image);
    if (descriptor.previous) {
      this.getTexture(descriptor.previous);
    }

    this.presents.push({
      monitor: descriptor.monitor.name,
      image: descriptor.image.id,
      previous: descriptor.previous?.id ?? null,
      blend: descriptor.blend,
    });
  }

  readPixels(handle: TextureHandle, face = 0): Uint8Array {
    const texture = this.getTexture(handle);
    this.checkLayer(texture, face);
    const layer = texture.layers[face];
    return layer ? new Uint8Array(layer) : new Uint8Array(this.layerSize(texture.handle));
  }

  destroy(): void {
    this.textures.clear();
    this.programs.clear();
    this.inFrame = false;
  }

  // ============================================
  // Introspection
  // ============================================

  get liveTextureCount(): number {
    return this.textures.size;
  }

  get liveProgramCount(): number {
    return this.programs.size;
  }

  get completedFrames(): number {
    return this.framesCompleted;
  }

  hasTexture(id: string): boolean {
    return this.textures.has(id);
  }

  programSource(program: ProgramHandle): string | undefined {
    return this.programs.get(program.id);
  }

  private getTexture(handle: TextureHandle): HeadlessTexture {
    const texture = this.textures.get(handle.id);
    if (!texture) {
      throw new Error(`Texture not found: ${handle.id}`);
    }
    return texture;
  }

  private checkLayer(texture: HeadlessTexture, face: number): void {
    if (!Number.isInteger(face) || face < 0 || face >= texture.layers.length) {
      throw new Error(`Face ${face} out of range for ${texture.handle.id}`);
    }
  }

  private layerSize(handle: TextureHandle): number {
    return handle.width * handle.height * handle.depth * bytesPerTexel(handle.format);
  }
}
