/**
 * Resource Slots
 *
 * Front/back render target pairs for every pass that renders into a texture.
 * `current` is the last completed frame, `writeTarget` the one being drawn.
 * Buffers and image follow the canvas size; cube_a faces have a fixed size.
 */

import type { RenderPassId } from '@/features/preset/types';
import { createLogger } from '@/lib/logger';
import type { RenderBackend, TextureFormat, TextureHandle } from '../backend/types';

const log = createLogger('ResourceSlots');

export const CUBE_FACE_SIZE = 1024;

export interface SlotSize {
  width: number;
  height: number;
}

interface SlotPair {
  front: TextureHandle;
  back: TextureHandle;
}

export class ResourceSlots {
  private backend: RenderBackend;
  private pairs: Map<RenderPassId, SlotPair> = new Map();
  private _size: SlotSize;
  private _generation = 0;
  private disposed = false;

  constructor(backend: RenderBackend, size: SlotSize, passes: readonly RenderPassId[]) {
    this.backend = backend;
    this._size = { ...size };
    for (const id of passes) {
      this.pairs.set(id, this.allocatePair(id));
    }
  }

  // ============================================
  // Getters
  // ============================================

  get size(): SlotSize {
    return { ...this._size };
  }

  /** Increments whenever canvas-sized targets are reallocated */
  get generation(): number {
    return this._generation;
  }

  get passes(): RenderPassId[] {
    return [...this.pairs.keys()];
  }

  has(id: RenderPassId): boolean {
    return this.pairs.has(id);
  }

  /**
   * Last completed frame of a pass
   */
  current(id: RenderPassId): TextureHandle {
    return this.getPair(id).front;
  }

  /**
   * Target the pass draws into this frame
   */
  writeTarget(id: RenderPassId): TextureHandle {
    return this.getPair(id).back;
  }

  // ============================================
  // Frame lifecycle
  // ============================================

  /**
   * Swap front and back of one pass after its frame completed
   */
  commit(id: RenderPassId): void {
    const pair = this.getPair(id);
    const front = pair.front;
    pair.front = pair.back;
    pair.back = front;
  }

  commitAll(): void {
    for (const id of this.pairs.keys()) {
      this.commit(id);
    }
  }

  /**
   * Reallocate canvas-sized targets when the size changed. Cube faces keep
   * their size and content.
   * @returns whether anything was reallocated
   */
  resize(size: SlotSize): boolean {
    if (size.width === this._size.width && size.height === this._size.height) {
      return false;
    }

    this._size = { ...size };
    for (const [id, pair] of this.pairs) {
      if (id === 'cube_a') continue;
      this.releasePair(pair);
      this.pairs.set(id, this.allocatePair(id));
    }
    this._generation++;
    log.debug(`Resized to ${size.width}x${size.height}`);
    return true;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const pair of this.pairs.values()) {
      this.releasePair(pair);
    }
    this.pairs.clear();
  }

  private getPair(id: RenderPassId): SlotPair {
    const pair = this.pairs.get(id);
    if (!pair) {
      throw new Error(`No render target for ${id}`);
    }
    return pair;
  }

  private allocatePair(id: RenderPassId): SlotPair {
    const pair = { front: this.allocate(id), back: this.allocate(id) };
    // New targets start cleared so a first-frame feedback read sees zeros
    this.backend.clearTexture(pair.front);
    this.backend.clearTexture(pair.back);
    return pair;
  }

  private allocate(id: RenderPassId): TextureHandle {
    const floatFormat: TextureFormat = this.backend.capabilities.supportsFloatTargets ? 'rgba16float' : 'rgba8unorm';

    if (id === 'cube_a') {
      return this.backend.createTexture({
        kind: 'cube',
        width: CUBE_FACE_SIZE,
        height: CUBE_FACE_SIZE,
        format: floatFormat,
      });
    }

    return this.backend.createTexture({
      kind: '2d',
      width: this._size.width,
      height: this._size.height,
      format: id === 'image' ? 'rgba8unorm' : floatFormat,
    });
  }

  private releasePair(pair: SlotPair): void {
    this.backend.destroyTexture(pair.front);
    this.backend.destroyTexture(pair.back);
  }
}
