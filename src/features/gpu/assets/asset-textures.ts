/**
 * Asset Textures
 *
 * Fetching runs while a graph is staged (async, no GPU work); uploading runs
 * when the graph is activated on the render side. An asset that fails to
 * load or has inconsistent dimensions is bound as a 1x1 black placeholder.
 */

import type { AssetInputType } from '@/features/preset/types';
import { createLogger } from '@/lib/logger';
import type { RenderBackend, TextureHandle } from '../backend/types';
import type { RenderGraph } from '../graph/types';
import type { AssetPixels, AssetProvider, AssetRequest, FetchedAsset } from './types';

const log = createLogger('AssetTextures');

const RGBA = 4;
const CUBE_FACES = 6;

export function assetKey(type: AssetInputType, name: string): string {
  return `${type}:${name}`;
}

/**
 * Distinct assets a graph binds, in first-use order
 */
export function collectAssetRequests(graph: Pick<RenderGraph, 'passes'>): AssetRequest[] {
  const requests = new Map<string, AssetRequest>();
  for (const pass of graph.passes) {
    for (const channel of pass.channels) {
      if (channel.kind !== 'asset') continue;
      const key = assetKey(channel.assetType, channel.name);
      if (!requests.has(key)) {
        requests.set(key, { type: channel.assetType, name: channel.name });
      }
    }
  }
  return [...requests.values()];
}

/**
 * Why pixel data cannot be uploaded for an input type, or null when it can
 */
export function checkAssetPixels(type: AssetInputType, pixels: AssetPixels): string | null {
  const expectedKind = type === 'texture' ? 'texture' : type === 'cubemap' ? 'cubemap' : 'volume';
  if (pixels.kind !== expectedKind) {
    return `expected ${expectedKind} data, got ${pixels.kind}`;
  }

  switch (pixels.kind) {
    case 'texture': {
      const expected = pixels.width * pixels.height * RGBA;
      if (pixels.width < 1 || pixels.height < 1) return 'empty texture';
      return pixels.data.byteLength === expected ? null : `expected ${expected} bytes, got ${pixels.data.byteLength}`;
    }
    case 'cubemap': {
      if (pixels.size < 1) return 'empty cubemap';
      if (pixels.faces.length !== CUBE_FACES) return `expected ${CUBE_FACES} faces, got ${pixels.faces.length}`;
      const expected = pixels.size * pixels.size * RGBA;
      const bad = pixels.faces.findIndex((face) => face.byteLength !== expected);
      return bad === -1 ? null : `face ${bad}: expected ${expected} bytes, got ${pixels.faces[bad].byteLength}`;
    }
    case 'volume': {
      const expected = pixels.width * pixels.height * pixels.depth * RGBA;
      if (pixels.width < 1 || pixels.height < 1 || pixels.depth < 1) return 'empty volume';
      return pixels.data.byteLength === expected ? null : `expected ${expected} bytes, got ${pixels.data.byteLength}`;
    }
  }
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetch every asset a graph binds. Never rejects: failures are recorded per asset.
 */
export async function fetchAssets(
  graph: Pick<RenderGraph, 'passes'>,
  provider: AssetProvider | null
): Promise<FetchedAsset[]> {
  const requests = collectAssetRequests(graph);

  return Promise.all(
    requests.map(async (request): Promise<FetchedAsset> => {
      if (!provider) {
        return { ...request, pixels: null, error: 'no asset provider configured' };
      }
      try {
        const pixels = await provider.load(request.type, request.name);
        const problem = checkAssetPixels(request.type, pixels);
        return problem ? { ...request, pixels: null, error: problem } : { ...request, pixels, error: null };
      } catch (error) {
        return { ...request, pixels: null, error: describeFailure(error) };
      }
    })
  );
}

/**
 * GPU textures of one graph's assets
 */
export class AssetTextures {
  private backend: RenderBackend;
  private textures: Map<string, TextureHandle> = new Map();
  private _warnings: string[] = [];

  constructor(backend: RenderBackend, assets: readonly FetchedAsset[]) {
    this.backend = backend;
    for (const asset of assets) {
      this.upload(asset);
    }
  }

  /** Assets that were replaced by placeholders or left unbound */
  get warnings(): readonly string[] {
    return this._warnings;
  }

  get size(): number {
    return this.textures.size;
  }

  /**
   * Texture bound for an asset input; null when it could not be created
   */
  get(type: AssetInputType, name: string): TextureHandle | null {
    return this.textures.get(assetKey(type, name)) ?? null;
  }

  dispose(): void {
    for (const texture of this.textures.values()) {
      this.backend.destroyTexture(texture);
    }
    this.textures.clear();
  }

  private upload(asset: FetchedAsset): void {
    const key = assetKey(asset.type, asset.name);

    if (asset.type === 'volume' && !this.backend.capabilities.supports3DTextures) {
      this.warn(`${key}: volume textures are not supported by the ${this.backend.name} backend`);
      return;
    }

    if (!asset.pixels) {
      this.warn(`${key}: ${asset.error ?? 'not loaded'}; using a black placeholder`);
      this.textures.set(key, this.placeholder(asset.type));
      return;
    }

    const pixels = asset.pixels;
    switch (pixels.kind) {
      case 'texture': {
        const texture = this.backend.createTexture({
          kind: '2d',
          width: pixels.width,
          height: pixels.height,
          format: 'rgba8unorm',
        });
        this.backend.uploadPixels(texture, pixels.data);
        this.textures.set(key, texture);
        break;
      }
      case 'cubemap': {
        const texture = this.backend.createTexture({
          kind: 'cube',
          width: pixels.size,
          height: pixels.size,
          format: 'rgba8unorm',
        });
        pixels.faces.forEach((face, index) => this.backend.uploadPixels(texture, face, index));
        this.textures.set(key, texture);
        break;
      }
      case 'volume': {
        const texture = this.backend.createTexture({
          kind: '3d',
          width: pixels.width,
          height: pixels.height,
          depth: pixels.depth,
          format: 'rgba8unorm',
        });
        this.backend.uploadPixels(texture, pixels.data);
        this.textures.set(key, texture);
        break;
      }
    }
  }

  /** 1x1 opaque black of the kind the sampler expects */
  private placeholder(type: AssetInputType): TextureHandle {
    const black = new Uint8Array([0, 0, 0, 255]);
    const kind = type === 'cubemap' ? 'cube' : type === 'volume' ? '3d' : '2d';
    const texture = this.backend.createTexture({ kind, width: 1, height: 1, depth: 1, format: 'rgba8unorm' });
    const layers = kind === 'cube' ? CUBE_FACES : 1;
    for (let face = 0; face < layers; face++) {
      this.backend.uploadPixels(texture, black, face);
    }
    return texture;
  }

  private warn(message: string): void {
    log.warn(message);
    this._warnings.push(message);
  }
}
