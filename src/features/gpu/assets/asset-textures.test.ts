import { describe, it, expect, vi } from 'vitest';
import type { AssetInputType } from '@/features/preset/types';
import { HeadlessBackend } from '../backend/headless-backend';
import type { PlannedPass } from '../graph/types';
import { AssetTextures, checkAssetPixels, collectAssetRequests, fetchAssets } from './asset-textures';
import type { AssetProvider } from './types';

const sampler = { wrap: 'clamp', filter: 'linear', vflip: false } as const;

function passWith(channels: PlannedPass['channels']): PlannedPass {
  return { id: 'image', kind: 'image', shader: '', usesDefaultShader: false, channels };
}

const graph = {
  passes: [
    passWith([
      { kind: 'asset', slot: 0, assetType: 'texture', name: 'Abstract 1', sampler },
      { kind: 'asset', slot: 1, assetType: 'cubemap', name: 'Forest', sampler },
    ]),
    passWith([{ kind: 'asset', slot: 2, assetType: 'texture', name: 'Abstract 1', sampler }]),
  ],
};

describe('collectAssetRequests', () => {
  it('lists each asset once in first-use order', () => {
    expect(collectAssetRequests(graph)).toEqual([
      { type: 'texture', name: 'Abstract 1' },
      { type: 'cubemap', name: 'Forest' },
    ]);
  });
});

describe('checkAssetPixels', () => {
  it('accepts consistent data', () => {
    expect(checkAssetPixels('texture', { kind: 'texture', width: 2, height: 1, data: new Uint8Array(8) })).toBeNull();
  });

  it('rejects a size mismatch', () => {
    expect(checkAssetPixels('texture', { kind: 'texture', width: 2, height: 2, data: new Uint8Array(8) })).toBe(
      'expected 16 bytes, got 8'
    );
  });

  it('rejects data of the wrong kind', () => {
    expect(checkAssetPixels('cubemap', { kind: 'texture', width: 1, height: 1, data: new Uint8Array(4) })).toBe(
      'expected cubemap data, got texture'
    );
  });

  it('rejects a cubemap with a short face', () => {
    const faces = [4, 4, 4, 0, 4, 4].map((length) => new Uint8Array(length));
    expect(checkAssetPixels('cubemap', { kind: 'cubemap', size: 1, faces })).toBe('face 3: expected 4 bytes, got 0');
  });
});

describe('fetchAssets', () => {
  it('loads every asset through the provider once', async () => {
    const provider: AssetProvider = {
      load: vi.fn(async (type: AssetInputType) =>
        type === 'cubemap'
          ? { kind: 'cubemap' as const, size: 1, faces: Array.from({ length: 6 }, () => new Uint8Array(4)) }
          : { kind: 'texture' as const, width: 1, height: 1, data: new Uint8Array(4) }
      ),
    };

    const fetched = await fetchAssets(graph, provider);

    expect(provider.load).toHaveBeenCalledTimes(2);
    expect(fetched.map((asset) => [asset.name, asset.pixels?.kind, asset.error])).toEqual([
      ['Abstract 1', 'texture', null],
      ['Forest', 'cubemap', null],
    ]);
  });

  it('records failures instead of rejecting', async () => {
    const provider: AssetProvider = {
      load: vi.fn(async () => {
        throw new Error('file not found');
      }),
    };

    const fetched = await fetchAssets(graph, provider);

    expect(fetched[0]).toEqual({ type: 'texture', name: 'Abstract 1', pixels: null, error: 'file not found' });
  });

  it('reports a missing provider', async () => {
    const fetched = await fetchAssets(graph, null);

    expect(fetched[1].error).toBe('no asset provider configured');
  });
});

describe('AssetTextures', () => {
  it('uploads loaded pixels', () => {
    const backend = new HeadlessBackend();
    const data = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);

    const assets = new AssetTextures(backend, [
      { type: 'texture', name: 'a.png', pixels: { kind: 'texture', width: 2, height: 1, data }, error: null },
    ]);

    const texture = assets.get('texture', 'a.png');
    expect(texture).toMatchObject({ kind: '2d', width: 2, height: 1 });
    expect(texture && Array.from(backend.readPixels(texture))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(assets.warnings).toEqual([]);
  });

  it('binds a black placeholder for failed assets', () => {
    const backend = new HeadlessBackend();

    const assets = new AssetTextures(backend, [
      { type: 'cubemap', name: 'Forest', pixels: null, error: 'file not found' },
    ]);

    const texture = assets.get('cubemap', 'Forest');
    expect(texture).toMatchObject({ kind: 'cube', width: 1, height: 1 });
    expect(texture && Array.from(backend.readPixels(texture, 5))).toEqual([0, 0, 0, 255]);
    expect(assets.warnings).toEqual(['cubemap:Forest: file not found; using a black placeholder']);
  });

  it('returns null for unknown assets', () => {
    const assets = new AssetTextures(new HeadlessBackend(), []);

    expect(assets.get('texture', 'missing')).toBeNull();
  });

  it('releases its textures on dispose', () => {
    const backend = new HeadlessBackend();
    const assets = new AssetTextures(backend, [
      { type: 'texture', name: 'a', pixels: null, error: 'broken' },
      { type: 'volume', name: 'b', pixels: null, error: 'broken' },
    ]);
    expect(backend.liveTextureCount).toBe(2);

    assets.dispose();

    expect(backend.liveTextureCount).toBe(0);
    expect(assets.size).toBe(0);
  });
});
