/**
 * Asset Types
 *
 * Pixel data for texture, cubemap and volume inputs comes from an external
 * provider keyed by predefined name or file path. All pixel data is RGBA8.
 */

import type { AssetInputType } from '@/features/preset/types';

export interface TexturePixels {
  kind: 'texture';
  width: number;
  height: number;
  data: Uint8Array;
}

/** Faces in +X, -X, +Y, -Y, +Z, -Z order */
export interface CubemapPixels {
  kind: 'cubemap';
  size: number;
  faces: readonly Uint8Array[];
}

export interface VolumePixels {
  kind: 'volume';
  width: number;
  height: number;
  depth: number;
  data: Uint8Array;
}

export type AssetPixels = TexturePixels | CubemapPixels | VolumePixels;

export interface AssetProvider {
  load(type: AssetInputType, name: string): Promise<AssetPixels>;
}

export interface AssetRequest {
  type: AssetInputType;
  name: string;
}

/** Result of fetching one asset; `pixels` is null when it could not be used */
export interface FetchedAsset extends AssetRequest {
  pixels: AssetPixels | null;
  error: string | null;
}
