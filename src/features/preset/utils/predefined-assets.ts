import catalogue from '../data/predefined-assets.json';
import type { AssetInputType } from '../types';

const PREDEFINED: Readonly<Record<AssetInputType, ReadonlySet<string>>> = {
  texture: new Set(catalogue.texture),
  cubemap: new Set(catalogue.cubemap),
  volume: new Set(catalogue.volume),
};

export function isPredefinedAsset(type: AssetInputType, name: string): boolean {
  return PREDEFINED[type].has(name);
}

export function listPredefinedAssets(type: AssetInputType): string[] {
  return [...PREDEFINED[type]];
}

/**
 * Anything with a path separator or a trailing file extension is taken as a file path.
 */
export function looksLikeFilePath(name: string): boolean {
  return /[\\/]/.test(name) || /\.[A-Za-z0-9]{2,5}$/.test(name);
}
