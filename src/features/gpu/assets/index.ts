export type {
  AssetPixels,
  AssetProvider,
  AssetRequest,
  CubemapPixels,
  FetchedAsset,
  TexturePixels,
  VolumePixels,
} from './types';
export { AssetTextures, assetKey, checkAssetPixels, collectAssetRequests, fetchAssets } from './asset-textures';
