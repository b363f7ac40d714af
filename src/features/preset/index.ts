export type {
  AssetInputType,
  AssetInputSpec,
  BufferInputSpec,
  BufferName,
  BufferPassId,
  FilterMode,
  FrameTiming,
  InputSpec,
  InputType,
  KeyboardInputSpec,
  LayoutMode,
  PassId,
  PassiveInputSpec,
  PassiveInputType,
  PassSpec,
  Preset,
  PresetMetadata,
  PresetSettings,
  RenderPassId,
  SamplerSettings,
  ScreenBoundsPolicy,
  WrapMode,
} from './types';
export {
  BUFFER_PASS_BY_NAME,
  DEFAULT_IMAGE_SHADER,
  DEFAULT_METADATA,
  DEFAULT_SETTINGS,
  MAX_INPUT_SLOTS,
  PASS_IDS,
  RENDER_ORDER,
  isBufferName,
} from './constants';
export { presetSchema, validatePreset, formatValidationErrors } from './schemas/preset-schema';
export { parsePreset, presetFromDocument, serializePreset } from './services/preset-codec';
export {
  PRESET_EXTENSION,
  listPresetFiles,
  pickPresetFromDirectory,
  readPresetFile,
  savePreset,
} from './services/preset-files';
export { watchPresetFile } from './services/preset-watcher';
export type { PresetWatcherOptions, WatchFunction, WatchListener } from './services/preset-watcher';
export { isPredefinedAsset, listPredefinedAssets, looksLikeFilePath } from './utils/predefined-assets';
