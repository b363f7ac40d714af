export { WallpaperRuntime, createWallpaperRuntime } from './wallpaper-runtime';
export type { PresentedFrame, TickAction, WallpaperRuntimeOptions } from './wallpaper-runtime';
export { HotReloadCoordinator } from './hot-reload-coordinator';
export type { HotReloadOptions, StagedReload } from './hot-reload-coordinator';
export { createStatusStore } from './stores/status-store';
export type {
  ActivePresetInfo,
  OverlayText,
  RuntimeErrorInfo,
  RuntimePhase,
  RuntimeStatus,
  StatusStore,
} from './stores/status-store';
