export type { CanvasPlan, LayoutMapping, Monitor, MonitorLayout, PresentWrap, Rect, UvRange } from './types';
export {
  UNION_CANVAS_ID,
  canvasSignature,
  mapCanvasToMonitor,
  resolveLayout,
  scaledSize,
  selectMonitors,
  unionRect,
} from './layout-resolver';
export type { LayoutSettings } from './layout-resolver';
