/**
 * Monitor and layout types
 */

/** A monitor as reported by the host: connector name and geometry in screen pixels */
export interface Monitor {
  name: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Texture coordinates with a top-left origin; values outside [0, 1] tile */
export interface UvRange {
  u0: number;
  v0: number;
  u1: number;
  v1: number;
}

export type PresentWrap = 'clamp' | 'repeat' | 'mirrored_repeat';

/**
 * How the rendered canvas lands on one monitor: the canvas region given by
 * `uv` is drawn into `destination` (monitor-local pixels).
 */
export interface LayoutMapping {
  destination: Rect;
  uv: UvRange;
  wrap: PresentWrap;
}

export interface MonitorLayout {
  monitor: Monitor;
  /** Monitor rectangle relative to its canvas's screen bounds */
  local: Rect;
  /** null when the canvas does not reach this monitor */
  mapping: LayoutMapping | null;
}

/** One render target shared by the monitors it is mapped onto */
export interface CanvasPlan {
  id: string;
  /** Screen-space bounds the canvas covers */
  bounds: Rect;
  /** Render resolution (bounds scaled by resolution_scale) */
  width: number;
  height: number;
  monitors: MonitorLayout[];
}
