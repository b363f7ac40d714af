/**
 * Layout Resolver
 *
 * Derives the render canvases from the monitor set and maps each canvas onto
 * its monitors according to the layout mode.
 */

import type { LayoutMode, PresetSettings } from '@/features/preset/types';
import type { CanvasPlan, LayoutMapping, Monitor, MonitorLayout, Rect } from './types';

export type LayoutSettings = Pick<
  PresetSettings,
  'screenBoundsPolicy' | 'monitorSelection' | 'resolutionScale' | 'layoutMode'
>;

export const UNION_CANVAS_ID = 'union';

/**
 * Monitors taking part under the bounds policy. all_monitors ignores the selection.
 */
export function selectMonitors(monitors: readonly Monitor[], settings: LayoutSettings): Monitor[] {
  if (settings.screenBoundsPolicy === 'all_monitors') return [...monitors];

  const selection = new Set(settings.monitorSelection);
  if (selection.has('*')) return [...monitors];
  return monitors.filter((monitor) => selection.has(monitor.name));
}

export function unionRect(rects: readonly Rect[]): Rect | null {
  if (rects.length === 0) return null;

  let left = Infinity;
  let top = Infinity;
  let right = -Infinity;
  let bottom = -Infinity;
  for (const rect of rects) {
    left = Math.min(left, rect.x);
    top = Math.min(top, rect.y);
    right = Math.max(right, rect.x + rect.width);
    bottom = Math.max(bottom, rect.y + rect.height);
  }
  return { x: left, y: top, width: right - left, height: bottom - top };
}

export function scaledSize(width: number, height: number, scale: number): { width: number; height: number } {
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

/**
 * Map a canvas of `canvasWidth` x `canvasHeight` render pixels, covering
 * `bounds`, onto the monitor at `local` (relative to bounds).
 */
export function mapCanvasToMonitor(
  mode: LayoutMode,
  local: Rect,
  bounds: Rect,
  canvasWidth: number,
  canvasHeight: number
): LayoutMapping | null {
  switch (mode) {
    case 'stretch':
      return {
        destination: { x: 0, y: 0, width: local.width, height: local.height },
        uv: { u0: 0, v0: 0, u1: 1, v1: 1 },
        wrap: 'clamp',
      };

    case 'center': {
      // Canvas at one render pixel per screen pixel, centered on the bounds
      const originX = (bounds.width - canvasWidth) / 2;
      const originY = (bounds.height - canvasHeight) / 2;
      const left = Math.max(originX, local.x);
      const top = Math.max(originY, local.y);
      const right = Math.min(originX + canvasWidth, local.x + local.width);
      const bottom = Math.min(originY + canvasHeight, local.y + local.height);
      if (right <= left || bottom <= top) return null;

      return {
        destination: { x: left - local.x, y: top - local.y, width: right - left, height: bottom - top },
        uv: {
          u0: (left - originX) / canvasWidth,
          v0: (top - originY) / canvasHeight,
          u1: (right - originX) / canvasWidth,
          v1: (bottom - originY) / canvasHeight,
        },
        wrap: 'clamp',
      };
    }

    case 'repeat':
    case 'mirrored_repeat':
      // Tiles start at the bounds' top-left and continue across monitors
      return {
        destination: { x: 0, y: 0, width: local.width, height: local.height },
        uv: {
          u0: local.x / canvasWidth,
          v0: local.y / canvasHeight,
          u1: (local.x + local.width) / canvasWidth,
          v1: (local.y + local.height) / canvasHeight,
        },
        wrap: mode,
      };
  }
}

function planCanvas(id: string, monitors: readonly Monitor[], bounds: Rect, settings: LayoutSettings): CanvasPlan {
  const size = scaledSize(bounds.width, bounds.height, settings.resolutionScale);
  const layouts: MonitorLayout[] = monitors.map((monitor) => {
    const local = {
      x: monitor.x - bounds.x,
      y: monitor.y - bounds.y,
      width: monitor.width,
      height: monitor.height,
    };
    return {
      monitor,
      local,
      mapping: mapCanvasToMonitor(settings.layoutMode, local, bounds, size.width, size.height),
    };
  });

  return { id, bounds, width: size.width, height: size.height, monitors: layouts };
}

/**
 * Connector name of a cloned canvas; suffixed with its position when the
 * name is empty or shared with another selected monitor
 */
function clonedCanvasId(selected: readonly Monitor[], index: number): string {
  const name = selected[index].name;
  const shared = name === '' || selected.some((other, i) => i !== index && other.name === name);
  return shared ? `${name}#${index}` : name;
}

/**
 * Resolve the canvases to render. cloned gives one canvas per selected monitor;
 * the other policies give one canvas spanning the selected monitors.
 */
export function resolveLayout(monitors: readonly Monitor[], settings: LayoutSettings): CanvasPlan[] {
  const selected = selectMonitors(monitors, settings).filter(
    (monitor) => monitor.width > 0 && monitor.height > 0
  );

  if (settings.screenBoundsPolicy === 'cloned') {
    return selected.map((monitor, index) =>
      planCanvas(
        clonedCanvasId(selected, index),
        [monitor],
        { x: monitor.x, y: monitor.y, width: monitor.width, height: monitor.height },
        settings
      )
    );
  }

  const bounds = unionRect(selected);
  return bounds ? [planCanvas(UNION_CANVAS_ID, selected, bounds, settings)] : [];
}

/**
 * Identity of a canvas set for deciding whether render targets must be reallocated
 */
export function canvasSignature(canvases: readonly CanvasPlan[]): string {
  return canvases.map((canvas) => `${canvas.id}:${canvas.width}x${canvas.height}`).join('|');
}
