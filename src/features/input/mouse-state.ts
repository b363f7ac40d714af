/**
 * Mouse state in the iMouse convention: xy is the pointer while the button
 * is held (kept after release), zw the click position. z is negative once
 * released; w is positive only on the frame of the click.
 */

import type { Rect } from '@/features/layout/types';

export type MouseUniform = [x: number, y: number, z: number, w: number];

interface Point {
  x: number;
  y: number;
}

export class MouseState {
  private down = false;
  private clickedThisFrame = false;
  private position: Point | null = null;
  private click: Point | null = null;

  /**
   * Record the pointer in screen pixels (top-left origin)
   */
  update(x: number, y: number, pressed: boolean): void {
    if (pressed) {
      if (!this.down) {
        this.click = { x, y };
        this.clickedThisFrame = true;
      }
      this.position = { x, y };
    }
    this.down = pressed;
  }

  get isDown(): boolean {
    return this.down;
  }

  /**
   * iMouse for a canvas covering `bounds`, in render pixels with a bottom-left origin
   */
  sample(bounds: Rect, scale: number): MouseUniform {
    if (!this.position || !this.click) return [0, 0, 0, 0];

    const toCanvas = (point: Point): Point => ({
      x: (point.x - bounds.x) * scale,
      y: (bounds.y + bounds.height - point.y) * scale,
    });
    const position = toCanvas(this.position);
    const click = toCanvas(this.click);

    if (this.down) {
      return [position.x, position.y, click.x, this.clickedThisFrame ? click.y : -click.y];
    }
    return [position.x, position.y, -click.x, -click.y];
  }

  endFrame(): void {
    this.clickedThisFrame = false;
  }
}
