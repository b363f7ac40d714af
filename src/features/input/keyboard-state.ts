/**
 * Keyboard state as a 256x3 texture, one column per key code:
 * row 0 held, row 1 pressed this frame, row 2 toggled by each press.
 */

export const KEY_COUNT = 256;
export const KEYBOARD_ROWS = 3;

const ON = 255;

export class KeyboardState {
  private held = new Uint8Array(KEY_COUNT);
  private pressed = new Uint8Array(KEY_COUNT);
  private toggled = new Uint8Array(KEY_COUNT);

  /**
   * Record a key transition from the input collaborator
   * @returns false when the code has no column
   */
  setKey(code: number, down: boolean): boolean {
    if (!Number.isInteger(code) || code < 0 || code >= KEY_COUNT) return false;

    if (down && this.held[code] === 0) {
      this.pressed[code] = ON;
      this.toggled[code] = this.toggled[code] === 0 ? ON : 0;
    }
    this.held[code] = down ? ON : 0;
    return true;
  }

  isHeld(code: number): boolean {
    return this.held[code] === ON;
  }

  releaseAll(): void {
    this.held.fill(0);
  }

  /**
   * Texel rows for upload, row 0 first
   */
  texels(): Uint8Array {
    const data = new Uint8Array(KEY_COUNT * KEYBOARD_ROWS);
    data.set(this.held, 0);
    data.set(this.pressed, KEY_COUNT);
    data.set(this.toggled, KEY_COUNT * 2);
    return data;
  }

  /**
   * Clear the one-frame pressed pulses once a frame has used them
   */
  endFrame(): void {
    this.pressed.fill(0);
  }
}
