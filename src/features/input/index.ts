import { KeyboardState } from './keyboard-state';
import { MouseState } from './mouse-state';

export { KeyboardState, KEY_COUNT, KEYBOARD_ROWS } from './keyboard-state';
export { MouseState } from './mouse-state';
export type { MouseUniform } from './mouse-state';

/**
 * Pointer and key state fed by the host, read once per rendered frame
 */
export class InputState {
  readonly keyboard = new KeyboardState();
  readonly mouse = new MouseState();

  endFrame(): void {
    this.keyboard.endFrame();
    this.mouse.endFrame();
  }
}
