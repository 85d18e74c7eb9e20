import type { GestureSink } from './gestures';
import type { KeyState } from './keyboard';

export interface KeyboardGestureBindings {
  left: string[];
  right: string[];
  fist: string[];
  twoFinger: string[];
}

export const DEFAULT_GESTURE_KEYS: KeyboardGestureBindings = {
  left: ['ArrowLeft', 'KeyA'],
  right: ['ArrowRight', 'KeyD'],
  fist: ['ArrowUp', 'KeyX'],
  twoFinger: ['Space'],
};

// Pointer positions that land inside the left and right zones.
export const KEY_POINTER_LEFT = 0.2;
export const KEY_POINTER_RIGHT = 0.8;
export const KEY_POINTER_IDLE = 0.5;

/**
 * Desktop stand-in for the hand tracker: emits the same gesture events from
 * keyboard state, once per sampled frame.
 */
export class KeyboardGestureSource {
  private bindings: KeyboardGestureBindings;

  constructor(
    private keys: KeyState,
    private sink: GestureSink,
    bindings: Partial<KeyboardGestureBindings> = {},
  ) {
    this.bindings = { ...DEFAULT_GESTURE_KEYS, ...bindings };
  }

  sample(): void {
    const { left, right, fist, twoFinger } = this.bindings;
    const leftHeld = left.some((code) => this.keys.isHeld(code));
    const rightHeld = right.some((code) => this.keys.isHeld(code));

    if (leftHeld && !rightHeld) {
      this.sink.pointerMoved(KEY_POINTER_LEFT, true);
    } else if (rightHeld && !leftHeld) {
      this.sink.pointerMoved(KEY_POINTER_RIGHT, true);
    } else {
      this.sink.pointerMoved(KEY_POINTER_IDLE, false);
    }

    if (this.consumeAny(fist)) this.sink.fistGesture();
    if (this.consumeAny(twoFinger)) this.sink.twoFingerGesture();
  }

  private consumeAny(codes: string[]): boolean {
    // every binding is consumed, not just the first one pressed
    let pressed = false;
    for (const code of codes) {
      if (this.keys.consumePressed(code)) pressed = true;
    }
    return pressed;
  }
}
