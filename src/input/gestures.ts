import type { GameController } from '../core/game';

/** Events produced by a hand-tracking (or stand-in) input source. */
export interface GestureSink {
  pointerMoved(x: number, isPointing: boolean): void;
  fistGesture(): void;
  twoFingerGesture(): void;
}

export type GestureAction = 'rotate' | 'hardDrop';

/** Fist rotates, two fingers hard-drop. */
export const GESTURE_ACTIONS = {
  fist: 'rotate',
  twoFinger: 'hardDrop',
} as const satisfies Record<'fist' | 'twoFinger', GestureAction>;

type GameActions = Pick<GameController, 'moveLateral' | 'rotate' | 'hardDrop'>;

export class GestureAdapter implements GestureSink {
  constructor(private game: GameActions) {}

  pointerMoved(x: number, isPointing: boolean): void {
    this.game.moveLateral(x, isPointing);
  }

  fistGesture(): void {
    this.perform(GESTURE_ACTIONS.fist);
  }

  twoFingerGesture(): void {
    this.perform(GESTURE_ACTIONS.twoFinger);
  }

  private perform(action: GestureAction): void {
    if (action === 'rotate') {
      this.game.rotate();
    } else {
      this.game.hardDrop();
    }
  }
}
