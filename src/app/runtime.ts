import type { Application, Ticker } from 'pixi.js';
import type { GameSession } from '../core/gameSession';
import type { GameView } from '../core/types';
import type { KeyboardGestureSource } from '../input/keyboardGestureSource';
import type { PixiRenderer } from '../render/pixiRenderer';

export type GameRuntime = {
  renderNow: () => void;
  destroy: () => void;
};

type GameRuntimeOptions = {
  app: Application;
  session: GameSession;
  renderer: PixiRenderer;
  input: KeyboardGestureSource;
  onFrame: (view: GameView) => void;
};

export function createGameRuntime(options: GameRuntimeOptions): GameRuntime {
  const { app, session, renderer, input, onFrame } = options;

  const renderNow = () => {
    const view = session.getGame().view();
    renderer.render(view);
    onFrame(view);
  };

  const tick = (_t: Ticker) => {
    input.sample();
    renderNow();
  };

  // Hidden pages are suspended into storage.
  const onVisibilityChange = () => {
    if (document.visibilityState === 'hidden') {
      session.suspend();
    } else if (session.resume()) {
      renderNow();
    }
  };

  app.ticker.add(tick);
  document.addEventListener('visibilitychange', onVisibilityChange);

  return {
    renderNow,
    destroy: () => {
      app.ticker.remove(tick);
      document.removeEventListener('visibilitychange', onVisibilityChange);
      session.dispose();
    },
  };
}
