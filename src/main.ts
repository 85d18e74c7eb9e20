import { Application, Graphics } from 'pixi.js';
import { createGameRuntime } from './app/runtime';
import { createSettingsController } from './app/settingsController';
import { createSettingsPanel } from './app/settingsPanel';
import {
  BOARD_X,
  BOARD_Y,
  PANEL_GAP,
  PLAY_HEIGHT,
  PLAY_WIDTH,
  PREVIEW_HEIGHT,
  PREVIEW_WIDTH,
  PREVIEW_X,
  PREVIEW_Y,
} from './core/constants';
import { createGameSession } from './core/gameSession';
import { createSettingsStore } from './core/settingsStore';
import { browserStorage } from './core/storage';
import type { GameView } from './core/types';
import { Keyboard } from './input/keyboard';
import { KeyboardGestureSource } from './input/keyboardGestureSource';
import { PixiRenderer } from './render/pixiRenderer';

function hasWebGL(): boolean {
  const c = document.createElement('canvas');
  return !!(c.getContext('webgl2') || c.getContext('webgl'));
}

function makeButton(label: string): HTMLButtonElement {
  const button = document.createElement('button');
  button.textContent = label;
  Object.assign(button.style, {
    display: 'block',
    width: `${PREVIEW_WIDTH}px`,
    marginBottom: '8px',
    padding: '8px 0',
    background: '#121a24',
    color: '#e5e7eb',
    border: '2px solid #1f2a37',
    font: '600 14px system-ui, sans-serif',
    cursor: 'pointer',
  });
  return button;
}

function makeLabel(): HTMLDivElement {
  const label = document.createElement('div');
  Object.assign(label.style, {
    margin: '0 0 8px',
    font: '600 16px system-ui, sans-serif',
  });
  return label;
}

async function boot() {
  const root = document.getElementById('app');
  if (!root) throw new Error('Missing #app container');

  if (!hasWebGL()) {
    root.innerHTML = `<div style="padding:16px">
      WebGL is disabled/unavailable. Enable hardware acceleration.
    </div>`;
    return;
  }

  const app = new Application();
  await app.init({
    width: PLAY_WIDTH,
    height: PLAY_HEIGHT,
    backgroundColor: 0x0b0f14,
    antialias: true,
  });
  root.appendChild(app.canvas);

  const gfx = new Graphics();
  app.stage.addChild(gfx);
  const renderer = new PixiRenderer(gfx);

  const storage = browserStorage();
  const settings = createSettingsStore(storage);
  const session = createGameSession({ storage, settings: settings.get() });
  createSettingsController({
    settingsStore: settings,
    session,
    renderer,
  }).start();

  const input = new KeyboardGestureSource(
    new Keyboard(),
    session.getGestures(),
  );

  const panel = document.createElement('div');
  Object.assign(panel.style, {
    position: 'absolute',
    left: `${PREVIEW_X}px`,
    top: `${PREVIEW_Y + PREVIEW_HEIGHT + PANEL_GAP}px`,
    width: `${PREVIEW_WIDTH}px`,
  });
  const scoreLabel = makeLabel();
  const highScoreLabel = makeLabel();
  const statusLabel = makeLabel();
  const startButton = makeButton('START');
  const pauseButton = makeButton('PAUSE');
  const restartButton = makeButton('RESTART');
  panel.append(
    scoreLabel,
    highScoreLabel,
    statusLabel,
    startButton,
    pauseButton,
    restartButton,
    createSettingsPanel(settings).element,
  );
  root.appendChild(panel);

  const help = document.createElement('div');
  help.textContent =
    '←/→ point left/right · ↑ fist (rotate) · Space two fingers (drop)';
  Object.assign(help.style, {
    position: 'absolute',
    left: `${BOARD_X}px`,
    top: `${BOARD_Y - 28}px`,
    font: '12px system-ui, sans-serif',
    opacity: '0.7',
  });
  root.appendChild(help);

  const updateLabels = (view: GameView) => {
    scoreLabel.textContent = `Score: ${view.score}`;
    highScoreLabel.textContent = `High score: ${view.highScore}`;
    statusLabel.textContent = view.isGameOver
      ? 'GAME OVER'
      : view.isPaused
        ? 'Paused'
        : '';
  };

  const runtime = createGameRuntime({
    app,
    session,
    renderer,
    input,
    onFrame: updateLabels,
  });

  startButton.addEventListener('click', () => session.start());
  pauseButton.addEventListener('click', () => session.pause());
  restartButton.addEventListener('click', () => {
    session.restart();
    runtime.renderNow();
  });

  // Snapshots only bridge a hidden tab; a fresh page starts a new game.
  session.discardSnapshot();
  session.restart();
  runtime.renderNow();
}

boot().catch((e) => console.error(e));
