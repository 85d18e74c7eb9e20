import { SNAPSHOT_STORAGE_KEY } from './constants';
import { GameController, type GameConfig, type GameLogger } from './game';
import { createHighScoreStore } from './highScore';
import type { Settings } from './settings';
import {
  deserializeSnapshot,
  serializeSnapshot,
  SnapshotError,
} from './snapshot';
import type { KeyValueStorage } from './storage';
import { GestureAdapter } from '../input/gestures';
import { HandGestureDetector } from '../input/handGestures';

export type GameSession = {
  getGame: () => GameController;
  getGestures: () => GestureAdapter;
  getDetector: () => HandGestureDetector;
  start: () => void;
  pause: () => void;
  restart: () => void;
  /** Saves everything needed to come back after the page is hidden. */
  suspend: () => void;
  /** Restores a suspended game; false when there was nothing to restore. */
  resume: () => boolean;
  /** Drops a stored snapshot left over from an earlier page. */
  discardSnapshot: () => void;
  applySettings: (settings: Settings) => void;
  dispose: () => void;
};

type GameSessionOptions = Omit<GameConfig, 'timing'> & {
  storage: KeyValueStorage;
  settings: Settings;
};

export function createGameSession(options: GameSessionOptions): GameSession {
  const { storage, settings, ...gameConfig } = options;
  const log: GameLogger = options.logger ?? console;
  const highScores = createHighScoreStore(storage);

  const game = new GameController({ ...gameConfig, timing: settings.timing });
  const gestures = new GestureAdapter(game);
  const detector = new HandGestureDetector(gestures, {
    debounceMs: settings.gestures.debounceMs,
    clock: options.clock,
  });

  game.setHighScore(highScores.load());

  const unsubscribe = game.subscribe((event) => {
    if (event.type === 'highScore' || event.type === 'gameOver') {
      highScores.save(game.highScore);
    }
  });

  // Reading a snapshot also removes it, so it is restored at most once.
  const takeSnapshot = (): string | null => {
    try {
      const raw = storage.getItem(SNAPSHOT_STORAGE_KEY);
      if (raw !== null) storage.removeItem(SNAPSHOT_STORAGE_KEY);
      return raw;
    } catch (err) {
      log.warn('[Session] Failed to read stored snapshot.', err);
      return null;
    }
  };

  const writeSnapshot = (text: string) => {
    try {
      storage.setItem(SNAPSHOT_STORAGE_KEY, text);
    } catch (err) {
      log.warn('[Session] Failed to store snapshot.', err);
    }
  };

  return {
    getGame: () => game,
    getGestures: () => gestures,
    getDetector: () => detector,
    start: () => game.start(),
    pause: () => game.pause(),
    restart: () => {
      game.reset();
      game.setHighScore(highScores.load());
    },
    suspend: () => {
      const text = serializeSnapshot(game.save());
      game.pause();
      highScores.save(game.highScore);
      writeSnapshot(text);
    },
    resume: () => {
      const raw = takeSnapshot();
      if (raw === null) return false;
      try {
        game.restore(deserializeSnapshot(raw));
      } catch (err) {
        if (!(err instanceof SnapshotError)) throw err;
        log.warn(`[Session] Discarding stored snapshot: ${err.message}`);
        return false;
      }
      game.setHighScore(highScores.load());
      return true;
    },
    discardSnapshot: () => {
      takeSnapshot();
    },
    applySettings: (next) => {
      game.setTiming(next.timing);
      detector.setDebounce(next.gestures.debounceMs);
    },
    dispose: () => {
      unsubscribe();
      game.dispose();
    },
  };
}
