import { HIGH_SCORE_STORAGE_KEY } from './constants';
import type { KeyValueStorage } from './storage';

export interface HighScoreStore {
  load(): number;
  save(score: number): void;
}

export function createHighScoreStore(
  storage: KeyValueStorage,
  key = HIGH_SCORE_STORAGE_KEY,
): HighScoreStore {
  return {
    load() {
      try {
        const value = Number(storage.getItem(key) ?? 0);
        return Number.isInteger(value) && value > 0 ? value : 0;
      } catch (err) {
        console.warn('[HighScore] Failed to load high score.', err);
        return 0;
      }
    },
    save(score) {
      try {
        storage.setItem(key, String(score));
      } catch (err) {
        console.warn('[HighScore] Failed to save high score.', err);
      }
    },
  };
}
