import { describe, expect, it, vi } from 'vitest';
import { createGameSession } from '../core/gameSession';
import { DEFAULT_SETTINGS, type Settings } from '../core/settings';
import { createMemoryStorage, type KeyValueStorage } from '../core/storage';
import type { Landmark } from '../input/handGestures';
import {
  ManualClock,
  SequenceGenerator,
  gridFrom,
  idleScheduler,
  snapshotOf,
} from './helpers';

const HIGH_SCORE_KEY = 'gesturetris.highScore';
const SNAPSHOT_KEY = 'gesturetris.snapshot';

function makeSession(
  storage: KeyValueStorage = createMemoryStorage(),
  settings: Settings = DEFAULT_SETTINGS,
) {
  const clock = new ManualClock();
  const logger = { info: vi.fn(), warn: vi.fn() };
  const session = createGameSession({
    storage,
    settings,
    clock,
    logger,
    scheduler: idleScheduler,
    generatorFactory: () => new SequenceGenerator(['T', 'O']),
  });
  return { session, storage, clock, logger, game: session.getGame() };
}

describe('createGameSession', () => {
  it('loads the stored high score', () => {
    const { game } = makeSession(
      createMemoryStorage({ [HIGH_SCORE_KEY]: '1200' }),
    );
    expect(game.highScore).toBe(1200);
  });

  it('stores a new high score as soon as it is reached', () => {
    const { game, storage } = makeSession();
    game.restore(
      snapshotOf({
        grid: gridFrom(['ZZZ....ZZZ']),
        current: { type: 'I', rotation: 0, x: 3, y: 0 },
      }),
    );
    game.hardDrop();
    expect(storage.getItem(HIGH_SCORE_KEY)).toBe('100');
  });

  it('restart starts over paused with the stored high score', () => {
    const { session, game, storage } = makeSession();
    session.start();
    storage.setItem(HIGH_SCORE_KEY, '500');
    session.restart();

    expect(game.score).toBe(0);
    expect(game.highScore).toBe(500);
    expect(game.isPaused).toBe(true);
    expect(game.currentPiece).toBeNull();
  });

  it('suspends into storage and resumes where it left off', () => {
    const { session, game, storage } = makeSession();
    session.start();
    game.moveLateral(0.1, true);
    const running = game.save();

    session.suspend();
    expect(game.isPaused).toBe(true);
    expect(game.isRunning).toBe(false);
    expect(storage.getItem(SNAPSHOT_KEY)).not.toBeNull();
    expect(storage.getItem(HIGH_SCORE_KEY)).toBe('0');

    expect(session.resume()).toBe(true);
    expect(game.save()).toEqual(running);
    expect(game.isRunning).toBe(true);
    expect(storage.getItem(SNAPSHOT_KEY)).toBeNull();
    expect(session.resume()).toBe(false);
  });

  it('discards a corrupt snapshot', () => {
    const storage = createMemoryStorage({ [SNAPSHOT_KEY]: '{"grid":[]}' });
    const { session, game, logger } = makeSession(storage);
    const before = game.save();

    expect(session.resume()).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(storage.getItem(SNAPSHOT_KEY)).toBeNull();
    expect(game.save()).toEqual(before);
  });

  it('keeps running when storage access fails', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const denied: KeyValueStorage = {
      getItem: () => {
        throw new Error('denied');
      },
      setItem: () => {
        throw new Error('denied');
      },
      removeItem: () => {
        throw new Error('denied');
      },
    };
    const { session, game, logger } = makeSession(denied);

    expect(game.highScore).toBe(0);
    expect(session.resume()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      '[Session] Failed to read stored snapshot.',
      expect.any(Error),
    );

    session.start();
    expect(() => session.suspend()).not.toThrow();
    expect(() => session.discardSnapshot()).not.toThrow();
    expect(game.isPaused).toBe(true);
    warn.mockRestore();
  });

  it('discards a snapshot left by an earlier page', () => {
    const { session, storage } = makeSession();
    session.start();
    session.suspend();

    session.discardSnapshot();
    expect(storage.getItem(SNAPSHOT_KEY)).toBeNull();
    expect(session.resume()).toBe(false);
  });

  it('applies new timing and gesture settings', () => {
    const { session, game, clock } = makeSession();
    session.applySettings({
      timing: { ...DEFAULT_SETTINGS.timing, rotateCooldownMs: 0 },
      gestures: { debounceMs: 200 },
      display: DEFAULT_SETTINGS.display,
    });
    session.start();

    const fist: Landmark[] = Array.from({ length: 21 }, () => ({
      x: 0.5,
      y: 0.5,
    }));
    for (const tip of [8, 12, 16, 20]) fist[tip] = { x: 0.7, y: 0.5 };

    session.getDetector().process([fist]);
    clock.advance(300);
    session.getDetector().process([fist]);
    expect(game.currentPiece?.r).toBe(2);
  });

  it('stops the game on dispose', () => {
    const { session, game } = makeSession();
    session.start();
    session.dispose();
    expect(game.isRunning).toBe(false);
  });
});
