import { afterEach, describe, expect, it, vi } from 'vitest';
import { createHighScoreStore } from '../core/highScore';
import {
  DEFAULT_SETTINGS,
  loadSettings,
  mergeSettings,
  saveSettings,
} from '../core/settings';
import { createSettingsStore } from '../core/settingsStore';
import { createMemoryStorage } from '../core/storage';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('mergeSettings', () => {
  it('keeps the base value for anything that is not a valid duration', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, {
      timing: { tickMs: 250, moveDelayMs: -5, rotateCooldownMs: 'fast' },
      gestures: { debounceMs: Number.NaN },
    });
    expect(merged).toEqual({
      timing: { ...DEFAULT_SETTINGS.timing, tickMs: 250 },
      gestures: { debounceMs: 1000 },
      display: { showZones: true },
    });
  });

  it('ignores patches that are not objects', () => {
    expect(mergeSettings(DEFAULT_SETTINGS, null)).toEqual(DEFAULT_SETTINGS);
    expect(mergeSettings(DEFAULT_SETTINGS, { timing: 3 })).toEqual(
      DEFAULT_SETTINGS,
    );
  });

  it('accepts a zero cooldown', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, {
      timing: { hardDropCooldownMs: 0 },
    });
    expect(merged.timing.hardDropCooldownMs).toBe(0);
  });

  it('keeps the gravity period above zero', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, {
      timing: { tickMs: 0 },
    });
    expect(merged.timing.tickMs).toBe(500);
  });

  it('only takes booleans for display flags', () => {
    expect(
      mergeSettings(DEFAULT_SETTINGS, { display: { showZones: false } })
        .display.showZones,
    ).toBe(false);
    expect(
      mergeSettings(DEFAULT_SETTINGS, { display: { showZones: 0 } }).display
        .showZones,
    ).toBe(true);
  });
});

describe('loadSettings / saveSettings', () => {
  it('fills missing values from the defaults', () => {
    const storage = createMemoryStorage({
      'gesturetris.settings': JSON.stringify({
        timing: { hardDropCooldownMs: 900 },
      }),
    });
    const settings = loadSettings(storage);
    expect(settings.timing.hardDropCooldownMs).toBe(900);
    expect(settings.timing.tickMs).toBe(500);
    expect(settings.gestures.debounceMs).toBe(1000);
  });

  it('falls back to the defaults on corrupt data', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const storage = createMemoryStorage({ 'gesturetris.settings': '{oops' });
    expect(loadSettings(storage)).toBe(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('writes settings as JSON', () => {
    const storage = createMemoryStorage();
    saveSettings(storage, DEFAULT_SETTINGS);
    expect(loadSettings(storage)).toEqual(DEFAULT_SETTINGS);
  });
});

describe('createSettingsStore', () => {
  it('persists and broadcasts applied patches', () => {
    const storage = createMemoryStorage();
    const store = createSettingsStore(storage);
    const seen: number[] = [];
    const unsubscribe = store.subscribe((s) => seen.push(s.timing.tickMs));

    store.apply({ timing: { tickMs: 300 } });
    expect(store.get().timing.tickMs).toBe(300);
    expect(loadSettings(storage).timing.tickMs).toBe(300);

    unsubscribe();
    store.apply({ timing: { tickMs: 400 } });
    expect(seen).toEqual([300]);
  });
});

describe('createHighScoreStore', () => {
  it('round-trips a score', () => {
    const store = createHighScoreStore(createMemoryStorage());
    expect(store.load()).toBe(0);
    store.save(1200);
    expect(store.load()).toBe(1200);
  });

  it('reads unusable values as zero', () => {
    for (const raw of ['abc', '-5', '2.5']) {
      const storage = createMemoryStorage({ 'gesturetris.highScore': raw });
      expect(createHighScoreStore(storage).load()).toBe(0);
    }
  });
});
