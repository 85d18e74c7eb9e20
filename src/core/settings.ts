import {
  DEFAULT_DROP_COOLDOWN_MS,
  DEFAULT_GESTURE_DEBOUNCE_MS,
  DEFAULT_HARD_DROP_COOLDOWN_MS,
  DEFAULT_MOVE_DELAY_MS,
  DEFAULT_ROTATE_COOLDOWN_MS,
  DEFAULT_TICK_MS,
  SETTINGS_STORAGE_KEY,
} from './constants';
import type { KeyValueStorage } from './storage';

export interface TimingSettings {
  tickMs: number;
  dropCooldownMs: number;
  moveDelayMs: number;
  rotateCooldownMs: number;
  hardDropCooldownMs: number;
}

export interface GestureSettings {
  debounceMs: number;
}

export interface DisplaySettings {
  /** Draw the left/right pointer zone lines and the pointer marker. */
  showZones: boolean;
}

export interface Settings {
  timing: TimingSettings;
  gestures: GestureSettings;
  display: DisplaySettings;
}

export type SettingsPatch = {
  timing?: Partial<TimingSettings>;
  gestures?: Partial<GestureSettings>;
  display?: Partial<DisplaySettings>;
};

export const DEFAULT_SETTINGS: Settings = {
  timing: {
    tickMs: DEFAULT_TICK_MS,
    dropCooldownMs: DEFAULT_DROP_COOLDOWN_MS,
    moveDelayMs: DEFAULT_MOVE_DELAY_MS,
    rotateCooldownMs: DEFAULT_ROTATE_COOLDOWN_MS,
    hardDropCooldownMs: DEFAULT_HARD_DROP_COOLDOWN_MS,
  },
  gestures: {
    debounceMs: DEFAULT_GESTURE_DEBOUNCE_MS,
  },
  display: {
    showZones: true,
  },
};

function ms(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) && v >= 0 ? v : undefined;
}

function positiveMs(v: unknown): number | undefined {
  const value = ms(v);
  return value !== undefined && value > 0 ? value : undefined;
}

function flag(v: unknown): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined;
}

function field(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) return undefined;
  return Object.getOwnPropertyDescriptor(source, key)?.value;
}

function mergeTiming(base: TimingSettings, patch: unknown): TimingSettings {
  return {
    tickMs: positiveMs(field(patch, 'tickMs')) ?? base.tickMs,
    dropCooldownMs: ms(field(patch, 'dropCooldownMs')) ?? base.dropCooldownMs,
    moveDelayMs: ms(field(patch, 'moveDelayMs')) ?? base.moveDelayMs,
    rotateCooldownMs:
      ms(field(patch, 'rotateCooldownMs')) ?? base.rotateCooldownMs,
    hardDropCooldownMs:
      ms(field(patch, 'hardDropCooldownMs')) ?? base.hardDropCooldownMs,
  };
}

function mergeGestures(base: GestureSettings, patch: unknown): GestureSettings {
  return {
    debounceMs: ms(field(patch, 'debounceMs')) ?? base.debounceMs,
  };
}

function mergeDisplay(base: DisplaySettings, patch: unknown): DisplaySettings {
  return {
    showZones: flag(field(patch, 'showZones')) ?? base.showZones,
  };
}

/**
 * Values that are not finite non-negative numbers keep the base value;
 * the gravity period must also be above zero.
 */
export function mergeSettings(
  base: Settings,
  patch: unknown,
): Settings {
  return {
    timing: mergeTiming(base.timing, field(patch, 'timing')),
    gestures: mergeGestures(base.gestures, field(patch, 'gestures')),
    display: mergeDisplay(base.display, field(patch, 'display')),
  };
}

export function loadSettings(storage: KeyValueStorage): Settings {
  try {
    const raw = storage.getItem(SETTINGS_STORAGE_KEY);
    if (!raw) return DEFAULT_SETTINGS;
    return mergeSettings(DEFAULT_SETTINGS, JSON.parse(raw));
  } catch (err) {
    console.warn('[Settings] Failed to load settings, using defaults.', err);
    return DEFAULT_SETTINGS;
  }
}

export function saveSettings(
  storage: KeyValueStorage,
  settings: Settings,
): void {
  try {
    storage.setItem(SETTINGS_STORAGE_KEY, JSON.stringify(settings));
  } catch (err) {
    console.warn('[Settings] Failed to save settings.', err);
  }
}
