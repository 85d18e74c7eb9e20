import { afterEach, describe, expect, it, vi } from 'vitest';
import { browserStorage, createMemoryStorage } from '../core/storage';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('createMemoryStorage', () => {
  it('stores, reads and removes values', () => {
    const storage = createMemoryStorage({ a: '1' });
    expect(storage.getItem('a')).toBe('1');
    storage.setItem('b', '2');
    storage.removeItem('a');
    expect(storage.getItem('a')).toBeNull();
    expect(storage.getItem('b')).toBe('2');
  });
});

describe('browserStorage', () => {
  it('uses localStorage when present', () => {
    const local = createMemoryStorage();
    vi.stubGlobal('localStorage', local);
    expect(browserStorage()).toBe(local);
  });

  it('keeps data in memory without localStorage', () => {
    vi.stubGlobal('localStorage', undefined);
    const storage = browserStorage();
    storage.setItem('k', 'v');
    expect(storage.getItem('k')).toBe('v');
  });

  it('keeps data in memory when localStorage access is denied', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.stubGlobal('localStorage', undefined);
    Object.defineProperty(globalThis, 'localStorage', {
      configurable: true,
      get: () => {
        throw new Error('denied');
      },
    });

    const storage = browserStorage();
    storage.setItem('k', 'v');
    expect(storage.getItem('k')).toBe('v');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
