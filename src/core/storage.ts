export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export function createMemoryStorage(
  initial: Record<string, string> = {},
): KeyValueStorage {
  const items = new Map(Object.entries(initial));
  return {
    getItem: (key) => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    },
    removeItem: (key) => {
      items.delete(key);
    },
  };
}

/** `localStorage` when the page may use it, otherwise an in-memory store. */
export function browserStorage(): KeyValueStorage {
  try {
    const storage: KeyValueStorage | undefined = globalThis.localStorage;
    if (storage) return storage;
  } catch (err) {
    console.warn('[Storage] localStorage is unavailable.', err);
  }
  return createMemoryStorage();
}
