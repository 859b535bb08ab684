/**
 * LRU Cache
 *
 * Map-backed: iteration order of a Map is insertion order, so re-inserting
 * a key on every touch keeps the least recently used entry first.
 */

/**
 * LRU Cache type
 */
export type LRUCache<K, V> = {
  get: (key: K) => V | undefined;
  set: (key: K, value: V) => void;
  has: (key: K) => boolean;
  delete: (key: K) => boolean;
  clear: () => void;
  size: () => number;
  /** Resident keys, least recently used first */
  keys: () => K[];
};

/**
 * Create an LRU cache
 *
 * `get` and `set` both mark the key as most recently used. After an insert
 * takes the size above `maxSize`, the least recently used entry is evicted.
 *
 * @param maxSize Maximum number of items to store
 */
export const createLRUCache = <K, V>(maxSize: number): LRUCache<K, V> => {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`LRU cache size must be a positive integer, got ${maxSize}`);
  }

  const entries = new Map<K, V>();

  const evictOverflow = (): void => {
    while (entries.size > maxSize) {
      const oldest = entries.keys().next();
      if (oldest.done) return;
      entries.delete(oldest.value);
    }
  };

  return {
    get: (key) => {
      const value = entries.get(key);
      if (value === undefined) return undefined;
      entries.delete(key);
      entries.set(key, value);
      return value;
    },
    set: (key, value) => {
      entries.delete(key);
      entries.set(key, value);
      evictOverflow();
    },
    has: (key) => entries.has(key),
    delete: (key) => entries.delete(key),
    clear: () => entries.clear(),
    size: () => entries.size,
    keys: () => Array.from(entries.keys()),
  };
};

/**
 * Default number of entries held in memory
 */
export const DEFAULT_CACHE_SIZE = 100;
