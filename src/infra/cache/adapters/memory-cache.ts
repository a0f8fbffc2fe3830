/**
 * In-memory LRU cache with TTL expiration.
 *
 * Values are kept by reference; cached grids are treated as immutable.
 */

import { ok } from 'neverthrow';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

interface CacheEntry<T> {
  value: T;
  /** Expiration timestamp (ms since epoch) */
  expiresAt: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 500 */
  maxEntries?: number;
  /** Default TTL in milliseconds. Default: 300000 (5 minutes) */
  defaultTtlMs?: number;
  /** Clock override for tests */
  now?: () => number;
}

export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): CachePort<T> => {
  const maxEntries = options.maxEntries ?? 500;
  const defaultTtlMs = options.defaultTtlMs ?? 300_000;
  const now = options.now ?? Date.now;

  // Map keeps insertion order, so the first key is the least recently used
  const store = new Map<string, CacheEntry<T>>();

  let hits = 0;
  let misses = 0;

  const readLive = (key: string): CacheEntry<T> | undefined => {
    const entry = store.get(key);
    if (entry === undefined) return undefined;
    if (now() >= entry.expiresAt) {
      store.delete(key);
      return undefined;
    }
    return entry;
  };

  return {
    get(key: string) {
      const entry = readLive(key);
      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      store.delete(key);
      store.set(key, entry);
      hits++;
      return Promise.resolve(ok(entry.value));
    },

    set(key: string, value: T, setOptions?: CacheSetOptions) {
      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;

      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        const lruKey = store.keys().next().value;
        if (lruKey !== undefined) {
          store.delete(lruKey);
        }
      }

      store.set(key, { value, expiresAt: now() + ttlMs });
      return Promise.resolve(ok(undefined));
    },

    delete(key: string) {
      return Promise.resolve(ok(store.delete(key)));
    },

    has(key: string) {
      return Promise.resolve(ok(readLive(key) !== undefined));
    },

    clearByPrefix(prefix: string) {
      let count = 0;
      for (const key of [...store.keys()]) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          count++;
        }
      }
      return Promise.resolve(ok(count));
    },

    clear() {
      store.clear();
      hits = 0;
      misses = 0;
      return Promise.resolve(ok(undefined));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, size: store.size });
    },
  };
};
