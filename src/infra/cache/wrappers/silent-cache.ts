/**
 * Silent degradation wrapper for cache ports.
 * A failing cache behaves like an empty cache; errors only reach the log.
 */

import type {
  CacheError,
  CachePort,
  CacheSetOptions,
  CacheStats,
  SilentCachePort,
} from '../ports.js';
import type { Logger } from 'pino';
import type { Result } from 'neverthrow';

export interface SilentCacheOptions {
  logger: Logger;
}

export const createSilentCache = <T>(
  cache: CachePort<T>,
  options: SilentCacheOptions
): SilentCachePort<T> => {
  const { logger } = options;

  const unwrap = <V>(
    result: Result<V, CacheError>,
    fallback: V,
    operation: string,
    context: Record<string, string>
  ): V => {
    if (result.isErr()) {
      logger.warn({ err: result.error, ...context }, `[Cache] ${operation} failed: ${result.error.message}`);
      return fallback;
    }
    return result.value;
  };

  return {
    async get(key: string): Promise<T | undefined> {
      return unwrap(await cache.get(key), undefined, 'Get', { key });
    },

    async set(key: string, value: T, setOptions?: CacheSetOptions): Promise<void> {
      unwrap(await cache.set(key, value, setOptions), undefined, 'Set', { key });
    },

    async delete(key: string): Promise<boolean> {
      return unwrap(await cache.delete(key), false, 'Delete', { key });
    },

    async has(key: string): Promise<boolean> {
      return unwrap(await cache.has(key), false, 'Has', { key });
    },

    async clearByPrefix(prefix: string): Promise<number> {
      return unwrap(await cache.clearByPrefix(prefix), 0, 'ClearByPrefix', { prefix });
    },

    async clear(): Promise<void> {
      unwrap(await cache.clear(), undefined, 'Clear', {});
    },

    async stats(): Promise<CacheStats> {
      return cache.stats();
    },
  };
};
