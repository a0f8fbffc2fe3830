/**
 * Read-through caching for functions that return a Result.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheSetOptions, SilentCachePort } from './ports.js';

export interface WithCacheOptions<TArgs extends unknown[]> {
  /** TTL in milliseconds, fixed or chosen per call */
  ttlMs?: number | ((args: TArgs) => number);
  keyGenerator: (args: TArgs) => string;
}

/**
 * Wrap a Result-returning function with caching.
 * Only successful results are cached; errors always reach the caller.
 *
 * @example
 * ```typescript
 * const fetchGrid = withCacheResult(source.fetchGrid, cache, {
 *   ttlMs: 5 * 60_000,
 *   keyGenerator: ([ref]) => keyBuilder.build(CacheNamespace.SHEETS_CHANNEL, refId(ref)),
 * });
 * ```
 */
export const withCacheResult = <TArgs extends unknown[], TValue, TError>(
  fn: (...args: TArgs) => Promise<Result<TValue, TError>>,
  cache: SilentCachePort<TValue>,
  options: WithCacheOptions<TArgs>
): ((...args: TArgs) => Promise<Result<TValue, TError>>) => {
  const { ttlMs, keyGenerator } = options;

  return async (...args: TArgs): Promise<Result<TValue, TError>> => {
    const key = keyGenerator(args);

    const cached = await cache.get(key);
    if (cached !== undefined) {
      return ok(cached);
    }

    const result = await fn(...args);

    if (result.isOk()) {
      const resolvedTtl = typeof ttlMs === 'function' ? ttlMs(args) : ttlMs;
      const setOptions: CacheSetOptions | undefined =
        resolvedTtl !== undefined ? { ttlMs: resolvedTtl } : undefined;
      await cache.set(key, result.value, setOptions);
    }

    return result;
  };
};
