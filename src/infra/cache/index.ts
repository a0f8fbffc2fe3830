/**
 * Cache Infrastructure
 *
 * A pluggable caching layer with silent degradation.
 * Cache failures never cause request failures.
 *
 * @example
 * ```typescript
 * const { cache, keyBuilder } = initCache({ config: createCacheConfig(process.env), logger, decode });
 * const cachedFetch = withCacheResult(source.fetchGrid, cache, {
 *   ttlMs: 600_000,
 *   keyGenerator: ([ref]) => keyBuilder.build(CacheNamespace.SHEETS_PARTNER, refId(ref)),
 * });
 * ```
 */

export type {
  CachePort,
  SilentCachePort,
  CacheError,
  CacheDecoder,
  CacheSetOptions,
  CacheStats,
} from './ports.js';
export { CacheError as CacheErrorFactory } from './ports.js';

export {
  CacheNamespace,
  SHEETS_NAMESPACE_ROOT,
  createKeyBuilder,
  type KeyBuilder,
  type KeyBuilderOptions,
} from './key-builder.js';

export { serialize, deserialize } from './serialization.js';

export {
  createNoopCache,
  createMemoryCache,
  createRedisCache,
  createRedisCacheFromClient,
  type MemoryCacheOptions,
  type RedisCacheOptions,
  type RedisCacheClientOptions,
} from './adapters/index.js';

export { createSilentCache, type SilentCacheOptions } from './wrappers/index.js';

export { withCacheResult, type WithCacheOptions } from './with-cache.js';

export {
  initCache,
  createCacheConfig,
  detectBackend,
  type CacheBackend,
  type CacheConfig,
  type CacheClient,
  type CacheEnv,
  type InitCacheOptions,
} from './client.js';
