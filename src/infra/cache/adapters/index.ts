/**
 * Cache adapters - backend implementations.
 */

export { createNoopCache } from './noop-cache.js';
export { createMemoryCache, type MemoryCacheOptions } from './memory-cache.js';
export {
  createRedisCache,
  createRedisCacheFromClient,
  type RedisCacheOptions,
  type RedisCacheClientOptions,
} from './redis-cache.js';
