/**
 * Cache client factory - creates and configures cache instances.
 */

import { createMemoryCache, createNoopCache, createRedisCache } from './adapters/index.js';
import { createKeyBuilder, type KeyBuilder } from './key-builder.js';
import { createSilentCache } from './wrappers/index.js';

import type { CacheDecoder, CachePort, SilentCachePort } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheBackend = 'disabled' | 'memory' | 'redis';

export interface CacheConfig {
  backend: CacheBackend;
  /** Default TTL in milliseconds. Default: 300000 (5 minutes) */
  defaultTtlMs: number;
  /** Max entries for memory cache. Default: 500 */
  memoryMaxEntries: number;
  /** Redis connection URL (required if backend is 'redis') */
  redisUrl: string | undefined;
  /** Key prefix for all cache keys. Default: 'adops' */
  keyPrefix: string;
}

export interface CacheClient<T = unknown> {
  /** Silent cache port for application use */
  cache: SilentCachePort<T>;
  keyBuilder: KeyBuilder;
  /** Backend name actually in use after fallbacks */
  backend: CacheBackend;
  /** Low-level cache port (for testing/advanced use) */
  rawCache: CachePort<T>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Detection
// ─────────────────────────────────────────────────────────────────────────────

export type CacheEnv = Record<string, string | undefined>;

/**
 * Detect cache backend from environment.
 * - Explicit CACHE_BACKEND takes precedence
 * - If REDIS_URL is set, use Redis
 * - Otherwise, use memory
 */
export const detectBackend = (env: CacheEnv): CacheBackend => {
  const backendValue = env['CACHE_BACKEND']?.toLowerCase();
  if (backendValue === 'disabled' || backendValue === 'memory' || backendValue === 'redis') {
    return backendValue;
  }

  const redisUrl = env['REDIS_URL'];
  if (redisUrl !== undefined && redisUrl !== '') {
    return 'redis';
  }

  return 'memory';
};

const DEFAULT_TTL_MS = 5 * 60 * 1000;
const DEFAULT_MEMORY_MAX_ENTRIES = 500;

const parseConfigInt = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
};

export const createCacheConfig = (env: CacheEnv): CacheConfig => ({
  backend: detectBackend(env),
  defaultTtlMs: parseConfigInt(env['CACHE_DEFAULT_TTL_MS'], DEFAULT_TTL_MS),
  memoryMaxEntries: parseConfigInt(env['CACHE_MEMORY_MAX_ENTRIES'], DEFAULT_MEMORY_MAX_ENTRIES),
  redisUrl: env['REDIS_URL'],
  keyPrefix: env['REDIS_PREFIX'] ?? 'adops',
});

// ─────────────────────────────────────────────────────────────────────────────
// Cache Initialization
// ─────────────────────────────────────────────────────────────────────────────

export interface InitCacheOptions<T> {
  config: CacheConfig;
  logger: Logger;
  /** Needed by backends that store values outside the process */
  decode: CacheDecoder<T>;
}

/**
 * Initialize the cache infrastructure.
 * Returns a cache client with silent degradation.
 */
export const initCache = <T>(options: InitCacheOptions<T>): CacheClient<T> => {
  const { config, logger, decode } = options;

  const keyBuilder = createKeyBuilder({ globalPrefix: config.keyPrefix });
  const memory = (): CachePort<T> =>
    createMemoryCache<T>({
      maxEntries: config.memoryMaxEntries,
      defaultTtlMs: config.defaultTtlMs,
    });

  let rawCache: CachePort<T>;
  let backend: CacheBackend = config.backend;

  switch (config.backend) {
    case 'disabled':
      logger.info('[Cache] Using NoOp cache (disabled)');
      rawCache = createNoopCache<T>();
      break;

    case 'redis':
      if (config.redisUrl === undefined || config.redisUrl === '') {
        logger.warn('[Cache] Redis URL not configured, falling back to memory cache');
        rawCache = memory();
        backend = 'memory';
      } else {
        logger.info('[Cache] Using Redis cache');
        rawCache = createRedisCache<T>({
          url: config.redisUrl,
          keyPrefix: config.keyPrefix,
          defaultTtlMs: config.defaultTtlMs,
          decode,
        });
      }
      break;

    case 'memory':
    default:
      logger.info(
        { maxEntries: config.memoryMaxEntries, defaultTtlMs: config.defaultTtlMs },
        '[Cache] Using in-memory LRU cache'
      );
      rawCache = memory();
      break;
  }

  return {
    cache: createSilentCache<T>(rawCache, { logger }),
    keyBuilder,
    backend,
    rawCache,
  };
};
