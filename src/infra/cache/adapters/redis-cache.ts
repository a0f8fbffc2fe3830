/**
 * Redis cache adapter using ioredis.
 *
 * Lets the API server and the report sender share fetched sheets.
 */

import { Redis } from 'ioredis';
import { err, ok, type Result } from 'neverthrow';

import {
  CacheError as CacheErrorFactory,
  type CacheDecoder,
  type CacheError,
  type CachePort,
  type CacheSetOptions,
  type CacheStats,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

export interface RedisCacheClientOptions<T> {
  /** Narrows stored JSON back to T */
  decode: CacheDecoder<T>;
  /** Key prefix for all cache keys. Default: 'adops' */
  keyPrefix?: string;
  /** Default TTL in milliseconds. Default: 300000 (5 minutes) */
  defaultTtlMs?: number;
}

export interface RedisCacheOptions<T> extends RedisCacheClientOptions<T> {
  url: string;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
}

const wrapRedisOp = async <T>(
  op: () => Promise<T>,
  errorMessage: string
): Promise<Result<T, CacheError>> => {
  try {
    return ok(await op());
  } catch (cause) {
    if (cause instanceof Error && /ETIMEDOUT|timeout/i.test(cause.message)) {
      return err(CacheErrorFactory.timeout(errorMessage, cause));
    }
    return err(CacheErrorFactory.connection(errorMessage, cause));
  }
};

export const createRedisCache = <T>(options: RedisCacheOptions<T>): CachePort<T> => {
  const client = new Redis(options.url, {
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
  });

  return createRedisCacheFromClient(client, options);
};

export const createRedisCacheFromClient = <T>(
  client: Redis,
  options: RedisCacheClientOptions<T>
): CachePort<T> => {
  const keyPrefix = options.keyPrefix ?? 'adops';
  const defaultTtlMs = options.defaultTtlMs ?? 300_000;
  let hits = 0;
  let misses = 0;

  const buildKey = (key: string): string =>
    key.startsWith(`${keyPrefix}:`) ? key : `${keyPrefix}:${key}`;

  const deleteMatching = async (pattern: string): Promise<number> => {
    let cursor = '0';
    let deleted = 0;
    do {
      const [nextCursor, keys] = await client.scan(cursor, 'MATCH', pattern, 'COUNT', 100);
      cursor = nextCursor;
      if (keys.length > 0) {
        deleted += await client.del(...keys);
      }
    } while (cursor !== '0');
    return deleted;
  };

  return {
    async get(key: string) {
      const result = await wrapRedisOp(() => client.get(buildKey(key)), `Failed to get key: ${key}`);
      if (result.isErr()) {
        return err(result.error);
      }
      if (result.value === null) {
        misses++;
        return ok(undefined);
      }

      const decoded = deserialize(result.value, options.decode);
      if (decoded.isErr()) {
        misses++;
        return err(decoded.error);
      }
      hits++;
      return ok(decoded.value);
    },

    async set(key: string, value: T, setOptions?: CacheSetOptions) {
      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;
      const result = await wrapRedisOp(
        () => client.set(buildKey(key), serialize(value), 'PX', ttlMs),
        `Failed to set key: ${key}`
      );
      return result.map(() => undefined);
    },

    async delete(key: string) {
      const result = await wrapRedisOp(() => client.del(buildKey(key)), `Failed to delete key: ${key}`);
      return result.map((count) => count > 0);
    },

    async has(key: string) {
      const result = await wrapRedisOp(
        () => client.exists(buildKey(key)),
        `Failed to check key existence: ${key}`
      );
      return result.map((count) => count > 0);
    },

    async clearByPrefix(prefix: string) {
      return wrapRedisOp(
        () => deleteMatching(`${buildKey(prefix)}*`),
        `Failed to clear by prefix: ${prefix}`
      );
    },

    async clear() {
      const result = await wrapRedisOp(() => deleteMatching(`${keyPrefix}:*`), 'Failed to clear cache');
      if (result.isErr()) {
        return err(result.error);
      }
      hits = 0;
      misses = 0;
      return ok(undefined);
    },

    stats(): Promise<CacheStats> {
      // Key counting would need a SCAN; hits and misses are tracked locally
      return Promise.resolve({ hits, misses, size: 0 });
    },
  };
};
