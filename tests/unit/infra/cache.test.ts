import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import {
  CacheErrorFactory,
  CacheNamespace,
  createCacheConfig,
  createKeyBuilder,
  createMemoryCache,
  createSilentCache,
  deserialize,
  detectBackend,
  initCache,
  withCacheResult,
  type CacheError,
  type CachePort,
} from '@/infra/cache/index.js';

import { makeCapturingLogger, makeSilentLogger } from '../../fixtures/builders.js';

const isStringList = (value: unknown): string[] | undefined =>
  Array.isArray(value) && value.every((item): item is string => typeof item === 'string') ? value : undefined;

/** A cache whose every operation fails */
const makeBrokenCache = (): CachePort<string> => {
  const failure = <V>(): Promise<Result<V, CacheError>> =>
    Promise.resolve(err(CacheErrorFactory.connection('Connection refused')));
  return {
    get: () => failure<string | undefined>(),
    set: () => failure<void>(),
    delete: () => failure<boolean>(),
    has: () => failure<boolean>(),
    clearByPrefix: () => failure<number>(),
    clear: () => failure<void>(),
    stats: () => Promise.resolve({ hits: 0, misses: 0, size: 0 }),
  };
};

describe('createMemoryCache', () => {
  it('expires entries after their TTL', async () => {
    let clock = 1_000;
    const cache = createMemoryCache<string>({ defaultTtlMs: 100, now: () => clock });

    await cache.set('a', 'x');
    expect((await cache.get('a'))._unsafeUnwrap()).toBe('x');

    clock = 1_100;
    expect((await cache.get('a'))._unsafeUnwrap()).toBeUndefined();
    expect(await cache.stats()).toEqual({ hits: 1, misses: 1, size: 0 });
  });

  it('evicts the least recently used entry', async () => {
    const cache = createMemoryCache<number>({ maxEntries: 2 });

    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.get('a');
    await cache.set('c', 3);

    expect((await cache.has('a'))._unsafeUnwrap()).toBe(true);
    expect((await cache.has('b'))._unsafeUnwrap()).toBe(false);
    expect((await cache.has('c'))._unsafeUnwrap()).toBe(true);
  });

  it('clears keys by prefix', async () => {
    const cache = createMemoryCache<number>();
    const keys = createKeyBuilder();

    await cache.set(keys.build(CacheNamespace.SHEETS_CHANNEL, 'fb'), 1);
    await cache.set(keys.build(CacheNamespace.SHEETS_AGENT, 'anna'), 2);
    await cache.set(keys.build(CacheNamespace.SHEETS_AGENT_TABS, 'p1'), 3);

    const cleared = await cache.clearByPrefix(keys.getPrefix(CacheNamespace.SHEETS_AGENT));

    expect(cleared._unsafeUnwrap()).toBe(1);
    expect((await cache.stats()).size).toBe(2);
  });
});

describe('createKeyBuilder', () => {
  it('namespaces keys under the global prefix', () => {
    const keys = createKeyBuilder({ globalPrefix: 'test' });

    expect(keys.build(CacheNamespace.SHEETS_ADS, 'kpi#200')).toBe('test:sheets:ads:kpi#200');
    expect(keys.getPrefix('sheets')).toBe('test:sheets:');
    expect(createKeyBuilder().getGlobalPrefix()).toBe('adops');
  });
});

describe('createSilentCache', () => {
  it('treats failures as misses and logs them', async () => {
    const { logger, logs } = makeCapturingLogger();
    const cache = createSilentCache(makeBrokenCache(), { logger });

    expect(await cache.get('a')).toBeUndefined();
    expect(await cache.clearByPrefix('p')).toBe(0);
    expect(logs.map((log) => log.msg)).toEqual([
      '[Cache] Get failed: Connection refused',
      '[Cache] ClearByPrefix failed: Connection refused',
    ]);
  });
});

describe('withCacheResult', () => {
  it('caches successful results only', async () => {
    const cache = createSilentCache(createMemoryCache<string>(), { logger: makeSilentLogger() });
    let calls = 0;
    const fetch = (id: string): Promise<Result<string, string>> => {
      calls++;
      return Promise.resolve(id === 'bad' ? err('failed') : ok(`value-${id}`));
    };
    const cached = withCacheResult(fetch, cache, { keyGenerator: ([id]) => id });

    expect((await cached('a'))._unsafeUnwrap()).toBe('value-a');
    expect((await cached('a'))._unsafeUnwrap()).toBe('value-a');
    expect((await cached('bad'))._unsafeUnwrapErr()).toBe('failed');
    expect((await cached('bad'))._unsafeUnwrapErr()).toBe('failed');
    expect(calls).toBe(3);
  });
});

describe('deserialize', () => {
  it('narrows stored JSON with the decoder', () => {
    expect(deserialize('["a","b"]', isStringList)._unsafeUnwrap()).toEqual(['a', 'b']);
    expect(deserialize('[1]', isStringList)._unsafeUnwrapErr()).toMatchObject({
      type: 'SerializationError',
      message: 'Cached value has an unexpected shape',
    });
    expect(deserialize('{', isStringList)._unsafeUnwrapErr().type).toBe('SerializationError');
  });
});

describe('cache configuration', () => {
  it('detects the backend', () => {
    expect(detectBackend({ CACHE_BACKEND: 'Disabled' })).toBe('disabled');
    expect(detectBackend({ REDIS_URL: 'redis://localhost:6379' })).toBe('redis');
    expect(detectBackend({})).toBe('memory');
  });

  it('reads numbers with defaults', () => {
    expect(createCacheConfig({ CACHE_DEFAULT_TTL_MS: '1000', CACHE_MEMORY_MAX_ENTRIES: 'lots' })).toEqual({
      backend: 'memory',
      defaultTtlMs: 1000,
      memoryMaxEntries: 500,
      redisUrl: undefined,
      keyPrefix: 'adops',
    });
  });

  it('falls back to memory when Redis has no URL', () => {
    const client = initCache<string[]>({
      config: { ...createCacheConfig({}), backend: 'redis' },
      logger: makeSilentLogger(),
      decode: isStringList,
    });

    expect(client.backend).toBe('memory');
  });
});
