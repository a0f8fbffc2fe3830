/**
 * Cache health checker
 *
 * Probes the grid cache with a lookup of a key that never exists.
 * Non-critical: without the cache every request reads the sheets directly.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { CachePort } from '../../../../infra/cache/index.js';

/** Default timeout for cache health check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

/** Key used for health check probes */
const HEALTH_CHECK_KEY = 'health:probe';

export interface CacheHealthCheckerOptions {
  /** Name to identify this cache in health check results (default: 'cache') */
  name?: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * Creates a health checker for the low-level cache port. The silent wrapper
 * hides failures, so it cannot be probed.
 *
 * @example
 * ```typescript
 * const checker = makeCacheHealthChecker(rawCache, { name: 'redis' });
 * await checker(); // { name: 'redis', status: 'healthy', latencyMs: 2, critical: false }
 * ```
 */
export const makeCacheHealthChecker = (
  cache: CachePort,
  options: CacheHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'cache', timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Cache health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      const result = await Promise.race([cache.has(HEALTH_CHECK_KEY), timeoutPromise]);
      const latencyMs = Date.now() - startTime;

      if (result.isErr()) {
        const message = result.error.message;
        return { name, status: 'unhealthy', message, latencyMs, critical: false };
      }
      return { name, status: 'healthy', latencyMs, critical: false };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown cache error';
      const latencyMs = Date.now() - startTime;
      return { name, status: 'unhealthy', message, latencyMs, critical: false };
    } finally {
      clearTimeout(timer);
    }
  };
};
