/**
 * Cache port interfaces using Result pattern for explicit error handling.
 */

import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheError =
  | { type: 'ConnectionError'; message: string; cause?: unknown }
  | { type: 'SerializationError'; message: string; cause?: unknown }
  | { type: 'TimeoutError'; message: string; cause?: unknown };

export const CacheError = {
  connection: (message: string, cause?: unknown): CacheError => ({
    type: 'ConnectionError',
    message,
    cause,
  }),
  serialization: (message: string, cause?: unknown): CacheError => ({
    type: 'SerializationError',
    message,
    cause,
  }),
  timeout: (message: string, cause?: unknown): CacheError => ({
    type: 'TimeoutError',
    message,
    cause,
  }),
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheSetOptions {
  /** TTL in milliseconds. If undefined, uses adapter default. */
  ttlMs?: number;
}

/**
 * Narrows a decoded JSON value back to the cached type.
 * Returns undefined when the stored shape does not match.
 */
export type CacheDecoder<T> = (value: unknown) => T | undefined;

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// CachePort (Low-Level / Adapter Interface)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Low-level cache interface for implementing backends.
 */
export interface CachePort<T = unknown> {
  /** Ok(undefined) on a miss */
  get(key: string): Promise<Result<T | undefined, CacheError>>;

  set(key: string, value: T, options?: CacheSetOptions): Promise<Result<void, CacheError>>;

  /** Ok(false) if the key did not exist */
  delete(key: string): Promise<Result<boolean, CacheError>>;

  has(key: string): Promise<Result<boolean, CacheError>>;

  /**
   * Delete all keys matching a prefix.
   * Used for namespace-based invalidation.
   */
  clearByPrefix(prefix: string): Promise<Result<number, CacheError>>;

  clear(): Promise<Result<void, CacheError>>;

  stats(): Promise<CacheStats>;
}

// ─────────────────────────────────────────────────────────────────────────────
// SilentCachePort (Application Interface)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Application-level cache interface with silent degradation.
 * Errors are logged and treated as misses.
 */
export interface SilentCachePort<T = unknown> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, options?: CacheSetOptions): Promise<void>;
  delete(key: string): Promise<boolean>;
  has(key: string): Promise<boolean>;
  /** Returns count (0 on error) */
  clearByPrefix(prefix: string): Promise<number>;
  clear(): Promise<void>;
  stats(): Promise<CacheStats>;
}
