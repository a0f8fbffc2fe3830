/**
 * JSON serialization for cache values stored outside the process.
 */

import { err, ok, type Result } from 'neverthrow';

import { CacheError, type CacheDecoder } from './ports.js';

export const serialize = (value: unknown): string => JSON.stringify(value);

/**
 * Parse a stored JSON string and narrow it with the cache's decoder.
 */
export const deserialize = <T>(json: string, decode: CacheDecoder<T>): Result<T, CacheError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (cause) {
    return err(CacheError.serialization('Failed to deserialize cached value', cause));
  }

  const value = decode(parsed);
  if (value === undefined) {
    return err(CacheError.serialization('Cached value has an unexpected shape'));
  }
  return ok(value);
};
