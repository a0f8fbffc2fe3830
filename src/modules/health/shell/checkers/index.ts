/**
 * Health checker factories
 */

export { makeCacheHealthChecker, type CacheHealthCheckerOptions } from './cache-checker.js';
export { makeSheetSourceHealthChecker } from './sheet-source-checker.js';
