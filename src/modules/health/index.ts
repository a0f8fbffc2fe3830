/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Use cases
export {
  getReadiness,
  overallStatus,
  type GetReadinessDeps,
} from './core/usecases/get-readiness.js';

// Health checker factories
export {
  makeCacheHealthChecker,
  makeSheetSourceHealthChecker,
  type CacheHealthCheckerOptions,
} from './shell/checkers/index.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
