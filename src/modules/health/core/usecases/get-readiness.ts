import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * A checker that throws counts as a critical failure.
 */
const toCheckResult = (result: PromiseSettledResult<HealthCheckResult>): HealthCheckResult =>
  result.status === 'fulfilled'
    ? result.value
    : {
        name: 'unknown',
        status: 'unhealthy',
        message: result.reason instanceof Error ? result.reason.message : 'Check failed',
        critical: true,
      };

/**
 * - Any critical unhealthy → "unhealthy" (503)
 * - Any non-critical unhealthy → "degraded" (200)
 * - All healthy → "ok" (200)
 */
export const overallStatus = (checks: HealthCheckResult[]): ReadinessResponse['status'] => {
  const unhealthy = checks.filter((check) => check.status === 'unhealthy');
  if (unhealthy.some((check) => check.critical !== false)) return 'unhealthy';
  if (unhealthy.length > 0) return 'degraded';
  return 'ok';
};

/**
 * Runs every checker in parallel and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers = [], version } = deps;
  const checks = (await Promise.allSettled(checkers.map((checker) => checker()))).map(toCheckResult);

  return {
    status: overallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
