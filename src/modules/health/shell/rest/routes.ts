/**
 * Health check routes
 *
 * Endpoints:
 * - GET /health/live  - Liveness probe (is the process alive?)
 * - GET /health/ready - Readiness probe (cache backend and sheet source)
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: Partial<GetReadinessDeps> = {}): FastifyPluginAsync => {
  const { version, checkers = [] } = deps;
  const startTime = Date.now();

  return async (fastify) => {
    /**
     * Always 200 while the process serves requests. Dependencies are the
     * readiness probe's job.
     */
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    /**
     * 503 only when a critical check fails; a failing cache reports `degraded`.
     */
    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const response = await getReadiness(
          { version, checkers },
          {
            uptime: Math.floor((Date.now() - startTime) / 1000),
            timestamp: new Date().toISOString(),
          }
        );

        return reply.status(response.status === 'unhealthy' ? 503 : 200).send(response);
      }
    );
  };
};
