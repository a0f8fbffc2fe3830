/**
 * Dashboard Module REST Routes
 *
 * Read-only JSON views over the sheets, plus cache invalidation.
 * - GET /api/v1/channels/summary
 * - GET /api/v1/channels/:channel/:section
 * - GET /api/v1/counterpart/:channel
 * - GET /api/v1/team-channel
 * - GET /api/v1/agents
 * - GET /api/v1/agents/:agent/activity
 * - GET /api/v1/agents/:agent/performance
 * - GET /api/v1/ads/individual-kpi
 * - POST /api/v1/cache/refresh
 */

import {
  AgentParamsSchema,
  ChannelParamsSchema,
  ChannelSectionParamsSchema,
  DataResponseSchema,
  DateRangeQuerySchema,
  ErrorResponseSchema,
  RefreshCacheBodySchema,
  RefreshCacheResponseSchema,
  type AgentParams,
  type ChannelParams,
  type ChannelSectionParams,
  type DateRangeQuery,
  type RefreshCacheBody,
} from './schemas.js';
import { getHttpStatusForError, type DashboardError } from '../../core/errors.js';
import { getAgentActivity } from '../../core/usecases/get-agent-activity.js';
import { getAgentPerformance } from '../../core/usecases/get-agent-performance.js';
import { getChannelReport } from '../../core/usecases/get-channel-report.js';
import { getChannelSummary } from '../../core/usecases/get-channel-summary.js';
import { getCounterpartReport } from '../../core/usecases/get-counterpart-report.js';
import { getIndividualKpi } from '../../core/usecases/get-individual-kpi.js';
import { getTeamChannelReport } from '../../core/usecases/get-team-channel-report.js';
import { listAgents } from '../../core/usecases/list-agents.js';
import { refreshCache } from '../../core/usecases/refresh-cache.js';

import type { DateRange } from '../../core/types.js';
import type { DashboardDeps } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MakeDashboardRoutesDeps = DashboardDeps;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const rangeOf = (query: DateRangeQuery): DateRange => ({
  ...(query.from !== undefined && { from: query.from }),
  ...(query.to !== undefined && { to: query.to }),
});

/**
 * Sends a use case result as `{ ok, data }` or as a mapped error.
 */
const sendResult = <T>(reply: FastifyReply, result: Result<T, DashboardError>) => {
  if (result.isErr()) {
    return reply.status(getHttpStatusForError(result.error)).send({
      ok: false,
      error: result.error.type,
      message: result.error.message,
    });
  }
  return reply.status(200).send({ ok: true, data: result.value });
};

const READ_RESPONSES = {
  200: DataResponseSchema,
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeDashboardRoutes = (deps: MakeDashboardRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // Channel ROI
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Querystring: DateRangeQuery }>(
      '/api/v1/channels/summary',
      { schema: { querystring: DateRangeQuerySchema, response: READ_RESPONSES } },
      async (request, reply) => {
        const result = await getChannelSummary(deps, rangeOf(request.query));
        return sendResult(reply, result);
      }
    );

    fastify.get<{ Params: ChannelSectionParams; Querystring: DateRangeQuery }>(
      '/api/v1/channels/:channel/:section',
      {
        schema: {
          params: ChannelSectionParamsSchema,
          querystring: DateRangeQuerySchema,
          response: READ_RESPONSES,
        },
      },
      async (request, reply) => {
        const result = await getChannelReport(deps, {
          channel: request.params.channel,
          section: request.params.section,
          range: rangeOf(request.query),
        });
        return sendResult(reply, result);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Partner sheets
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Params: ChannelParams; Querystring: DateRangeQuery }>(
      '/api/v1/counterpart/:channel',
      {
        schema: {
          params: ChannelParamsSchema,
          querystring: DateRangeQuerySchema,
          response: READ_RESPONSES,
        },
      },
      async (request, reply) => {
        const result = await getCounterpartReport(deps, {
          channel: request.params.channel,
          range: rangeOf(request.query),
        });
        return sendResult(reply, result);
      }
    );

    fastify.get<{ Querystring: DateRangeQuery }>(
      '/api/v1/team-channel',
      { schema: { querystring: DateRangeQuerySchema, response: READ_RESPONSES } },
      async (request, reply) => {
        const result = await getTeamChannelReport(deps, rangeOf(request.query));
        return sendResult(reply, result);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Agents
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get(
      '/api/v1/agents',
      { schema: { response: { 200: DataResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ ok: true, data: listAgents(deps) });
      }
    );

    fastify.get<{ Params: AgentParams; Querystring: DateRangeQuery }>(
      '/api/v1/agents/:agent/activity',
      {
        schema: {
          params: AgentParamsSchema,
          querystring: DateRangeQuerySchema,
          response: READ_RESPONSES,
        },
      },
      async (request, reply) => {
        const result = await getAgentActivity(deps, {
          agent: request.params.agent,
          range: rangeOf(request.query),
        });
        return sendResult(reply, result);
      }
    );

    fastify.get<{ Params: AgentParams }>(
      '/api/v1/agents/:agent/performance',
      { schema: { params: AgentParamsSchema, response: READ_RESPONSES } },
      async (request, reply) => {
        const result = await getAgentPerformance(deps, request.params.agent);
        return sendResult(reply, result);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Ads
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Querystring: DateRangeQuery }>(
      '/api/v1/ads/individual-kpi',
      { schema: { querystring: DateRangeQuerySchema, response: READ_RESPONSES } },
      async (request, reply) => {
        const result = await getIndividualKpi(deps, rangeOf(request.query));
        return sendResult(reply, result);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/cache/refresh - Drop cached grids
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: RefreshCacheBody | undefined }>(
      '/api/v1/cache/refresh',
      {
        schema: {
          body: RefreshCacheBodySchema,
          response: { 200: RefreshCacheResponseSchema, 400: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const data = await refreshCache(deps, request.body?.group);
        return reply.status(200).send({ ok: true, data });
      }
    );
  };
};
