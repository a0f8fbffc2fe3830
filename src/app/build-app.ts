/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { initCache, createCacheConfig, type CacheClient } from '../infra/cache/index.js';
import { registerCors } from '../infra/plugins/index.js';
import { todayIn } from '../infra/time/index.js';
import { makeDashboardRoutes, type DashboardDeps } from '../modules/dashboard/index.js';
import {
  makeCacheHealthChecker,
  makeHealthRoutes,
  makeSheetSourceHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import { decodeGrid, makeCachedSheetProvider } from '../modules/sheet-source/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { IsoDate, LayoutRegistry, RawGrid } from '../modules/extraction/index.js';
import type { KpiScoring } from '../modules/metrics/index.js';
import type { SheetCatalog, SheetSource } from '../modules/sheet-source/index.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  catalog: SheetCatalog;
  layouts: LayoutRegistry;
  scoring: KpiScoring;
  sheetSource: SheetSource;
  /** Optional cache client for testing (auto-initialized if not provided) */
  cacheClient?: CacheClient<RawGrid>;
  /** Checkers in addition to the cache and sheet-source ones */
  healthCheckers?: HealthChecker[];
  /** Current day; defaults to today in the reporting timezone */
  today?: () => IsoDate;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Wires the sheet cache and the dashboard dependencies. Shared with the
 * report command so both read through the same cache keys.
 */
export const makeDashboardDeps = (
  deps: AppDeps
): { dashboard: DashboardDeps; cacheClient: CacheClient<RawGrid> } => {
  const { config, logger } = deps;

  const cacheClient =
    deps.cacheClient ??
    initCache<RawGrid>({ config: createCacheConfig(process.env), logger, decode: decodeGrid });

  const sheets = makeCachedSheetProvider({
    source: deps.sheetSource,
    cache: cacheClient.cache,
    keyBuilder: cacheClient.keyBuilder,
  });

  return {
    cacheClient,
    dashboard: {
      sheets,
      catalog: deps.catalog,
      layouts: deps.layouts,
      scoring: deps.scoring,
      logger: logger.child({ component: 'dashboard' }),
      today: deps.today ?? (() => todayIn(config.reporting.timezone)),
    },
  };
};

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config } = deps;

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Register CORS plugin
  await registerCors(app, config);

  // ─────────────────────────────────────────────────────────────────────────────
  // Sheets, cache and dashboard
  // ─────────────────────────────────────────────────────────────────────────────
  const { dashboard, cacheClient } = makeDashboardDeps(deps);

  // Register health routes
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: [
        makeCacheHealthChecker(cacheClient.rawCache, { name: `cache:${cacheClient.backend}` }),
        makeSheetSourceHealthChecker(deps.sheetSource),
        ...(deps.healthCheckers ?? []),
      ],
    })
  );

  await app.register(makeDashboardRoutes(dashboard));

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
