import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { createCacheConfig, initCache } from '@/infra/cache/index.js';
import { decodeGrid } from '@/modules/sheet-source/index.js';

import {
  blankRows,
  makeSilentLogger,
  makeTestConfig,
  row,
  testCatalog,
  testLayouts,
  testScoring,
} from '../fixtures/builders.js';
import { makeFakeSheetSource } from '../fixtures/fakes.js';

import type { RawGrid } from '@/modules/extraction/index.js';
import type { FastifyInstance } from 'fastify';

const facebookGrid: RawGrid = [
  ...blankRows(4, 12),
  row(12, { 1: '3/1/2026', 2: '100', 3: '10', 4: '2', 5: '300' }),
  row(12, { 1: '3/5/2026', 2: '50', 3: '5', 4: '1' }),
];

describe('HTTP API', () => {
  const source = makeFakeSheetSource({ 'FB Summary': facebookGrid });
  let app: FastifyInstance;

  beforeAll(async () => {
    const logger = makeSilentLogger();
    app = await createApp({
      fastifyOptions: { logger: false },
      version: '1.0.0',
      deps: {
        config: makeTestConfig({ cors: { allowedOrigins: undefined, clientBaseUrl: 'https://app.example' } }),
        logger,
        catalog: testCatalog(),
        layouts: testLayouts(),
        scoring: testScoring(),
        sheetSource: source,
        cacheClient: initCache<RawGrid>({
          config: { ...createCacheConfig({}), backend: 'memory' },
          logger,
          decode: decodeGrid,
        }),
        today: () => '2026-03-10',
      },
    });
  });

  afterAll(async () => {
    await app.close();
  });

  describe('health', () => {
    it('answers the liveness probe', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });

    it('reports the cache and the sheet source', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/ready' });
      const body = response.json<{ status: string; version: string; checks: { name: string }[] }>();

      expect(response.statusCode).toBe(200);
      expect(body.status).toBe('ok');
      expect(body.version).toBe('1.0.0');
      expect(body.checks.map((check) => check.name)).toEqual(['cache:memory', 'sheet-source']);
    });
  });

  describe('dashboard', () => {
    it('serves a channel section and caches the sheet', async () => {
      const first = await app.inject({ method: 'GET', url: '/api/v1/channels/facebook/daily_roi' });
      const second = await app.inject({
        method: 'GET',
        url: '/api/v1/channels/facebook/daily_roi?from=2026-03-02',
      });

      expect(first.statusCode).toBe(200);
      expect(first.json<{ ok: boolean; data: { records: unknown[] } }>().data.records).toHaveLength(2);
      expect(second.json<{ data: { total: { cost: number } } }>().data.total.cost).toBe(50);
      expect(source.calls).toEqual(['FB Summary']);
    });

    it('refreshes a cache group', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/cache/refresh',
        payload: { group: 'channel' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true, data: { group: 'channel', cleared: 1 } });

      await app.inject({ method: 'GET', url: '/api/v1/channels/fb/daily_roi' });
      expect(source.calls).toEqual(['FB Summary', 'FB Summary']);
    });

    it('refreshes everything without a group', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/v1/cache/refresh', payload: {} });

      expect(response.statusCode).toBe(200);
      expect(response.json<{ data: { group: string | null } }>().data.group).toBeNull();
    });

    it('answers 404 for an unknown channel', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/channels/tiktok/daily_roi' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: "Unknown channel 'tiktok'",
      });
    });

    it('answers 400 for a malformed date', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/team-channel?from=yesterday' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ ok: false, error: 'ValidationError' });
    });

    it('answers 400 for a reversed range', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/ads/individual-kpi?from=2026-03-05&to=2026-03-01',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: "'from' (2026-03-05) is after 'to' (2026-03-01)",
      });
    });

    it('serves empty tables when a sheet cannot be read', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/ads/individual-kpi' });

      expect(response.statusCode).toBe(200);
      expect(response.json<{ data: { records: unknown[]; byPerson: unknown[] } }>().data).toMatchObject({
        records: [],
        byPerson: [],
      });
    });

    it('lists agents', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/agents' });

      expect(response.json<{ data: { name: string }[] }>().data.map((agent) => agent.name)).toEqual([
        'ANNA',
        'BRUNO',
        'CARLA',
        'DANTE',
        'ELISE',
      ]);
    });
  });

  describe('errors and CORS', () => {
    it('answers unknown routes with 404', async () => {
      const response = await app.inject({ method: 'GET', url: '/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ ok: false, error: 'NotFoundError', message: 'Route GET /nope not found' });
    });

    it('allows the configured client origin', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://app.example' },
      });

      expect(response.headers['access-control-allow-origin']).toBe('https://app.example');
    });

    it('allows localhost during development', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'http://localhost:5173' },
      });

      expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    });
  });
});
