/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import pinoLib from 'pino';

import { loadLayoutRegistry, type LayoutRegistry } from '@/modules/extraction/index.js';
import { loadKpiScoring, type KpiScoring } from '@/modules/metrics/index.js';
import { loadSheetCatalog, type SheetCatalog } from '@/modules/sheet-source/index.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { HealthCheckResult, HealthChecker } from '@/modules/health/index.js';
import type { Logger } from 'pino';

/**
 * Create a health check result with defaults
 */
export const makeHealthCheckResult = (
  overrides: Partial<HealthCheckResult> = {}
): HealthCheckResult => ({
  name: 'test-check',
  status: 'healthy',
  ...overrides,
});

/**
 * Create a health checker function that returns a fixed result
 */
export const makeHealthChecker = (result: Partial<HealthCheckResult> = {}): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => fullResult;
};

/**
 * Create a health checker that throws an error
 */
export const makeFailingHealthChecker = (errorMessage: string): HealthChecker => {
  return async () => {
    throw new Error(errorMessage);
  };
};

/**
 * Create a test configuration with defaults
 */
export const makeTestConfig = (overrides: Partial<AppConfig> = {}): AppConfig => {
  const defaults: AppConfig = {
    server: {
      port: 3000,
      host: '0.0.0.0',
      isDevelopment: true,
      isProduction: false,
      isTest: true,
    },
    logger: {
      level: 'silent',
      pretty: false,
    },
    redis: {
      url: undefined,
    },
    cors: {
      allowedOrigins: undefined,
      clientBaseUrl: undefined,
    },
    sheets: {
      source: 'csv',
      catalogFile: 'config/sheets.json',
      credentialsJson: undefined,
      credentialsFile: undefined,
      requestTimeoutMs: 30000,
    },
    telegram: {
      botToken: 'test-token',
      chatId: 'test-chat',
      mentions: {},
    },
    reporting: {
      snapshotFile: 'data/last-report.json',
      timezone: 'Asia/Manila',
      lowSpendThresholdUsd: 100,
      noChangeAlert: true,
    },
  };

  return { ...defaults, ...overrides };
};

/** Pino logger that writes nothing */
export const makeSilentLogger = (): Logger => pinoLib({ level: 'silent' });

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Pino logger writing JSON lines to memory.
 */
export const makeCapturingLogger = (): { logger: Logger; logs: CapturedLog[] } => {
  const logs: CapturedLog[] = [];
  const logger = pinoLib(
    { level: 'debug' },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && 'msg' in parsed) {
          const { level, msg } = parsed;
          if (typeof level === 'number' && typeof msg === 'string') {
            logs.push({ ...parsed, level, msg });
          }
        }
      },
    }
  );
  return { logger, logs };
};

/** pino level numbers */
export const LOG_LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

// ─────────────────────────────────────────────────────────────────────────────
// Sheet configuration
// ─────────────────────────────────────────────────────────────────────────────

/** The layouts shipped in config/layouts.json */
export const testLayouts = (): LayoutRegistry => loadLayoutRegistry();

/** The catalog shipped in config/sheets.json */
export const testCatalog = (): SheetCatalog => loadSheetCatalog();

export const testScoring = (): KpiScoring => loadKpiScoring();

// ─────────────────────────────────────────────────────────────────────────────
// Grid builders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A row of `width` blank cells with the given cells filled in.
 *
 * @example row(4, { 0: '1/5/2026', 2: '12' }) // ['1/5/2026', '', '12', '']
 */
export const row = (width: number, cells: Record<number, string>): string[] => {
  const out = Array.from({ length: width }, () => '');
  for (const [index, value] of Object.entries(cells)) {
    out[Number(index)] = value;
  }
  return out;
};

/** `count` blank rows of `width` cells */
export const blankRows = (count: number, width: number): string[][] =>
  Array.from({ length: count }, () => row(width, {}));
