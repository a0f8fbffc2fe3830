/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  REDIS_URL: Type.Optional(Type.String()),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),

  // Spreadsheet source
  SHEETS_SOURCE: Type.Union([Type.Literal('api'), Type.Literal('csv')], { default: 'api' }),
  SHEETS_CATALOG_FILE: Type.String({ default: 'config/sheets.json' }),
  GOOGLE_CREDENTIALS_JSON: Type.Optional(Type.String()),
  GOOGLE_CREDENTIALS_FILE: Type.Optional(Type.String()),
  SHEETS_REQUEST_TIMEOUT_MS: Type.Number({ default: 30000, minimum: 1000 }),

  // Reporting
  TELEGRAM_BOT_TOKEN: Type.Optional(Type.String()),
  TELEGRAM_CHAT_ID: Type.Optional(Type.String()),
  TELEGRAM_MENTIONS: Type.Optional(Type.String()),
  REPORT_SNAPSHOT_FILE: Type.String({ default: 'data/last-report.json' }),
  REPORT_TIMEZONE: Type.String({ default: 'Asia/Manila' }),
  LOW_SPEND_THRESHOLD_USD: Type.Number({ default: 100, minimum: 0 }),
  NO_CHANGE_ALERT: Type.Boolean({ default: true }),
});

export type Env = Static<typeof EnvSchema>;

const parseNumberVar = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  return Number(value);
};

const parseBooleanVar = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true' || value === '1';
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    REDIS_URL: env['REDIS_URL'],
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
    SHEETS_SOURCE: env['SHEETS_SOURCE'] ?? 'api',
    SHEETS_CATALOG_FILE: env['SHEETS_CATALOG_FILE'] ?? 'config/sheets.json',
    GOOGLE_CREDENTIALS_JSON: env['GOOGLE_CREDENTIALS_JSON'],
    GOOGLE_CREDENTIALS_FILE: env['GOOGLE_CREDENTIALS_FILE'],
    SHEETS_REQUEST_TIMEOUT_MS: parseNumberVar(env['SHEETS_REQUEST_TIMEOUT_MS'], 30000),
    TELEGRAM_BOT_TOKEN: env['TELEGRAM_BOT_TOKEN'],
    TELEGRAM_CHAT_ID: env['TELEGRAM_CHAT_ID'],
    TELEGRAM_MENTIONS: env['TELEGRAM_MENTIONS'],
    REPORT_SNAPSHOT_FILE: env['REPORT_SNAPSHOT_FILE'] ?? 'data/last-report.json',
    REPORT_TIMEZONE: env['REPORT_TIMEZONE'] ?? 'Asia/Manila',
    LOW_SPEND_THRESHOLD_USD: parseNumberVar(env['LOW_SPEND_THRESHOLD_USD'], 100),
    NO_CHANGE_ALERT: parseBooleanVar(env['NO_CHANGE_ALERT'], true),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Parse `NAME:username,NAME2:username2` into a name → username map.
 */
export const parseMentions = (raw: string | undefined): Record<string, string> => {
  const mentions: Record<string, string> = {};
  if (raw === undefined || raw.trim() === '') return mentions;

  for (const pair of raw.split(',')) {
    const [name, username] = pair.split(':').map((part) => part.trim());
    if (name !== undefined && name !== '' && username !== undefined && username !== '') {
      mentions[name.toUpperCase()] = username.replace(/^@/, '');
    }
  }
  return mentions;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  redis: {
    url: env.REDIS_URL,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
  sheets: {
    source: env.SHEETS_SOURCE,
    catalogFile: env.SHEETS_CATALOG_FILE,
    /** Inline service-account JSON; takes precedence over the file */
    credentialsJson: env.GOOGLE_CREDENTIALS_JSON,
    credentialsFile: env.GOOGLE_CREDENTIALS_FILE,
    requestTimeoutMs: env.SHEETS_REQUEST_TIMEOUT_MS,
  },
  telegram: {
    botToken: env.TELEGRAM_BOT_TOKEN,
    chatId: env.TELEGRAM_CHAT_ID,
    mentions: parseMentions(env.TELEGRAM_MENTIONS),
  },
  reporting: {
    snapshotFile: env.REPORT_SNAPSHOT_FILE,
    timezone: env.REPORT_TIMEZONE,
    lowSpendThresholdUsd: env.LOW_SPEND_THRESHOLD_USD,
    noChangeAlert: env.NO_CHANGE_ALERT,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
