/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'adops-sheets-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/** pino-pretty transport for local runs */
const prettyTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
} as const;

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  // Silent loggers never need a worker thread
  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = prettyTransport;
  }

  return pinoLib(options);
};

export { type Logger } from 'pino';
