/**
 * CORS plugin for Fastify
 * Lets the dashboard front end call the API from its configured origins
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Origins from ALLOWED_ORIGINS (comma-separated) plus CLIENT_BASE_URL
 */
export function getAllowedOrigins(config: AppConfig): Set<string> {
  const set = new Set<string>();

  if (config.cors.allowedOrigins !== undefined && config.cors.allowedOrigins !== '') {
    config.cors.allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .forEach((u) => set.add(u));
  }

  if (config.cors.clientBaseUrl !== undefined && config.cors.clientBaseUrl !== '') {
    set.add(config.cors.clientBaseUrl.trim());
  }

  return set;
}

function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server or same-origin
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // Local dashboard builds run on arbitrary localhost ports
      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'x-requested-with', 'accept'],
    credentials: false,
  });
}
