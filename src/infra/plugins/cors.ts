/**
 * CORS plugin for Fastify
 * Lets browser dashboards on other origins read the API
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Parse the comma-separated ALLOWED_ORIGINS list
 */
export function getAllowedOriginsSet(config: AppConfig): Set<string> {
  const raw = config.cors.allowedOrigins ?? '';

  return new Set(
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 *
 * Development accepts localhost origins plus ALLOWED_ORIGINS; every other
 * environment accepts ALLOWED_ORIGINS only. Requests without an Origin header
 * (curl, server-to-server) are always allowed.
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOriginsSet(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      // Disallowed origins get no CORS headers; the browser blocks the read
      cb(null, false);
    },
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept'],
  });
}
