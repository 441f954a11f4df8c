/**
 * CORS plugin for Fastify
 *
 * Browsers may call the API from the origins in ALLOWED_ORIGINS and
 * CLIENT_BASE_URL; in development any localhost origin is accepted too.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/index.js';
import type { FastifyInstance } from 'fastify';

export const getAllowedOrigins = (config: AppConfig): Set<string> => {
  const origins = (config.cors.allowedOrigins ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');

  const clientBaseUrl = config.cors.clientBaseUrl?.trim();
  if (clientBaseUrl !== undefined && clientBaseUrl !== '') {
    origins.push(clientBaseUrl);
  }

  return new Set(origins);
};

export const isLocalhostOrigin = (origin: string): boolean => {
  if (!URL.canParse(origin)) {
    return false;
  }
  const url = new URL(origin);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return false;
  }
  // Exact hostname match; a prefix check would accept localhost.attacker.example
  return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
};

/**
 * Decides whether a request origin may read responses.
 * Requests without an Origin header (server-to-server, same origin) are allowed.
 */
export const isOriginAllowed = (
  origin: string | undefined,
  allowedOrigins: ReadonlySet<string>,
  isDevelopment: boolean
): boolean => {
  if (origin === undefined || origin === '') {
    return true;
  }
  if (allowedOrigins.has(origin)) {
    return true;
  }
  return isDevelopment && isLocalhostOrigin(origin);
};

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      if (isOriginAllowed(origin, allowedOrigins, config.server.isDevelopment)) {
        cb(null, true);
        return;
      }
      cb(
        Object.assign(new Error('CORS origin not allowed'), {
          name: 'CorsOriginError',
          statusCode: 403,
        }),
        false
      );
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'x-requested-with', 'accept', 'x-admin-key'],
    exposedHeaders: ['content-length'],
    credentials: false,
  });
}
