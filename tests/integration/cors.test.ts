/**
 * Integration tests for CORS plugin
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeTestAppDeps, makeTestConfig } from '../fixtures/builders.js';

import type { AppConfig } from '@/infra/config/index.js';
import type { FastifyInstance } from 'fastify';

const configFor = (isDevelopment: boolean, cors: Partial<AppConfig['cors']> = {}): AppConfig =>
  makeTestConfig({
    server: {
      port: 3000,
      host: '0.0.0.0',
      isDevelopment,
      isProduction: !isDevelopment,
      isTest: false,
    },
    cors: { allowedOrigins: undefined, clientBaseUrl: undefined, ...cors },
  });

describe('CORS Plugin', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    if (app != null) {
      await app.close();
    }
  });

  const live = (origin?: string) =>
    app.inject({
      method: 'GET',
      url: '/health/live',
      ...(origin !== undefined && { headers: { origin } }),
    });

  describe('Development Mode', () => {
    it('allows localhost origins', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps({ config: configFor(true) }),
      });

      const response = await live('http://localhost:5173');

      expect(response.statusCode).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    });

    it('allows requests without origin header', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps({ config: configFor(true) }),
      });

      const response = await live();

      expect(response.statusCode).toBe(200);
    });
  });

  describe('Production Mode', () => {
    it('allows origins from ALLOWED_ORIGINS and CLIENT_BASE_URL', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps({
          config: configFor(false, {
            allowedOrigins: 'https://app1.example, https://app2.example',
            clientBaseUrl: 'https://client.example',
          }),
        }),
      });

      for (const origin of ['https://app2.example', 'https://client.example']) {
        const response = await live(origin);
        expect(response.statusCode).toBe(200);
        expect(response.headers['access-control-allow-origin']).toBe(origin);
      }
    });

    it('blocks localhost and unlisted origins', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps({
          config: configFor(false, { allowedOrigins: 'https://app.example' }),
        }),
      });

      for (const origin of ['http://localhost:5173', 'https://malicious.example']) {
        const response = await live(origin);
        expect(response.statusCode).toBe(403);
        expect(response.json()).toEqual({
          ok: false,
          error: 'CorsOriginError',
          message: 'CORS origin not allowed',
        });
      }
    });
  });
});
