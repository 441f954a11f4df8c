/**
 * Integration tests for health routes and the fallback handlers
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import {
  makeFailingHealthChecker,
  makeHealthChecker,
  makeTestAppDeps,
} from '../fixtures/builders.js';

import type { FastifyInstance } from 'fastify';

describe('Health Routes', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    if (app != null) {
      await app.close();
    }
  });

  it('GET /health/live returns ok', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('GET /health/ready always checks the catalog', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps(),
      version: '1.2.3',
    });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.version).toBe('1.2.3');
    expect(body.checks).toEqual([
      {
        name: 'catalog',
        status: 'healthy',
        message: '10 levels, 4 achievements',
        critical: true,
      },
    ]);
  });

  it('GET /health/ready returns 503 when a critical check fails', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({
        healthCheckers: [makeFailingHealthChecker('database', 'Connection refused')],
      }),
    });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json().checks[1]).toEqual({
      name: 'database',
      status: 'unhealthy',
      message: 'Connection refused',
      critical: true,
    });
  });

  it('GET /health/ready stays available when a non-critical check fails', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({
        healthCheckers: [makeHealthChecker('metrics', { status: 'unhealthy' }, false)],
      }),
    });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('degraded');
  });

  it('answers unknown routes with the error envelope', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await app.inject({ method: 'GET', url: '/api/v1/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'NotFoundError',
      message: 'Route GET /api/v1/nope not found',
    });
  });
});
