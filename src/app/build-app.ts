/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import { randomUUID } from 'node:crypto';

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { makeGraphQLPlugin, BaseSchema } from '../infra/graphql/index.js';
import { registerCors } from '../infra/plugins/cors.js';
import { makeAchievementRoutes } from '../modules/achievements/index.js';
import { CatalogSchema, makeCatalogResolvers, type GameCatalog } from '../modules/catalog/index.js';
import {
  HealthSchema,
  makeCatalogHealthChecker,
  makeHealthResolvers,
  makeHealthRoutes,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  PlayerSchema,
  makePlayerResolvers,
  makePlayerRoutes,
  type PlayerRepository,
} from '../modules/players/index.js';
import {
  ProgressionSchema,
  makeProgressionResolvers,
  makeProgressionRoutes,
} from '../modules/progression/index.js';
import { makeVmSyntaxChecker, type SyntaxChecker } from '../modules/scoring/index.js';
import { makeShopRoutes } from '../modules/shop/index.js';

import type { AppConfig } from '../infra/config/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  catalog: GameCatalog;
  playerRepo: PlayerRepository;
  /** Defaults to the node:vm parse check */
  syntaxChecker?: SyntaxChecker;
  /** Extra readiness checks; the catalog check is always present */
  healthCheckers?: HealthChecker[];
  generateId?: () => string;
  /** Clock for attempt timestamps and streaks; tests pin it */
  now?: () => Date;
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
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, catalog, playerRepo: repo } = deps;
  const syntaxChecker = deps.syntaxChecker ?? makeVmSyntaxChecker();
  const generateId = deps.generateId ?? randomUUID;
  const now = deps.now ?? (() => new Date());
  const checkers = [makeCatalogHealthChecker(catalog), ...(deps.healthCheckers ?? [])];

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.info({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      request.log.warn({ err: error }, 'Request error');
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');
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

  // ─────────────────────────────────────────────────────────────────────────────
  // REST Routes
  // ─────────────────────────────────────────────────────────────────────────────

  await app.register(makeHealthRoutes({ version, checkers }));

  await app.register(
    makePlayerRoutes({
      repo,
      catalog,
      generateId,
      now,
      adminApiKey: config.game.adminApiKey,
    })
  );

  await app.register(makeProgressionRoutes({ repo, catalog, syntaxChecker, now }));
  await app.register(makeAchievementRoutes({ repo, catalog }));
  await app.register(makeShopRoutes({ repo, catalog }));

  // ─────────────────────────────────────────────────────────────────────────────
  // GraphQL
  // ─────────────────────────────────────────────────────────────────────────────

  await app.register(
    makeGraphQLPlugin({
      schema: [BaseSchema, HealthSchema, CatalogSchema, PlayerSchema, ProgressionSchema],
      resolvers: [
        makeHealthResolvers({ version, checkers }),
        makeCatalogResolvers({ catalog }),
        makePlayerResolvers({ repo }),
        makeProgressionResolvers({ repo, catalog }),
      ],
      isProduction: config.server.isProduction,
    })
  );

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
