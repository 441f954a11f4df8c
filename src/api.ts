/**
 * API server entry point
 * Loads course content, picks the player store and starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { createGameDbClient, type GameDbClient } from './infra/database/client.js';
import { createLogger, createLoggerOptions } from './infra/logger/index.js';
import { applyRuleOverrides, loadCatalog } from './modules/catalog/index.js';
import { makeDbHealthChecker, type HealthChecker } from './modules/health/index.js';
import {
  makeInMemoryPlayerRepo,
  makePlayerRepo,
  type PlayerRepository,
} from './modules/players/index.js';

import type { Logger } from 'pino';

interface PlayerStore {
  repo: PlayerRepository;
  healthCheckers: HealthChecker[];
  db: GameDbClient | null;
}

/**
 * Postgres when DATABASE_URL is set, otherwise an in-process store that
 * forgets everything on restart.
 */
const createPlayerStore = (config: AppConfig, logger: Logger): PlayerStore => {
  if (config.database.url === undefined) {
    logger.warn('DATABASE_URL not configured - player progress is kept in memory only');
    return { repo: makeInMemoryPlayerRepo(), healthCheckers: [], db: null };
  }

  const db = createGameDbClient({ connectionString: config.database.url });
  return {
    repo: makePlayerRepo({ db, logger }),
    healthCheckers: [makeDbHealthChecker(db, { name: 'database' })],
    db,
  };
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const loggerConfig = { level: config.logger.level, pretty: config.logger.pretty };
  const logger = createLogger(loggerConfig);

  logger.info({ config: { server: config.server } }, 'Starting API server');

  // Course content is required; there is nothing to serve without it
  const catalogResult = await loadCatalog({ rootDir: config.game.contentDir, logger });
  if (catalogResult.isErr()) {
    logger.fatal({ error: catalogResult.error }, 'Failed to load course content');
    process.exit(1);
  }

  const catalog = applyRuleOverrides(catalogResult.value, { maxRetries: config.game.maxRetries });
  logger.info(
    { levels: catalog.levels.length, maxRetries: catalog.rules.maxRetries },
    'Course content loaded'
  );

  const store = createPlayerStore(config, logger);

  const app = await buildApp({
    fastifyOptions: {
      logger: createLoggerOptions(loggerConfig),
      disableRequestLogging: false,
    },
    deps: {
      config,
      catalog,
      playerRepo: store.repo,
      healthCheckers: store.healthCheckers,
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      if (store.db !== null) {
        await store.db.destroy();
      }
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
