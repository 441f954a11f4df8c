/**
 * Creates the players table and its indexes.
 * Safe to run repeatedly; every statement is IF NOT EXISTS.
 *
 * Usage: DATABASE_URL=postgres://... npm run db:init
 */

import fs from 'node:fs/promises';

import { sql } from 'kysely';

import { parseEnv, createConfig } from '../infra/config/index.js';
import { createGameDbClient } from '../infra/database/client.js';
import { createLogger } from '../infra/logger/index.js';

const SCHEMA_FILE = new URL('../infra/database/game/schema.sql', import.meta.url);

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'init-db',
    pretty: config.logger.pretty,
  });

  if (config.database.url === undefined) {
    logger.fatal('DATABASE_URL is required');
    process.exit(1);
  }

  const schemaSql = await fs.readFile(SCHEMA_FILE, 'utf8');
  const db = createGameDbClient({ connectionString: config.database.url, maxConnections: 1 });

  try {
    await sql.raw(schemaSql).execute(db);
    logger.info('Database schema is up to date');
  } finally {
    await db.destroy();
  }
};

await main().catch((error: unknown) => {
  console.error('Database initialization failed:', error);
  process.exit(1);
});
