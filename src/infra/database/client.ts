import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { GameDatabase } from './game/types.js';

const { Pool: PG_POOL } = pg;

export type GameDbClient = Kysely<GameDatabase>;

export interface DatabaseClientOptions {
  connectionString: string;
  /** Connection pool size (default: 10) */
  maxConnections?: number;
}

/**
 * Create a Kysely instance for the game database
 */
export const createGameDbClient = (options: DatabaseClientOptions): GameDbClient => {
  return new Kysely<GameDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: options.connectionString,
        max: options.maxConnections ?? 10,
      }),
    }),
  });
};

// Re-export types
export type { GameDatabase, Players, Timestamp } from './game/types.js';
