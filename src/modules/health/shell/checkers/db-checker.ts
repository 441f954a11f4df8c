/**
 * Database health checker
 *
 * Runs `SELECT 1` against the player store's database.
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthProbe } from '../../core/types.js';

/** Default timeout for the check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name to identify this database in health check results */
  name: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * @example
 * ```typescript
 * const dbChecker = makeDbHealthChecker(gameDb, { name: 'database' });
 * await dbChecker.check(); // { status: 'healthy', latencyMs: 5 }
 * ```
 */
export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return {
    name,
    critical: true,
    check: async (): Promise<HealthProbe> => {
      const startTime = Date.now();
      let timer: NodeJS.Timeout | undefined;

      try {
        const timeoutPromise = new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => {
            reject(new Error(`Database health check timed out after ${String(timeoutMs)}ms`));
          }, timeoutMs);
        });

        await Promise.race([sql`SELECT 1`.execute(db), timeoutPromise]);

        return { status: 'healthy', latencyMs: Date.now() - startTime };
      } catch (error) {
        return {
          status: 'unhealthy',
          message: error instanceof Error ? error.message : 'Unknown database error',
          latencyMs: Date.now() - startTime,
        };
      } finally {
        clearTimeout(timer);
      }
    },
  };
};
