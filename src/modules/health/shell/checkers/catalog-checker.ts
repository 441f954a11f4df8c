/**
 * Course content health checker
 *
 * The catalog is loaded once at startup; the check reports whether it has
 * any playable level.
 */

import type { GameCatalog } from '../../../catalog/index.js';
import type { HealthChecker } from '../../core/ports.js';
import type { HealthProbe } from '../../core/types.js';

export const makeCatalogHealthChecker = (catalog: GameCatalog): HealthChecker => ({
  name: 'catalog',
  critical: true,
  check: (): Promise<HealthProbe> =>
    Promise.resolve(
      catalog.levels.length > 0
        ? {
            status: 'healthy',
            message: `${String(catalog.levels.length)} levels, ${String(catalog.achievements.length)} achievements`,
          }
        : { status: 'unhealthy', message: 'Catalog has no playable levels' }
    ),
});
