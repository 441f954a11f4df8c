/**
 * Health Module - Public API
 */

export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  HealthProbe,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';

export {
  determineOverallStatus,
  getReadiness,
  mapCheckResults,
  type GetReadinessDeps,
  type GetReadinessInput,
} from './core/usecases/get-readiness.js';

export {
  makeCatalogHealthChecker,
  makeDbHealthChecker,
  type DbHealthCheckerOptions,
} from './shell/checkers/index.js';

export { makeHealthRoutes, type MakeHealthRoutesDeps } from './shell/rest/routes.js';
export { makeHealthResolvers, type MakeHealthResolversDeps } from './shell/graphql/resolvers.js';
export { schema as HealthSchema } from './shell/graphql/schema.js';
