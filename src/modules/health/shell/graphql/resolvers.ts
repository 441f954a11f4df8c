import { getReadiness } from '../../core/usecases/get-readiness.js';

import type { HealthChecker } from '../../core/ports.js';
import type { IResolvers } from 'mercurius';

export interface MakeHealthResolversDeps {
  checkers?: readonly HealthChecker[];
  version?: string | undefined;
}

export const makeHealthResolvers = (deps: MakeHealthResolversDeps = {}): IResolvers => {
  const { version, checkers = [] } = deps;

  return {
    Query: {
      health: () => 'ok',
      ready: () =>
        getReadiness(
          { version, checkers },
          { uptime: process.uptime(), timestamp: new Date().toISOString() }
        ),
    },
  };
};
