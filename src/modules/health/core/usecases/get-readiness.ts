import type { HealthChecker } from '../ports.js';
import type {
  HealthCheckResult,
  HealthProbe,
  ReadinessResponse,
  ReadinessStatus,
} from '../types.js';

export interface GetReadinessDeps {
  checkers: readonly HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Pairs each settled check with its checker. A checker that throws is unhealthy.
 */
export const mapCheckResults = (
  checkers: readonly HealthChecker[],
  results: readonly PromiseSettledResult<HealthProbe>[]
): HealthCheckResult[] =>
  checkers.map((checker, index): HealthCheckResult => {
    const result = results[index];
    if (result?.status === 'fulfilled') {
      return { ...result.value, name: checker.name, critical: checker.critical };
    }
    return {
      name: checker.name,
      status: 'unhealthy',
      message: result?.reason instanceof Error ? result.reason.message : 'Check failed',
      critical: checker.critical,
    };
  });

/**
 * - Any critical unhealthy → "unhealthy" (503)
 * - Any non-critical unhealthy → "degraded" (200)
 * - All healthy → "ok" (200)
 */
export const determineOverallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  if (checks.some((c) => c.status === 'unhealthy' && c.critical)) {
    return 'unhealthy';
  }
  if (checks.some((c) => c.status === 'unhealthy')) {
    return 'degraded';
  }
  return 'ok';
};

/**
 * Runs every checker in parallel and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const results = await Promise.allSettled(checkers.map((checker) => checker.check()));
  const checks = mapCheckResults(checkers, results);

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
