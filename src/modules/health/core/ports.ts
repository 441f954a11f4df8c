import type { HealthProbe } from './types.js';

/**
 * A named dependency check. A critical failure makes the service unready;
 * a non-critical one only degrades it.
 */
export interface HealthChecker {
  readonly name: string;
  readonly critical: boolean;
  check(): Promise<HealthProbe>;
}
