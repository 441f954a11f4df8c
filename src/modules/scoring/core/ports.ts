/**
 * Scoring Module - Ports
 */

import type { SyntaxCheckResult } from './types.js';

/**
 * Decides whether submitted source code parses. Implementations must not
 * execute the code.
 */
export interface SyntaxChecker {
  check(code: string): SyntaxCheckResult;
}
