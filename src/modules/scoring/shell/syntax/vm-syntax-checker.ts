/**
 * Syntax checker backed by the V8 compiler.
 *
 * `new Script()` compiles without running anything; `runInContext` is never called.
 */

import { Script } from 'node:vm';

import type { SyntaxChecker } from '../../core/ports.js';
import type { SyntaxCheckResult } from '../../core/types.js';

export const makeVmSyntaxChecker = (): SyntaxChecker => ({
  check(code: string): SyntaxCheckResult {
    try {
      new Script(code, { filename: 'submission.js' });
      return { valid: true };
    } catch (error) {
      return {
        valid: false,
        message: error instanceof Error ? error.message : 'Code could not be compiled',
      };
    }
  },
});
