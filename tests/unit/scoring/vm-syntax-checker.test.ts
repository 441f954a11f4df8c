import { describe, expect, it } from 'vitest';

import { makeVmSyntaxChecker } from '@/modules/scoring/shell/syntax/vm-syntax-checker.js';

describe('makeVmSyntaxChecker', () => {
  const checker = makeVmSyntaxChecker();

  it('accepts code that compiles', () => {
    expect(checker.check('const total = [1, 2].reduce((a, b) => a + b, 0);')).toEqual({
      valid: true,
    });
  });

  it('reports the compiler message for code that does not compile', () => {
    const result = checker.check('function (');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.message.length).toBeGreaterThan(0);
    }
  });

  it('never runs the submitted code', () => {
    const marker = '__syntaxCheckerRan';

    const result = checker.check(`globalThis.${marker} = true;`);

    expect(result).toEqual({ valid: true });
    expect(marker in globalThis).toBe(false);
  });

  it('accepts an empty submission as syntactically valid', () => {
    expect(checker.check('')).toEqual({ valid: true });
  });
});
