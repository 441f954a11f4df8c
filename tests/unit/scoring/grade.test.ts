/**
 * Unit tests for answer grading
 */

import { describe, expect, it } from 'vitest';

import { getLevel } from '@/modules/catalog/index.js';
import { grade, roundScore } from '@/modules/scoring/core/grade.js';

import { makeTestCatalog } from '../../fixtures/builders.js';

import type { Level } from '@/modules/catalog/index.js';
import type { SyntaxChecker } from '@/modules/scoring/index.js';

const acceptAll: SyntaxChecker = { check: () => ({ valid: true }) };
const rejectAll: SyntaxChecker = {
  check: () => ({ valid: false, message: "Unexpected token '}'" }),
};

const catalog = makeTestCatalog();

const levelOrThrow = (id: number): Level => {
  const level = getLevel(catalog, id);
  if (level === null) {
    throw new Error(`fixture level ${String(id)} missing`);
  }
  return level;
};

describe('grade', () => {
  describe('multiple choice', () => {
    it('scores every correct answer as 100%', () => {
      const result = grade(levelOrThrow(1), [0, 1], acceptAll);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.correctCount).toBe(2);
        expect(result.value.totalQuestions).toBe(2);
        expect(result.value.scorePercentage).toBe(100);
        expect(result.value.questions).toEqual([
          { index: 0, kind: 'multiple_choice', correct: true, explanation: 'B0 explained' },
          { index: 1, kind: 'multiple_choice', correct: true, explanation: 'B1 explained' },
        ]);
      }
    });

    it('keeps full precision in the percentage', () => {
      const result = grade(levelOrThrow(5), [0, 0, 0], acceptAll);

      expect(result._unsafeUnwrap().correctCount).toBe(1);
      expect(result._unsafeUnwrap().scorePercentage).toBeCloseTo(33.3333, 4);
    });

    it('treats a string answer to a multiple-choice question as wrong', () => {
      const result = grade(levelOrThrow(1), ['0', 1], acceptAll);

      expect(result._unsafeUnwrap().questions[0]?.correct).toBe(false);
      expect(result._unsafeUnwrap().scorePercentage).toBe(50);
    });

    it('treats an out-of-range option as wrong rather than rejecting it', () => {
      const result = grade(levelOrThrow(1), [7, -1], acceptAll);

      expect(result._unsafeUnwrap().scorePercentage).toBe(0);
    });
  });

  describe('code questions', () => {
    it('passes code that parses and mentions every expected concept', () => {
      const code = 'function sum(xs) { let t = 0; for (const x of xs) t += x; return t; }';

      const result = grade(levelOrThrow(10), [1, code], acceptAll);

      expect(result._unsafeUnwrap().questions[1]).toEqual({
        index: 1,
        kind: 'code',
        correct: true,
        explanation: 'Loop over the array and return the total',
        missingConcepts: [],
        syntaxError: null,
      });
    });

    it('matches concepts case-insensitively', () => {
      const result = grade(levelOrThrow(10), [1, 'FOR ... RETURN'], acceptAll);

      expect(result._unsafeUnwrap().questions[1]?.correct).toBe(true);
    });

    it('lists missing concepts', () => {
      const result = grade(levelOrThrow(10), [1, 'function sum(xs) { return 0; }'], acceptAll);

      expect(result._unsafeUnwrap().questions[1]).toMatchObject({
        correct: false,
        missingConcepts: ['for'],
        syntaxError: null,
      });
      expect(result._unsafeUnwrap().scorePercentage).toBe(50);
    });

    it('fails code with a syntax error even when every concept is present', () => {
      const result = grade(levelOrThrow(10), [1, 'for return }'], rejectAll);

      expect(result._unsafeUnwrap().questions[1]).toMatchObject({
        correct: false,
        missingConcepts: [],
        syntaxError: "Unexpected token '}'",
      });
    });

    it('fails a numeric answer to a code question', () => {
      const result = grade(levelOrThrow(10), [1, 3], acceptAll);

      expect(result._unsafeUnwrap().questions[1]).toMatchObject({
        correct: false,
        missingConcepts: ['for', 'return'],
        syntaxError: 'Expected source code',
      });
    });
  });

  describe('rejections', () => {
    it('rejects too few answers', () => {
      const result = grade(levelOrThrow(5), [0, 1], acceptAll);

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'AnswerCountMismatchError',
        message: 'Expected 3 answers but received 2',
        expected: 3,
        provided: 2,
      });
    });

    it('rejects too many answers', () => {
      const result = grade(levelOrThrow(1), [0, 1, 2], acceptAll);

      expect(result._unsafeUnwrapErr().type).toBe('AnswerCountMismatchError');
    });

    it('rejects a level without questions before looking at the answers', () => {
      const result = grade({ id: 42, questions: [] }, [0], acceptAll);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'EmptyQuestionSetError',
        message: 'Level 42 has no questions to score',
        levelId: 42,
      });
    });
  });
});

describe('roundScore', () => {
  it('rounds to two decimals', () => {
    expect(roundScore(100 / 3)).toBe(33.33);
    expect(roundScore(200 / 3)).toBe(66.67);
    expect(roundScore(80)).toBe(80);
  });
});
