/**
 * Scoring Module - Domain Errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The number of answers does not match the number of questions.
 */
export interface AnswerCountMismatchError {
  readonly type: 'AnswerCountMismatchError';
  readonly message: string;
  readonly expected: number;
  readonly provided: number;
}

/**
 * The level has no questions, so no score can be computed.
 */
export interface EmptyQuestionSetError {
  readonly type: 'EmptyQuestionSetError';
  readonly message: string;
  readonly levelId: number;
}

export type ScoringError = AnswerCountMismatchError | EmptyQuestionSetError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createAnswerCountMismatchError = (
  expected: number,
  provided: number
): AnswerCountMismatchError => ({
  type: 'AnswerCountMismatchError',
  message: `Expected ${String(expected)} answers but received ${String(provided)}`,
  expected,
  provided,
});

export const createEmptyQuestionSetError = (levelId: number): EmptyQuestionSetError => ({
  type: 'EmptyQuestionSetError',
  message: `Level ${String(levelId)} has no questions to score`,
  levelId,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const SCORING_ERROR_HTTP_STATUS: Record<ScoringError['type'], number> = {
  AnswerCountMismatchError: 400,
  EmptyQuestionSetError: 500,
};
