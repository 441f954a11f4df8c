/**
 * Progression Module - Domain Errors
 */

import { PLAYER_ERROR_HTTP_STATUS, type PlayerStoreError } from '../../players/index.js';
import { SCORING_ERROR_HTTP_STATUS, type ScoringError } from '../../scoring/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export interface LevelNotFoundError {
  readonly type: 'LevelNotFoundError';
  readonly message: string;
  readonly levelId: number;
}

/**
 * Prerequisites of the level are not all completed.
 */
export interface LevelNotAvailableError {
  readonly type: 'LevelNotAvailableError';
  readonly message: string;
  readonly levelId: number;
  readonly missingPrerequisites: readonly number[];
}

export interface RetryLimitExceededError {
  readonly type: 'RetryLimitExceededError';
  readonly message: string;
  readonly levelId: number;
  readonly attempts: number;
  readonly maxRetries: number;
}

/**
 * The attempt was graded but the updated progress could not be written.
 */
export interface ProgressNotSavedError {
  readonly type: 'ProgressNotSavedError';
  readonly message: string;
  readonly levelId: number;
  readonly scorePercentage: number;
  readonly passed: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

/** Rejections decided by the rules before grading. */
export type AttemptRejection = LevelNotAvailableError | RetryLimitExceededError;

export type ProgressionError =
  | LevelNotFoundError
  | AttemptRejection
  | ProgressNotSavedError
  | ScoringError
  | PlayerStoreError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createLevelNotFoundError = (levelId: number): LevelNotFoundError => ({
  type: 'LevelNotFoundError',
  message: `Level ${String(levelId)} does not exist`,
  levelId,
});

export const createLevelNotAvailableError = (
  levelId: number,
  missingPrerequisites: readonly number[]
): LevelNotAvailableError => ({
  type: 'LevelNotAvailableError',
  message: `Level ${String(levelId)} is locked; complete level(s) ${missingPrerequisites.join(', ')} first`,
  levelId,
  missingPrerequisites,
});

export const createRetryLimitExceededError = (
  levelId: number,
  attempts: number,
  maxRetries: number
): RetryLimitExceededError => ({
  type: 'RetryLimitExceededError',
  message: `Level ${String(levelId)} allows ${String(maxRetries)} attempts and ${String(attempts)} have been used`,
  levelId,
  attempts,
  maxRetries,
});

export const createProgressNotSavedError = (
  levelId: number,
  scorePercentage: number,
  passed: boolean,
  cause?: unknown
): ProgressNotSavedError => ({
  type: 'ProgressNotSavedError',
  message: `Level ${String(levelId)} was graded (${String(scorePercentage)}%, ${passed ? 'passed' : 'not passed'}) but progress could not be saved; the result may not be durable`,
  levelId,
  scorePercentage,
  passed,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const PROGRESSION_ERROR_HTTP_STATUS: Record<ProgressionError['type'], number> = {
  LevelNotFoundError: 404,
  LevelNotAvailableError: 403,
  RetryLimitExceededError: 409,
  ProgressNotSavedError: 500,
  AnswerCountMismatchError: SCORING_ERROR_HTTP_STATUS.AnswerCountMismatchError,
  EmptyQuestionSetError: SCORING_ERROR_HTTP_STATUS.EmptyQuestionSetError,
  DatabaseError: PLAYER_ERROR_HTTP_STATUS.DatabaseError,
  PlayerNotFoundError: PLAYER_ERROR_HTTP_STATUS.PlayerNotFoundError,
};

export const getHttpStatusForError = (error: ProgressionError): number => {
  return PROGRESSION_ERROR_HTTP_STATUS[error.type];
};
