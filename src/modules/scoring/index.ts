/**
 * Scoring Module - Public API
 */

export type {
  SubmittedAnswer,
  QuestionResult,
  MultipleChoiceResult,
  CodeResult,
  ScoreResult,
  SyntaxCheckResult,
} from './core/types.js';

export type { SyntaxChecker } from './core/ports.js';

export type { ScoringError, AnswerCountMismatchError, EmptyQuestionSetError } from './core/errors.js';

export {
  createAnswerCountMismatchError,
  createEmptyQuestionSetError,
  SCORING_ERROR_HTTP_STATUS,
} from './core/errors.js';

export { grade, roundScore } from './core/grade.js';

export { makeVmSyntaxChecker } from './shell/syntax/vm-syntax-checker.js';
