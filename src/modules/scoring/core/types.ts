/**
 * Scoring Module - Types
 */

/**
 * One submitted answer: an option index for multiple-choice questions,
 * source code for code questions.
 */
export type SubmittedAnswer = number | string;

export interface MultipleChoiceResult {
  readonly index: number;
  readonly kind: 'multiple_choice';
  readonly correct: boolean;
  readonly explanation: string;
}

export interface CodeResult {
  readonly index: number;
  readonly kind: 'code';
  readonly correct: boolean;
  readonly explanation: string;
  /** Expected concepts not found in the submission. */
  readonly missingConcepts: readonly string[];
  /** Compiler message when the submission does not parse. */
  readonly syntaxError: string | null;
}

export type QuestionResult = MultipleChoiceResult | CodeResult;

export interface ScoreResult {
  readonly questions: readonly QuestionResult[];
  readonly correctCount: number;
  readonly totalQuestions: number;
  /** Full precision. Round only for display, never before comparing with a threshold. */
  readonly scorePercentage: number;
}

export type SyntaxCheckResult = { readonly valid: true } | { readonly valid: false; readonly message: string };
