/**
 * Grading.
 *
 * Pure comparison of submitted answers with a level's questions. The only
 * collaborator is the syntax checker, which inspects code without running it.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createAnswerCountMismatchError,
  createEmptyQuestionSetError,
  type ScoringError,
} from './errors.js';

import type { SyntaxChecker } from './ports.js';
import type { QuestionResult, ScoreResult, SubmittedAnswer } from './types.js';
import type { CodeQuestion, Level, MultipleChoiceQuestion } from '../../catalog/index.js';

const gradeMultipleChoice = (
  question: MultipleChoiceQuestion,
  answer: SubmittedAnswer,
  index: number
): QuestionResult => ({
  index,
  kind: 'multiple_choice',
  correct: typeof answer === 'number' && answer === question.correctIndex,
  explanation: question.explanation,
});

const gradeCode = (
  question: CodeQuestion,
  answer: SubmittedAnswer,
  index: number,
  syntaxChecker: SyntaxChecker
): QuestionResult => {
  if (typeof answer !== 'string') {
    return {
      index,
      kind: 'code',
      correct: false,
      explanation: question.explanation,
      missingConcepts: question.expectedConcepts,
      syntaxError: 'Expected source code',
    };
  }

  const haystack = answer.toLowerCase();
  const missingConcepts = question.expectedConcepts.filter(
    (concept) => !haystack.includes(concept.toLowerCase())
  );
  const syntax = syntaxChecker.check(answer);
  const syntaxError = syntax.valid ? null : syntax.message;

  return {
    index,
    kind: 'code',
    correct: missingConcepts.length === 0 && syntaxError === null,
    explanation: question.explanation,
    missingConcepts,
    syntaxError,
  };
};

/**
 * Grades one answer per question, in order.
 *
 * A count mismatch is a rejected submission rather than a low score.
 */
export const grade = (
  level: Pick<Level, 'id' | 'questions'>,
  answers: readonly SubmittedAnswer[],
  syntaxChecker: SyntaxChecker
): Result<ScoreResult, ScoringError> => {
  const { questions } = level;

  if (questions.length === 0) {
    return err(createEmptyQuestionSetError(level.id));
  }

  if (answers.length !== questions.length) {
    return err(createAnswerCountMismatchError(questions.length, answers.length));
  }

  const results = questions.map((question, index): QuestionResult => {
    const answer = answers[index] ?? '';
    return question.kind === 'multiple_choice'
      ? gradeMultipleChoice(question, answer, index)
      : gradeCode(question, answer, index, syntaxChecker);
  });

  const correctCount = results.filter((r) => r.correct).length;

  return ok({
    questions: results,
    correctCount,
    totalQuestions: questions.length,
    scorePercentage: (correctCount / questions.length) * 100,
  });
};

/**
 * Rounds a percentage to two decimals for reporting.
 */
export const roundScore = (percentage: number): number => Math.round(percentage * 100) / 100;
