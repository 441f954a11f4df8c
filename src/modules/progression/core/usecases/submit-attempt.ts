/**
 * Submit Attempt Use Case
 *
 * Checks, grades and records one attempt inside a single atomic player update,
 * so availability and the retry cap are judged against the locked record.
 */

import { err, ok, type Result } from 'neverthrow';

import { awardAchievements, checkNewAchievements } from '../../../achievements/index.js';
import { getLevel } from '../../../catalog/index.js';
import { playerLevelFor } from '../../../players/index.js';
import { grade, roundScore } from '../../../scoring/index.js';
import {
  createLevelNotFoundError,
  createProgressNotSavedError,
  type AttemptRejection,
  type ProgressionError,
} from '../errors.js';
import { buildAttemptFeedback } from '../feedback.js';
import {
  applyAttempt,
  attemptsRemainingFor,
  canAttempt,
  evaluateAttempt,
  isLevelAvailable,
  isNewBestScore,
} from '../rules.js';

import type { SubmitAttemptOutput } from '../types.js';
import type { UnknownStatError } from '../../../achievements/index.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';
import type { ScoringError, SubmittedAnswer, SyntaxChecker } from '../../../scoring/index.js';

export interface SubmitAttemptDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
  syntaxChecker: SyntaxChecker;
}

export interface SubmitAttemptInput {
  playerId: string;
  levelId: number;
  answers: readonly SubmittedAnswer[];
  timeTakenSeconds?: number | null | undefined;
  /** ISO timestamp */
  now: string;
}

export interface SubmitAttemptResult {
  output: SubmitAttemptOutput;
  /** Achievements that could not be evaluated. */
  warnings: UnknownStatError[];
}

interface GradedSummary {
  scorePercentage: number;
  passed: boolean;
}

export async function submitAttempt(
  deps: SubmitAttemptDeps,
  input: SubmitAttemptInput
): Promise<Result<SubmitAttemptResult, ProgressionError>> {
  const { repo, catalog, syntaxChecker } = deps;
  const maxRetries = catalog.rules.maxRetries;

  const level = getLevel(catalog, input.levelId);
  if (level === null) {
    return err(createLevelNotFoundError(input.levelId));
  }

  const graded: { summary: GradedSummary | null } = { summary: null };

  const result = await repo.update<SubmitAttemptResult, AttemptRejection | ScoringError>(
    input.playerId,
    (player) => {
      const allowed = canAttempt(level, player, maxRetries);
      if (allowed.isErr()) {
        return err(allowed.error);
      }

      const scored = grade(level, input.answers, syntaxChecker);
      if (scored.isErr()) {
        return err(scored.error);
      }

      const score = scored.value;
      const outcome = evaluateAttempt(level, score);
      const scorePercentage = roundScore(score.scorePercentage);
      graded.summary = { scorePercentage, passed: outcome.passed };

      const nextLevel = getLevel(catalog, level.id + 1);
      const nextWasAvailable = nextLevel !== null && isLevelAvailable(nextLevel, player);

      const applied = applyAttempt(player, level, score, outcome, {
        now: input.now,
        timeTakenSeconds: input.timeTakenSeconds ?? null,
        testBonus: catalog.rules.testBonus,
      });

      const { earned, skipped } = checkNewAchievements(
        applied.player,
        catalog.achievements,
        catalog.tierRewards,
        input.now
      );
      const updated = awardAchievements(applied.player, earned);

      const playerLevel = playerLevelFor(updated.totalXp);

      const nextLevelUnlocked =
        nextLevel !== null && !nextWasAvailable && isLevelAvailable(nextLevel, updated)
          ? nextLevel.id
          : null;

      const output: SubmitAttemptOutput = {
        success: true,
        levelId: level.id,
        passed: outcome.passed,
        scorePercentage,
        correctCount: score.correctCount,
        totalQuestions: score.totalQuestions,
        questions: score.questions,
        starsEarned: outcome.stars,
        coinsEarned: applied.coinsEarned,
        xpEarned: applied.xpEarned,
        newAchievements: earned,
        nextLevelUnlocked,
        attemptNumber: applied.attemptNumber,
        attemptsRemaining: attemptsRemainingFor(updated, level.id, maxRetries),
        newBestScore: isNewBestScore(player, level.id, score.scorePercentage),
        playerLevel,
        leveledUp: playerLevel > playerLevelFor(player.totalXp),
        feedback: buildAttemptFeedback(score.scorePercentage, level.passingScore, outcome.passed),
        totals: {
          totalXp: updated.totalXp,
          totalCoins: updated.totalCoins,
          learningStreak: updated.learningStreak,
        },
      };

      return ok({ player: updated, value: { output, warnings: skipped } });
    }
  );

  if (result.isErr()) {
    const error = result.error;
    if (error.type === 'DatabaseError' && error.writeFailed && graded.summary !== null) {
      return err(
        createProgressNotSavedError(
          level.id,
          graded.summary.scorePercentage,
          graded.summary.passed,
          error.cause
        )
      );
    }
    return err(error);
  }

  return ok(result.value);
}
