/**
 * Progression Rules
 *
 * Availability, retry cap, pass/star evaluation and the state transition
 * applied to a player after a graded attempt. Everything here is pure.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createLevelNotAvailableError,
  createRetryLimitExceededError,
  type AttemptRejection,
} from './errors.js';
import { updateStreak } from './streak.js';
import { STAR_THRESHOLDS, type AttemptContext, type AttemptOutcome, type LevelState } from './types.js';
import { getAttemptCount, hasCompletedLevel } from '../../players/index.js';

import type { Level, RewardAmount } from '../../catalog/index.js';
import type { AttemptRecord, Player } from '../../players/index.js';
import type { ScoreResult } from '../../scoring/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Stars & Pass
// ─────────────────────────────────────────────────────────────────────────────

export const computeStars = (scorePercentage: number): number =>
  STAR_THRESHOLDS.find((threshold) => scorePercentage >= threshold.minScore)?.stars ?? 0;

/**
 * Compares the full-precision score with the pass mark. A fail earns no stars.
 */
export const evaluateAttempt = (
  level: Pick<Level, 'passingScore'>,
  score: Pick<ScoreResult, 'scorePercentage'>
): AttemptOutcome => {
  const passed = score.scorePercentage >= level.passingScore;
  return { passed, stars: passed ? computeStars(score.scorePercentage) : 0 };
};

/**
 * True when no earlier attempt on the level scored as high. The first attempt
 * is always a new best.
 */
export const isNewBestScore = (
  player: Player,
  levelId: number,
  scorePercentage: number
): boolean =>
  player.performanceHistory.every(
    (record) => record.levelId !== levelId || record.scorePercentage < scorePercentage
  );

// ─────────────────────────────────────────────────────────────────────────────
// Availability
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Prerequisites the player still has to complete. A level other than the
 * first with no prerequisites listed requires the one before it.
 */
export const missingPrerequisites = (
  level: Pick<Level, 'id' | 'prerequisites'>,
  player: Player
): number[] => {
  if (level.id === 1) {
    return [];
  }
  const required = level.prerequisites.length > 0 ? level.prerequisites : [level.id - 1];
  return required.filter((id) => !hasCompletedLevel(player, id));
};

export const isLevelAvailable = (
  level: Pick<Level, 'id' | 'prerequisites'>,
  player: Player
): boolean => missingPrerequisites(level, player).length === 0;

export const attemptsRemainingFor = (player: Player, levelId: number, maxRetries: number): number =>
  Math.max(0, maxRetries - getAttemptCount(player, levelId));

/**
 * Every attempt counts towards the cap, passed or not.
 */
export const canAttempt = (
  level: Pick<Level, 'id' | 'prerequisites'>,
  player: Player,
  maxRetries: number
): Result<void, AttemptRejection> => {
  const missing = missingPrerequisites(level, player);
  if (missing.length > 0) {
    return err(createLevelNotAvailableError(level.id, missing));
  }

  const attempts = getAttemptCount(player, level.id);
  if (attempts >= maxRetries) {
    return err(createRetryLimitExceededError(level.id, attempts, maxRetries));
  }

  return ok(undefined);
};

export const levelStateFor = (
  level: Pick<Level, 'id' | 'prerequisites'>,
  player: Player,
  maxRetries: number
): LevelState => {
  if (hasCompletedLevel(player, level.id)) {
    return 'completed';
  }
  if (!isLevelAvailable(level, player)) {
    return 'locked';
  }
  const attempts = getAttemptCount(player, level.id);
  if (attempts >= maxRetries) {
    return 'exhausted';
  }
  return attempts > 0 ? 'failed' : 'available';
};

// ─────────────────────────────────────────────────────────────────────────────
// Applying an Attempt
// ─────────────────────────────────────────────────────────────────────────────

export interface ApplyAttemptContext extends AttemptContext {
  readonly testBonus: RewardAmount;
}

export interface AppliedAttempt {
  readonly player: Player;
  readonly attemptNumber: number;
  readonly coinsEarned: number;
  readonly xpEarned: number;
  /** True on the first pass of this level. */
  readonly firstCompletion: boolean;
}

/**
 * Records a graded attempt. Attempts, history, streak and activity time are
 * always updated; completion, rewards and the frontier only on a pass.
 * Rewards are the level's coins and XP multiplied by the stars earned, plus
 * the test bonus on every pass of a test level.
 */
export const applyAttempt = (
  player: Player,
  level: Level,
  score: Pick<ScoreResult, 'scorePercentage'>,
  outcome: AttemptOutcome,
  ctx: ApplyAttemptContext
): AppliedAttempt => {
  const attemptNumber = getAttemptCount(player, level.id) + 1;

  const record: AttemptRecord = {
    levelId: level.id,
    levelKind: level.kind,
    scorePercentage: score.scorePercentage,
    passed: outcome.passed,
    stars: outcome.stars,
    attemptNumber,
    occurredAt: ctx.now,
    timeTakenSeconds: ctx.timeTakenSeconds,
  };

  const streak = updateStreak(player, ctx.now);

  const attempted: Player = {
    ...player,
    lastActiveAt: ctx.now,
    levelAttempts: { ...player.levelAttempts, [String(level.id)]: attemptNumber },
    performanceHistory: [...player.performanceHistory, record],
    learningStreak: streak.learningStreak,
    longestStreak: streak.longestStreak,
    lastActivityDate: streak.lastActivityDate,
  };

  if (!outcome.passed) {
    return { player: attempted, attemptNumber, coinsEarned: 0, xpEarned: 0, firstCompletion: false };
  }

  const firstCompletion = !hasCompletedLevel(player, level.id);
  const bonus = level.kind === 'test' ? ctx.testBonus : { coins: 0, xp: 0 };
  const coinsEarned = level.rewards.coins * outcome.stars + bonus.coins;
  const xpEarned = level.rewards.xp * outcome.stars + bonus.xp;

  return {
    player: {
      ...attempted,
      completedLevels: firstCompletion
        ? [...player.completedLevels, level.id].sort((a, b) => a - b)
        : player.completedLevels,
      currentLevel: level.id === player.currentLevel ? level.id + 1 : player.currentLevel,
      totalCoins: player.totalCoins + coinsEarned,
      totalXp: player.totalXp + xpEarned,
    },
    attemptNumber,
    coinsEarned,
    xpEarned,
    firstCompletion,
  };
};
