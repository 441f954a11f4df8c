/**
 * Players Module - Types
 *
 * The player record is fully specified: every field has an explicit default
 * set by `createPlayer`, so nothing downstream probes for missing fields.
 */

import type { AchievementTier, LevelKind } from '../../catalog/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const USERNAME_PATTERN = '^[A-Za-z0-9_-]{3,32}$';

/** XP needed per player level. */
export const XP_PER_PLAYER_LEVEL = 1000;

export const DEFAULT_LEADERBOARD_LIMIT = 10;
export const MAX_LEADERBOARD_LIMIT = 100;

// ─────────────────────────────────────────────────────────────────────────────
// Player Record
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One graded attempt. The history of these is append-only and is the source
 * of every derived statistic.
 */
export interface AttemptRecord {
  readonly levelId: number;
  readonly levelKind: LevelKind;
  readonly scorePercentage: number;
  readonly passed: boolean;
  readonly stars: number;
  readonly attemptNumber: number;
  /** ISO timestamp */
  readonly occurredAt: string;
  readonly timeTakenSeconds: number | null;
}

export interface EarnedAchievement {
  readonly achievementId: string;
  readonly tier: AchievementTier;
  /** ISO timestamp */
  readonly earnedAt: string;
  readonly coins: number;
  readonly xp: number;
}

export interface Player {
  readonly id: string;
  readonly username: string;
  readonly createdAt: string;
  readonly lastActiveAt: string;
  /** Frontier level: the next level in sequence the player has not yet passed. */
  readonly currentLevel: number;
  /** Ascending, unique. */
  readonly completedLevels: readonly number[];
  /** Attempt count keyed by level id. */
  readonly levelAttempts: Readonly<Record<string, number>>;
  readonly performanceHistory: readonly AttemptRecord[];
  readonly totalXp: number;
  readonly totalCoins: number;
  readonly learningStreak: number;
  readonly longestStreak: number;
  /** UTC calendar date (YYYY-MM-DD) of the last recorded activity. */
  readonly lastActivityDate: string | null;
  readonly achievements: readonly EarnedAchievement[];
  readonly purchasedRewards: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Derived Views
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Statistics recomputed from the history on every read.
 */
export interface PlayerStats {
  readonly levelsCompleted: number;
  readonly totalLevels: number;
  readonly progressPercentage: number;
  /** Best stars per passed level, keyed by level id. */
  readonly levelStars: Readonly<Record<string, number>>;
  readonly totalStars: number;
  readonly averageScore: number;
  readonly perfectScores: number;
  readonly totalAttempts: number;
  readonly achievementsCount: number;
  readonly playerLevel: number;
}

export interface LeaderboardEntry {
  readonly rank: number;
  readonly playerId: string;
  readonly username: string;
  readonly totalXp: number;
  readonly playerLevel: number;
  readonly levelsCompleted: number;
  readonly achievementsCount: number;
}
