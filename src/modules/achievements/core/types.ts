/**
 * Achievements Module - Types
 */

import type { AchievementTier } from '../../catalog/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Stats
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Every stat an achievement condition may name.
 */
export const ACHIEVEMENT_STATS = [
  'levels_completed',
  'perfect_scores',
  'learning_streak',
  'total_time_hours',
  'fast_completion_count',
  'challenge_levels_completed',
  'tests_completed',
  'night_completions',
  'early_completions',
  'total_xp',
] as const;

export type AchievementStat = (typeof ACHIEVEMENT_STATS)[number];

export type StatsSnapshot = Readonly<Record<AchievementStat, number>>;

export const isAchievementStat = (value: string): value is AchievementStat =>
  ACHIEVEMENT_STATS.some((stat) => stat === value);

/** Passed attempts faster than this count as fast completions. */
export const FAST_COMPLETION_SECONDS = 120;

/** UTC hours counted as night: [22, 24) and [0, 6). */
export const NIGHT_START_HOUR = 22;
export const NIGHT_END_HOUR = 6;

/** UTC hour counted as an early completion. */
export const EARLY_HOUR = 6;

// ─────────────────────────────────────────────────────────────────────────────
// Evaluation Results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An achievement unlocked by the latest evaluation.
 */
export interface NewAchievement {
  readonly achievementId: string;
  readonly name: string;
  readonly tier: AchievementTier;
  readonly coins: number;
  readonly xp: number;
  /** ISO timestamp */
  readonly earnedAt: string;
}

export interface AchievementProgress {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly icon: string;
  readonly tier: AchievementTier;
  readonly hidden: boolean;
  readonly earned: boolean;
  readonly earnedAt: string | null;
  readonly current: number;
  readonly target: number;
  /** 0..100, floored */
  readonly percentage: number;
}
