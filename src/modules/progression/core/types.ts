/**
 * Progression Module - Types
 */

import type { NewAchievement, AchievementProgress } from '../../achievements/index.js';
import type { LevelKind, LevelRewards, LevelView } from '../../catalog/index.js';
import type { AttemptRecord } from '../../players/index.js';
import type { QuestionResult } from '../../scoring/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Lowest score (inclusive) for each star count. */
export const STAR_THRESHOLDS = [
  { stars: 3, minScore: 95 },
  { stars: 2, minScore: 85 },
  { stars: 1, minScore: 70 },
] as const;

/** A failing score this close to the pass mark gets encouraging feedback. */
export const ALMOST_MARGIN = 10;

export const DEFAULT_RECOMMENDATION_COUNT = 3;

/** Average assumed for players with no attempts yet. */
export const DEFAULT_RECENT_AVERAGE = 70;

export const RECENT_SCORE_WINDOW = 10;
export const RECENT_KIND_WINDOW = 5;
export const DASHBOARD_RECENT_ATTEMPTS = 5;

/** Latest attempts in a topic compared against the earlier ones. */
export const TREND_RECENT_WINDOW = 3;
/** Points the recent average must move to count as a trend. */
export const TREND_MARGIN = 5;

// ─────────────────────────────────────────────────────────────────────────────
// Level State
// ─────────────────────────────────────────────────────────────────────────────

/**
 * - locked: prerequisites not met
 * - available: unlocked and never attempted
 * - failed: attempted without a pass, attempts remain
 * - exhausted: every attempt used without a pass
 * - completed: passed at least once
 */
export type LevelState = 'locked' | 'available' | 'failed' | 'exhausted' | 'completed';

export interface LevelMapEntry {
  readonly id: number;
  readonly kind: LevelKind;
  readonly title: string;
  readonly topic: string;
  readonly difficulty: string;
  readonly completed: boolean;
  readonly unlocked: boolean;
  readonly state: LevelState;
  /** Best stars earned, 0 when never passed. */
  readonly stars: number;
  readonly attempts: number;
  readonly attemptsRemaining: number;
  readonly passingScore: number;
  readonly rewards: LevelRewards;
}

// ─────────────────────────────────────────────────────────────────────────────
// Attempts
// ─────────────────────────────────────────────────────────────────────────────

export interface AttemptOutcome {
  readonly passed: boolean;
  readonly stars: number;
}

export interface AttemptContext {
  /** ISO timestamp */
  readonly now: string;
  readonly timeTakenSeconds: number | null;
}

export type FeedbackTone = 'perfect' | 'excellent' | 'passed' | 'almost' | 'retry';

export interface AttemptFeedback {
  readonly tone: FeedbackTone;
  readonly message: string;
}

export interface PlayerTotals {
  readonly totalXp: number;
  readonly totalCoins: number;
  readonly learningStreak: number;
}

export interface SubmitAttemptOutput {
  readonly success: true;
  readonly levelId: number;
  readonly passed: boolean;
  /** Rounded to two decimals. */
  readonly scorePercentage: number;
  readonly correctCount: number;
  readonly totalQuestions: number;
  readonly questions: readonly QuestionResult[];
  readonly starsEarned: number;
  /** Level rewards plus any test bonus; achievement rewards are listed separately. */
  readonly coinsEarned: number;
  readonly xpEarned: number;
  readonly newAchievements: readonly NewAchievement[];
  /** Id of the following level when this attempt unlocked it. */
  readonly nextLevelUnlocked: number | null;
  readonly attemptNumber: number;
  readonly attemptsRemaining: number;
  /** No earlier attempt on this level scored as high. */
  readonly newBestScore: boolean;
  /** Player level after this attempt, achievement XP included. */
  readonly playerLevel: number;
  readonly leveledUp: boolean;
  readonly feedback: AttemptFeedback;
  readonly totals: PlayerTotals;
}

// ─────────────────────────────────────────────────────────────────────────────
// Views
// ─────────────────────────────────────────────────────────────────────────────

export type RecommendationReason = 'next_in_sequence' | 'difficulty_match' | 'review_test';

export interface Recommendation {
  readonly levelId: number;
  readonly title: string;
  readonly kind: LevelKind;
  readonly difficulty: string;
  readonly score: number;
  readonly reasons: readonly RecommendationReason[];
}

export interface PlayerLevelDetail {
  readonly level: LevelView;
  readonly progress: LevelMapEntry;
}

export interface LevelHint {
  readonly levelId: number;
  readonly topic: string;
  readonly hint: string;
}

export type PerformanceTrend = 'improving' | 'stable' | 'declining' | 'insufficient_data';

export interface TopicPerformance {
  readonly topicId: string;
  readonly topic: string;
  readonly attempts: number;
  readonly averageScore: number;
  readonly bestScore: number;
  readonly trend: PerformanceTrend;
}

export interface DashboardProgress {
  readonly completedLevels: number;
  readonly totalLevels: number;
  readonly progressPercentage: number;
  readonly totalStars: number;
  readonly maxPossibleStars: number;
}

export interface Dashboard {
  readonly player: {
    readonly id: string;
    readonly username: string;
    readonly currentLevel: number;
    readonly playerLevel: number;
    readonly totalXp: number;
    readonly totalCoins: number;
    readonly learningStreak: number;
    readonly longestStreak: number;
  };
  readonly nextLevel: LevelMapEntry | null;
  readonly recommendations: readonly Recommendation[];
  readonly progress: DashboardProgress;
  /** Newest first. */
  readonly recentAttempts: readonly AttemptRecord[];
  readonly topicPerformance: readonly TopicPerformance[];
  readonly achievements: readonly AchievementProgress[];
}
