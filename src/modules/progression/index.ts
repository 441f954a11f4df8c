/**
 * Progression Module - Public API
 *
 * Level availability, attempts, rewards, streaks and per-player level views.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AttemptContext,
  AttemptFeedback,
  AttemptOutcome,
  Dashboard,
  DashboardProgress,
  FeedbackTone,
  LevelHint,
  LevelMapEntry,
  LevelState,
  PerformanceTrend,
  PlayerLevelDetail,
  PlayerTotals,
  Recommendation,
  RecommendationReason,
  SubmitAttemptOutput,
  TopicPerformance,
} from './core/types.js';

export {
  ALMOST_MARGIN,
  STAR_THRESHOLDS,
  TREND_MARGIN,
  TREND_RECENT_WINDOW,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AttemptRejection,
  LevelNotAvailableError,
  LevelNotFoundError,
  ProgressionError,
  ProgressNotSavedError,
  RetryLimitExceededError,
} from './core/errors.js';

export {
  createLevelNotAvailableError,
  createLevelNotFoundError,
  createProgressNotSavedError,
  createRetryLimitExceededError,
  getHttpStatusForError,
  PROGRESSION_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Rules (Pure Functions)
// ─────────────────────────────────────────────────────────────────────────────

export {
  applyAttempt,
  attemptsRemainingFor,
  canAttempt,
  computeStars,
  evaluateAttempt,
  isLevelAvailable,
  isNewBestScore,
  levelStateFor,
  missingPrerequisites,
  type AppliedAttempt,
  type ApplyAttemptContext,
} from './core/rules.js';

export { updateStreak, utcDateOf, type StreakState } from './core/streak.js';

export {
  getLevelMap as buildLevelMap,
  getLevelView,
  nextAvailableLevel,
  recommendLevels,
  toLevelMapEntry,
} from './core/level-map.js';

export { buildAttemptFeedback, feedbackToneFor } from './core/feedback.js';
export { hintFor } from './core/hints.js';
export { getTopicPerformance, trendOf } from './core/topic-performance.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  submitAttempt,
  type SubmitAttemptDeps,
  type SubmitAttemptInput,
  type SubmitAttemptResult,
} from './core/usecases/submit-attempt.js';

export {
  getLevelMap,
  type GetLevelMapDeps,
  type GetLevelMapInput,
} from './core/usecases/get-level-map.js';

export {
  getPlayerLevel,
  type GetPlayerLevelDeps,
  type GetPlayerLevelError,
  type GetPlayerLevelInput,
} from './core/usecases/get-player-level.js';

export {
  getLevelHint,
  type GetLevelHintDeps,
  type GetLevelHintInput,
} from './core/usecases/get-level-hint.js';

export {
  getDashboard,
  type GetDashboardDeps,
  type GetDashboardInput,
} from './core/usecases/get-dashboard.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST & GraphQL
// ─────────────────────────────────────────────────────────────────────────────

export { makeProgressionRoutes, type MakeProgressionRoutesDeps } from './shell/rest/routes.js';
export {
  makeProgressionResolvers,
  type MakeProgressionResolversDeps,
} from './shell/graphql/resolvers.js';
export { schema as ProgressionSchema } from './shell/graphql/schema.js';
