/**
 * Achievements Module - Public API
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AchievementProgress,
  AchievementStat,
  NewAchievement,
  StatsSnapshot,
} from './core/types.js';

export { ACHIEVEMENT_STATS, FAST_COMPLETION_SECONDS, isAchievementStat } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { AchievementError, UnknownStatError } from './core/errors.js';

export { createUnknownStatError, ACHIEVEMENT_ERROR_HTTP_STATUS } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export { computeStatsSnapshot } from './core/stats.js';

export {
  awardAchievements,
  checkNewAchievements,
  evaluateCondition,
  readStat,
  type CheckNewAchievementsResult,
} from './core/evaluator.js';

export { getAchievementProgress } from './core/progress.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  listAchievementProgress,
  type ListAchievementProgressDeps,
  type ListAchievementProgressInput,
} from './core/usecases/list-achievement-progress.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST
// ─────────────────────────────────────────────────────────────────────────────

export { makeAchievementRoutes, type MakeAchievementRoutesDeps } from './shell/rest/routes.js';
