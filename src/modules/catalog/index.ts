/**
 * Catalog Module - Public API
 *
 * Immutable course content: levels, achievement definitions and shop rewards.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AchievementCondition,
  AchievementDefinition,
  AchievementsFileDTO,
  AchievementTier,
  CatalogContent,
  CodeQuestion,
  Comparator,
  CourseFileDTO,
  GameCatalog,
  Level,
  LevelKind,
  LevelRewards,
  LevelView,
  MultipleChoiceQuestion,
  ProgressionRules,
  ProgressionSettings,
  Question,
  QuestionView,
  RewardAmount,
  ShopFileDTO,
  ShopReward,
  ShopRewardCategory,
} from './core/types.js';

export { FALLBACK_HINT, MAX_STARS } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { CatalogIssue, CatalogLoadError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export { buildCatalog, type BuildCatalogResult } from './core/build-catalog.js';

export {
  getLevel,
  allLevels,
  getAchievementDefinitions,
  getShopReward,
  toLevelView,
  applyRuleOverrides,
  type RuleOverrides,
} from './core/catalog.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { loadCatalog, type CatalogLoaderOptions } from './shell/repo/fs-catalog-loader.js';
export { makeCatalogResolvers, type MakeCatalogResolversDeps } from './shell/graphql/resolvers.js';
export { schema as CatalogSchema } from './shell/graphql/schema.js';
