/**
 * Per-player views over the catalog: level map, single level, next level and
 * recommendations.
 */

import {
  attemptsRemainingFor,
  isLevelAvailable,
  levelStateFor,
} from './rules.js';
import {
  DEFAULT_RECENT_AVERAGE,
  DEFAULT_RECOMMENDATION_COUNT,
  RECENT_KIND_WINDOW,
  RECENT_SCORE_WINDOW,
  type LevelMapEntry,
  type Recommendation,
  type RecommendationReason,
} from './types.js';
import { allLevels, getLevel, toLevelView } from '../../catalog/index.js';
import { bestStarsFor, getAttemptCount, hasCompletedLevel } from '../../players/index.js';

import type { GameCatalog, Level, LevelView } from '../../catalog/index.js';
import type { Player } from '../../players/index.js';

export const toLevelMapEntry = (level: Level, player: Player, maxRetries: number): LevelMapEntry => ({
  id: level.id,
  kind: level.kind,
  title: level.title,
  topic: level.topic,
  difficulty: level.difficulty,
  completed: hasCompletedLevel(player, level.id),
  unlocked: isLevelAvailable(level, player),
  state: levelStateFor(level, player, maxRetries),
  stars: bestStarsFor(player, level.id),
  attempts: getAttemptCount(player, level.id),
  attemptsRemaining: attemptsRemainingFor(player, level.id, maxRetries),
  passingScore: level.passingScore,
  rewards: level.rewards,
});

export const getLevelMap = (catalog: GameCatalog, player: Player): LevelMapEntry[] =>
  allLevels(catalog).map((level) => toLevelMapEntry(level, player, catalog.rules.maxRetries));

/**
 * The level without answers, or null when it does not exist or is locked.
 */
export const getLevelView = (catalog: GameCatalog, player: Player, id: number): LevelView | null => {
  const level = getLevel(catalog, id);
  if (level === null || !isLevelAvailable(level, player)) {
    return null;
  }
  return toLevelView(level);
};

/**
 * Available, not completed, with attempts left.
 */
const isPlayable = (level: Level, player: Player, maxRetries: number): boolean =>
  !hasCompletedLevel(player, level.id) &&
  isLevelAvailable(level, player) &&
  attemptsRemainingFor(player, level.id, maxRetries) > 0;

export const nextAvailableLevel = (catalog: GameCatalog, player: Player): Level | null =>
  allLevels(catalog).find((level) => isPlayable(level, player, catalog.rules.maxRetries)) ?? null;

const preferredDifficulties = (averageScore: number): readonly string[] => {
  if (averageScore >= 90) {
    return ['Advanced', 'Expert'];
  }
  if (averageScore >= 70) {
    return ['Intermediate', 'Advanced'];
  }
  return ['Beginner', 'Easy'];
};

/**
 * Ranks playable levels: the next one in sequence first, then levels matching
 * the player's recent scores, then tests after lesson practice.
 */
export const recommendLevels = (
  catalog: GameCatalog,
  player: Player,
  count: number = DEFAULT_RECOMMENDATION_COUNT
): Recommendation[] => {
  const history = player.performanceHistory;
  const recentScores = history.slice(-RECENT_SCORE_WINDOW).map((r) => r.scorePercentage);
  const averageScore =
    recentScores.length > 0
      ? recentScores.reduce((sum, s) => sum + s, 0) / recentScores.length
      : DEFAULT_RECENT_AVERAGE;
  const preferred = preferredDifficulties(averageScore);
  const practisedLessons = history.slice(-RECENT_KIND_WINDOW).some((r) => r.levelKind === 'lesson');
  const nextInSequence = Math.max(0, ...player.completedLevels) + 1;

  return allLevels(catalog)
    .filter((level) => isPlayable(level, player, catalog.rules.maxRetries))
    .map((level): Recommendation => {
      const reasons: RecommendationReason[] = [];
      let score = 0;

      if (level.id === nextInSequence) {
        score += 100;
        reasons.push('next_in_sequence');
      }
      if (preferred.includes(level.difficulty)) {
        score += 50;
        reasons.push('difficulty_match');
      }
      if (level.kind === 'test' && practisedLessons) {
        score += 30;
        reasons.push('review_test');
      }

      return {
        levelId: level.id,
        title: level.title,
        kind: level.kind,
        difficulty: level.difficulty,
        score,
        reasons,
      };
    })
    .sort((a, b) => b.score - a.score || a.levelId - b.levelId)
    .slice(0, Math.max(0, count));
};
