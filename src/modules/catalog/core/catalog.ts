/**
 * Read-only catalog lookups. Unknown ids yield null, never an exception:
 * "the level after the last one" is a normal question for callers to ask.
 */

import type {
  AchievementDefinition,
  GameCatalog,
  Level,
  LevelView,
  QuestionView,
  ShopReward,
} from './types.js';

export const getLevel = (catalog: GameCatalog, id: number): Level | null =>
  catalog.levelsById.get(id) ?? null;

export const allLevels = (catalog: GameCatalog): readonly Level[] => catalog.levels;

export const getAchievementDefinitions = (
  catalog: GameCatalog
): readonly AchievementDefinition[] => catalog.achievements;

export const getShopReward = (catalog: GameCatalog, id: string): ShopReward | null =>
  catalog.shopRewards.find((reward) => reward.id === id) ?? null;

/**
 * Strips correct answers and expected concepts from a level.
 */
export const toLevelView = (level: Level): LevelView => ({
  id: level.id,
  kind: level.kind,
  title: level.title,
  topic: level.topic,
  difficulty: level.difficulty,
  passingScore: level.passingScore,
  rewards: level.rewards,
  prerequisites: level.prerequisites,
  questions: level.questions.map(
    (question, index): QuestionView =>
      question.kind === 'multiple_choice'
        ? { index, kind: 'multiple_choice', text: question.text, options: question.options }
        : { index, kind: 'code', text: question.text, starterCode: question.starterCode }
  ),
});

export interface RuleOverrides {
  maxRetries?: number | undefined;
}

/**
 * Deployment-level overrides of the rules read from course content.
 * Unset fields keep the content's value.
 */
export const applyRuleOverrides = (catalog: GameCatalog, overrides: RuleOverrides): GameCatalog => {
  if (overrides.maxRetries === undefined) {
    return catalog;
  }
  return { ...catalog, rules: { ...catalog.rules, maxRetries: overrides.maxRetries } };
};
