/**
 * Achievement Evaluator
 *
 * Conditions are data: a stat name, a comparator and a threshold, looked up
 * against a typed snapshot. Nothing is evaluated as code.
 */

import { err, ok, type Result } from 'neverthrow';

import { createUnknownStatError, type UnknownStatError } from './errors.js';
import { computeStatsSnapshot } from './stats.js';
import { isAchievementStat, type NewAchievement, type StatsSnapshot } from './types.js';

import type {
  AchievementCondition,
  AchievementDefinition,
  AchievementTier,
  Comparator,
  RewardAmount,
} from '../../catalog/index.js';
import type { Player } from '../../players/index.js';

const compare = (value: number, comparator: Comparator, threshold: number): boolean => {
  switch (comparator) {
    case '>=':
      return value >= threshold;
    case '>':
      return value > threshold;
    case '==':
      return value === threshold;
    case '<=':
      return value <= threshold;
    case '<':
      return value < threshold;
  }
};

/**
 * Reads a stat from the snapshot, or null when the name is not a known stat.
 */
export const readStat = (snapshot: StatsSnapshot, stat: string): number | null =>
  isAchievementStat(stat) ? snapshot[stat] : null;

export const evaluateCondition = (
  condition: AchievementCondition,
  snapshot: StatsSnapshot
): Result<boolean, UnknownStatError> => {
  const value = readStat(snapshot, condition.stat);
  if (value === null) {
    return err(createUnknownStatError(condition.stat));
  }
  return ok(compare(value, condition.comparator, condition.threshold));
};

export interface CheckNewAchievementsResult {
  earned: NewAchievement[];
  /** Definitions that could not be evaluated. */
  skipped: UnknownStatError[];
}

/**
 * Finds achievements the player now satisfies but does not hold yet.
 */
export const checkNewAchievements = (
  player: Player,
  definitions: readonly AchievementDefinition[],
  tierRewards: Readonly<Record<AchievementTier, RewardAmount>>,
  now: string
): CheckNewAchievementsResult => {
  const snapshot = computeStatsSnapshot(player);
  const held = new Set(player.achievements.map((a) => a.achievementId));
  const earned: NewAchievement[] = [];
  const skipped: UnknownStatError[] = [];

  for (const definition of definitions) {
    if (held.has(definition.id)) {
      continue;
    }

    const satisfied = evaluateCondition(definition.condition, snapshot);
    if (satisfied.isErr()) {
      skipped.push(createUnknownStatError(definition.condition.stat, definition.id));
      continue;
    }

    if (satisfied.value) {
      const reward = tierRewards[definition.tier];
      earned.push({
        achievementId: definition.id,
        name: definition.name,
        tier: definition.tier,
        coins: reward.coins,
        xp: reward.xp,
        earnedAt: now,
      });
    }
  }

  return { earned, skipped };
};

/**
 * Adds achievements the player does not hold yet and credits their rewards.
 * Applying the same list twice changes nothing the second time.
 */
export const awardAchievements = (player: Player, earned: readonly NewAchievement[]): Player => {
  const held = new Set(player.achievements.map((a) => a.achievementId));
  const fresh = earned.filter((achievement) => {
    if (held.has(achievement.achievementId)) {
      return false;
    }
    held.add(achievement.achievementId);
    return true;
  });

  if (fresh.length === 0) {
    return player;
  }

  return {
    ...player,
    achievements: [
      ...player.achievements,
      ...fresh.map(({ achievementId, tier, earnedAt, coins, xp }) => ({
        achievementId,
        tier,
        earnedAt,
        coins,
        xp,
      })),
    ],
    totalCoins: player.totalCoins + fresh.reduce((sum, a) => sum + a.coins, 0),
    totalXp: player.totalXp + fresh.reduce((sum, a) => sum + a.xp, 0),
  };
};
