import { evaluateCondition, readStat } from './evaluator.js';
import { computeStatsSnapshot } from './stats.js';

import type { AchievementProgress } from './types.js';
import type { AchievementDefinition } from '../../catalog/index.js';
import type { Player } from '../../players/index.js';

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Progress towards each achievement. Hidden achievements are listed only
 * once earned.
 */
export const getAchievementProgress = (
  player: Player,
  definitions: readonly AchievementDefinition[]
): AchievementProgress[] => {
  const snapshot = computeStatsSnapshot(player);
  const earnedById = new Map(player.achievements.map((a) => [a.achievementId, a]));

  return definitions
    .filter((definition) => !definition.hidden || earnedById.has(definition.id))
    .map((definition) => {
      const earned = earnedById.get(definition.id);
      const { comparator, threshold } = definition.condition;
      const current = readStat(snapshot, definition.condition.stat) ?? 0;
      const satisfied = evaluateCondition(definition.condition, snapshot).unwrapOr(false);

      let percentage: number;
      if (earned !== undefined) {
        percentage = 100;
      } else if ((comparator === '>=' || comparator === '>') && threshold > 0) {
        percentage = Math.min(100, Math.floor((current / threshold) * 100));
      } else {
        percentage = satisfied ? 100 : 0;
      }

      return {
        id: definition.id,
        name: definition.name,
        description: definition.description,
        icon: definition.icon,
        tier: definition.tier,
        hidden: definition.hidden,
        earned: earned !== undefined,
        earnedAt: earned?.earnedAt ?? null,
        current: round2(current),
        target: threshold,
        percentage,
      };
    });
};
