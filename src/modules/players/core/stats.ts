import { XP_PER_PLAYER_LEVEL, type Player, type PlayerStats } from './types.js';

const round2 = (value: number): number => Math.round(value * 100) / 100;

export const playerLevelFor = (totalXp: number): number =>
  Math.floor(totalXp / XP_PER_PLAYER_LEVEL) + 1;

/**
 * Rebuilds derived statistics from the attempt history. Nothing here is stored,
 * so counters can never drift from the log.
 */
export const derivePlayerStats = (player: Player, totalLevels: number): PlayerStats => {
  const levelStars: Record<string, number> = {};
  let scoreSum = 0;
  let perfectScores = 0;

  for (const record of player.performanceHistory) {
    scoreSum += record.scorePercentage;
    if (record.scorePercentage >= 100) {
      perfectScores++;
    }
    if (record.passed) {
      const key = String(record.levelId);
      levelStars[key] = Math.max(levelStars[key] ?? 0, record.stars);
    }
  }

  const totalAttempts = player.performanceHistory.length;
  const levelsCompleted = player.completedLevels.length;

  return {
    levelsCompleted,
    totalLevels,
    progressPercentage: totalLevels > 0 ? round2((levelsCompleted / totalLevels) * 100) : 0,
    levelStars,
    totalStars: Object.values(levelStars).reduce((sum, stars) => sum + stars, 0),
    averageScore: totalAttempts > 0 ? round2(scoreSum / totalAttempts) : 0,
    perfectScores,
    totalAttempts,
    achievementsCount: player.achievements.length,
    playerLevel: playerLevelFor(player.totalXp),
  };
};

/**
 * Best stars earned on one level, 0 when never passed.
 */
export const bestStarsFor = (player: Player, levelId: number): number =>
  player.performanceHistory.reduce(
    (best, record) =>
      record.levelId === levelId && record.passed ? Math.max(best, record.stars) : best,
    0
  );
