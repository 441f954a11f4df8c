/**
 * Get Dashboard Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { loadPlayer } from './load-player.js';
import { getAchievementProgress } from '../../../achievements/index.js';
import { MAX_STARS } from '../../../catalog/index.js';
import { derivePlayerStats } from '../../../players/index.js';
import { nextAvailableLevel, recommendLevels, toLevelMapEntry } from '../level-map.js';
import { getTopicPerformance } from '../topic-performance.js';
import { DASHBOARD_RECENT_ATTEMPTS, type Dashboard } from '../types.js';

import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository, PlayerStoreError } from '../../../players/index.js';

export interface GetDashboardDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface GetDashboardInput {
  playerId: string;
}

export async function getDashboard(
  deps: GetDashboardDeps,
  input: GetDashboardInput
): Promise<Result<Dashboard, PlayerStoreError>> {
  const { catalog } = deps;

  const loaded = await loadPlayer(deps.repo, input.playerId);
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  const player = loaded.value;
  const stats = derivePlayerStats(player, catalog.levels.length);
  const next = nextAvailableLevel(catalog, player);

  return ok({
    player: {
      id: player.id,
      username: player.username,
      currentLevel: player.currentLevel,
      playerLevel: stats.playerLevel,
      totalXp: player.totalXp,
      totalCoins: player.totalCoins,
      learningStreak: player.learningStreak,
      longestStreak: player.longestStreak,
    },
    nextLevel: next === null ? null : toLevelMapEntry(next, player, catalog.rules.maxRetries),
    recommendations: recommendLevels(catalog, player),
    progress: {
      completedLevels: stats.levelsCompleted,
      totalLevels: stats.totalLevels,
      progressPercentage: stats.progressPercentage,
      totalStars: stats.totalStars,
      maxPossibleStars: stats.levelsCompleted * MAX_STARS,
    },
    recentAttempts: player.performanceHistory.slice(-DASHBOARD_RECENT_ATTEMPTS).reverse(),
    topicPerformance: getTopicPerformance(catalog, player),
    achievements: getAchievementProgress(player, catalog.achievements),
  });
}
