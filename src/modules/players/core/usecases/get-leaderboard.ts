/**
 * Get Leaderboard Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { playerLevelFor } from '../stats.js';
import { DEFAULT_LEADERBOARD_LIMIT, MAX_LEADERBOARD_LIMIT, type LeaderboardEntry } from '../types.js';

import type { PlayerStoreError } from '../errors.js';
import type { PlayerRepository } from '../ports.js';

export interface GetLeaderboardDeps {
  repo: PlayerRepository;
}

export interface GetLeaderboardInput {
  limit?: number | undefined;
}

/**
 * Ranks players by total XP. The limit is clamped to 1..100.
 */
export async function getLeaderboard(
  deps: GetLeaderboardDeps,
  input: GetLeaderboardInput
): Promise<Result<LeaderboardEntry[], PlayerStoreError>> {
  const limit = Math.min(
    Math.max(1, Math.floor(input.limit ?? DEFAULT_LEADERBOARD_LIMIT)),
    MAX_LEADERBOARD_LIMIT
  );

  const result = await deps.repo.listLeaderboard(limit);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok(
    result.value.map((player, index) => ({
      rank: index + 1,
      playerId: player.id,
      username: player.username,
      totalXp: player.totalXp,
      playerLevel: playerLevelFor(player.totalXp),
      levelsCompleted: player.completedLevels.length,
      achievementsCount: player.achievements.length,
    }))
  );
}
