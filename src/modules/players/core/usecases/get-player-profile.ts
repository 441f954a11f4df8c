/**
 * Get Player Profile Use Case
 *
 * Loads a player and recomputes derived statistics from the attempt history.
 */

import { err, ok, type Result } from 'neverthrow';

import { createPlayerNotFoundError, type PlayerStoreError } from '../errors.js';
import { derivePlayerStats } from '../stats.js';

import type { PlayerRepository } from '../ports.js';
import type { Player, PlayerStats } from '../types.js';
import type { GameCatalog } from '../../../catalog/index.js';

export interface GetPlayerProfileDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface GetPlayerProfileInput {
  playerId: string;
}

export interface PlayerProfile {
  player: Player;
  stats: PlayerStats;
}

export async function getPlayerProfile(
  deps: GetPlayerProfileDeps,
  input: GetPlayerProfileInput
): Promise<Result<PlayerProfile, PlayerStoreError>> {
  const found = await deps.repo.findById(input.playerId);
  if (found.isErr()) {
    return err(found.error);
  }

  const player = found.value;
  if (player === null) {
    return err(createPlayerNotFoundError(input.playerId));
  }

  return ok({
    player,
    stats: derivePlayerStats(player, deps.catalog.levels.length),
  });
}
