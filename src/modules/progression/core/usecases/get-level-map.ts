/**
 * Get Level Map Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { loadPlayer } from './load-player.js';
import { getLevelMap as buildLevelMap } from '../level-map.js';

import type { LevelMapEntry } from '../types.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository, PlayerStoreError } from '../../../players/index.js';

export interface GetLevelMapDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface GetLevelMapInput {
  playerId: string;
}

/**
 * Every level in catalog order with the player's state on it.
 */
export async function getLevelMap(
  deps: GetLevelMapDeps,
  input: GetLevelMapInput
): Promise<Result<LevelMapEntry[], PlayerStoreError>> {
  const player = await loadPlayer(deps.repo, input.playerId);
  if (player.isErr()) {
    return err(player.error);
  }

  return ok(buildLevelMap(deps.catalog, player.value));
}
