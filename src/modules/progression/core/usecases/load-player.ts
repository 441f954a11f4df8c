import { err, ok, type Result } from 'neverthrow';

import { createPlayerNotFoundError } from '../../../players/index.js';

import type { Player, PlayerRepository, PlayerStoreError } from '../../../players/index.js';

/**
 * Loads a player, turning a missing record into PlayerNotFoundError.
 */
export async function loadPlayer(
  repo: PlayerRepository,
  playerId: string
): Promise<Result<Player, PlayerStoreError>> {
  const found = await repo.findById(playerId);
  if (found.isErr()) {
    return err(found.error);
  }
  if (found.value === null) {
    return err(createPlayerNotFoundError(playerId));
  }
  return ok(found.value);
}
