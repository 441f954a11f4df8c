/**
 * Reset Player Progress Use Case (administrative)
 */

import { ok, type Result } from 'neverthrow';

import { resetProgress } from '../player.js';

import type { PlayerStoreError } from '../errors.js';
import type { PlayerRepository } from '../ports.js';
import type { Player } from '../types.js';

export interface ResetPlayerProgressDeps {
  repo: PlayerRepository;
}

export interface ResetPlayerProgressInput {
  playerId: string;
  /** ISO timestamp */
  now: string;
}

/**
 * Clears a player's progression, XP, coins, streak and achievements.
 * Identity and purchased rewards are kept.
 */
export async function resetPlayerProgress(
  deps: ResetPlayerProgressDeps,
  input: ResetPlayerProgressInput
): Promise<Result<Player, PlayerStoreError>> {
  return deps.repo.update<Player, never>(input.playerId, (player) => {
    const reset = resetProgress(player, input.now);
    return ok({ player: reset, value: reset });
  });
}
