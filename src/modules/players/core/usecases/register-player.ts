/**
 * Register Player Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { createPlayer } from '../player.js';

import type { PlayerError } from '../errors.js';
import type { PlayerRepository } from '../ports.js';
import type { Player } from '../types.js';

export interface RegisterPlayerDeps {
  repo: PlayerRepository;
  generateId: () => string;
}

export interface RegisterPlayerInput {
  username: string;
  /** ISO timestamp */
  now: string;
}

/**
 * Creates and stores a player with default progress.
 */
export async function registerPlayer(
  deps: RegisterPlayerDeps,
  input: RegisterPlayerInput
): Promise<Result<Player, PlayerError>> {
  const player = createPlayer({ id: deps.generateId(), username: input.username, now: input.now });

  const result = await deps.repo.create(player);
  if (result.isErr()) {
    return err(result.error);
  }

  return ok(result.value);
}
