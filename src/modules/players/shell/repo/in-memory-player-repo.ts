/**
 * Player Repository - In-Memory Implementation
 *
 * Used when no database is configured, and by tests. Mutations run
 * synchronously between the read and the write, so per-player updates are
 * atomic without a lock.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createPlayerNotFoundError,
  createUsernameTakenError,
  type PlayerError,
  type PlayerStoreError,
} from '../../core/errors.js';

import type { PlayerMutation, PlayerRepository } from '../../core/ports.js';
import type { Player } from '../../core/types.js';

export interface InMemoryPlayerRepoOptions {
  /** Players to start with. */
  initialPlayers?: readonly Player[];
}

class InMemoryPlayerRepo implements PlayerRepository {
  private readonly players = new Map<string, Player>();

  constructor(options: InMemoryPlayerRepoOptions) {
    for (const player of options.initialPlayers ?? []) {
      this.players.set(player.id, player);
    }
  }

  create(player: Player): Promise<Result<Player, PlayerError>> {
    const wanted = player.username.toLowerCase();
    for (const existing of this.players.values()) {
      if (existing.username.toLowerCase() === wanted) {
        return Promise.resolve(err(createUsernameTakenError(player.username)));
      }
    }

    this.players.set(player.id, player);
    return Promise.resolve(ok(player));
  }

  findById(playerId: string): Promise<Result<Player | null, PlayerStoreError>> {
    return Promise.resolve(ok(this.players.get(playerId) ?? null));
  }

  update<T, E>(
    playerId: string,
    mutation: PlayerMutation<T, E>
  ): Promise<Result<T, E | PlayerStoreError>> {
    const current = this.players.get(playerId);
    if (current === undefined) {
      return Promise.resolve(err(createPlayerNotFoundError(playerId)));
    }

    const mutated = mutation(current);
    if (mutated.isErr()) {
      return Promise.resolve(err(mutated.error));
    }

    this.players.set(playerId, mutated.value.player);
    return Promise.resolve(ok(mutated.value.value));
  }

  listLeaderboard(limit: number): Promise<Result<Player[], PlayerStoreError>> {
    const ranked = [...this.players.values()]
      .sort((a, b) => b.totalXp - a.totalXp || a.createdAt.localeCompare(b.createdAt))
      .slice(0, limit);
    return Promise.resolve(ok(ranked));
  }
}

export const makeInMemoryPlayerRepo = (
  options: InMemoryPlayerRepoOptions = {}
): PlayerRepository => {
  return new InMemoryPlayerRepo(options);
};
