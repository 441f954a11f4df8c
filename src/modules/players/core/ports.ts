/**
 * Players Module - Ports (Interfaces)
 */

import type { PlayerError, PlayerStoreError } from './errors.js';
import type { Player } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Pure change to one player. Returning an error leaves the stored record untouched.
 */
export type PlayerMutation<T, E> = (player: Player) => Result<{ player: Player; value: T }, E>;

/**
 * Player Progress Store.
 *
 * Implementations guarantee that `update` is atomic per player: no other
 * update of the same player can interleave between its read and its write.
 */
export interface PlayerRepository {
  /**
   * Inserts a new player. Fails with UsernameTakenError on a duplicate username
   * (compared case-insensitively).
   */
  create(player: Player): Promise<Result<Player, PlayerError>>;

  /**
   * Returns null when no player has this id.
   */
  findById(playerId: string): Promise<Result<Player | null, PlayerStoreError>>;

  /**
   * Loads, mutates and saves a player as one unit.
   * A missing player yields PlayerNotFoundError; the mutation is not called.
   */
  update<T, E>(playerId: string, mutation: PlayerMutation<T, E>): Promise<Result<T, E | PlayerStoreError>>;

  /**
   * Players ordered by total XP (highest first), ties by registration time.
   */
  listLeaderboard(limit: number): Promise<Result<Player[], PlayerStoreError>>;
}
