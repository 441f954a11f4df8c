/**
 * Player Repository - Kysely Implementation
 *
 * One row per player. Ranking counters are columns; the rest of the progress
 * record is stored as a JSONB document and validated with TypeBox when read.
 */

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { ok, err, type Result } from 'neverthrow';

import {
  createDatabaseError,
  createPlayerNotFoundError,
  createUsernameTakenError,
  type PlayerError,
  type PlayerStoreError,
} from '../../core/errors.js';

import type { PlayerMutation, PlayerRepository } from '../../core/ports.js';
import type { Player } from '../../core/types.js';
import type { GameDbClient, Players } from '@/infra/database/client.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Progress Document Schema
// ─────────────────────────────────────────────────────────────────────────────

const AttemptRecordSchema = Type.Object({
  levelId: Type.Integer({ minimum: 1 }),
  levelKind: Type.Union([Type.Literal('lesson'), Type.Literal('test'), Type.Literal('challenge')]),
  scorePercentage: Type.Number({ minimum: 0, maximum: 100 }),
  passed: Type.Boolean(),
  stars: Type.Integer({ minimum: 0, maximum: 3 }),
  attemptNumber: Type.Integer({ minimum: 1 }),
  occurredAt: Type.String(),
  timeTakenSeconds: Type.Union([Type.Number({ minimum: 0 }), Type.Null()]),
});

const EarnedAchievementSchema = Type.Object({
  achievementId: Type.String(),
  tier: Type.Union([
    Type.Literal('bronze'),
    Type.Literal('silver'),
    Type.Literal('gold'),
    Type.Literal('platinum'),
  ]),
  earnedAt: Type.String(),
  coins: Type.Integer({ minimum: 0 }),
  xp: Type.Integer({ minimum: 0 }),
});

const PlayerProgressSchema = Type.Object({
  completedLevels: Type.Array(Type.Integer({ minimum: 1 })),
  levelAttempts: Type.Record(Type.String(), Type.Integer({ minimum: 0 })),
  performanceHistory: Type.Array(AttemptRecordSchema),
  learningStreak: Type.Integer({ minimum: 0 }),
  longestStreak: Type.Integer({ minimum: 0 }),
  lastActivityDate: Type.Union([Type.String(), Type.Null()]),
  achievements: Type.Array(EarnedAchievementSchema),
  purchasedRewards: Type.Array(Type.String()),
});

const progressValidator = TypeCompiler.Compile(PlayerProgressSchema);

/** Postgres unique_violation */
const UNIQUE_VIOLATION = '23505';

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === UNIQUE_VIOLATION;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating the repository.
 */
export interface PlayerRepoOptions {
  db: GameDbClient;
  logger: Logger;
}

type PlayerRow = Selectable<Players>;

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyPlayerRepo implements PlayerRepository {
  private readonly db: GameDbClient;
  private readonly log: Logger;

  constructor(options: PlayerRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'player-repo' });
  }

  async create(player: Player): Promise<Result<Player, PlayerError>> {
    try {
      await this.db
        .insertInto('players')
        .values({
          id: player.id,
          username: player.username,
          current_level: player.currentLevel,
          total_xp: player.totalXp,
          total_coins: player.totalCoins,
          progress: this.serializeProgress(player),
          created_at: player.createdAt,
          last_active_at: player.lastActiveAt,
        })
        .execute();

      return ok(player);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err(createUsernameTakenError(player.username));
      }
      this.log.error({ err: error, playerId: player.id }, 'Failed to create player');
      return err(createDatabaseError('Failed to create player', error));
    }
  }

  async findById(playerId: string): Promise<Result<Player | null, PlayerStoreError>> {
    try {
      const row = await this.db
        .selectFrom('players')
        .selectAll()
        .where('id', '=', playerId)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      return this.mapRowToPlayer(row);
    } catch (error) {
      this.log.error({ err: error, playerId }, 'Failed to load player');
      return err(createDatabaseError('Failed to load player', error));
    }
  }

  async update<T, E>(
    playerId: string,
    mutation: PlayerMutation<T, E>
  ): Promise<Result<T, E | PlayerStoreError>> {
    const stage = { writing: false };

    try {
      return await this.db.transaction().execute(async (trx): Promise<Result<T, E | PlayerStoreError>> => {
        const row = await trx
          .selectFrom('players')
          .selectAll()
          .where('id', '=', playerId)
          .forUpdate()
          .executeTakeFirst();

        if (row === undefined) {
          return err(createPlayerNotFoundError(playerId));
        }

        const current = this.mapRowToPlayer(row);
        if (current.isErr()) {
          return err(current.error);
        }

        const mutated = mutation(current.value);
        if (mutated.isErr()) {
          return err(mutated.error);
        }

        const next = mutated.value.player;
        stage.writing = true;

        await trx
          .updateTable('players')
          .set({
            username: next.username,
            current_level: next.currentLevel,
            total_xp: next.totalXp,
            total_coins: next.totalCoins,
            progress: this.serializeProgress(next),
            last_active_at: next.lastActiveAt,
            updated_at: new Date(),
          })
          .where('id', '=', playerId)
          .execute();

        return ok(mutated.value.value);
      });
    } catch (error) {
      this.log.error({ err: error, playerId, writing: stage.writing }, 'Failed to update player');
      return err(
        createDatabaseError(
          stage.writing ? 'Failed to save player progress' : 'Failed to load player for update',
          error,
          stage.writing
        )
      );
    }
  }

  async listLeaderboard(limit: number): Promise<Result<Player[], PlayerStoreError>> {
    try {
      const rows = await this.db
        .selectFrom('players')
        .selectAll()
        .orderBy('total_xp', 'desc')
        .orderBy('created_at', 'asc')
        .limit(limit)
        .execute();

      const players: Player[] = [];
      for (const row of rows) {
        const mapped = this.mapRowToPlayer(row);
        if (mapped.isOk()) {
          players.push(mapped.value);
        }
      }

      return ok(players);
    } catch (error) {
      this.log.error({ err: error, limit }, 'Failed to list leaderboard');
      return err(createDatabaseError('Failed to list leaderboard', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Maps a database row to a player, rejecting a progress document that does
   * not match the schema.
   */
  private mapRowToPlayer(row: PlayerRow): Result<Player, PlayerStoreError> {
    const progress = row.progress;

    if (!progressValidator.Check(progress)) {
      const details = [...progressValidator.Errors(progress)].map(
        (e) => `${e.path}: ${e.message}`
      );
      this.log.error({ playerId: row.id, details }, 'Corrupt player progress document');
      return err(createDatabaseError(`Corrupt progress record for player '${row.id}'`, details));
    }

    return ok({
      id: row.id,
      username: row.username,
      createdAt: row.created_at.toISOString(),
      lastActiveAt: row.last_active_at.toISOString(),
      currentLevel: row.current_level,
      totalXp: row.total_xp,
      totalCoins: row.total_coins,
      ...progress,
    });
  }

  /**
   * Serializes the JSONB part of a player record.
   */
  private serializeProgress(player: Player): string {
    return JSON.stringify({
      completedLevels: player.completedLevels,
      levelAttempts: player.levelAttempts,
      performanceHistory: player.performanceHistory,
      learningStreak: player.learningStreak,
      longestStreak: player.longestStreak,
      lastActivityDate: player.lastActivityDate,
      achievements: player.achievements,
      purchasedRewards: player.purchasedRewards,
    });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Postgres-backed player repository.
 */
export const makePlayerRepo = (options: PlayerRepoOptions): PlayerRepository => {
  return new KyselyPlayerRepo(options);
};
