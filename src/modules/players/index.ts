/**
 * Players Module - Public API
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AttemptRecord,
  EarnedAchievement,
  LeaderboardEntry,
  Player,
  PlayerStats,
} from './core/types.js';

export {
  DEFAULT_LEADERBOARD_LIMIT,
  MAX_LEADERBOARD_LIMIT,
  USERNAME_PATTERN,
  XP_PER_PLAYER_LEVEL,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  DatabaseError,
  PlayerError,
  PlayerNotFoundError,
  PlayerStoreError,
  UsernameTakenError,
} from './core/errors.js';

export {
  createDatabaseError,
  createPlayerNotFoundError,
  createUsernameTakenError,
  getHttpStatusForError,
  PLAYER_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { PlayerMutation, PlayerRepository } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export {
  createPlayer,
  getAttemptCount,
  hasAchievement,
  hasCompletedLevel,
  resetProgress,
  type NewPlayerInput,
} from './core/player.js';

export { bestStarsFor, derivePlayerStats, playerLevelFor } from './core/stats.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  registerPlayer,
  type RegisterPlayerDeps,
  type RegisterPlayerInput,
} from './core/usecases/register-player.js';

export {
  getPlayerProfile,
  type GetPlayerProfileDeps,
  type GetPlayerProfileInput,
  type PlayerProfile,
} from './core/usecases/get-player-profile.js';

export {
  getLeaderboard,
  type GetLeaderboardDeps,
  type GetLeaderboardInput,
} from './core/usecases/get-leaderboard.js';

export {
  resetPlayerProgress,
  type ResetPlayerProgressDeps,
  type ResetPlayerProgressInput,
} from './core/usecases/reset-player-progress.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository
// ─────────────────────────────────────────────────────────────────────────────

export { makePlayerRepo, type PlayerRepoOptions } from './shell/repo/kysely-player-repo.js';
export {
  makeInMemoryPlayerRepo,
  type InMemoryPlayerRepoOptions,
} from './shell/repo/in-memory-player-repo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST & GraphQL
// ─────────────────────────────────────────────────────────────────────────────

export { makePlayerRoutes, type MakePlayerRoutesDeps } from './shell/rest/routes.js';
export { makePlayerResolvers, type MakePlayerResolversDeps } from './shell/graphql/resolvers.js';
export { schema as PlayerSchema } from './shell/graphql/schema.js';
