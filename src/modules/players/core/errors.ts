/**
 * Players Module - Domain Errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Database operation failed.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  /** True when the failure happened while writing a mutated record. */
  readonly writeFailed: boolean;
  readonly cause?: unknown;
}

export interface PlayerNotFoundError {
  readonly type: 'PlayerNotFoundError';
  readonly message: string;
  readonly playerId: string;
}

export interface UsernameTakenError {
  readonly type: 'UsernameTakenError';
  readonly message: string;
  readonly username: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

/** Errors any store operation on an existing player can produce. */
export type PlayerStoreError = DatabaseError | PlayerNotFoundError;

export type PlayerError = PlayerStoreError | UsernameTakenError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (
  message: string,
  cause?: unknown,
  writeFailed = false
): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  writeFailed,
  cause,
});

export const createPlayerNotFoundError = (playerId: string): PlayerNotFoundError => ({
  type: 'PlayerNotFoundError',
  message: `Player '${playerId}' not found`,
  playerId,
});

export const createUsernameTakenError = (username: string): UsernameTakenError => ({
  type: 'UsernameTakenError',
  message: `Username '${username}' is already taken`,
  username,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const PLAYER_ERROR_HTTP_STATUS: Record<PlayerError['type'], number> = {
  DatabaseError: 500,
  PlayerNotFoundError: 404,
  UsernameTakenError: 409,
};

export const getHttpStatusForError = (error: PlayerError): number => {
  return PLAYER_ERROR_HTTP_STATUS[error.type];
};
