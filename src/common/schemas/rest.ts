/**
 * Shared REST Schemas
 *
 * Envelope and parameter schemas used by every module's routes.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Params
// ─────────────────────────────────────────────────────────────────────────────

export const PlayerIdParamsSchema = Type.Object(
  {
    playerId: Type.String({ minLength: 1, maxLength: 100 }),
  },
  { additionalProperties: false }
);

export type PlayerIdParams = Static<typeof PlayerIdParamsSchema>;

export const PlayerLevelParamsSchema = Type.Object(
  {
    playerId: Type.String({ minLength: 1, maxLength: 100 }),
    levelId: Type.Integer({ minimum: 1 }),
  },
  { additionalProperties: false }
);

export type PlayerLevelParams = Static<typeof PlayerLevelParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Envelopes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Error response.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

/**
 * Builds the error envelope for a typed domain error.
 */
export const toErrorResponse = (error: { type: string; message: string }): ErrorResponse => ({
  ok: false,
  error: error.type,
  message: error.message,
});
