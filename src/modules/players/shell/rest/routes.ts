/**
 * Players REST Routes
 *
 * Registration, profile, leaderboard and the administrative progress reset.
 */

import {
  AdminHeadersSchema,
  LeaderboardQuerySchema,
  LeaderboardResponseSchema,
  PlayerProfileResponseSchema,
  RegisterPlayerBodySchema,
  RegisterPlayerResponseSchema,
  type AdminHeaders,
  type LeaderboardQuery,
  type RegisterPlayerBody,
} from './schemas.js';
import {
  ErrorResponseSchema,
  PlayerIdParamsSchema,
  toErrorResponse,
  type PlayerIdParams,
} from '../../../../common/schemas/rest.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { getLeaderboard } from '../../core/usecases/get-leaderboard.js';
import { getPlayerProfile } from '../../core/usecases/get-player-profile.js';
import { registerPlayer } from '../../core/usecases/register-player.js';
import { resetPlayerProgress } from '../../core/usecases/reset-player-progress.js';

import type { PlayerRepository } from '../../core/ports.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakePlayerRoutesDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
  generateId: () => string;
  now: () => Date;
  /** When unset the admin reset route is not registered. */
  adminApiKey?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makePlayerRoutes = (deps: MakePlayerRoutesDeps): FastifyPluginAsync => {
  const { repo, catalog, generateId, now, adminApiKey } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/players - Register a player
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: RegisterPlayerBody }>(
      '/api/v1/players',
      {
        schema: {
          body: RegisterPlayerBodySchema,
          response: {
            201: RegisterPlayerResponseSchema,
            409: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await registerPlayer(
          { repo, generateId },
          { username: request.body.username, now: now().toISOString() }
        );

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        request.log.info({ playerId: result.value.id }, 'Player registered');
        return reply.status(201).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/players/:playerId - Profile with derived statistics
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: PlayerIdParams }>(
      '/api/v1/players/:playerId',
      {
        schema: {
          params: PlayerIdParamsSchema,
          response: {
            200: PlayerProfileResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getPlayerProfile(
          { repo, catalog },
          { playerId: request.params.playerId }
        );

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/leaderboard - Players ranked by XP
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: LeaderboardQuery }>(
      '/api/v1/leaderboard',
      {
        schema: {
          querystring: LeaderboardQuerySchema,
          response: {
            200: LeaderboardResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getLeaderboard({ repo }, { limit: request.query.limit });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    if (adminApiKey === undefined || adminApiKey === '') {
      return;
    }

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/admin/players/:playerId/reset-progress - Administrative reset
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: PlayerIdParams; Headers: AdminHeaders }>(
      '/api/v1/admin/players/:playerId/reset-progress',
      {
        schema: {
          params: PlayerIdParamsSchema,
          headers: AdminHeadersSchema,
          response: {
            200: RegisterPlayerResponseSchema,
            401: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (request.headers['x-admin-key'] !== adminApiKey) {
          return reply.status(401).send({
            ok: false,
            error: 'Unauthorized',
            message: 'A valid x-admin-key header is required',
          });
        }

        const { playerId } = request.params;
        const result = await resetPlayerProgress({ repo }, { playerId, now: now().toISOString() });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        request.log.warn({ playerId }, 'Player progress reset');
        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
