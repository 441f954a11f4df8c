/**
 * Achievements REST Routes
 */

import { AchievementProgressResponseSchema } from './schemas.js';
import {
  ErrorResponseSchema,
  PlayerIdParamsSchema,
  toErrorResponse,
  type PlayerIdParams,
} from '../../../../common/schemas/rest.js';
import { getHttpStatusForError } from '../../../players/index.js';
import { listAchievementProgress } from '../../core/usecases/list-achievement-progress.js';

import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeAchievementRoutesDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export const makeAchievementRoutes = (deps: MakeAchievementRoutesDeps): FastifyPluginAsync => {
  const { repo, catalog } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/players/:playerId/achievements - Progress per achievement
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: PlayerIdParams }>(
      '/api/v1/players/:playerId/achievements',
      {
        schema: {
          params: PlayerIdParamsSchema,
          response: {
            200: AchievementProgressResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await listAchievementProgress(
          { repo, catalog },
          { playerId: request.params.playerId }
        );

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
