/**
 * Progression REST Routes
 *
 * Level map, single level, hints, attempt submission and dashboard for one player.
 * Routes here validate with TypeBox, so request bodies are never coerced.
 */

import {
  DashboardResponseSchema,
  LevelHintResponseSchema,
  LevelMapResponseSchema,
  PlayerLevelResponseSchema,
  ProgressNotSavedResponseSchema,
  SubmitAttemptBodySchema,
  SubmitAttemptResponseSchema,
  type SubmitAttemptBody,
} from './schemas.js';
import {
  ErrorResponseSchema,
  PlayerIdParamsSchema,
  PlayerLevelParamsSchema,
  toErrorResponse,
  type PlayerIdParams,
  type PlayerLevelParams,
} from '../../../../common/schemas/rest.js';
import { typeBoxValidatorCompiler } from '../../../../common/schemas/validator.js';
import { getHttpStatusForError, type ProgressionError } from '../../core/errors.js';
import { getDashboard } from '../../core/usecases/get-dashboard.js';
import { getLevelHint } from '../../core/usecases/get-level-hint.js';
import { getLevelMap } from '../../core/usecases/get-level-map.js';
import { getPlayerLevel } from '../../core/usecases/get-player-level.js';
import { submitAttempt } from '../../core/usecases/submit-attempt.js';

import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';
import type { SyntaxChecker } from '../../../scoring/index.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeProgressionRoutesDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
  syntaxChecker: SyntaxChecker;
  now: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Error body for a failed submission. An unsaved attempt still reports its score.
 */
const toAttemptErrorResponse = (error: ProgressionError) =>
  error.type === 'ProgressNotSavedError'
    ? {
        ...toErrorResponse(error),
        scorePercentage: error.scorePercentage,
        passed: error.passed,
      }
    : toErrorResponse(error);

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeProgressionRoutes = (deps: MakeProgressionRoutesDeps): FastifyPluginAsync => {
  const { repo, catalog, syntaxChecker, now } = deps;

  return async (fastify) => {
    fastify.setValidatorCompiler(typeBoxValidatorCompiler);

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/players/:playerId/levels - Level map
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: PlayerIdParams }>(
      '/api/v1/players/:playerId/levels',
      {
        schema: {
          params: PlayerIdParamsSchema,
          response: {
            200: LevelMapResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getLevelMap({ repo, catalog }, { playerId: request.params.playerId });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/players/:playerId/levels/:levelId - One unlocked level
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: PlayerLevelParams }>(
      '/api/v1/players/:playerId/levels/:levelId',
      {
        schema: {
          params: PlayerLevelParamsSchema,
          response: {
            200: PlayerLevelResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { playerId, levelId } = request.params;
        const result = await getPlayerLevel({ repo, catalog }, { playerId, levelId });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/players/:playerId/levels/:levelId/hint - Topic hint
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: PlayerLevelParams }>(
      '/api/v1/players/:playerId/levels/:levelId/hint',
      {
        schema: {
          params: PlayerLevelParamsSchema,
          response: {
            200: LevelHintResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { playerId, levelId } = request.params;
        const result = await getLevelHint({ repo, catalog }, { playerId, levelId });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        request.log.info({ playerId, levelId }, 'Hint requested');
        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/players/:playerId/levels/:levelId/attempts - Submit answers
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: PlayerLevelParams; Body: SubmitAttemptBody }>(
      '/api/v1/players/:playerId/levels/:levelId/attempts',
      {
        schema: {
          params: PlayerLevelParamsSchema,
          body: SubmitAttemptBodySchema,
          response: {
            200: SubmitAttemptResponseSchema,
            400: ErrorResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            409: ErrorResponseSchema,
            500: ProgressNotSavedResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { playerId, levelId } = request.params;
        const { answers, timeTakenSeconds } = request.body;

        const result = await submitAttempt(
          { repo, catalog, syntaxChecker },
          {
            playerId,
            levelId,
            answers,
            timeTakenSeconds: timeTakenSeconds ?? null,
            now: now().toISOString(),
          }
        );

        if (result.isErr()) {
          const error = result.error;
          if (error.type === 'ProgressNotSavedError' || error.type === 'DatabaseError') {
            request.log.error({ err: error, playerId, levelId }, error.message);
          }
          return reply.status(getHttpStatusForError(error)).send(toAttemptErrorResponse(error));
        }

        const { output, warnings } = result.value;
        for (const warning of warnings) {
          request.log.warn({ warning }, warning.message);
        }

        request.log.info(
          {
            playerId,
            levelId,
            passed: output.passed,
            scorePercentage: output.scorePercentage,
            attemptNumber: output.attemptNumber,
          },
          'Attempt recorded'
        );

        return reply.status(200).send({ ok: true, data: output });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/players/:playerId/dashboard - Progress overview
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: PlayerIdParams }>(
      '/api/v1/players/:playerId/dashboard',
      {
        schema: {
          params: PlayerIdParamsSchema,
          response: {
            200: DashboardResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getDashboard({ repo, catalog }, { playerId: request.params.playerId });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
