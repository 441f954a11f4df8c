/**
 * Shop REST Routes
 */

import {
  PurchaseBodySchema,
  PurchaseErrorResponseSchema,
  PurchaseResponseSchema,
  ShopListingResponseSchema,
  type PurchaseBody,
} from './schemas.js';
import {
  ErrorResponseSchema,
  PlayerIdParamsSchema,
  toErrorResponse,
  type PlayerIdParams,
} from '../../../../common/schemas/rest.js';
import { getHttpStatusForError, type PurchaseError } from '../../core/errors.js';
import { getShop } from '../../core/usecases/get-shop.js';
import { purchaseShopReward } from '../../core/usecases/purchase-shop-reward.js';

import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeShopRoutesDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

const toPurchaseErrorResponse = (error: PurchaseError) =>
  'reason' in error ? { ...toErrorResponse(error), reason: error.reason } : toErrorResponse(error);

export const makeShopRoutes = (deps: MakeShopRoutesDeps): FastifyPluginAsync => {
  const { repo, catalog } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/players/:playerId/shop - Rewards with ownership
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: PlayerIdParams }>(
      '/api/v1/players/:playerId/shop',
      {
        schema: {
          params: PlayerIdParamsSchema,
          response: {
            200: ShopListingResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getShop({ repo, catalog }, { playerId: request.params.playerId });

        if (result.isErr()) {
          return reply.status(getHttpStatusForError(result.error)).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/players/:playerId/purchases - Buy a reward
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: PlayerIdParams; Body: PurchaseBody }>(
      '/api/v1/players/:playerId/purchases',
      {
        schema: {
          params: PlayerIdParamsSchema,
          body: PurchaseBodySchema,
          response: {
            200: PurchaseResponseSchema,
            404: PurchaseErrorResponseSchema,
            409: PurchaseErrorResponseSchema,
            500: PurchaseErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { playerId } = request.params;
        const { rewardId } = request.body;

        const result = await purchaseShopReward({ repo, catalog }, { playerId, rewardId });

        if (result.isErr()) {
          return reply
            .status(getHttpStatusForError(result.error))
            .send(toPurchaseErrorResponse(result.error));
        }

        request.log.info(
          { playerId, rewardId, remainingCoins: result.value.remainingCoins },
          'Reward purchased'
        );
        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
