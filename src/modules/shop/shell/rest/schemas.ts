/**
 * Shop REST API Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

export const PurchaseBodySchema = Type.Object(
  {
    rewardId: Type.String({ minLength: 1, maxLength: 100 }),
  },
  { additionalProperties: false }
);

export type PurchaseBody = Static<typeof PurchaseBodySchema>;

export const ShopListingResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    coins: Type.Integer(),
    rewards: Type.Array(
      Type.Object({
        id: Type.String(),
        name: Type.String(),
        description: Type.String(),
        cost: Type.Integer(),
        category: Type.String(),
        owned: Type.Boolean(),
        affordable: Type.Boolean(),
      })
    ),
  }),
});

export const PurchaseResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    success: Type.Literal(true),
    rewardId: Type.String(),
    remainingCoins: Type.Integer(),
  }),
});

/**
 * Purchase failure; `reason` is set for shop rule violations.
 */
export const PurchaseErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
  reason: Type.Optional(Type.String()),
});
