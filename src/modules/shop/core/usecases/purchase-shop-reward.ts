/**
 * Purchase Reward Use Case
 *
 * Runs inside the player's atomic update so two purchases cannot spend the
 * same coins.
 */

import { err, ok, type Result } from 'neverthrow';

import { purchaseReward } from '../shop.js';

import type { PurchaseError, ShopError } from '../errors.js';
import type { PurchaseOutcome } from '../types.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';

export interface PurchaseShopRewardDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface PurchaseShopRewardInput {
  playerId: string;
  rewardId: string;
}

export async function purchaseShopReward(
  deps: PurchaseShopRewardDeps,
  input: PurchaseShopRewardInput
): Promise<Result<PurchaseOutcome, PurchaseError>> {
  const result = await deps.repo.update<PurchaseOutcome, ShopError>(input.playerId, (player) => {
    const purchased = purchaseReward(player, deps.catalog, input.rewardId);
    if (purchased.isErr()) {
      return err(purchased.error);
    }

    const outcome: PurchaseOutcome = {
      success: true,
      rewardId: input.rewardId,
      remainingCoins: purchased.value.remainingCoins,
    };
    return ok({ player: purchased.value.player, value: outcome });
  });

  if (result.isErr()) {
    return err(result.error);
  }

  return ok(result.value);
}
