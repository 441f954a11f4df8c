/**
 * Shop rules: listing with ownership and affordability, and purchase.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInsufficientFundsError,
  createRewardAlreadyOwnedError,
  createRewardNotFoundError,
  type ShopError,
} from './errors.js';
import { getShopReward } from '../../catalog/index.js';

import type { ShopListing } from './types.js';
import type { GameCatalog } from '../../catalog/index.js';
import type { Player } from '../../players/index.js';

export const listShop = (catalog: GameCatalog, player: Player): ShopListing => ({
  coins: player.totalCoins,
  rewards: catalog.shopRewards.map((reward) => {
    const owned = player.purchasedRewards.includes(reward.id);
    return {
      ...reward,
      owned,
      affordable: !owned && player.totalCoins >= reward.cost,
    };
  }),
});

export interface PurchasedReward {
  player: Player;
  remainingCoins: number;
}

/**
 * Deducts the cost and records ownership. Each reward can be bought once.
 */
export const purchaseReward = (
  player: Player,
  catalog: GameCatalog,
  rewardId: string
): Result<PurchasedReward, ShopError> => {
  const reward = getShopReward(catalog, rewardId);
  if (reward === null) {
    return err(createRewardNotFoundError(rewardId));
  }

  if (player.purchasedRewards.includes(reward.id)) {
    return err(createRewardAlreadyOwnedError(reward.id));
  }

  if (player.totalCoins < reward.cost) {
    return err(createInsufficientFundsError(reward.id, reward.cost, player.totalCoins));
  }

  const remainingCoins = player.totalCoins - reward.cost;
  return ok({
    player: {
      ...player,
      totalCoins: remainingCoins,
      purchasedRewards: [...player.purchasedRewards, reward.id],
    },
    remainingCoins,
  });
};
