/**
 * Shop Module - Types
 */

import type { ShopRewardCategory } from '../../catalog/index.js';

export interface ShopListingItem {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly cost: number;
  readonly category: ShopRewardCategory;
  readonly owned: boolean;
  /** Not owned and the player has enough coins. */
  readonly affordable: boolean;
}

export interface ShopListing {
  readonly coins: number;
  readonly rewards: readonly ShopListingItem[];
}

export interface PurchaseOutcome {
  readonly success: true;
  readonly rewardId: string;
  readonly remainingCoins: number;
}
