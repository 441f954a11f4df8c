/**
 * Shop Module - Public API
 */

export type { PurchaseOutcome, ShopListing, ShopListingItem } from './core/types.js';

export type {
  InsufficientFundsError,
  PurchaseError,
  RewardAlreadyOwnedError,
  RewardNotFoundError,
  ShopError,
} from './core/errors.js';

export {
  createInsufficientFundsError,
  createRewardAlreadyOwnedError,
  createRewardNotFoundError,
  getHttpStatusForError,
  SHOP_ERROR_HTTP_STATUS,
} from './core/errors.js';

export { listShop, purchaseReward, type PurchasedReward } from './core/shop.js';

export { getShop, type GetShopDeps, type GetShopInput } from './core/usecases/get-shop.js';
export {
  purchaseShopReward,
  type PurchaseShopRewardDeps,
  type PurchaseShopRewardInput,
} from './core/usecases/purchase-shop-reward.js';

export { makeShopRoutes, type MakeShopRoutesDeps } from './shell/rest/routes.js';
