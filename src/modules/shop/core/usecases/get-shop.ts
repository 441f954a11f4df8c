/**
 * Get Shop Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { createPlayerNotFoundError } from '../../../players/index.js';
import { listShop } from '../shop.js';

import type { ShopListing } from '../types.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository, PlayerStoreError } from '../../../players/index.js';

export interface GetShopDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface GetShopInput {
  playerId: string;
}

export async function getShop(
  deps: GetShopDeps,
  input: GetShopInput
): Promise<Result<ShopListing, PlayerStoreError>> {
  const found = await deps.repo.findById(input.playerId);
  if (found.isErr()) {
    return err(found.error);
  }

  if (found.value === null) {
    return err(createPlayerNotFoundError(input.playerId));
  }

  return ok(listShop(deps.catalog, found.value));
}
