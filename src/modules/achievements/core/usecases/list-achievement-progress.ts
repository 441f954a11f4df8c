/**
 * List Achievement Progress Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { createPlayerNotFoundError, type PlayerStoreError } from '../../../players/index.js';
import { getAchievementProgress } from '../progress.js';

import type { AchievementProgress } from '../types.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';

export interface ListAchievementProgressDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface ListAchievementProgressInput {
  playerId: string;
}

export async function listAchievementProgress(
  deps: ListAchievementProgressDeps,
  input: ListAchievementProgressInput
): Promise<Result<AchievementProgress[], PlayerStoreError>> {
  const found = await deps.repo.findById(input.playerId);
  if (found.isErr()) {
    return err(found.error);
  }

  if (found.value === null) {
    return err(createPlayerNotFoundError(input.playerId));
  }

  return ok(getAchievementProgress(found.value, deps.catalog.achievements));
}
