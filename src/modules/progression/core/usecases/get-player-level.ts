/**
 * Get Player Level Use Case
 *
 * A single level as the player may see it: no answers, and only once unlocked.
 */

import { err, ok, type Result } from 'neverthrow';

import { loadPlayer } from './load-player.js';
import { getLevel } from '../../../catalog/index.js';
import {
  createLevelNotAvailableError,
  createLevelNotFoundError,
  type LevelNotAvailableError,
  type LevelNotFoundError,
} from '../errors.js';
import { getLevelView, toLevelMapEntry } from '../level-map.js';
import { missingPrerequisites } from '../rules.js';

import type { PlayerLevelDetail } from '../types.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository, PlayerStoreError } from '../../../players/index.js';

export interface GetPlayerLevelDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface GetPlayerLevelInput {
  playerId: string;
  levelId: number;
}

export type GetPlayerLevelError = LevelNotFoundError | LevelNotAvailableError | PlayerStoreError;

export async function getPlayerLevel(
  deps: GetPlayerLevelDeps,
  input: GetPlayerLevelInput
): Promise<Result<PlayerLevelDetail, GetPlayerLevelError>> {
  const { catalog } = deps;

  const level = getLevel(catalog, input.levelId);
  if (level === null) {
    return err(createLevelNotFoundError(input.levelId));
  }

  const player = await loadPlayer(deps.repo, input.playerId);
  if (player.isErr()) {
    return err(player.error);
  }

  const view = getLevelView(catalog, player.value, level.id);
  if (view === null) {
    return err(createLevelNotAvailableError(level.id, missingPrerequisites(level, player.value)));
  }

  return ok({
    level: view,
    progress: toLevelMapEntry(level, player.value, catalog.rules.maxRetries),
  });
}
