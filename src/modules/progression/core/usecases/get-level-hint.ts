/**
 * Get Level Hint Use Case
 *
 * Hints are only given for levels the player has unlocked.
 */

import { err, ok, type Result } from 'neverthrow';

import { loadPlayer } from './load-player.js';
import { getLevel } from '../../../catalog/index.js';
import { getAttemptCount } from '../../../players/index.js';
import { createLevelNotAvailableError, createLevelNotFoundError } from '../errors.js';
import { hintFor } from '../hints.js';
import { missingPrerequisites } from '../rules.js';

import type { GetPlayerLevelError } from './get-player-level.js';
import type { LevelHint } from '../types.js';
import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';

export interface GetLevelHintDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

export interface GetLevelHintInput {
  playerId: string;
  levelId: number;
}

export async function getLevelHint(
  deps: GetLevelHintDeps,
  input: GetLevelHintInput
): Promise<Result<LevelHint, GetPlayerLevelError>> {
  const { catalog } = deps;

  const level = getLevel(catalog, input.levelId);
  if (level === null) {
    return err(createLevelNotFoundError(input.levelId));
  }

  const loaded = await loadPlayer(deps.repo, input.playerId);
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  const player = loaded.value;
  const missing = missingPrerequisites(level, player);
  if (missing.length > 0) {
    return err(createLevelNotAvailableError(level.id, missing));
  }

  return ok({
    levelId: level.id,
    topic: level.topic,
    hint: hintFor(catalog, level, getAttemptCount(player, level.id)),
  });
}
