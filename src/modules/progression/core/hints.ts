/**
 * Level hints, drawn from the level's topic. The hint rotates with the
 * attempts already made, so each retry shows the next one.
 */

import type { GameCatalog, Level } from '../../catalog/index.js';

export const hintFor = (
  catalog: Pick<GameCatalog, 'hintsByTopic' | 'defaultHint'>,
  level: Pick<Level, 'topicId'>,
  attemptsMade: number
): string => {
  const hints = catalog.hintsByTopic.get(level.topicId) ?? [];
  return hints[attemptsMade % Math.max(1, hints.length)] ?? catalog.defaultHint;
};
