import { type IResolvers } from 'mercurius';

import { allLevels, getAchievementDefinitions, getLevel, toLevelView } from '../../core/catalog.js';

import type { GameCatalog } from '../../core/types.js';

export interface MakeCatalogResolversDeps {
  catalog: GameCatalog;
}

interface LevelQueryArgs {
  id: number;
}

export const makeCatalogResolvers = (deps: MakeCatalogResolversDeps): IResolvers => {
  const { catalog } = deps;

  return {
    Query: {
      levels: () => allLevels(catalog).map(toLevelView),

      level: (_parent: unknown, args: LevelQueryArgs) => {
        const level = getLevel(catalog, args.id);
        return level === null ? null : toLevelView(level);
      },

      // Hidden achievements stay secret until a player earns them
      achievements: () =>
        getAchievementDefinitions(catalog).filter((definition) => !definition.hidden),

      shopRewards: () => catalog.shopRewards,
    },
  };
};
