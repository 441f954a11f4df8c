import { getLevelMap } from '../../core/usecases/get-level-map.js';

import type { GameCatalog } from '../../../catalog/index.js';
import type { PlayerRepository } from '../../../players/index.js';
import type { IResolvers, MercuriusContext } from 'mercurius';

export interface MakeProgressionResolversDeps {
  repo: PlayerRepository;
  catalog: GameCatalog;
}

interface LevelMapArgs {
  playerId: string;
}

export const makeProgressionResolvers = (deps: MakeProgressionResolversDeps): IResolvers => {
  const { repo, catalog } = deps;

  return {
    Query: {
      levelMap: async (_parent: unknown, args: LevelMapArgs, context: MercuriusContext) => {
        const result = await getLevelMap({ repo, catalog }, { playerId: args.playerId });

        if (result.isErr()) {
          context.reply.log.error(
            { err: result.error, playerId: args.playerId },
            `[${result.error.type}] ${result.error.message}`
          );
          throw new Error(`[${result.error.type}] ${result.error.message}`);
        }

        return result.value;
      },
    },
  };
};
