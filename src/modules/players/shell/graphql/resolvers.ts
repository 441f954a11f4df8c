import { getLeaderboard } from '../../core/usecases/get-leaderboard.js';

import type { PlayerRepository } from '../../core/ports.js';
import type { IResolvers, MercuriusContext } from 'mercurius';

export interface MakePlayerResolversDeps {
  repo: PlayerRepository;
}

interface LeaderboardArgs {
  limit?: number | null;
}

export const makePlayerResolvers = (deps: MakePlayerResolversDeps): IResolvers => {
  const { repo } = deps;

  return {
    Query: {
      leaderboard: async (_parent: unknown, args: LeaderboardArgs, context: MercuriusContext) => {
        const result = await getLeaderboard({ repo }, { limit: args.limit ?? undefined });

        if (result.isErr()) {
          context.reply.log.error(
            { err: result.error, limit: args.limit },
            `[${result.error.type}] ${result.error.message}`
          );
          throw new Error(`[${result.error.type}] ${result.error.message}`);
        }

        return result.value;
      },
    },
  };
};
