/**
 * Players GraphQL Schema (SDL)
 */
export const schema = `
  type LeaderboardEntry {
    rank: Int!
    playerId: String!
    username: String!
    totalXp: Int!
    playerLevel: Int!
    levelsCompleted: Int!
    achievementsCount: Int!
  }

  extend type Query {
    """
    Players ranked by total XP (limit 1..100, default 10)
    """
    leaderboard(limit: Int): [LeaderboardEntry!]!
  }
`;
