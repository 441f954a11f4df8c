/**
 * Progression GraphQL Schema (SDL)
 */
export const schema = `
  type LevelMapEntry {
    id: Int!
    kind: String!
    title: String!
    topic: String!
    difficulty: String!
    completed: Boolean!
    unlocked: Boolean!
    state: String!
    stars: Int!
    attempts: Int!
    attemptsRemaining: Int!
    passingScore: Float!
    rewards: LevelRewards!
  }

  extend type Query {
    """
    Every level with the given player's state on it
    """
    levelMap(playerId: String!): [LevelMapEntry!]!
  }
`;
