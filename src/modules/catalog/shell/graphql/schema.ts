/**
 * Catalog GraphQL Schema (SDL)
 */
export const schema = `
  type LevelRewards {
    stars: Int!
    coins: Int!
    xp: Int!
  }

  type QuestionView {
    index: Int!
    kind: String!
    text: String!
    options: [String!]
    starterCode: String
  }

  type Level {
    id: Int!
    kind: String!
    title: String!
    topic: String!
    difficulty: String!
    passingScore: Float!
    rewards: LevelRewards!
    prerequisites: [Int!]!
    questions: [QuestionView!]!
  }

  type AchievementCondition {
    stat: String!
    comparator: String!
    threshold: Float!
  }

  type Achievement {
    id: String!
    name: String!
    description: String!
    icon: String!
    tier: String!
    condition: AchievementCondition!
  }

  type ShopReward {
    id: String!
    name: String!
    description: String!
    cost: Int!
    category: String!
  }

  extend type Query {
    """
    All levels in catalog order, without answers
    """
    levels: [Level!]!

    """
    A single level without answers, or null when the id is unknown
    """
    level(id: Int!): Level

    """
    Visible achievement definitions
    """
    achievements: [Achievement!]!

    shopRewards: [ShopReward!]!
  }
`;
