/**
 * Health GraphQL Schema (SDL)
 */
export const schema = `
  type HealthCheck {
    name: String!
    status: String!
    message: String
    latencyMs: Float
    critical: Boolean!
  }

  type Readiness {
    status: String!
    version: String
    uptime: Float!
    checks: [HealthCheck!]!
    timestamp: String!
  }

  extend type Query {
    """
    Service liveness check
    """
    health: String!

    """
    Readiness with per-dependency status
    """
    ready: Readiness!
  }
`;
