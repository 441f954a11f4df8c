/**
 * Root query type; each module adds its fields with `extend type Query`.
 */
export const BaseSchema = `
  type Query {
    _empty: String
  }
`;
