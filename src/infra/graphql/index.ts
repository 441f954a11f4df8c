import { makeExecutableSchema, type IExecutableSchemaDefinition } from '@graphql-tools/schema';
import {
  NoSchemaIntrospectionCustomRule,
  Kind,
  type ValidationRule,
  type DocumentNode,
  type OperationDefinitionNode,
  type FieldNode,
} from 'graphql';
import depthLimit from 'graphql-depth-limit';
import mercuriusPlugin, { type IResolvers } from 'mercurius';

import type { FastifyPluginAsync } from 'fastify';

export { BaseSchema } from './schema.js';

declare module 'mercurius' {
  interface MercuriusContext {
    /** Set in preExecution so onResolution can describe the operation. */
    graphqlDocument?: DocumentNode;
  }
}

/** Deepest selection accepted; the catalog's level → questions → options is depth 3. */
const MAX_QUERY_DEPTH = 10;

// ─────────────────────────────────────────────────────────────────────────────
// Operation Inspection
// ─────────────────────────────────────────────────────────────────────────────

const findOperation = (document: DocumentNode): OperationDefinitionNode | undefined =>
  document.definitions.find(
    (def): def is OperationDefinitionNode => def.kind === Kind.OPERATION_DEFINITION
  );

/**
 * Name, type and top-level fields of the first operation in a document.
 * For `query { levels { id } leaderboard { rank } }` the fields are ['levels', 'leaderboard'].
 */
export function describeOperation(document: DocumentNode): {
  operationName: string | null;
  operationType: string;
  fields: string[];
} {
  const operation = findOperation(document);

  return {
    operationName: operation?.name?.value ?? null,
    operationType: operation?.operation ?? 'unknown',
    fields:
      operation?.selectionSet.selections
        .filter((sel): sel is FieldNode => sel.kind === Kind.FIELD)
        .map((field) => field.name.value) ?? [],
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Plugin
// ─────────────────────────────────────────────────────────────────────────────

export interface GraphQLOptions {
  schema: string[];
  resolvers: IResolvers[];
  /** Disables introspection and GraphiQL when true. */
  isProduction: boolean;
}

/**
 * Read-only GraphQL endpoint at /graphql.
 *
 * Query depth is always limited; introspection is off in production.
 */
export const makeGraphQLPlugin = (options: GraphQLOptions): FastifyPluginAsync => {
  const { schema: typeDefs, resolvers, isProduction } = options;

  const schema = makeExecutableSchema({
    typeDefs,
    resolvers, // mercurius and graphql-tools disagree on the resolver map type
  } as IExecutableSchemaDefinition);

  const validationRules: ValidationRule[] = [
    depthLimit(MAX_QUERY_DEPTH) as ValidationRule,
    ...(isProduction ? [NoSchemaIntrospectionCustomRule] : []),
  ];

  return async (fastify) => {
    await fastify.register(mercuriusPlugin, {
      schema,
      graphiql: !isProduction,
      path: '/graphql',
      validationRules,
    });

    fastify.graphql.addHook('preExecution', (_schema, document, context) => {
      context.graphqlDocument = document;
    });

    fastify.graphql.addHook('onResolution', (execution, context) => {
      const document = context.graphqlDocument;
      const { operationName, operationType, fields } =
        document !== undefined
          ? describeOperation(document)
          : { operationName: null, operationType: 'unknown', fields: [] };

      const errorCount = execution.errors?.length ?? 0;
      const logEntry = { graphql: { operationType, operationName, fields, errorCount } };
      const label = `GraphQL ${operationType} "${operationName ?? 'anonymous'}"`;

      if (errorCount > 0) {
        context.reply.log.warn(
          { ...logEntry, errors: execution.errors },
          `${label} completed with ${String(errorCount)} error(s)`
        );
      } else {
        context.reply.log.info(logEntry, `${label} [${fields.join(', ')}]`);
      }
    });
  };
};
