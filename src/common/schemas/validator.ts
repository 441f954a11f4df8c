/**
 * TypeBox validator compiler for routes whose bodies must not be coerced.
 *
 * Fastify's default Ajv setup coerces types, so a JSON `true` passes as the
 * integer 1. Bodies are checked exactly as sent here; params and querystrings
 * arrive as strings and are converted before the check.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Value } from '@sinclair/typebox/value';

import type { TSchema } from '@sinclair/typebox';
import type { FastifySchemaCompiler } from 'fastify';

export const typeBoxValidatorCompiler: FastifySchemaCompiler<TSchema> = ({ schema, httpPart }) => {
  const validator = TypeCompiler.Compile(schema);

  return (data: unknown) => {
    const value = httpPart === 'body' ? data : Value.Convert(schema, data);
    if (validator.Check(value)) {
      return { value };
    }

    return {
      error: [...validator.Errors(value)].map((error) => ({
        keyword: 'type',
        instancePath: error.path,
        schemaPath: '',
        params: {},
        message: error.message,
      })),
    };
  };
};
