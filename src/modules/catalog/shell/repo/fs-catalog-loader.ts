import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { buildCatalog } from '../../core/build-catalog.js';
import { formatSchemaErrors, type CatalogLoadError } from '../../core/errors.js';
import {
  AchievementsFileSchema,
  CourseFileSchema,
  ShopFileSchema,
  type GameCatalog,
} from '../../core/types.js';

import type { TSchema, Static } from '@sinclair/typebox';
import type { TypeCheck } from '@sinclair/typebox/compiler';
import type { Logger } from 'pino';

const courseValidator = TypeCompiler.Compile(CourseFileSchema);
const achievementsValidator = TypeCompiler.Compile(AchievementsFileSchema);
const shopValidator = TypeCompiler.Compile(ShopFileSchema);

export const COURSE_FILE = 'course.yaml';
export const ACHIEVEMENTS_FILE = 'achievements.yaml';
export const SHOP_FILE = 'shop.yaml';

export interface CatalogLoaderOptions {
  rootDir: string;
  logger: Logger;
}

const errorCode = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const readContentFile = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T>, CatalogLoadError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Content file not found at ${filePath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read content file at ${filePath}: ${errorMessage(error)}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${filePath}: ${errorMessage(error)}`,
    });
  }

  if (!validator.Check(parsed)) {
    const details = formatSchemaErrors(validator.Errors(parsed));
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details,
    });
  }

  return ok(parsed);
};

/**
 * Reads the course, achievement and shop files from `rootDir` and builds the catalog.
 *
 * Content issues (unscorable levels, duplicate ids) are logged and the affected
 * items skipped. Only unreadable files, bad YAML, schema violations or a catalog
 * with no playable level fail the load.
 */
export const loadCatalog = async (
  options: CatalogLoaderOptions
): Promise<Result<GameCatalog, CatalogLoadError>> => {
  const log = options.logger.child({ module: 'catalog-loader' });

  const course = await readContentFile(path.join(options.rootDir, COURSE_FILE), courseValidator);
  if (course.isErr()) {
    return err(course.error);
  }

  const achievements = await readContentFile(
    path.join(options.rootDir, ACHIEVEMENTS_FILE),
    achievementsValidator
  );
  if (achievements.isErr()) {
    return err(achievements.error);
  }

  const shop = await readContentFile(path.join(options.rootDir, SHOP_FILE), shopValidator);
  if (shop.isErr()) {
    return err(shop.error);
  }

  const { catalog, issues } = buildCatalog({
    course: course.value,
    achievements: achievements.value,
    shop: shop.value,
  });

  for (const issue of issues) {
    log.warn({ issue }, issue.message);
  }

  if (catalog.levels.length === 0) {
    return err({
      type: 'EmptyCatalog',
      message: `No playable levels could be built from ${options.rootDir}`,
      issues,
    });
  }

  log.info(
    {
      levels: catalog.levels.length,
      achievements: catalog.achievements.length,
      shopRewards: catalog.shopRewards.length,
      skipped: issues.length,
    },
    'Catalog loaded'
  );

  return ok(catalog);
};
