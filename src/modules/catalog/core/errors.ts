import type { ValueError } from '@sinclair/typebox/errors';

/**
 * Problems found while deriving the catalog. The affected item is left out;
 * the rest of the catalog is still usable.
 */
export type CatalogIssue =
  | { type: 'EmptyQuestionSet'; message: string; levelId: number }
  | { type: 'InvalidPrerequisite'; message: string; levelId: number; prerequisiteId: number }
  | { type: 'InvalidCorrectIndex'; message: string; topicId: string; questionIndex: number }
  | { type: 'DuplicateTopicId'; message: string; topicId: string }
  | { type: 'DuplicateAchievementId'; message: string; achievementId: string }
  | { type: 'DuplicateRewardId'; message: string; rewardId: string };

export type CatalogLoadError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'EmptyCatalog'; message: string; issues: CatalogIssue[] };

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
