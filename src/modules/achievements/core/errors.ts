/**
 * Achievements Module - Domain Errors
 */

/**
 * An achievement condition names a stat that does not exist.
 * The achievement is skipped; the rest of the table is still evaluated.
 */
export interface UnknownStatError {
  readonly type: 'UnknownStatError';
  readonly message: string;
  readonly stat: string;
  readonly achievementId: string | null;
}

export type AchievementError = UnknownStatError;

export const createUnknownStatError = (
  stat: string,
  achievementId: string | null = null
): UnknownStatError => ({
  type: 'UnknownStatError',
  message:
    achievementId === null
      ? `Unknown achievement stat '${stat}'`
      : `Achievement '${achievementId}' uses unknown stat '${stat}'`,
  stat,
  achievementId,
});

export const ACHIEVEMENT_ERROR_HTTP_STATUS: Record<AchievementError['type'], number> = {
  UnknownStatError: 500,
};
