/**
 * Achievements REST API Schemas
 */

import { Type } from '@sinclair/typebox';

export const AchievementProgressSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  description: Type.String(),
  icon: Type.String(),
  tier: Type.String(),
  hidden: Type.Boolean(),
  earned: Type.Boolean(),
  earnedAt: Type.Union([Type.String(), Type.Null()]),
  current: Type.Number(),
  target: Type.Number(),
  percentage: Type.Integer({ minimum: 0, maximum: 100 }),
});

export const AchievementProgressResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(AchievementProgressSchema),
});
