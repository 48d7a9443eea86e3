/**
 * Snapshot schema: the versioned, self-describing export format.
 *
 * Content records are validated structurally here and semantically
 * (category, intensity, timestamp) later, so a snapshot with imperfect
 * records still parses and can be previewed.
 *
 * @module snapshot-schema
 */

import { CorruptedDataError, type ErrorCode } from '@quipkeep/core';
import { z } from 'zod';

/** Schema version written by this build */
export const CURRENT_SCHEMA_VERSION = 2;

export const preferenceValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
  z.null(),
]);

export const deviceInfoSchema = z.object({
  platform: z.string(),
  osVersion: z.string(),
  appBuild: z.string(),
});

export const snapshotRecordSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  category: z.string(),
  intensity: z.number(),
  locale: z.string(),
  createdAt: z.string(),
  isFavorite: z.boolean(),
});

export const usageStatisticsSchema = z.object({
  totalRecords: z.number().int().nonnegative(),
  totalFavorites: z.number().int().nonnegative(),
  categoryBreakdown: z.record(z.string(), z.number().int().nonnegative()),
  averageIntensity: z.number(),
  mostPopularCategory: z.string().nullable(),
  dateRange: z
    .object({
      earliest: z.string(),
      latest: z.string(),
    })
    .nullable(),
});

export const snapshotSchema = z.object({
  schemaVersion: z.number().int().positive(),
  appVersion: z.string(),
  exportTimestamp: z.string(),
  deviceInfo: deviceInfoSchema.nullable(),
  contentRecords: z.array(snapshotRecordSchema),
  favoriteIds: z.array(z.string()),
  preferences: z.record(z.string(), preferenceValueSchema),
  usageStatistics: usageStatisticsSchema.nullable(),
  checksum: z.string().nullable(),
});

export type DeviceInfo = z.infer<typeof deviceInfoSchema>;
export type SnapshotRecord = z.infer<typeof snapshotRecordSchema>;
export type UsageStatistics = z.infer<typeof usageStatisticsSchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;

/**
 * Render a zod issue path the way field errors name it, e.g.
 * `contentRecords[3].intensity`.
 */
export function formatIssuePath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '$';

  let result = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      result += `[${segment}]`;
    } else {
      result += result.length === 0 ? segment : `.${segment}`;
    }
  }
  return result;
}

/**
 * Validate `value` against `schema`, raising the first issue as a
 * {@link CorruptedDataError}.
 */
export function parseWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  code: ErrorCode = 'QK_D102'
): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  throw new CorruptedDataError(
    issue ? formatIssuePath(issue.path) : '$',
    issue?.message ?? 'Invalid value',
    { code, cause: result.error }
  );
}

/**
 * Identifier uniqueness within one snapshot, for records and favorites.
 */
export function assertUniqueIdentifiers(snapshot: Snapshot): void {
  const seen = new Set<string>();
  snapshot.contentRecords.forEach((record, index) => {
    if (seen.has(record.id)) {
      throw new CorruptedDataError(
        `contentRecords[${index}].id`,
        `Duplicate record id "${record.id}"`,
        { code: 'QK_D103' }
      );
    }
    seen.add(record.id);
  });

  const favorites = new Set<string>();
  snapshot.favoriteIds.forEach((id, index) => {
    if (favorites.has(id)) {
      throw new CorruptedDataError(`favoriteIds[${index}]`, `Duplicate favorite id "${id}"`, {
        code: 'QK_D103',
      });
    }
    favorites.add(id);
  });
}
