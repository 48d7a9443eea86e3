/**
 * Step-by-step upgrades of older snapshot formats.
 *
 * Each step validates its own input format and returns a plain object in
 * the next version's shape; the codec validates the final result against
 * the current schema.
 *
 * @module schema-migrations
 */

import { VersionMismatchError } from '@quipkeep/core';
import { z } from 'zod';
import {
  CURRENT_SCHEMA_VERSION,
  parseWithSchema,
  preferenceValueSchema,
  snapshotRecordSchema,
} from './snapshot-schema.js';

export interface SchemaMigration {
  readonly from: number;
  readonly to: number;
  readonly description: string;
  migrate(input: unknown): unknown;
}

/** Locale assumed for v1 records when preferences carry no language */
export const FALLBACK_LOCALE = 'en';

const snapshotV1Schema = z.object({
  schemaVersion: z.literal(1),
  appVersion: z.string(),
  exportTimestamp: z.string(),
  contentRecords: z.array(snapshotRecordSchema.omit({ locale: true })),
  favoriteIds: z.array(z.string()),
  preferences: z.record(z.string(), preferenceValueSchema),
  checksum: z.string().nullable().optional(),
});

const v1ToV2: SchemaMigration = {
  from: 1,
  to: 2,
  description: 'Add record locale, device info and usage statistics',
  migrate(input) {
    const v1 = parseWithSchema(snapshotV1Schema, input);
    const language = v1.preferences['language'];
    const locale = typeof language === 'string' && language.length > 0 ? language : FALLBACK_LOCALE;

    return {
      schemaVersion: 2,
      appVersion: v1.appVersion,
      exportTimestamp: v1.exportTimestamp,
      deviceInfo: null,
      contentRecords: v1.contentRecords.map((record) => ({ ...record, locale })),
      favoriteIds: v1.favoriteIds,
      preferences: v1.preferences,
      usageStatistics: null,
      checksum: v1.checksum ?? null,
    };
  },
};

export const SCHEMA_MIGRATIONS: readonly SchemaMigration[] = [v1ToV2];

/**
 * Upgrade `input` from `fromVersion` to `targetVersion`.
 *
 * @throws VersionMismatchError when a step is missing
 */
export function migrateSnapshot(
  input: unknown,
  fromVersion: number,
  migrations: readonly SchemaMigration[] = SCHEMA_MIGRATIONS,
  targetVersion: number = CURRENT_SCHEMA_VERSION
): unknown {
  let version = fromVersion;
  let current = input;

  while (version < targetVersion) {
    const step = migrations.find((m) => m.from === version);
    if (!step) {
      throw new VersionMismatchError(fromVersion, targetVersion);
    }
    current = step.migrate(current);
    version = step.to;
  }

  return current;
}
