/**
 * Semantic checks on individual snapshot records.
 *
 * The preview reports every finding as a warning. The merge engine treats
 * empty content, unsupported categories and out-of-range intensities as
 * per-record failures, and replaces malformed timestamps with the import
 * time.
 */

import {
  CorruptedDataError,
  INTENSITY_RANGE,
  isContentCategory,
  type ContentRecord,
} from '@quipkeep/core';
import type { SnapshotRecord } from './snapshot-schema.js';
import type { ImportWarning, ImportWarningType } from './types.js';

export interface RecordInspectionOptions {
  /** Reference time in epoch ms */
  readonly now: number;
  readonly futureTimestampToleranceMs: number;
}

export type RecordValidation =
  | { readonly ok: true; readonly record: ContentRecord; readonly warnings: readonly ImportWarning[] }
  | { readonly ok: false; readonly error: CorruptedDataError; readonly warnings: readonly ImportWarning[] };

const FATAL_ISSUES: ReadonlySet<ImportWarningType> = new Set([
  'emptyContent',
  'unsupportedCategory',
  'invalidIntensity',
]);

const ISSUE_FIELDS: Partial<Record<ImportWarningType, string>> = {
  emptyContent: 'content',
  unsupportedCategory: 'category',
  invalidIntensity: 'intensity',
  malformedTimestamp: 'createdAt',
  futureTimestamp: 'createdAt',
};

export function isValidIntensity(value: number): boolean {
  return Number.isInteger(value) && value >= INTENSITY_RANGE.min && value <= INTENSITY_RANGE.max;
}

/**
 * Every anomaly in `record`, in field order.
 */
export function inspectRecord(
  record: SnapshotRecord,
  options: RecordInspectionOptions
): ImportWarning[] {
  const warnings: ImportWarning[] = [];
  const warn = (type: ImportWarningType, message: string): void => {
    warnings.push({ type, message, recordId: record.id });
  };

  if (record.content.trim().length === 0) {
    warn('emptyContent', `Record "${record.id}" has empty content`);
  }

  if (!isContentCategory(record.category)) {
    warn('unsupportedCategory', `Record "${record.id}" has unsupported category "${record.category}"`);
  }

  if (!isValidIntensity(record.intensity)) {
    warn(
      'invalidIntensity',
      `Record "${record.id}" has intensity ${record.intensity} outside ${INTENSITY_RANGE.min}..${INTENSITY_RANGE.max}`
    );
  }

  const created = Date.parse(record.createdAt);
  if (Number.isNaN(created)) {
    warn(
      'malformedTimestamp',
      `Record "${record.id}" has malformed timestamp "${record.createdAt}"; the import time will be used`
    );
  } else if (created - options.now > options.futureTimestampToleranceMs) {
    warn('futureTimestamp', `Record "${record.id}" has a creation time in the future (${record.createdAt})`);
  }

  return warnings;
}

/**
 * Convert a snapshot record into a local record, or explain why it cannot
 * be committed. `index` is the record's position in the snapshot.
 */
export function validateRecord(
  record: SnapshotRecord,
  index: number,
  options: RecordInspectionOptions & { readonly importTime: string }
): RecordValidation {
  const warnings = inspectRecord(record, options);
  const fatal = warnings.find((w) => FATAL_ISSUES.has(w.type));
  const category = record.category;

  if (fatal || !isContentCategory(category)) {
    const field = (fatal && ISSUE_FIELDS[fatal.type]) ?? 'category';
    const reason = fatal?.message ?? `Record "${record.id}" has unsupported category "${category}"`;
    return {
      ok: false,
      error: new CorruptedDataError(`contentRecords[${index}].${field}`, reason, { code: 'QK_D104' }),
      warnings,
    };
  }

  const malformed = warnings.some((w) => w.type === 'malformedTimestamp');

  return {
    ok: true,
    record: {
      id: record.id,
      content: record.content,
      category,
      intensity: record.intensity,
      locale: record.locale,
      createdAt: malformed ? options.importTime : record.createdAt,
      isFavorite: record.isFavorite,
    },
    warnings,
  };
}
