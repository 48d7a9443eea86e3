/**
 * Preview/diff engine: what an import would change, without changing it.
 *
 * Never aborts on imperfect records: every anomaly becomes a warning and
 * the merge step's error budget decides what is tolerated.
 *
 * @module preview-engine
 */

import {
  isCredentialPreferenceKey,
  type LocalStore,
  type PreferenceMap,
  type PreferenceValue,
} from '@quipkeep/core';
import { randomUUID } from 'node:crypto';
import { resolveConfig, type DataInterchangeConfig } from './config.js';
import { readLocalState } from './local-state.js';
import type { OperationScope } from './operation-runner.js';
import { inspectRecord } from './record-validation.js';
import { CURRENT_SCHEMA_VERSION, type SnapshotRecord } from './snapshot-schema.js';
import type {
  ImportPreview,
  ImportWarning,
  ParsedSnapshot,
  PreferenceChange,
} from './types.js';

export interface BuildPreviewOptions {
  config?: DataInterchangeConfig;
  /** Progress and cancellation, when run as part of an operation */
  scope?: OperationScope;
  /** Clock, for tests */
  now?: () => Date;
}

export function preferenceValuesEqual(
  a: PreferenceValue | undefined,
  b: PreferenceValue | undefined
): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((value, i) => value === b[i]);
  }
  return a === b;
}

function renderPreferenceValue(key: string, value: PreferenceValue | undefined): string {
  if (value === undefined) return '(not set)';
  if (isCredentialPreferenceKey(key) && value !== null) return '(hidden)';
  if (value === null) return 'null';
  if (Array.isArray(value)) return `[${value.join(', ')}]`;
  return String(value);
}

/**
 * Incoming preferences whose value differs from the local one, in
 * snapshot key order. Credential values are masked in descriptions.
 */
export function diffPreferences(local: PreferenceMap, incoming: PreferenceMap): PreferenceChange[] {
  const changes: PreferenceChange[] = [];
  for (const [key, next] of Object.entries(incoming)) {
    const previous = local[key];
    if (preferenceValuesEqual(previous, next)) continue;
    changes.push({
      key,
      previous,
      next,
      description: `${key}: ${renderPreferenceValue(key, previous)} → ${renderPreferenceValue(key, next)}`,
    });
  }
  return changes;
}

/** Key for content-and-category equality */
function contentKey(record: Pick<SnapshotRecord, 'category' | 'content'>): string {
  return `${record.category}\u0000${record.content}`;
}

/**
 * Compare a parsed snapshot with the local store.
 */
export async function buildPreview(
  parsed: ParsedSnapshot,
  store: LocalStore,
  options: BuildPreviewOptions = {}
): Promise<ImportPreview> {
  const config = resolveConfig(options.config);
  const now = (options.now ?? (() => new Date()))();
  const { snapshot } = parsed;
  const scope = options.scope;

  const state = await readLocalState(store);

  const warnings: ImportWarning[] = [];
  if (!parsed.isCompatible) {
    warnings.push({
      type: 'schemaVersionMismatch',
      message: `Snapshot uses schema version ${parsed.sourceSchemaVersion} and was upgraded to version ${CURRENT_SCHEMA_VERSION}`,
      recordId: null,
    });
  }
  if (parsed.integrity === 'mismatch') {
    warnings.push({
      type: 'checksumMismatch',
      message: 'Snapshot checksum does not match its contents; the file may have been modified',
      recordId: null,
    });
  } else if (parsed.integrity === 'absent') {
    warnings.push({
      type: 'checksumMissing',
      message: 'Snapshot has no checksum; its integrity cannot be verified',
      recordId: null,
    });
  }

  const localIds = new Set(state.records.map((r) => r.id));
  const localByContent = new Map<string, { id: string; createdAt: number }[]>();
  for (const record of state.records) {
    const key = contentKey(record);
    const entries = localByContent.get(key) ?? [];
    entries.push({ id: record.id, createdAt: Date.parse(record.createdAt) });
    localByContent.set(key, entries);
  }

  const firstWithContent = new Map<string, string>();
  const categoryBreakdown: Record<string, number> = {};
  let newRecords = 0;
  let duplicateRecords = 0;
  let likelyDuplicateRecords = 0;

  scope?.enterPhase('analyzing', snapshot.contentRecords.length);

  snapshot.contentRecords.forEach((record, index) => {
    scope?.checkpoint();
    warnings.push(
      ...inspectRecord(record, {
        now: now.getTime(),
        futureTimestampToleranceMs: config.futureTimestampToleranceMs,
      })
    );

    if (localIds.has(record.id)) {
      duplicateRecords++;
      warnings.push({
        type: 'duplicateRecord',
        message: `Record "${record.id}" already exists locally`,
        recordId: record.id,
      });
    } else {
      newRecords++;
      categoryBreakdown[record.category] = (categoryBreakdown[record.category] ?? 0) + 1;

      const created = Date.parse(record.createdAt);
      const localMatch = (localByContent.get(contentKey(record)) ?? []).find(
        (local) =>
          !Number.isNaN(created) &&
          !Number.isNaN(local.createdAt) &&
          Math.abs(local.createdAt - created) <= config.likelyDuplicateWindowMs
      );
      if (localMatch) {
        warnings.push({
          type: 'likelyDuplicate',
          message: `Record "${record.id}" looks like local record "${localMatch.id}"`,
          recordId: record.id,
        });
      }
    }

    const key = contentKey(record);
    const first = firstWithContent.get(key);
    if (first === undefined) {
      firstWithContent.set(key, record.id);
    } else {
      likelyDuplicateRecords++;
      warnings.push({
        type: 'likelyDuplicate',
        message: `Record "${record.id}" has the same content and category as record "${first}"`,
        recordId: record.id,
      });
    }

    scope?.tracker.advance(index + 1);
  });

  const snapshotIds = new Set(snapshot.contentRecords.map((r) => r.id));
  let newFavorites = 0;
  for (const id of snapshot.favoriteIds) {
    const hasRecord = snapshotIds.has(id) || localIds.has(id);
    if (!hasRecord) {
      warnings.push({
        type: 'orphanFavorite',
        message: `Favorite "${id}" has no matching record`,
        recordId: id,
      });
    } else if (!state.favoriteIds.has(id)) {
      newFavorites++;
    }
  }

  return {
    id: randomUUID(),
    createdAt: now.toISOString(),
    source: {
      appVersion: snapshot.appVersion,
      schemaVersion: parsed.sourceSchemaVersion,
      exportTimestamp: snapshot.exportTimestamp,
      deviceInfo: snapshot.deviceInfo,
    },
    isCompatible: parsed.isCompatible,
    integrity: parsed.integrity,
    counts: {
      totalRecords: snapshot.contentRecords.length,
      newRecords,
      duplicateRecords,
      likelyDuplicateRecords,
      totalFavorites: snapshot.favoriteIds.length,
      newFavorites,
    },
    categoryBreakdown,
    warnings,
    preferenceChanges: diffPreferences(state.preferences, snapshot.preferences),
  };
}
