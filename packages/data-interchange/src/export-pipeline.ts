/**
 * Export pipeline: local state to a versioned snapshot file.
 *
 * The store is read once, at `collectingData`; later mutations are not
 * observed by a running export.
 *
 * @module export-pipeline
 */

import {
  InsufficientStorageError,
  isCredentialPreferenceKey,
  type ContentRecord,
  type LocalStore,
  type PreferenceMap,
} from '@quipkeep/core';
import { ContentAnonymizer, type ExportOptions } from '@quipkeep/compliance';
import type { Observable } from 'rxjs';
import {
  resolveConfig,
  type DataInterchangeConfig,
  type ResolvedDataInterchangeConfig,
} from './config.js';
import { computeChecksum } from './integrity.js';
import { readLocalState } from './local-state.js';
import type { CancellationToken, OperationLock } from './operation-lock.js';
import { runPipeline, type RunOperationOptions } from './operation-runner.js';
import { inspectRecord } from './record-validation.js';
import { serializeSnapshot } from './snapshot-codec.js';
import { CURRENT_SCHEMA_VERSION, type Snapshot, type SnapshotRecord } from './snapshot-schema.js';
import { snapshotFileName, type SnapshotSink } from './snapshot-sink.js';
import { computeUsageStatistics } from './statistics.js';
import {
  EXPORT_PHASES,
  type ExportResult,
  type ExportSizeEstimate,
  type LocalDataValidation,
  type PipelineEvent,
} from './types.js';

export interface ExportPipelineOptions {
  config?: DataInterchangeConfig;
  /** Redaction rules used when `anonymize` is set */
  anonymizer?: ContentAnonymizer;
  lock?: OperationLock;
  token?: CancellationToken;
  onStart?: (token: CancellationToken) => void;
  onSettled?: RunOperationOptions['onSettled'];
  /** Clock, for tests */
  now?: () => Date;
}

/** Placeholder of checksum length, for size estimates */
const CHECKSUM_PLACEHOLDER = '0'.repeat(64);

/**
 * The exported form of a record. The favorite set is authoritative for
 * `isFavorite`.
 */
export function exportRecord(
  record: ContentRecord,
  favoriteIds: ReadonlySet<string>,
  anonymizer: ContentAnonymizer | null
): SnapshotRecord {
  return {
    ...record,
    content: anonymizer ? anonymizer.anonymize(record.content).text : record.content,
    isFavorite: favoriteIds.has(record.id),
  };
}

/** Preferences with credential keys removed unless requested */
export function exportPreferences(preferences: PreferenceMap, options: ExportOptions): PreferenceMap {
  if (options.includeCredentials) return { ...preferences };
  return Object.fromEntries(
    Object.entries(preferences).filter(([key]) => !isCredentialPreferenceKey(key))
  );
}

function buildSnapshot(
  contentRecords: SnapshotRecord[],
  favoriteIds: string[],
  preferences: PreferenceMap,
  options: ExportOptions,
  config: ResolvedDataInterchangeConfig,
  exportTimestamp: string
): Snapshot {
  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    appVersion: config.appVersion,
    exportTimestamp,
    deviceInfo: options.includeDeviceInfo ? config.deviceInfo : null,
    contentRecords,
    favoriteIds,
    preferences,
    usageStatistics: options.includeUsageStatistics
      ? computeUsageStatistics(contentRecords, favoriteIds)
      : null,
    checksum: null,
  };
}

/**
 * Export the whole of `store` through `sink`.
 *
 * @example
 * ```typescript
 * exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, new FileSnapshotSink(dir)).subscribe({
 *   next: (event) => {
 *     if (event.kind === 'progress') render(event.progress);
 *     else share(event.result.location);
 *   },
 *   error: (error) => showRecovery(error),
 * });
 * ```
 */
export function exportSnapshot(
  options: ExportOptions,
  store: LocalStore,
  sink: SnapshotSink,
  pipelineOptions: ExportPipelineOptions = {}
): Observable<PipelineEvent<ExportResult>> {
  const config = resolveConfig(pipelineOptions.config);
  const logger = config.logger.child('export');
  const now = pipelineOptions.now ?? (() => new Date());
  const anonymizer = options.anonymize
    ? (pipelineOptions.anonymizer ?? new ContentAnonymizer())
    : null;

  return runPipeline<ExportResult>(
    'export',
    EXPORT_PHASES,
    async (scope) => {
      scope.enterPhase('preparing');
      logger.debug('Export options', { ...options });

      scope.enterPhase('collectingData');
      const state = await readLocalState(store);

      scope.enterPhase('processingRecords', state.records.length);
      const contentRecords: SnapshotRecord[] = [];
      for (const record of state.records) {
        scope.checkpoint();
        contentRecords.push(exportRecord(record, state.favoriteIds, anonymizer));
        scope.tracker.advance(contentRecords.length);
      }

      const favoriteCandidates = Array.from(state.favoriteIds);
      scope.enterPhase('processingFavorites', favoriteCandidates.length);
      const exported = new Set<string>();
      favoriteCandidates.forEach((id, index) => {
        scope.checkpoint();
        exported.add(id);
        scope.tracker.advance(index + 1);
      });
      // Record order; favorites without a record are dropped
      const favoriteIds = contentRecords.filter((r) => exported.has(r.id)).map((r) => r.id);
      if (favoriteIds.length < favoriteCandidates.length) {
        logger.debug('Dropped favorites without a record', {
          dropped: favoriteCandidates.length - favoriteIds.length,
        });
      }

      const preferenceKeys = Object.keys(state.preferences);
      scope.enterPhase('processingPreferences', preferenceKeys.length);
      const preferences = exportPreferences(state.preferences, options);
      scope.tracker.advance(preferenceKeys.length);

      scope.enterPhase('generatingMetadata');
      const unsigned = buildSnapshot(
        contentRecords,
        favoriteIds,
        preferences,
        options,
        config,
        now().toISOString()
      );
      const checksum = await computeChecksum(unsigned);
      const snapshot: Snapshot = { ...unsigned, checksum };

      scope.enterPhase('serializing');
      const payload = serializeSnapshot(snapshot, { pretty: config.prettyPrint });
      if (payload.byteLength > config.maxSnapshotBytes) {
        throw new InsufficientStorageError(payload.byteLength, config.maxSnapshotBytes);
      }

      scope.enterPhase('writing');
      const required = Math.ceil(payload.byteLength * config.storageSafetyFactor);
      const available = await sink.availableBytes();
      if (available !== null && available < required) {
        throw new InsufficientStorageError(required, available);
      }

      const pending = await sink.write(payload, snapshotFileName(snapshot.exportTimestamp));
      let location: string;
      try {
        scope.checkpoint();
        location = await pending.commit();
      } catch (error) {
        await pending.discard();
        throw error;
      }

      logger.info('Snapshot written', {
        location,
        sizeBytes: payload.byteLength,
        records: contentRecords.length,
      });

      return { snapshot, location, sizeBytes: payload.byteLength, checksum };
    },
    {
      logger,
      lock: pipelineOptions.lock,
      token: pipelineOptions.token,
      onStart: pipelineOptions.onStart,
      onSettled: pipelineOptions.onSettled,
    }
  );
}

/**
 * Serialized size of an export of `store` with `options`, without writing
 * anything.
 */
export async function estimateExportSize(
  store: LocalStore,
  options: ExportOptions,
  config?: DataInterchangeConfig
): Promise<ExportSizeEstimate> {
  const resolved = resolveConfig(config);
  const state = await readLocalState(store);
  const anonymizer = options.anonymize ? new ContentAnonymizer() : null;
  const contentRecords = state.records.map((r) => exportRecord(r, state.favoriteIds, anonymizer));
  const snapshot = buildSnapshot(
    contentRecords,
    contentRecords.filter((r) => r.isFavorite).map((r) => r.id),
    exportPreferences(state.preferences, options),
    options,
    resolved,
    new Date().toISOString()
  );
  const payload = serializeSnapshot(
    { ...snapshot, checksum: CHECKSUM_PLACEHOLDER },
    { pretty: resolved.prettyPrint }
  );

  return {
    recordCount: snapshot.contentRecords.length,
    favoriteCount: snapshot.favoriteIds.length,
    estimatedBytes: payload.byteLength,
  };
}

/**
 * Check local data before exporting: duplicate identifiers, invalid
 * records and favorites without a record.
 */
export async function validateLocalData(
  store: LocalStore,
  config?: DataInterchangeConfig
): Promise<LocalDataValidation> {
  const resolved = resolveConfig(config);
  const state = await readLocalState(store);
  const issues: string[] = [];
  const seen = new Set<string>();
  const now = Date.now();

  for (const record of state.records) {
    if (seen.has(record.id)) {
      issues.push(`Duplicate record id "${record.id}"`);
    }
    seen.add(record.id);

    for (const warning of inspectRecord(record, {
      now,
      futureTimestampToleranceMs: resolved.futureTimestampToleranceMs,
    })) {
      issues.push(warning.message);
    }
  }

  for (const id of state.favoriteIds) {
    if (!seen.has(id)) {
      issues.push(`Favorite "${id}" has no record`);
    }
  }

  return { isValid: issues.length === 0, recordCount: state.records.length, issues };
}
