/**
 * Merge/replace engine: commits a previewed snapshot into local state.
 *
 * Replace is all-or-nothing: the pre-import state is captured and written
 * back on any failure or cancellation. Merge commits record by record and
 * is never rolled back; per-record failures count against the error
 * budget.
 *
 * @module merge-engine
 */

import {
  CorruptedDataError,
  PartialImportExceededError,
  StorageError,
  ensureInterchangeError,
  isCredentialPreferenceKey,
  restoreLocalState,
  type ContentRecord,
  type LocalStateCapture,
  type LocalStore,
  type Logger,
  type PreferenceMap,
} from '@quipkeep/core';
import type { Observable } from 'rxjs';
import { resolveConfig, type DataInterchangeConfig } from './config.js';
import { readLocalState } from './local-state.js';
import type { CancellationToken, OperationLock } from './operation-lock.js';
import { runPipeline, type OperationScope, type RunOperationOptions } from './operation-runner.js';
import { preferenceValuesEqual } from './preview-engine.js';
import { validateRecord, type RecordInspectionOptions } from './record-validation.js';
import type { Snapshot } from './snapshot-schema.js';
import {
  IMPORT_PHASES,
  type ImportOptions,
  type ImportPreview,
  type ImportResult,
  type ImportWarning,
  type PipelineEvent,
} from './types.js';

export interface ApplySnapshotOptions {
  config?: DataInterchangeConfig;
  lock?: OperationLock;
  token?: CancellationToken;
  onStart?: (token: CancellationToken) => void;
  onSettled?: RunOperationOptions['onSettled'];
  /** Clock, for tests */
  now?: () => Date;
}

interface ImportContext {
  readonly snapshot: Snapshot;
  readonly options: ImportOptions;
  readonly store: LocalStore;
  readonly state: LocalStateCapture;
  readonly inspection: RecordInspectionOptions & { readonly importTime: string };
  readonly scope: OperationScope;
  readonly logger: Logger;
}

function asStorageError(action: string, error: unknown): Error {
  return ensureInterchangeError(error, (cause) => new StorageError(action, cause));
}

/** Non-fatal findings that still reach the result */
function keepWarning(warning: ImportWarning): boolean {
  return warning.type === 'malformedTimestamp' || warning.type === 'futureTimestamp';
}

function assertMatchesPreview(snapshot: Snapshot, preview: ImportPreview): void {
  const matches =
    preview.source.exportTimestamp === snapshot.exportTimestamp &&
    preview.source.appVersion === snapshot.appVersion &&
    preview.counts.totalRecords === snapshot.contentRecords.length &&
    preview.counts.totalFavorites === snapshot.favoriteIds.length;

  if (!matches) {
    throw new CorruptedDataError('$', `Snapshot does not match preview "${preview.id}"`);
  }
}

/**
 * Preferences after an import: incoming values overwrite key by key.
 */
function mergePreferences(
  local: PreferenceMap,
  incoming: PreferenceMap
): { preferences: PreferenceMap; updated: number } {
  const preferences: PreferenceMap = { ...local };
  let updated = 0;
  for (const [key, value] of Object.entries(incoming)) {
    if (preferenceValuesEqual(local[key], value)) continue;
    preferences[key] = value;
    updated++;
  }
  return { preferences, updated };
}

async function replaceAll(ctx: ImportContext): Promise<ImportResult> {
  const { snapshot, store, state, scope } = ctx;
  const warnings: ImportWarning[] = [];

  scope.enterPhase('processingRecords', snapshot.contentRecords.length);
  const records: ContentRecord[] = [];
  for (const [index, raw] of snapshot.contentRecords.entries()) {
    scope.checkpoint();
    const validation = validateRecord(raw, index, ctx.inspection);
    if (!validation.ok) {
      throw validation.error;
    }
    warnings.push(...validation.warnings.filter(keepWarning));
    records.push(validation.record);
    scope.tracker.advance(index + 1);
  }

  const recordIds = new Set(records.map((r) => r.id));
  const favorites = snapshot.favoriteIds.filter((id) => recordIds.has(id));
  scope.enterPhase('processingFavorites', favorites.length);
  const favoriteIds = new Set(favorites);
  const finalRecords = records.map((r) => ({ ...r, isFavorite: favoriteIds.has(r.id) }));
  scope.tracker.advance(favorites.length);

  // Credentials never travel in a snapshot unless explicitly included;
  // keep the local ones the snapshot does not carry.
  scope.enterPhase('processingPreferences');
  const preferences: PreferenceMap = { ...snapshot.preferences };
  for (const [key, value] of Object.entries(state.preferences)) {
    if (isCredentialPreferenceKey(key) && !(key in preferences)) {
      preferences[key] = value;
    }
  }
  const { updated } = mergePreferences(state.preferences, preferences);

  scope.enterPhase('saving', 4);
  try {
    await store.clearAll();
    scope.tracker.advance(1);
    scope.checkpoint();
    await store.writeAllRecords(finalRecords);
    scope.tracker.advance(2);
    scope.checkpoint();
    await store.writeFavoriteIds(favoriteIds);
    scope.tracker.advance(3);
    scope.checkpoint();
    await store.writePreferences(preferences);
    scope.tracker.advance(4);
  } catch (error) {
    const failure = asStorageError('replace', error);
    ctx.logger.warn('Replace failed, restoring previous state', { reason: failure.message });
    try {
      await restoreLocalState(store, state);
    } catch (restoreError) {
      ctx.logger.error(
        'Restoring previous state failed',
        restoreError instanceof Error ? restoreError : undefined
      );
    }
    throw failure;
  }

  return {
    strategy: 'replace',
    recordsImported: finalRecords.length,
    recordsSkipped: 0,
    recordsFailed: 0,
    committedRecordIds: finalRecords.map((r) => r.id),
    favoritesApplied: favoriteIds.size,
    preferencesUpdated: updated,
    warnings,
  };
}

function sameIds(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return a.size === b.size && Array.from(a).every((id) => b.has(id));
}

async function mergeInto(ctx: ImportContext): Promise<ImportResult> {
  const { snapshot, options, store, state, scope, logger } = ctx;
  const warnings: ImportWarning[] = [];
  const localIds = new Set(state.records.map((r) => r.id));
  const incomingFavorites = new Set(snapshot.favoriteIds);
  const favorites = new Set(state.favoriteIds);
  const committed: string[] = [];
  let skipped = 0;
  let failed = 0;

  // Decided before the write, so an aborted merge leaves consistent flags
  const favoriteFlag = (record: ContentRecord): boolean =>
    (options.preserveExistingFavorites && state.favoriteIds.has(record.id)) ||
    record.isFavorite ||
    incomingFavorites.has(record.id);

  const maxErrorsAllowed = options.allowPartialImport ? Math.max(0, options.maxErrorsAllowed) : 0;
  const recordFailure = (index: number, recordId: string, error: Error): void => {
    failed++;
    logger.warn('Record failed to import', { recordId, reason: error.message });
    if (failed > maxErrorsAllowed) {
      const pending = snapshot.contentRecords.slice(index + 1).map((r) => r.id);
      throw new PartialImportExceededError(failed, committed, pending, maxErrorsAllowed);
    }
  };

  scope.enterPhase('processingRecords', snapshot.contentRecords.length);
  try {
    for (const [index, raw] of snapshot.contentRecords.entries()) {
      scope.checkpoint();

      if (options.skipDuplicates && localIds.has(raw.id)) {
        skipped++;
      } else {
        const validation = validateRecord(raw, index, ctx.inspection);
        if (validation.ok) {
          warnings.push(...validation.warnings.filter(keepWarning));
          const isFavorite = favoriteFlag(validation.record);
          try {
            await store.putRecord({ ...validation.record, isFavorite });
            committed.push(raw.id);
            if (isFavorite) favorites.add(raw.id);
            else favorites.delete(raw.id);
          } catch (error) {
            recordFailure(index, raw.id, asStorageError(`write of record "${raw.id}"`, error));
          }
        } else {
          warnings.push(...validation.warnings.filter((w) => !keepWarning(w)));
          recordFailure(index, raw.id, validation.error);
        }
      }

      scope.tracker.advance(index + 1);
    }
  } catch (error) {
    // Committed records stay; their favorites must stay with them
    if (!sameIds(favorites, state.favoriteIds)) {
      try {
        await store.writeFavoriteIds(favorites);
      } catch (writeError) {
        logger.error(
          'Saving favorites of committed records failed',
          writeError instanceof Error ? writeError : undefined
        );
      }
    }
    throw error;
  }

  const committedIds = new Set(committed);
  const existingIds = new Set([...localIds, ...committed]);
  scope.enterPhase('processingFavorites', incomingFavorites.size);

  for (const id of incomingFavorites) {
    if (existingIds.has(id)) favorites.add(id);
  }
  for (const id of favorites) {
    if (!existingIds.has(id)) favorites.delete(id);
  }
  // Local records the merge did not write whose flag disagrees with the set
  const staleFlags = new Set(
    state.records
      .filter((r) => !committedIds.has(r.id) && r.isFavorite !== favorites.has(r.id))
      .map((r) => r.id)
  );
  const favoritesApplied = Array.from(favorites).filter((id) => !state.favoriteIds.has(id)).length;
  scope.tracker.advance(incomingFavorites.size);

  scope.enterPhase('processingPreferences', Object.keys(snapshot.preferences).length);
  const { preferences, updated } = mergePreferences(state.preferences, snapshot.preferences);
  scope.tracker.advance(Object.keys(snapshot.preferences).length);

  scope.enterPhase('saving');
  try {
    await store.writeFavoriteIds(favorites);
    if (staleFlags.size > 0) {
      const stored = await store.readAllRecords();
      await store.writeAllRecords(
        stored.map((r) => (staleFlags.has(r.id) ? { ...r, isFavorite: favorites.has(r.id) } : r))
      );
    }
    if (updated > 0) {
      await store.writePreferences(preferences);
    }
  } catch (error) {
    throw asStorageError('merge', error);
  }

  return {
    strategy: 'merge',
    recordsImported: committed.length,
    recordsSkipped: skipped,
    recordsFailed: failed,
    committedRecordIds: committed,
    favoritesApplied,
    preferencesUpdated: updated,
    warnings,
  };
}

/**
 * Apply `snapshot` to `store` under `options`. `preview` must have been
 * built from the same snapshot.
 */
export function applySnapshot(
  snapshot: Snapshot,
  preview: ImportPreview,
  options: ImportOptions,
  store: LocalStore,
  applyOptions: ApplySnapshotOptions = {}
): Observable<PipelineEvent<ImportResult>> {
  const config = resolveConfig(applyOptions.config);
  const logger = config.logger.child('import');
  const now = applyOptions.now ?? (() => new Date());

  return runPipeline<ImportResult>(
    'import',
    IMPORT_PHASES,
    async (scope) => {
      scope.enterPhase('preparing');
      const state = await readLocalState(store);

      scope.enterPhase('validating');
      assertMatchesPreview(snapshot, preview);
      const importTime = now();

      const ctx: ImportContext = {
        snapshot,
        options,
        store,
        state,
        inspection: {
          now: importTime.getTime(),
          futureTimestampToleranceMs: config.futureTimestampToleranceMs,
          importTime: importTime.toISOString(),
        },
        scope,
        logger,
      };

      logger.debug('Applying snapshot', { strategy: options.strategy, previewId: preview.id });
      const result = options.strategy === 'replace' ? await replaceAll(ctx) : await mergeInto(ctx);

      logger.info('Import applied', {
        strategy: result.strategy,
        imported: result.recordsImported,
        skipped: result.recordsSkipped,
        failed: result.recordsFailed,
      });
      return result;
    },
    {
      logger,
      lock: applyOptions.lock,
      token: applyOptions.token,
      onStart: applyOptions.onStart,
      onSettled: applyOptions.onSettled,
    }
  );
}
