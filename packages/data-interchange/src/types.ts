import type { InterchangeError, OperationKind } from '@quipkeep/core';
import type { ExportOptions } from '@quipkeep/compliance';
import type { IntegrityStatus } from './integrity.js';
import type { DeviceInfo, Snapshot } from './snapshot-schema.js';

// ---- Phases ----

export const EXPORT_PHASES = [
  'preparing',
  'collectingData',
  'processingRecords',
  'processingFavorites',
  'processingPreferences',
  'generatingMetadata',
  'serializing',
  'writing',
  'completed',
] as const;

export const PREVIEW_PHASES = ['parsing', 'analyzing', 'completed'] as const;

export const IMPORT_PHASES = [
  'preparing',
  'validating',
  'processingRecords',
  'processingFavorites',
  'processingPreferences',
  'saving',
  'completed',
] as const;

export type ExportPhase = (typeof EXPORT_PHASES)[number];
export type PreviewPhase = (typeof PREVIEW_PHASES)[number];
export type ImportPhase = (typeof IMPORT_PHASES)[number];

export type OperationPhase = ExportPhase | PreviewPhase | ImportPhase | 'failed';

// ---- Progress ----

export interface OperationProgress {
  readonly operation: OperationKind;
  readonly phase: OperationPhase;
  /** 0..1, never decreases within one operation */
  readonly fraction: number;
  readonly itemsProcessed: number;
  readonly totalItems: number;
  readonly message: string;
  readonly failure: InterchangeError | null;
}

/**
 * Events emitted by a pipeline: any number of progress updates, then
 * exactly one result on success. Failures arrive as a `failed` progress
 * update followed by the stream's error notification.
 */
export type PipelineEvent<T> =
  | { readonly kind: 'progress'; readonly progress: OperationProgress }
  | { readonly kind: 'result'; readonly result: T };

// ---- Export ----

export interface ExportResult {
  readonly snapshot: Snapshot;
  /** Where the sink finalized the payload */
  readonly location: string;
  readonly sizeBytes: number;
  readonly checksum: string;
}

export interface ExportSizeEstimate {
  readonly recordCount: number;
  readonly favoriteCount: number;
  readonly estimatedBytes: number;
}

export interface LocalDataValidation {
  readonly isValid: boolean;
  readonly recordCount: number;
  readonly issues: readonly string[];
}

// ---- Import ----

export type ImportStrategy = 'merge' | 'replace';

export interface ImportOptions {
  readonly strategy: ImportStrategy;
  /** Merge only: leave records whose id already exists untouched */
  readonly skipDuplicates: boolean;
  /** Merge only: never remove a local favorite */
  readonly preserveExistingFavorites: boolean;
  /** Merge only: tolerate per-record failures up to the error budget */
  readonly allowPartialImport: boolean;
  /** Error budget; the merge aborts once failures exceed it */
  readonly maxErrorsAllowed: number;
}

export const MERGE_IMPORT_OPTIONS: Readonly<ImportOptions> = {
  strategy: 'merge',
  skipDuplicates: true,
  preserveExistingFavorites: true,
  allowPartialImport: true,
  maxErrorsAllowed: 10,
};

export const REPLACE_IMPORT_OPTIONS: Readonly<ImportOptions> = {
  strategy: 'replace',
  skipDuplicates: false,
  preserveExistingFavorites: false,
  allowPartialImport: false,
  maxErrorsAllowed: 0,
};

export type ImportWarningType =
  | 'duplicateRecord'
  | 'likelyDuplicate'
  | 'invalidIntensity'
  | 'emptyContent'
  | 'unsupportedCategory'
  | 'malformedTimestamp'
  | 'futureTimestamp'
  | 'orphanFavorite'
  | 'schemaVersionMismatch'
  | 'checksumMismatch'
  | 'checksumMissing';

export interface ImportWarning {
  readonly type: ImportWarningType;
  readonly message: string;
  readonly recordId: string | null;
}

export interface PreferenceChange {
  readonly key: string;
  /** undefined when the key does not exist locally */
  readonly previous: Snapshot['preferences'][string] | undefined;
  readonly next: Snapshot['preferences'][string];
  /** "key: old → new" */
  readonly description: string;
}

export interface ImportPreviewCounts {
  readonly totalRecords: number;
  readonly newRecords: number;
  /** Identifier already present locally */
  readonly duplicateRecords: number;
  /** Same content and category as an earlier record in the snapshot */
  readonly likelyDuplicateRecords: number;
  readonly totalFavorites: number;
  readonly newFavorites: number;
}

export interface ImportPreview {
  readonly id: string;
  readonly createdAt: string;
  readonly source: {
    readonly appVersion: string;
    readonly schemaVersion: number;
    readonly exportTimestamp: string;
    readonly deviceInfo: DeviceInfo | null;
  };
  readonly isCompatible: boolean;
  readonly integrity: IntegrityStatus;
  readonly counts: ImportPreviewCounts;
  /** Category → count, new records only */
  readonly categoryBreakdown: Readonly<Record<string, number>>;
  readonly warnings: readonly ImportWarning[];
  readonly preferenceChanges: readonly PreferenceChange[];
}

export interface ParsedSnapshot {
  readonly snapshot: Snapshot;
  readonly sourceSchemaVersion: number;
  /** False for snapshots migrated from an older schema */
  readonly isCompatible: boolean;
  readonly integrity: IntegrityStatus;
}

export interface ImportResult {
  readonly strategy: ImportStrategy;
  readonly recordsImported: number;
  readonly recordsSkipped: number;
  readonly recordsFailed: number;
  readonly committedRecordIds: readonly string[];
  readonly favoritesApplied: number;
  readonly preferencesUpdated: number;
  /** Per-record failures and defaulted values */
  readonly warnings: readonly ImportWarning[];
}

// ---- Recovery ----

export type RecoveryStrategy = 'retry' | 'skipAndContinue' | 'freeStorageAndRetry' | 'abort';

export interface RecoveryOption {
  readonly strategy: RecoveryStrategy;
  readonly title: string;
  readonly description: string;
  readonly isRecommended: boolean;
}

export interface RecoveryContext {
  readonly operation?: OperationKind;
  /** Import options in effect, when the error came from an import */
  readonly importOptions?: ImportOptions;
}

export interface ClassifiedError {
  readonly kind: InterchangeError['kind'];
  readonly code: InterchangeError['code'];
  readonly message: string;
  readonly recoverySuggestion: string;
}

export type { ExportOptions };
