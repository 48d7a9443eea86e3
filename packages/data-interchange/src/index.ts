// Types
export * from './types.js';

// Snapshot format
export {
  CURRENT_SCHEMA_VERSION,
  assertUniqueIdentifiers,
  deviceInfoSchema,
  formatIssuePath,
  parseWithSchema,
  preferenceValueSchema,
  snapshotRecordSchema,
  snapshotSchema,
  usageStatisticsSchema,
} from './snapshot-schema.js';
export type { DeviceInfo, Snapshot, SnapshotRecord, UsageStatistics } from './snapshot-schema.js';

export { FALLBACK_LOCALE, SCHEMA_MIGRATIONS, migrateSnapshot } from './schema-migrations.js';
export type { SchemaMigration } from './schema-migrations.js';

export {
  canonicalJson,
  canonicalize,
  decodeSnapshot,
  deserializeSnapshot,
  serializeSnapshot,
} from './snapshot-codec.js';
export type { DecodedSnapshot, SerializeOptions } from './snapshot-codec.js';

// Integrity
export { computeChecksum, verifyChecksum } from './integrity.js';
export type { IntegrityStatus } from './integrity.js';

// Configuration
export { DEFAULT_MAX_SNAPSHOT_BYTES, dataInterchangeConfigSchema, resolveConfig } from './config.js';
export type { DataInterchangeConfig, ResolvedDataInterchangeConfig } from './config.js';

// Operations
export { OperationProgressTracker, createOperationProgressTracker } from './operation-progress.js';
export { CancellationToken, createOperationLock } from './operation-lock.js';
export type { OperationLease, OperationLock } from './operation-lock.js';
export { runOperation, runPipeline } from './operation-runner.js';
export type { OperationBody, OperationScope, RunOperationOptions } from './operation-runner.js';
export { DEFAULT_OPERATION_LOG_SIZE, OperationLog } from './operation-log.js';
export type { FailedOperationLog } from './operation-log.js';

// Export
export { computeUsageStatistics } from './statistics.js';
export {
  FileSnapshotSink,
  MemorySnapshotSink,
  SNAPSHOT_FILE_MODE,
  snapshotFileName,
} from './snapshot-sink.js';
export type { PendingWrite, SnapshotSink } from './snapshot-sink.js';
export {
  estimateExportSize,
  exportPreferences,
  exportRecord,
  exportSnapshot,
  validateLocalData,
} from './export-pipeline.js';
export type { ExportPipelineOptions } from './export-pipeline.js';

// Import
export { parseSnapshot, readSnapshotFile } from './import-parser.js';
export { inspectRecord, isValidIntensity, validateRecord } from './record-validation.js';
export type { RecordInspectionOptions, RecordValidation } from './record-validation.js';
export { buildPreview, diffPreferences, preferenceValuesEqual } from './preview-engine.js';
export type { BuildPreviewOptions } from './preview-engine.js';
export { applySnapshot } from './merge-engine.js';
export type { ApplySnapshotOptions } from './merge-engine.js';

// Recovery
export { classify, recoveryOptions } from './recovery-classifier.js';

// Service
export { DataInterchangeService, createDataInterchangeService } from './data-interchange-service.js';
export type { DataInterchangeServiceConfig } from './data-interchange-service.js';
