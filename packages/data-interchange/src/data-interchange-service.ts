/**
 * DataInterchangeService: the surface the UI layer talks to.
 *
 * Exports, previews and imports run one at a time against the store, in
 * request order. The latest preview is kept until it is confirmed or
 * discarded, or another import starts. The log of the last failed
 * operation stays available for problem reports.
 *
 * @example
 * ```typescript
 * const service = createDataInterchangeService({ store, sink: new FileSnapshotSink(dir) });
 *
 * const { issues } = service.analyze(options);
 * if (!service.requiresAcknowledgement(issues) || (await askUser(issues))) {
 *   service.startExport(options).subscribe(render);
 * }
 *
 * const preview = await service.startImport(bytes);
 * service.confirmImport(preview, MERGE_IMPORT_OPTIONS).subscribe(render);
 * ```
 */

import {
  PreviewExpiredError,
  type InterchangeError,
  type LocalStore,
  type Logger,
} from '@quipkeep/core';
import {
  ComplianceAnalyzer,
  DEFAULT_EXPORT_OPTIONS,
  type ComplianceAnalysis,
  type ComplianceIssue,
  type ContentAnonymizer,
  type ExportOptions,
} from '@quipkeep/compliance';
import { BehaviorSubject, tap, throwError, type Observable } from 'rxjs';
import { resolveConfig, type DataInterchangeConfig } from './config.js';
import {
  estimateExportSize,
  exportSnapshot,
  validateLocalData,
} from './export-pipeline.js';
import { parseSnapshot, readSnapshotFile } from './import-parser.js';
import { readLocalState } from './local-state.js';
import { applySnapshot } from './merge-engine.js';
import { CancellationToken, createOperationLock, type OperationLock } from './operation-lock.js';
import { OperationLog, type FailedOperationLog } from './operation-log.js';
import { OperationProgressTracker } from './operation-progress.js';
import { runOperation } from './operation-runner.js';
import { buildPreview } from './preview-engine.js';
import { classify, recoveryOptions } from './recovery-classifier.js';
import type { Snapshot } from './snapshot-schema.js';
import type { SnapshotSink } from './snapshot-sink.js';
import {
  PREVIEW_PHASES,
  type ClassifiedError,
  type ExportResult,
  type ExportSizeEstimate,
  type ImportOptions,
  type ImportPreview,
  type ImportResult,
  type LocalDataValidation,
  type OperationProgress,
  type PipelineEvent,
  type RecoveryContext,
  type RecoveryOption,
} from './types.js';

export interface DataInterchangeServiceConfig extends DataInterchangeConfig {
  store: LocalStore;
  /** Destination for exports */
  sink: SnapshotSink;
  analyzer?: ComplianceAnalyzer;
  /** Redaction rules for anonymized exports */
  anonymizer?: ContentAnonymizer;
}

interface PendingImport {
  readonly preview: ImportPreview;
  readonly snapshot: Snapshot;
}

export class DataInterchangeService {
  private readonly store: LocalStore;
  private readonly sink: SnapshotSink;
  private readonly analyzer: ComplianceAnalyzer;
  private readonly anonymizer?: ContentAnonymizer;
  private readonly config: DataInterchangeConfig;
  private readonly logger: Logger;
  private readonly lock: OperationLock = createOperationLock();
  private readonly operationLog: OperationLog;
  private pending: PendingImport | null = null;
  private readonly progress$$ = new BehaviorSubject<OperationProgress | null>(null);
  private current: CancellationToken | null = null;

  constructor(config: DataInterchangeServiceConfig) {
    const { store, sink, analyzer, anonymizer, ...rest } = config;
    const resolved = resolveConfig(rest);

    this.store = store;
    this.sink = sink;
    this.analyzer = analyzer ?? new ComplianceAnalyzer();
    this.anonymizer = anonymizer;
    this.config = { ...rest, logger: resolved.logger };
    this.logger = resolved.logger.child('service');
    this.operationLog = new OperationLog(resolved.logger);
  }

  /** Progress of the most recent operation */
  get progress$(): Observable<OperationProgress | null> {
    return this.progress$$.asObservable();
  }

  /** Whether an operation holds the store */
  get isBusy(): boolean {
    return this.lock.isLocked();
  }

  /** Failure and log entries of the most recent operation that failed */
  get lastFailureLog(): FailedOperationLog | null {
    return this.operationLog.lastFailure;
  }

  // ── Compliance ───────────────────────────────────────────────────────

  analyze(options: ExportOptions): ComplianceAnalysis {
    return this.analyzer.analyze(options);
  }

  /** {@link analyze} plus a scan of the records currently stored */
  async analyzeLocalContent(options: ExportOptions): Promise<ComplianceAnalysis> {
    const state = await readLocalState(this.store);
    return this.analyzer.analyzeContent(state.records, options);
  }

  requiresAcknowledgement(issues: readonly ComplianceIssue[]): boolean {
    return this.analyzer.requiresAcknowledgement(issues);
  }

  // ── Export ───────────────────────────────────────────────────────────

  startExport(options: ExportOptions): Observable<PipelineEvent<ExportResult>> {
    return exportSnapshot(options, this.store, this.sink, {
      config: this.config,
      anonymizer: this.anonymizer,
      lock: this.lock,
      onStart: (token) => this.begin(token),
      onSettled: (token, failure) => this.end(token, failure),
    }).pipe(tap((event) => this.relay(event)));
  }

  estimateExportSize(options: ExportOptions = DEFAULT_EXPORT_OPTIONS): Promise<ExportSizeEstimate> {
    return estimateExportSize(this.store, options, this.config);
  }

  validateLocalData(): Promise<LocalDataValidation> {
    return validateLocalData(this.store, this.config);
  }

  // ── Import ───────────────────────────────────────────────────────────

  /**
   * Parse `bytes` and preview the import against the store. Nothing is
   * written until {@link confirmImport}. An earlier preview expires.
   */
  async startImport(bytes: Uint8Array): Promise<ImportPreview> {
    const tracker = new OperationProgressTracker('preview', PREVIEW_PHASES);
    const subscription = tracker.progress$.subscribe((progress) => this.progress$$.next(progress));

    try {
      return await runOperation(
        tracker,
        async (scope) => {
          scope.enterPhase('parsing');
          const parsed = await parseSnapshot(bytes);
          const preview = await buildPreview(parsed, this.store, { config: this.config, scope });
          this.pending = { preview, snapshot: parsed.snapshot };
          return preview;
        },
        {
          logger: this.logger,
          lock: this.lock,
          onStart: (token) => this.begin(token),
          onSettled: (token, failure) => this.end(token, failure),
        }
      );
    } finally {
      subscription.unsubscribe();
    }
  }

  async startImportFromFile(filePath: string): Promise<ImportPreview> {
    return this.startImport(await readSnapshotFile(filePath));
  }

  /**
   * Apply a previewed import. The preview stays available after a failure
   * so the caller can retry with other options.
   */
  confirmImport(preview: ImportPreview, options: ImportOptions): Observable<PipelineEvent<ImportResult>> {
    const pending = this.pending;
    if (pending?.preview.id !== preview.id) {
      return throwError(() => new PreviewExpiredError(preview.id));
    }

    return applySnapshot(pending.snapshot, preview, options, this.store, {
      config: this.config,
      lock: this.lock,
      onStart: (token) => this.begin(token),
      onSettled: (token, failure) => this.end(token, failure),
    }).pipe(
      tap((event) => {
        this.relay(event);
        if (event.kind === 'result' && this.pending === pending) {
          this.pending = null;
        }
      })
    );
  }

  /** Forget a preview the user declined. Returns false if it was unknown. */
  discardImport(preview: ImportPreview): boolean {
    if (!this.hasPendingImport(preview.id)) return false;
    this.pending = null;
    return true;
  }

  hasPendingImport(previewId: string): boolean {
    return this.pending?.preview.id === previewId;
  }

  /**
   * Request cancellation of the operation holding the store. Returns
   * false when nothing is running.
   */
  cancelCurrentOperation(): boolean {
    if (!this.current) return false;
    this.logger.info('Cancellation requested', { operation: this.current.operation });
    this.current.cancel();
    return true;
  }

  // ── Errors ───────────────────────────────────────────────────────────

  classify(error: unknown): ClassifiedError {
    return classify(error);
  }

  recoveryOptions(error: unknown, context?: RecoveryContext): RecoveryOption[] {
    return recoveryOptions(error, context);
  }

  /** Cancel whatever runs and drop the pending preview */
  dispose(): void {
    this.current?.cancel();
    this.pending = null;
    this.operationLog.dispose();
    this.progress$$.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private begin(token: CancellationToken): void {
    this.current = token;
    this.operationLog.begin(token.operation);
  }

  private end(token: CancellationToken, failure: InterchangeError | null): void {
    this.operationLog.settle(failure);
    if (this.current === token) {
      this.current = null;
    }
  }

  private relay<T>(event: PipelineEvent<T>): void {
    if (event.kind === 'progress') {
      this.progress$$.next(event.progress);
    }
  }
}

export function createDataInterchangeService(
  config: DataInterchangeServiceConfig
): DataInterchangeService {
  return new DataInterchangeService(config);
}
