/**
 * Progress tracking for export, preview and import operations.
 *
 * Provides an observable progress stream that walks a fixed list of
 * phases, with per-item progress inside countable phases.
 *
 * @module operation-progress
 */

import type { InterchangeError, OperationContext, OperationKind } from '@quipkeep/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import type { OperationPhase, OperationProgress } from './types.js';

const PHASE_MESSAGES: Record<OperationPhase, string> = {
  preparing: 'Preparing',
  collectingData: 'Collecting local data',
  processingRecords: 'Processing records',
  processingFavorites: 'Processing favorites',
  processingPreferences: 'Processing preferences',
  generatingMetadata: 'Generating metadata',
  serializing: 'Serializing snapshot',
  writing: 'Writing file',
  parsing: 'Parsing snapshot',
  analyzing: 'Comparing with local data',
  validating: 'Validating snapshot',
  saving: 'Saving',
  completed: 'Completed',
  failed: 'Failed',
};

/**
 * Tracks and emits progress for one operation.
 *
 * @example
 * ```typescript
 * const tracker = new OperationProgressTracker('export', EXPORT_PHASES);
 *
 * tracker.progress$.subscribe(p => {
 *   console.log(`${Math.round(p.fraction * 100)}% ${p.message}`);
 * });
 *
 * tracker.enterPhase('processingRecords', records.length);
 * records.forEach((_, i) => tracker.advance(i + 1));
 * tracker.complete();
 * ```
 */
export class OperationProgressTracker {
  readonly operation: OperationKind;
  private readonly phases: readonly OperationPhase[];
  private readonly progress$$: BehaviorSubject<OperationProgress>;
  private readonly destroy$ = new Subject<void>();
  private phase: OperationPhase;
  private itemsProcessed = 0;
  private totalItems = 0;
  private fraction = 0;
  private failure: InterchangeError | null = null;
  private finished = false;

  constructor(operation: OperationKind, phases: readonly OperationPhase[]) {
    const first = phases[0];
    if (first === undefined) {
      throw new RangeError('An operation needs at least one phase');
    }
    this.operation = operation;
    this.phases = phases;
    this.phase = first;
    this.progress$$ = new BehaviorSubject<OperationProgress>(this.buildProgress());
  }

  /** Observable progress stream */
  get progress$(): Observable<OperationProgress> {
    return this.progress$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Get current progress snapshot */
  getProgress(): OperationProgress {
    return this.progress$$.value;
  }

  get currentPhase(): OperationPhase {
    return this.phase;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** Move to `phase`; countable phases pass their item total */
  enterPhase(phase: OperationPhase, totalItems = 0): void {
    if (this.finished) return;
    if (!this.phases.includes(phase)) {
      throw new RangeError(`Unknown ${this.operation} phase "${phase}"`);
    }
    this.phase = phase;
    this.itemsProcessed = 0;
    this.totalItems = totalItems;
    this.raiseFraction(this.phaseStart(phase));
    this.emit();
  }

  /** Report items processed within the current phase */
  advance(itemsProcessed: number): void {
    if (this.finished) return;
    this.itemsProcessed = Math.min(itemsProcessed, this.totalItems);
    if (this.totalItems > 0) {
      const within = this.itemsProcessed / this.totalItems;
      this.raiseFraction(this.phaseStart(this.phase) + within * this.phaseWidth());
    }
    this.emit();
  }

  /** Where the operation currently is, for error reports */
  context(): OperationContext {
    return {
      operation: this.operation,
      phase: this.phase,
      itemsProcessed: this.itemsProcessed,
      totalItems: this.totalItems,
      timestamp: new Date().toISOString(),
    };
  }

  /** Mark the operation as complete */
  complete(): void {
    if (this.isFinished) return;
    this.phase = 'completed';
    this.itemsProcessed = 0;
    this.totalItems = 0;
    this.fraction = 1;
    this.emit();
    this.finish();
  }

  /** Mark the operation as failed; the fraction stays where it was */
  fail(error: InterchangeError): void {
    if (this.isFinished) return;
    error.withOperation(this.context());
    this.phase = 'failed';
    this.failure = error;
    this.emit();
    this.finish();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private phaseWidth(): number {
    return this.phases.length > 1 ? 1 / (this.phases.length - 1) : 1;
  }

  private phaseStart(phase: OperationPhase): number {
    return Math.max(0, this.phases.indexOf(phase)) * this.phaseWidth();
  }

  private raiseFraction(value: number): void {
    this.fraction = Math.min(1, Math.max(this.fraction, value));
  }

  private finish(): void {
    this.finished = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.progress$$.complete();
  }

  private emit(): void {
    if (!this.finished) {
      this.progress$$.next(this.buildProgress());
    }
  }

  private buildProgress(): OperationProgress {
    const label = PHASE_MESSAGES[this.phase];
    return {
      operation: this.operation,
      phase: this.phase,
      fraction: this.fraction,
      itemsProcessed: this.itemsProcessed,
      totalItems: this.totalItems,
      message: this.totalItems > 0 ? `${label} (${this.itemsProcessed}/${this.totalItems})` : label,
      failure: this.failure,
    };
  }
}

/** Factory function */
export function createOperationProgressTracker(
  operation: OperationKind,
  phases: readonly OperationPhase[]
): OperationProgressTracker {
  return new OperationProgressTracker(operation, phases);
}
