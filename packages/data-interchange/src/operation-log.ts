/**
 * Log entries of the operation in flight, kept for the last one that
 * failed so the UI can attach them to a problem report.
 *
 * @module operation-log
 */

import type { InterchangeError, LogEntry, Logger, OperationKind } from '@quipkeep/core';

export const DEFAULT_OPERATION_LOG_SIZE = 200;

export interface FailedOperationLog {
  readonly operation: OperationKind;
  readonly failure: InterchangeError;
  /** Entries logged while it ran, oldest first */
  readonly entries: readonly LogEntry[];
}

export class OperationLog {
  private readonly maxEntries: number;
  private readonly stopObserving: () => void;
  private current: { readonly operation: OperationKind; readonly entries: LogEntry[] } | null = null;
  private failed: FailedOperationLog | null = null;

  constructor(logger: Logger, maxEntries = DEFAULT_OPERATION_LOG_SIZE) {
    this.maxEntries = maxEntries;
    this.stopObserving = logger.observe((entry) => this.record(entry));
  }

  get lastFailure(): FailedOperationLog | null {
    return this.failed;
  }

  begin(operation: OperationKind): void {
    this.current = { operation, entries: [] };
  }

  /** Close the running operation; `failure` keeps its entries */
  settle(failure: InterchangeError | null): void {
    if (this.current && failure) {
      this.failed = { operation: this.current.operation, failure, entries: this.current.entries };
    }
    this.current = null;
  }

  dispose(): void {
    this.stopObserving();
    this.current = null;
  }

  private record(entry: LogEntry): void {
    if (!this.current) return;
    const { entries } = this.current;
    entries.push(entry);
    if (entries.length > this.maxEntries) {
      entries.splice(0, entries.length - this.maxEntries);
    }
  }
}
