/**
 * Serializes export, preview and import operations against one local
 * store. Waiters are granted the lock in arrival order.
 *
 * @example
 * ```typescript
 * const lock = createOperationLock();
 * const lease = await lock.acquire('import');
 * try {
 *   // ... exclusive work ...
 * } finally {
 *   lock.release(lease);
 * }
 * ```
 */

import { OperationCancelledError, type OperationKind } from '@quipkeep/core';

export interface OperationLease {
  readonly leaseId: string;
  readonly operation: OperationKind;
  readonly acquiredAt: number;
}

export interface OperationLock {
  acquire(operation: OperationKind): Promise<OperationLease>;
  release(lease: OperationLease): void;
  /** Acquire, run `fn`, release whether or not it fails */
  run<T>(operation: OperationKind, fn: (lease: OperationLease) => Promise<T>): Promise<T>;
  isLocked(): boolean;
  getHolder(): OperationLease | null;
  getPendingCount(): number;
}

let leaseCounter = 0;

export function createOperationLock(): OperationLock {
  let holder: OperationLease | null = null;
  const waiters: { operation: OperationKind; grant: (lease: OperationLease) => void }[] = [];

  function grant(operation: OperationKind): OperationLease {
    const lease: OperationLease = {
      leaseId: `lease_${++leaseCounter}`,
      operation,
      acquiredAt: Date.now(),
    };
    holder = lease;
    return lease;
  }

  async function acquire(operation: OperationKind): Promise<OperationLease> {
    if (!holder) {
      return grant(operation);
    }
    return new Promise<OperationLease>((resolve) => {
      waiters.push({ operation, grant: resolve });
    });
  }

  function release(lease: OperationLease): void {
    if (holder?.leaseId !== lease.leaseId) return;
    holder = null;

    const next = waiters.shift();
    if (next) {
      next.grant(grant(next.operation));
    }
  }

  async function run<T>(
    operation: OperationKind,
    fn: (lease: OperationLease) => Promise<T>
  ): Promise<T> {
    const lease = await acquire(operation);
    try {
      return await fn(lease);
    } finally {
      release(lease);
    }
  }

  return {
    acquire,
    release,
    run,
    isLocked: () => holder !== null,
    getHolder: () => holder,
    getPendingCount: () => waiters.length,
  };
}

/**
 * Cooperative cancellation flag, checked by pipelines between items and
 * phases.
 */
export class CancellationToken {
  readonly operation: OperationKind;
  private cancelled = false;

  constructor(operation: OperationKind) {
    this.operation = operation;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    this.cancelled = true;
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new OperationCancelledError(this.operation);
    }
  }
}
