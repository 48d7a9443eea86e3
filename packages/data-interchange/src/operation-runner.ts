/**
 * Shared driver for long-running operations: lock, cancellation, progress
 * completion and failure reporting.
 *
 * @module operation-runner
 */

import {
  ensureInterchangeError,
  type InterchangeError,
  type Logger,
  type OperationKind,
} from '@quipkeep/core';
import { Observable, asyncScheduler, subscribeOn } from 'rxjs';
import { CancellationToken, type OperationLock } from './operation-lock.js';
import { OperationProgressTracker } from './operation-progress.js';
import type { OperationPhase, PipelineEvent } from './types.js';

/**
 * Handed to the body of an operation.
 */
export interface OperationScope {
  readonly tracker: OperationProgressTracker;
  readonly logger: Logger;
  /** Throws OperationCancelledError once cancellation was requested */
  checkpoint(): void;
  /** Checkpoint, then move to `phase` */
  enterPhase(phase: OperationPhase, totalItems?: number): void;
}

export interface RunOperationOptions {
  readonly logger: Logger;
  /** Held for the whole operation when given */
  readonly lock?: OperationLock;
  readonly token?: CancellationToken;
  /** Called with the operation's token once it holds the lock */
  readonly onStart?: (token: CancellationToken) => void;
  /**
   * Called after the operation finished, before the lock is released.
   * `failure` is null on success.
   */
  readonly onSettled?: (token: CancellationToken, failure: InterchangeError | null) => void;
}

export type OperationBody<T> = (scope: OperationScope) => Promise<T>;

/**
 * Run `body` to completion. The returned promise rejects with an
 * InterchangeError that carries the operation context.
 */
export async function runOperation<T>(
  tracker: OperationProgressTracker,
  body: OperationBody<T>,
  options: RunOperationOptions
): Promise<T> {
  const token = options.token ?? new CancellationToken(tracker.operation);
  const logger = options.logger;

  const scope: OperationScope = {
    tracker,
    logger,
    checkpoint: () => token.throwIfCancelled(),
    enterPhase(phase, totalItems) {
      token.throwIfCancelled();
      tracker.enterPhase(phase, totalItems);
      logger.debug(`${tracker.operation} phase ${phase}`, totalItems ? { totalItems } : undefined);
    },
  };

  const execute = async (): Promise<T> => {
    options.onStart?.(token);
    const end = logger.time(tracker.operation);
    let failure: InterchangeError | null = null;
    try {
      token.throwIfCancelled();
      const result = await body(scope);
      tracker.complete();
      end();
      logger.info(`${tracker.operation} completed`);
      return result;
    } catch (error) {
      failure = ensureInterchangeError(error);
      tracker.fail(failure);
      if (failure.kind === 'operationCancelled') {
        logger.info(`${tracker.operation} cancelled`, { phase: failure.operation?.phase });
      } else {
        logger.error(`${tracker.operation} failed`, failure, {
          code: failure.code,
          phase: failure.operation?.phase,
        });
      }
      throw failure;
    } finally {
      options.onSettled?.(token, failure);
    }
  };

  return options.lock ? options.lock.run(tracker.operation, execute) : execute();
}

/**
 * Run `body` as a cold Observable of pipeline events. Work starts on
 * subscription, off the caller's stack; unsubscribing cancels it.
 */
export function runPipeline<T>(
  operation: OperationKind,
  phases: readonly OperationPhase[],
  body: OperationBody<T>,
  options: RunOperationOptions
): Observable<PipelineEvent<T>> {
  return new Observable<PipelineEvent<T>>((subscriber) => {
    const token = options.token ?? new CancellationToken(operation);
    const tracker = new OperationProgressTracker(operation, phases);
    const progressSubscription = tracker.progress$.subscribe((progress) =>
      subscriber.next({ kind: 'progress', progress })
    );

    void runOperation(tracker, body, { ...options, token }).then(
      (result) => {
        subscriber.next({ kind: 'result', result });
        subscriber.complete();
      },
      (error: unknown) => subscriber.error(error)
    );

    return () => {
      token.cancel();
      progressSubscription.unsubscribe();
    };
  }).pipe(subscribeOn(asyncScheduler));
}
