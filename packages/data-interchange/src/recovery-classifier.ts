/**
 * Maps failures to user-facing recovery choices. The classifier only
 * recommends; it never retries or skips anything itself.
 *
 * @module recovery-classifier
 */

import {
  ensureInterchangeError,
  type InterchangeError,
  type InterchangeErrorKind,
} from '@quipkeep/core';
import type {
  ClassifiedError,
  RecoveryContext,
  RecoveryOption,
  RecoveryStrategy,
} from './types.js';

export function classify(error: unknown): ClassifiedError {
  const failure = ensureInterchangeError(error);
  return {
    kind: failure.kind,
    code: failure.code,
    message: failure.message,
    recoverySuggestion: failure.suggestion,
  };
}

function rankedStrategies(kind: InterchangeErrorKind, context: RecoveryContext): RecoveryStrategy[] {
  switch (kind) {
    case 'insufficientStorage':
      return ['freeStorageAndRetry', 'abort'];
    case 'corruptedData':
      return context.importOptions?.allowPartialImport ? ['skipAndContinue', 'abort'] : ['abort'];
    case 'versionMismatch':
      return ['abort'];
    case 'serialization':
    case 'storage':
    case 'operationCancelled':
    case 'previewExpired':
      return ['retry', 'abort'];
    case 'partialImportExceeded':
      return ['abort', 'skipAndContinue'];
    case 'unknown':
      return ['abort', 'retry'];
  }
}

function describe(strategy: RecoveryStrategy, error: InterchangeError): Omit<RecoveryOption, 'isRecommended'> {
  switch (strategy) {
    case 'retry':
      return { strategy, title: 'Try again', description: 'Run the operation again.' };
    case 'skipAndContinue':
      return {
        strategy,
        title: 'Skip invalid records',
        description:
          error.kind === 'partialImportExceeded'
            ? 'Import the remaining records with a larger error budget.'
            : 'Import again and skip records that cannot be imported.',
      };
    case 'freeStorageAndRetry':
      return {
        strategy,
        title: 'Free up space and retry',
        description:
          typeof error.context['required'] === 'number'
            ? `Free up space so that at least ${error.context['required']} bytes are available, then try again.`
            : 'Free up storage space, then try again.',
      };
    case 'abort':
      return {
        strategy,
        title: 'Cancel',
        description:
          error.kind === 'partialImportExceeded'
            ? 'Stop here. Records already imported are kept.'
            : 'Stop here. Your data is unchanged.',
      };
  }
}

/**
 * Recovery options for `error`, recommended option first. Exactly one
 * option is recommended.
 */
export function recoveryOptions(error: unknown, context: RecoveryContext = {}): RecoveryOption[] {
  const failure = ensureInterchangeError(error);
  return rankedStrategies(failure.kind, context).map((strategy, index) => ({
    ...describe(strategy, failure),
    isRecommended: index === 0,
  }));
}
