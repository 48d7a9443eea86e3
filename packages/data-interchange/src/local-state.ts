import {
  StorageError,
  captureLocalState,
  ensureInterchangeError,
  type LocalStateCapture,
  type LocalStore,
} from '@quipkeep/core';

/**
 * Point-in-time read of the whole store; failures surface as StorageError.
 */
export async function readLocalState(store: LocalStore): Promise<LocalStateCapture> {
  try {
    return await captureLocalState(store);
  } catch (error) {
    throw ensureInterchangeError(error, (cause) => new StorageError('read', cause));
  }
}
