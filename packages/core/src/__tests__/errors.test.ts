import { describe, it, expect } from 'vitest';
import {
  CorruptedDataError,
  InsufficientStorageError,
  InterchangeError,
  OperationCancelledError,
  PartialImportExceededError,
  SerializationError,
  VersionMismatchError,
  ensureInterchangeError,
  getErrorCategory,
} from '../errors/index.js';

describe('InterchangeError', () => {
  it('should fill message and suggestion from the error code', () => {
    const error = new InterchangeError({ code: 'QK_S200', kind: 'storage' });
    expect(error.message).toBe('Local store operation failed');
    expect(error.suggestion).toBe('Retry the operation.');
    expect(error.category).toBe('storage');
  });

  it('should map code letters to categories', () => {
    expect(getErrorCategory('QK_D101')).toBe('data');
    expect(getErrorCategory('QK_I300')).toBe('import');
    expect(getErrorCategory('QK_O400')).toBe('operation');
    expect(getErrorCategory('QK_X900')).toBe('internal');
  });

  it('should keep the first operation context', () => {
    const error = new SerializationError();
    error.withOperation({
      operation: 'export',
      phase: 'serializing',
      itemsProcessed: 3,
      totalItems: 5,
      timestamp: '2024-01-01T00:00:00.000Z',
    });
    error.withOperation({
      operation: 'export',
      phase: 'writing',
      itemsProcessed: 5,
      totalItems: 5,
      timestamp: '2024-01-01T00:00:01.000Z',
    });

    expect(error.operation?.phase).toBe('serializing');
  });

  it('should format code, context, operation and suggestion', () => {
    const error = new InsufficientStorageError(200, 100).withOperation({
      operation: 'export',
      phase: 'writing',
      itemsProcessed: 4,
      totalItems: 4,
      timestamp: '2024-01-01T00:00:00.000Z',
    });

    expect(error.format()).toBe(
      [
        '[QK_S201] Insufficient storage: 200 bytes required, 100 bytes available',
        'Context: {"required":200,"available":100}',
        'Operation: export (writing, 4/4)',
        'Suggestion: Free some storage space and retry the export.',
      ].join('\n')
    );
  });

  it('should serialize with its cause', () => {
    const error = new SerializationError(new RangeError('Invalid string length'));
    const json = error.toJSON();

    expect(json.kind).toBe('serialization');
    expect(json.message).toBe('Snapshot serialization failed: Invalid string length');
    expect(json.cause).toEqual({ name: 'RangeError', message: 'Invalid string length' });
  });

  describe('type guards', () => {
    it('should match by kind and code', () => {
      const error = new VersionMismatchError(3, 2);
      expect(InterchangeError.isKind(error, 'versionMismatch')).toBe(true);
      expect(InterchangeError.isKind(error, 'corruptedData')).toBe(false);
      expect(InterchangeError.isCode(error, 'QK_D110')).toBe(true);
      expect(InterchangeError.isInterchangeError(new Error('plain'))).toBe(false);
    });
  });

  describe('subclasses', () => {
    it('should expose corrupted field and reason', () => {
      const error = new CorruptedDataError('contentRecords[2].id', 'Required');
      expect(error.field).toBe('contentRecords[2].id');
      expect(error.message).toBe('Corrupted data at "contentRecords[2].id": Required');
      expect(error.code).toBe('QK_D100');
    });

    it('should report committed and pending records', () => {
      const error = new PartialImportExceededError(3, ['a', 'b'], ['c'], 2);
      expect(error.recordsCommitted).toBe(2);
      expect(error.pendingRecordIds).toEqual(['c']);
      expect(error.context).toEqual({
        errorsEncountered: 3,
        recordsCommitted: 2,
        pendingRecords: 1,
        maxErrorsAllowed: 2,
      });
    });

    it('should name the cancelled operation', () => {
      expect(new OperationCancelledError('import').message).toBe(
        'The import operation was cancelled'
      );
    });
  });
});

describe('ensureInterchangeError', () => {
  it('should return interchange errors unchanged', () => {
    const error = new SerializationError();
    expect(ensureInterchangeError(error)).toBe(error);
  });

  it('should wrap foreign errors as unknown by default', () => {
    const wrapped = ensureInterchangeError(new Error('boom'));
    expect(wrapped.kind).toBe('unknown');
    expect(wrapped.code).toBe('QK_X900');
    expect(wrapped.cause?.message).toBe('boom');
  });

  it('should use the provided wrapper', () => {
    const wrapped = ensureInterchangeError('not an error', (cause) => new SerializationError(cause));
    expect(wrapped.kind).toBe('serialization');
    expect(wrapped.cause?.message).toBe('not an error');
  });
});
