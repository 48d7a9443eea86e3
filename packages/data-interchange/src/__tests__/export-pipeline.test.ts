import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  InsufficientStorageError,
  InterchangeError,
  isCredentialPreferenceKey,
} from '@quipkeep/core';
import {
  DEFAULT_EXPORT_OPTIONS,
  SECURE_EXPORT_OPTIONS,
  createComplianceAnalyzer,
} from '@quipkeep/compliance';
import { createMemoryLocalStore, type KeyValueLocalStore } from '@quipkeep/storage-memory';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { tap } from 'rxjs';
import { estimateExportSize, exportSnapshot, validateLocalData } from '../export-pipeline.js';
import { CancellationToken } from '../operation-lock.js';
import { deserializeSnapshot } from '../snapshot-codec.js';
import { FileSnapshotSink, MemorySnapshotSink } from '../snapshot-sink.js';
import { EXPORT_PHASES, type ExportResult } from '../types.js';
import {
  EXPORT_TIME,
  TEST_CONFIG,
  collect,
  collectFailure,
  phaseSequence,
  record,
  records,
} from './helpers.js';

const FAVORITES = ['r0', 'r5', 'r10', 'r15', 'r20'];
const pipelineOptions = { config: TEST_CONFIG, now: () => new Date(EXPORT_TIME) };

describe('exportSnapshot', () => {
  let store: KeyValueLocalStore;
  let sink: MemorySnapshotSink;

  beforeEach(async () => {
    store = await createMemoryLocalStore({
      records: records(42),
      favoriteIds: FAVORITES,
      preferences: { language: 'en', theme: 'dark', 'api.key': 'test-secret' },
    });
    sink = new MemorySnapshotSink();
  });

  it('should export every record and favorite', async () => {
    const options = { ...DEFAULT_EXPORT_OPTIONS, includeCredentials: false, includeDeviceInfo: true };
    const { result } = await collect(exportSnapshot(options, store, sink, pipelineOptions));
    const { snapshot } = result;

    expect(snapshot.contentRecords).toHaveLength(42);
    expect(snapshot.favoriteIds).toEqual(FAVORITES);
    expect(snapshot.deviceInfo).toEqual(TEST_CONFIG.deviceInfo);
    expect(Object.keys(snapshot.preferences).some(isCredentialPreferenceKey)).toBe(false);
    expect(snapshot.schemaVersion).toBe(2);
    expect(snapshot.appVersion).toBe('2.1.0');
    expect(snapshot.exportTimestamp).toBe(EXPORT_TIME);

    const issues = createComplianceAnalyzer().analyze(options).issues;
    expect(issues.filter((i) => i.severity === 'high')).toEqual([]);
  });

  it('should write the snapshot through the sink', async () => {
    const { result } = await collect(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, sink, pipelineOptions)
    );

    expect(result.location).toBe('memory://quipkeep-export-2024-03-01T10-00-00Z.json');
    expect(result.checksum).toMatch(/^[0-9a-f]{64}$/);
    expect(result.snapshot.checksum).toBe(result.checksum);

    const written = sink.read(result.location);
    expect(written?.byteLength).toBe(result.sizeBytes);
    expect(written && deserializeSnapshot(written)).toEqual(result.snapshot);
  });

  it('should walk every phase in order', async () => {
    const { progress } = await collect(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, sink, pipelineOptions)
    );

    expect(phaseSequence(progress)).toEqual([...EXPORT_PHASES]);
    const fractions = progress.map((p) => p.fraction);
    expect(fractions).toEqual([...fractions].sort((a, b) => a - b));
    expect(fractions[fractions.length - 1]).toBe(1);
  });

  it('should take favorite flags from the favorite set', async () => {
    await store.putRecord({ ...(await store.readAllRecords())[1]!, isFavorite: true });

    const { result } = await collect(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, sink, pipelineOptions)
    );
    const flagged = result.snapshot.contentRecords.filter((r) => r.isFavorite).map((r) => r.id);
    expect(flagged).toEqual(FAVORITES);
  });

  it('should drop favorites without a record', async () => {
    await store.writeFavoriteIds(new Set([...FAVORITES, 'ghost']));

    const { result } = await collect(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, sink, pipelineOptions)
    );
    expect(result.snapshot.favoriteIds).toEqual(FAVORITES);
  });

  it('should include credentials only on request', async () => {
    const { result } = await collect(
      exportSnapshot({ ...DEFAULT_EXPORT_OPTIONS, includeCredentials: true }, store, sink, pipelineOptions)
    );
    expect(result.snapshot.preferences).toEqual({
      language: 'en',
      theme: 'dark',
      'api.key': 'test-secret',
    });
  });

  it('should omit device info and redact content with the secure preset', async () => {
    await store.putRecord(record('r3', { content: 'Ask jane@example.com about it' }));

    const { result } = await collect(
      exportSnapshot(SECURE_EXPORT_OPTIONS, store, sink, pipelineOptions)
    );
    expect(result.snapshot.deviceInfo).toBeNull();
    expect(result.snapshot.contentRecords.find((r) => r.id === 'r3')?.content).toBe(
      'Ask [EMAIL] about it'
    );
    expect(result.snapshot.usageStatistics).toMatchObject({ totalRecords: 42, totalFavorites: 5 });
  });

  it('should leave out usage statistics when not requested', async () => {
    const { result } = await collect(
      exportSnapshot(
        { ...DEFAULT_EXPORT_OPTIONS, includeUsageStatistics: false },
        store,
        sink,
        pipelineOptions
      )
    );
    expect(result.snapshot.usageStatistics).toBeNull();
  });

  it('should fail before writing when the sink lacks space', async () => {
    const small = new MemorySnapshotSink(10);

    const { progress, error } = await collectFailure(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, small, pipelineOptions)
    );

    expect(error).toBeInstanceOf(InsufficientStorageError);
    expect(error).toMatchObject({ available: 10, operation: { phase: 'writing' } });
    expect(progress[progress.length - 1]!.phase).toBe('failed');
    expect(small.pendingCount).toBe(0);
    expect(small.committedLocations).toEqual([]);
  });

  it('should enforce the configured size limit', async () => {
    const { error } = await collectFailure(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, sink, {
        ...pipelineOptions,
        config: { ...TEST_CONFIG, maxSnapshotBytes: 100 },
      })
    );

    expect(error).toMatchObject({
      kind: 'insufficientStorage',
      available: 100,
      operation: { phase: 'serializing' },
    });
  });

  it('should report a failing store read as a storage error', async () => {
    store.readAllRecords = async () => {
      throw new Error('disk gone');
    };

    const { error } = await collectFailure(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, sink, pipelineOptions)
    );
    expect(InterchangeError.isKind(error, 'storage')).toBe(true);
    expect(error).toMatchObject({
      message: 'Local store read failed: disk gone',
      operation: { phase: 'collectingData' },
    });
  });

  describe('with a file sink', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'quipkeep-export-'));
    });

    afterEach(async () => {
      await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('should write the snapshot file', async () => {
      const { result } = await collect(
        exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, new FileSnapshotSink(dir), pipelineOptions)
      );

      expect(await fs.promises.readdir(dir)).toEqual(['quipkeep-export-2024-03-01T10-00-00Z.json']);
      const bytes = new Uint8Array(await fs.promises.readFile(result.location));
      expect(deserializeSnapshot(bytes)).toEqual(result.snapshot);
    });

    it('should leave no file behind when cancelled while writing', async () => {
      const token = new CancellationToken('export');

      const { error } = await collectFailure<ExportResult>(
        exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, new FileSnapshotSink(dir), {
          ...pipelineOptions,
          token,
        }).pipe(
          tap((event) => {
            if (event.kind === 'progress' && event.progress.phase === 'writing') token.cancel();
          })
        )
      );

      expect(InterchangeError.isKind(error, 'operationCancelled')).toBe(true);
      expect(await fs.promises.readdir(dir)).toEqual([]);
    });
  });
});

describe('estimateExportSize', () => {
  it('should match the size of the actual export', async () => {
    const store = await createMemoryLocalStore({ records: records(12), favoriteIds: ['r1', 'r2'] });

    const estimate = await estimateExportSize(store, DEFAULT_EXPORT_OPTIONS, TEST_CONFIG);
    const { result } = await collect(
      exportSnapshot(DEFAULT_EXPORT_OPTIONS, store, new MemorySnapshotSink(), pipelineOptions)
    );

    expect(estimate).toEqual({ recordCount: 12, favoriteCount: 2, estimatedBytes: result.sizeBytes });
  });
});

describe('validateLocalData', () => {
  it('should list duplicate ids, invalid records and orphaned favorites', async () => {
    const store = await createMemoryLocalStore({
      records: [record('r1'), record('r1'), record('r2', { intensity: 9 })],
      favoriteIds: ['r2', 'ghost'],
    });

    expect(await validateLocalData(store, TEST_CONFIG)).toEqual({
      isValid: false,
      recordCount: 3,
      issues: [
        'Duplicate record id "r1"',
        'Record "r2" has intensity 9 outside 1..5',
        'Favorite "ghost" has no record',
      ],
    });
  });

  it('should accept clean data', async () => {
    const store = await createMemoryLocalStore({ records: records(3), favoriteIds: ['r0'] });
    expect(await validateLocalData(store)).toEqual({ isValid: true, recordCount: 3, issues: [] });
  });
});
