import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InterchangeError, createLogger, type LogEntry } from '@quipkeep/core';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  FileSnapshotSink,
  MemorySnapshotSink,
  SNAPSHOT_FILE_MODE,
  snapshotFileName,
} from '../snapshot-sink.js';

const payload = new TextEncoder().encode('{"schemaVersion":2}');

describe('snapshotFileName', () => {
  it('should derive a file-system safe name from the export time', () => {
    expect(snapshotFileName('2024-03-01T10:00:00.000Z')).toBe('quipkeep-export-2024-03-01T10-00-00Z.json');
  });
});

describe('FileSnapshotSink', () => {
  let dir: string;
  let sink: FileSnapshotSink;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'quipkeep-sink-'));
    sink = new FileSnapshotSink(dir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should keep the payload out of its final name until commit', async () => {
    const pending = await sink.write(payload, 'export.json');

    expect(await fs.promises.readdir(dir)).toEqual([path.basename(pending.tempLocation)]);

    const location = await pending.commit();
    expect(location).toBe(path.join(dir, 'export.json'));
    expect(await fs.promises.readdir(dir)).toEqual(['export.json']);
    expect(await fs.promises.readFile(location, 'utf8')).toBe('{"schemaVersion":2}');
  });

  it('should make snapshot files readable by the owner only', async () => {
    const location = await (await sink.write(payload, 'export.json')).commit();

    expect((await fs.promises.stat(location)).mode & 0o777).toBe(SNAPSHOT_FILE_MODE);
  });

  it('should report the write failure when removing the temporary file fails too', async () => {
    const entries: LogEntry[] = [];
    const logged = new FileSnapshotSink(dir, createLogger({ module: 'test', handler: (e) => entries.push(e) }));
    vi.spyOn(fs.promises, 'writeFile').mockRejectedValueOnce(new Error('device busy'));
    vi.spyOn(fs.promises, 'rm').mockRejectedValueOnce(new Error('permission denied'));

    const error = await logged.write(payload, 'export.json').catch((e: unknown) => e);

    expect(InterchangeError.isKind(error, 'storage')).toBe(true);
    expect(error instanceof Error && error.message).toMatch(/failed: device busy$/);
    expect(entries.map((e) => [e.level, e.message, e.context?.['reason']])).toEqual([
      ['warn', 'Removing temporary snapshot failed', 'permission denied'],
    ]);
  });

  it('should leave nothing behind when discarded', async () => {
    const pending = await sink.write(payload, 'export.json');
    await pending.discard();
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it('should report free space', async () => {
    const available = await sink.availableBytes();
    expect(typeof available).toBe('number');
    expect(available).toBeGreaterThan(0);
  });

  it('should report a missing directory as a storage error', async () => {
    const missing = new FileSnapshotSink(path.join(dir, 'nope'));
    const error = await missing.write(payload, 'export.json').catch((e: unknown) => e);
    expect(InterchangeError.isKind(error, 'storage')).toBe(true);
  });
});

describe('MemorySnapshotSink', () => {
  it('should track capacity of committed payloads', async () => {
    const sink = new MemorySnapshotSink(100);
    const pending = await sink.write(payload, 'export.json');
    expect(sink.pendingCount).toBe(1);
    expect(await sink.availableBytes()).toBe(100);

    const location = await pending.commit();
    expect(location).toBe('memory://export.json');
    expect(sink.pendingCount).toBe(0);
    expect(sink.committedLocations).toEqual(['memory://export.json']);
    expect(sink.read(location)).toEqual(payload);
    expect(await sink.availableBytes()).toBe(100 - payload.byteLength);
  });

  it('should report unknown capacity when unlimited', async () => {
    expect(await new MemorySnapshotSink().availableBytes()).toBeNull();
  });

  it('should drop discarded payloads', async () => {
    const sink = new MemorySnapshotSink();
    const pending = await sink.write(payload, 'export.json');
    await pending.discard();
    expect(sink.pendingCount).toBe(0);
    expect(sink.committedLocations).toEqual([]);
  });
});
