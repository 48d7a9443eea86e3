import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InterchangeError, VersionMismatchError } from '@quipkeep/core';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseSnapshot, readSnapshotFile } from '../import-parser.js';
import { computeChecksum, verifyChecksum } from '../integrity.js';
import { serializeSnapshot } from '../snapshot-codec.js';
import { bytesOf, snapshot } from './helpers.js';

async function signed() {
  const unsigned = snapshot();
  return { ...unsigned, checksum: await computeChecksum(unsigned) };
}

describe('integrity', () => {
  it('should produce a lowercase SHA-256 hex digest', async () => {
    expect(await computeChecksum(snapshot())).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should ignore the embedded checksum when hashing', async () => {
    const plain = await computeChecksum(snapshot());
    expect(await computeChecksum(snapshot({ checksum: 'ffff' }))).toBe(plain);
  });

  it('should not depend on pretty printing', async () => {
    const signedSnapshot = await signed();
    for (const pretty of [true, false]) {
      const raw = JSON.parse(new TextDecoder().decode(serializeSnapshot(signedSnapshot, { pretty })));
      expect(await verifyChecksum(raw)).toBe('verified');
    }
  });

  it('should accept an upper-case checksum', async () => {
    const signedSnapshot = await signed();
    const raw = { ...signedSnapshot, checksum: signedSnapshot.checksum.toUpperCase() };
    expect(await verifyChecksum(raw)).toBe('verified');
  });

  it('should detect modified content', async () => {
    const signedSnapshot = await signed();
    const tampered = { ...signedSnapshot, preferences: { language: 'fr' } };
    expect(await verifyChecksum(tampered)).toBe('mismatch');
  });

  it('should report a missing checksum as absent', async () => {
    expect(await verifyChecksum({ ...snapshot(), checksum: null })).toBe('absent');
    expect(await verifyChecksum({ ...snapshot(), checksum: '' })).toBe('absent');
    const { checksum: _checksum, ...withoutChecksum } = snapshot();
    expect(await verifyChecksum(withoutChecksum)).toBe('absent');
  });
});

describe('parseSnapshot', () => {
  it('should parse a current snapshot as compatible and verified', async () => {
    const signedSnapshot = await signed();
    const parsed = await parseSnapshot(serializeSnapshot(signedSnapshot));

    expect(parsed.snapshot).toEqual(signedSnapshot);
    expect(parsed.sourceSchemaVersion).toBe(2);
    expect(parsed.isCompatible).toBe(true);
    expect(parsed.integrity).toBe('verified');
  });

  it('should report a migrated snapshot as not compatible', async () => {
    const parsed = await parseSnapshot(
      bytesOf({
        schemaVersion: 1,
        appVersion: '0.9.0',
        exportTimestamp: '2023-11-20T12:00:00.000Z',
        contentRecords: [],
        favoriteIds: [],
        preferences: {},
      })
    );

    expect(parsed.isCompatible).toBe(false);
    expect(parsed.sourceSchemaVersion).toBe(1);
    expect(parsed.integrity).toBe('absent');
  });

  it('should verify the checksum of a version 1 file against its original content', async () => {
    const v1 = {
      schemaVersion: 1,
      appVersion: '0.9.0',
      exportTimestamp: '2023-11-20T12:00:00.000Z',
      contentRecords: [],
      favoriteIds: [],
      preferences: { language: 'de' },
      checksum: null,
    };
    const parsed = await parseSnapshot(bytesOf({ ...v1, checksum: await computeChecksum(v1) }));
    expect(parsed.integrity).toBe('verified');
  });

  it('should reject a newer schema version', async () => {
    await expect(parseSnapshot(bytesOf(snapshot({ schemaVersion: 7 })))).rejects.toBeInstanceOf(
      VersionMismatchError
    );
  });
});

describe('readSnapshotFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'quipkeep-read-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should read file bytes', async () => {
    const file = path.join(dir, 'export.json');
    await fs.promises.writeFile(file, '{"schemaVersion":2}');
    expect(new TextDecoder().decode(await readSnapshotFile(file))).toBe('{"schemaVersion":2}');
  });

  it('should report a missing file as a storage error', async () => {
    const error = await readSnapshotFile(path.join(dir, 'missing.json')).catch((e: unknown) => e);
    expect(InterchangeError.isKind(error, 'storage')).toBe(true);
  });
});
