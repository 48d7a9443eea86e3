/**
 * Import parser: external bytes to a validated, current-version snapshot.
 *
 * Parsing is all-or-nothing: any structural problem rejects the whole
 * file. Semantic problems in individual records are left to the preview.
 *
 * @module import-parser
 */

import { StorageError } from '@quipkeep/core';
import * as fs from 'node:fs';
import { verifyChecksum } from './integrity.js';
import { decodeSnapshot } from './snapshot-codec.js';
import { CURRENT_SCHEMA_VERSION } from './snapshot-schema.js';
import type { ParsedSnapshot } from './types.js';

/**
 * Parse snapshot bytes.
 *
 * Snapshots from an older schema are migrated and reported with
 * `isCompatible: false`; the import may still continue.
 *
 * @throws CorruptedDataError for malformed input
 * @throws VersionMismatchError for a newer schema version
 */
export async function parseSnapshot(bytes: Uint8Array): Promise<ParsedSnapshot> {
  const decoded = decodeSnapshot(bytes);
  const integrity = await verifyChecksum(decoded.raw);

  return {
    snapshot: decoded.snapshot,
    sourceSchemaVersion: decoded.sourceSchemaVersion,
    isCompatible: decoded.sourceSchemaVersion === CURRENT_SCHEMA_VERSION,
    integrity,
  };
}

/**
 * Read a snapshot file chosen by the user.
 */
export async function readSnapshotFile(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.promises.readFile(filePath));
  } catch (error) {
    throw new StorageError(`read of "${filePath}"`, error instanceof Error ? error : undefined);
  }
}
