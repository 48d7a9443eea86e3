/**
 * Snapshot codec: bytes in, validated current-version snapshot out.
 *
 * Serialized snapshots are UTF-8 JSON with object keys sorted at every
 * level, so equal snapshots always produce equal bytes.
 *
 * @module snapshot-codec
 */

import { CorruptedDataError, SerializationError, VersionMismatchError } from '@quipkeep/core';
import { z } from 'zod';
import { migrateSnapshot } from './schema-migrations.js';
import {
  CURRENT_SCHEMA_VERSION,
  assertUniqueIdentifiers,
  parseWithSchema,
  snapshotSchema,
  type Snapshot,
} from './snapshot-schema.js';

export interface SerializeOptions {
  /** Indent with two spaces (default: true) */
  pretty?: boolean;
}

/**
 * A decoded snapshot together with what the file originally contained.
 */
export interface DecodedSnapshot {
  readonly snapshot: Snapshot;
  /** Schema version found in the file, before migration */
  readonly sourceSchemaVersion: number;
  /** The parsed JSON object as found in the file */
  readonly raw: Readonly<Record<string, unknown>>;
}

const versionProbeSchema = z.object({
  schemaVersion: z.number().int().positive(),
});

const encoder = new TextEncoder();

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep copy of `value` with object keys in sorted order.
 */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isJsonObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(value[key]);
    }
    return sorted;
  }
  return value;
}

/** Compact JSON with sorted keys */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * Encode a snapshot as UTF-8 JSON.
 *
 * @throws SerializationError when the value cannot be encoded
 */
export function serializeSnapshot(snapshot: Snapshot, options: SerializeOptions = {}): Uint8Array {
  let text: string;
  try {
    text = JSON.stringify(canonicalize(snapshot), null, options.pretty === false ? undefined : 2);
  } catch (error) {
    throw new SerializationError(error instanceof Error ? error : undefined);
  }
  return encoder.encode(text);
}

/**
 * Decode, migrate and validate snapshot bytes.
 *
 * @throws CorruptedDataError for invalid UTF-8, invalid JSON, missing or
 * mistyped fields and duplicate identifiers
 * @throws VersionMismatchError for a schema version newer than this build
 */
export function decodeSnapshot(bytes: Uint8Array): DecodedSnapshot {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new CorruptedDataError('$', 'Invalid UTF-8 byte sequence', {
      code: 'QK_D101',
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorruptedDataError('$', `Invalid JSON: ${reason}`, {
      code: 'QK_D101',
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new CorruptedDataError('$', 'Expected a JSON object', { code: 'QK_D102' });
  }

  const { schemaVersion } = parseWithSchema(versionProbeSchema, parsed);
  if (schemaVersion > CURRENT_SCHEMA_VERSION) {
    throw new VersionMismatchError(schemaVersion, CURRENT_SCHEMA_VERSION);
  }

  const migrated = schemaVersion < CURRENT_SCHEMA_VERSION ? migrateSnapshot(parsed, schemaVersion) : parsed;
  const snapshot = parseWithSchema(snapshotSchema, migrated);
  assertUniqueIdentifiers(snapshot);

  return { snapshot, sourceSchemaVersion: schemaVersion, raw: parsed };
}

export function deserializeSnapshot(bytes: Uint8Array): Snapshot {
  return decodeSnapshot(bytes).snapshot;
}
