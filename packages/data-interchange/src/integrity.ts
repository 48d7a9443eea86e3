import { canonicalJson } from './snapshot-codec.js';

/**
 * Outcome of checking a snapshot's embedded checksum
 */
export type IntegrityStatus = 'verified' | 'mismatch' | 'absent';

/**
 * Compute SHA-256 hash of a string and return as hex.
 */
async function sha256(input: string): Promise<string> {
  const data = new TextEncoder().encode(input);
  const hashBuffer = await globalThis.crypto.subtle.digest('SHA-256', data);
  const hashArray = new Uint8Array(hashBuffer);
  return Array.from(hashArray)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Checksum of a snapshot: SHA-256 over its canonical JSON with `checksum`
 * set to null. Independent of pretty printing.
 */
export async function computeChecksum(snapshot: object): Promise<string> {
  return sha256(canonicalJson({ ...snapshot, checksum: null }));
}

/**
 * Verify the checksum embedded in a snapshot object as found in a file,
 * before any migration.
 */
export async function verifyChecksum(raw: Readonly<Record<string, unknown>>): Promise<IntegrityStatus> {
  const expected = raw['checksum'];
  if (typeof expected !== 'string' || expected.length === 0) {
    return 'absent';
  }
  const actual = await computeChecksum(raw);
  return actual === expected.toLowerCase() ? 'verified' : 'mismatch';
}
