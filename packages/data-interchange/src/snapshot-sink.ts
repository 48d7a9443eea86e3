/**
 * Destinations for exported snapshots.
 *
 * A sink writes the payload to a temporary location first. The export
 * pipeline commits only after every phase succeeded and discards the
 * pending write otherwise, so no partial file is ever visible.
 *
 * @module snapshot-sink
 */

import {
  InsufficientStorageError,
  StorageError,
  createLogger,
  type Logger,
} from '@quipkeep/core';
import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface PendingWrite {
  /** Temporary location holding the payload */
  readonly tempLocation: string;
  /** Atomically move the payload to its final location */
  commit(): Promise<string>;
  /** Remove the temporary payload */
  discard(): Promise<void>;
}

export interface SnapshotSink {
  /** Free bytes at the destination, or null when unknown */
  availableBytes(): Promise<number | null>;
  write(payload: Uint8Array, fileName: string): Promise<PendingWrite>;
}

/**
 * File name for a snapshot exported at `exportTimestamp`, e.g.
 * `quipkeep-export-2024-03-01T10-00-00Z.json`.
 */
export function snapshotFileName(exportTimestamp: string): string {
  const stamp = exportTimestamp.replace(/\.\d+Z$/, 'Z').replace(/:/g, '-');
  return `quipkeep-export-${stamp}.json`;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/** Owner read/write only; snapshots may carry credentials */
export const SNAPSHOT_FILE_MODE = 0o600;

/**
 * Writes snapshots into a directory on the local file system.
 */
export class FileSnapshotSink implements SnapshotSink {
  readonly directory: string;
  private readonly logger: Logger;

  constructor(directory: string, logger: Logger = createLogger({ module: 'snapshot-sink' })) {
    this.directory = directory;
    this.logger = logger;
  }

  async availableBytes(): Promise<number | null> {
    try {
      const stats = await fs.promises.statfs(this.directory);
      return stats.bavail * stats.bsize;
    } catch (error) {
      throw new StorageError(`space check of "${this.directory}"`, asError(error));
    }
  }

  async write(payload: Uint8Array, fileName: string): Promise<PendingWrite> {
    const finalPath = path.join(this.directory, fileName);
    const tempPath = path.join(this.directory, `.${fileName}.${randomUUID()}.tmp`);

    try {
      // rename keeps the mode, so the committed file is private too
      await fs.promises.writeFile(tempPath, payload, { mode: SNAPSHOT_FILE_MODE });
    } catch (error) {
      await this.removeTemp(tempPath);
      if (errorCode(error) === 'ENOSPC') {
        throw new InsufficientStorageError(payload.byteLength, 0);
      }
      throw new StorageError(`write of "${tempPath}"`, asError(error));
    }

    return {
      tempLocation: tempPath,
      commit: async () => {
        try {
          await fs.promises.rename(tempPath, finalPath);
        } catch (error) {
          await this.removeTemp(tempPath);
          throw new StorageError(`rename to "${finalPath}"`, asError(error));
        }
        return finalPath;
      },
      discard: () => this.removeTemp(tempPath),
    };
  }

  /** Failures are logged; the caller is already reporting another error */
  private async removeTemp(tempPath: string): Promise<void> {
    await fs.promises.rm(tempPath, { force: true }).catch((error: unknown) => {
      this.logger.warn('Removing temporary snapshot failed', {
        path: tempPath,
        reason: asError(error)?.message ?? String(error),
      });
    });
  }
}

/**
 * Keeps committed snapshots in memory. Used by tests and by callers that
 * hand the bytes to a share sheet themselves.
 */
export class MemorySnapshotSink implements SnapshotSink {
  private readonly committed = new Map<string, Uint8Array>();
  private readonly pending = new Map<string, Uint8Array>();
  private readonly capacity: number | null;

  /** `capacity` in bytes; null for unlimited */
  constructor(capacity: number | null = null) {
    this.capacity = capacity;
  }

  async availableBytes(): Promise<number | null> {
    if (this.capacity === null) return null;
    const used = Array.from(this.committed.values()).reduce((sum, p) => sum + p.byteLength, 0);
    return Math.max(0, this.capacity - used);
  }

  async write(payload: Uint8Array, fileName: string): Promise<PendingWrite> {
    const tempLocation = `memory://pending/${fileName}`;
    this.pending.set(tempLocation, payload.slice());

    return {
      tempLocation,
      commit: async () => {
        const data = this.pending.get(tempLocation);
        this.pending.delete(tempLocation);
        if (!data) {
          throw new StorageError(`commit of "${fileName}"`);
        }
        const location = `memory://${fileName}`;
        this.committed.set(location, data);
        return location;
      },
      discard: async () => {
        this.pending.delete(tempLocation);
      },
    };
  }

  /** Committed payload at `location`, if any */
  read(location: string): Uint8Array | undefined {
    return this.committed.get(location);
  }

  get committedLocations(): string[] {
    return Array.from(this.committed.keys());
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
