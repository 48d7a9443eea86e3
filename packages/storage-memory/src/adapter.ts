import {
  StorageError,
  type ContentRecord,
  type KeyValueStorage,
  type LocalStore,
  type PreferenceMap,
} from '@quipkeep/core';
import { Subject, type Observable } from 'rxjs';

/**
 * Change emitted after a successful write
 */
export interface LocalStoreChange {
  readonly target: 'records' | 'favorites' | 'preferences';
  readonly operation: 'put' | 'replace' | 'clear';
  /** Record id for single-record writes */
  readonly recordId?: string;
  readonly timestamp: number;
}

/**
 * String key/value storage held in a Map.
 */
export class MemoryKeyValueStorage implements KeyValueStorage {
  private readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }

  /** Stored keys, for inspection in tests */
  keys(): string[] {
    return Array.from(this.items.keys());
  }

  get size(): number {
    return this.items.size;
  }
}

export interface KeyValueLocalStoreConfig {
  /** Key prefix (default: 'quipkeep') */
  namespace?: string;
}

/**
 * LocalStore persisted as three JSON values in a key/value storage:
 * `<namespace>:records`, `<namespace>:favorites` and
 * `<namespace>:preferences`.
 */
export class KeyValueLocalStore implements LocalStore {
  private readonly storage: KeyValueStorage;
  private readonly keys: { records: string; favorites: string; preferences: string };
  private readonly changes$$ = new Subject<LocalStoreChange>();

  constructor(storage: KeyValueStorage, config: KeyValueLocalStoreConfig = {}) {
    const namespace = config.namespace ?? 'quipkeep';
    this.storage = storage;
    this.keys = {
      records: `${namespace}:records`,
      favorites: `${namespace}:favorites`,
      preferences: `${namespace}:preferences`,
    };
  }

  /** Stream of successful writes */
  get changes$(): Observable<LocalStoreChange> {
    return this.changes$$.asObservable();
  }

  async readAllRecords(): Promise<ContentRecord[]> {
    return this.readJson<ContentRecord[]>(this.keys.records, []);
  }

  async readFavoriteIds(): Promise<Set<string>> {
    return new Set(this.readJson<string[]>(this.keys.favorites, []));
  }

  async readPreferences(): Promise<PreferenceMap> {
    return this.readJson<PreferenceMap>(this.keys.preferences, {});
  }

  async putRecord(record: ContentRecord): Promise<void> {
    const records = this.readJson<ContentRecord[]>(this.keys.records, []);
    const index = records.findIndex((r) => r.id === record.id);
    if (index === -1) {
      records.push(record);
    } else {
      records[index] = record;
    }
    this.writeJson(this.keys.records, records);
    this.emit('records', 'put', record.id);
  }

  async writeAllRecords(records: ContentRecord[]): Promise<void> {
    this.writeJson(this.keys.records, records);
    this.emit('records', 'replace');
  }

  async writeFavoriteIds(ids: Set<string>): Promise<void> {
    this.writeJson(this.keys.favorites, Array.from(ids));
    this.emit('favorites', 'replace');
  }

  async writePreferences(preferences: PreferenceMap): Promise<void> {
    this.writeJson(this.keys.preferences, preferences);
    this.emit('preferences', 'replace');
  }

  async clearAll(): Promise<void> {
    try {
      this.storage.removeItem(this.keys.records);
      this.storage.removeItem(this.keys.favorites);
    } catch (error) {
      throw new StorageError('clear', error instanceof Error ? error : undefined);
    }
    this.emit('records', 'clear');
    this.emit('favorites', 'clear');
  }

  /** Complete the change stream */
  close(): void {
    this.changes$$.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private readJson<T>(key: string, fallback: T): T {
    let raw: string | null;
    try {
      raw = this.storage.getItem(key);
    } catch (error) {
      throw new StorageError(`read of "${key}"`, error instanceof Error ? error : undefined);
    }
    if (raw === null) return fallback;

    try {
      return JSON.parse(raw) as T;
    } catch (error) {
      throw new StorageError(`decode of "${key}"`, error instanceof Error ? error : undefined);
    }
  }

  private writeJson(key: string, value: unknown): void {
    try {
      this.storage.setItem(key, JSON.stringify(value));
    } catch (error) {
      throw new StorageError(`write of "${key}"`, error instanceof Error ? error : undefined);
    }
  }

  private emit(
    target: LocalStoreChange['target'],
    operation: LocalStoreChange['operation'],
    recordId?: string
  ): void {
    this.changes$$.next({
      target,
      operation,
      ...(recordId ? { recordId } : {}),
      timestamp: Date.now(),
    });
  }
}

/**
 * Initial contents for a memory store
 */
export interface MemoryLocalStoreSeed {
  records?: ContentRecord[];
  favoriteIds?: Iterable<string>;
  preferences?: PreferenceMap;
}

/**
 * Create a LocalStore backed by a fresh in-memory key/value storage.
 *
 * @example
 * ```typescript
 * const store = await createMemoryLocalStore({ records, preferences: { language: 'en' } });
 * ```
 */
export async function createMemoryLocalStore(
  seed: MemoryLocalStoreSeed = {},
  config?: KeyValueLocalStoreConfig
): Promise<KeyValueLocalStore> {
  const store = new KeyValueLocalStore(new MemoryKeyValueStorage(), config);
  if (seed.records) await store.writeAllRecords(seed.records);
  if (seed.favoriteIds) await store.writeFavoriteIds(new Set(seed.favoriteIds));
  if (seed.preferences) await store.writePreferences(seed.preferences);
  return store;
}
