import type { ContentRecord, PreferenceMap } from './content.js';

/**
 * The persistence substrate: a string key/value store such as
 * `localStorage` or a mobile preferences store.
 */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

/**
 * Local state the export/import pipelines borrow during an operation.
 *
 * Each call is consistent on its own; the pipelines serialize against each
 * other so that no other writer runs while one of them holds the store.
 * Implementations return copies, so callers may mutate what they read.
 */
export interface LocalStore {
  readAllRecords(): Promise<ContentRecord[]>;
  readFavoriteIds(): Promise<Set<string>>;
  readPreferences(): Promise<PreferenceMap>;

  /** Insert or overwrite a single record by id */
  putRecord(record: ContentRecord): Promise<void>;
  /** Replace every record */
  writeAllRecords(records: ContentRecord[]): Promise<void>;
  /** Replace the favorite set */
  writeFavoriteIds(ids: Set<string>): Promise<void>;
  /** Replace every preference */
  writePreferences(preferences: PreferenceMap): Promise<void>;

  /** Remove every record and favorite. Preferences are kept. */
  clearAll(): Promise<void>;
}

/**
 * Point-in-time copy of a LocalStore.
 */
export interface LocalStateCapture {
  readonly records: ContentRecord[];
  readonly favoriteIds: Set<string>;
  readonly preferences: PreferenceMap;
}

/** Read the whole store once */
export async function captureLocalState(store: LocalStore): Promise<LocalStateCapture> {
  const records = await store.readAllRecords();
  const favoriteIds = await store.readFavoriteIds();
  const preferences = await store.readPreferences();
  return { records, favoriteIds, preferences };
}

/** Write a capture back, replacing whatever the store holds */
export async function restoreLocalState(
  store: LocalStore,
  capture: LocalStateCapture
): Promise<void> {
  await store.clearAll();
  await store.writeAllRecords(capture.records);
  await store.writeFavoriteIds(capture.favoriteIds);
  await store.writePreferences(capture.preferences);
}
