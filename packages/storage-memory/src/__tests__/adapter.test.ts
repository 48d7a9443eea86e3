import { describe, it, expect, beforeEach } from 'vitest';
import type { ContentRecord, KeyValueStorage } from '@quipkeep/core';
import {
  KeyValueLocalStore,
  MemoryKeyValueStorage,
  createMemoryLocalStore,
  type LocalStoreChange,
} from '../adapter.js';

function record(id: string, overrides: Partial<ContentRecord> = {}): ContentRecord {
  return {
    id,
    content: `Snippet ${id}`,
    category: 'meetings',
    intensity: 3,
    locale: 'en',
    createdAt: '2024-03-01T10:00:00.000Z',
    isFavorite: false,
    ...overrides,
  };
}

describe('KeyValueLocalStore', () => {
  let storage: MemoryKeyValueStorage;
  let store: KeyValueLocalStore;

  beforeEach(() => {
    storage = new MemoryKeyValueStorage();
    store = new KeyValueLocalStore(storage, { namespace: 'test' });
  });

  it('should return empty state for a fresh storage', async () => {
    expect(await store.readAllRecords()).toEqual([]);
    expect(await store.readFavoriteIds()).toEqual(new Set());
    expect(await store.readPreferences()).toEqual({});
  });

  it('should persist under namespaced keys', async () => {
    await store.writeAllRecords([record('r1')]);
    await store.writeFavoriteIds(new Set(['r1']));
    await store.writePreferences({ language: 'en' });

    expect(storage.keys().sort()).toEqual(['test:favorites', 'test:preferences', 'test:records']);
    expect(storage.getItem('test:favorites')).toBe('["r1"]');
  });

  it('should insert and overwrite records by id', async () => {
    await store.putRecord(record('r1'));
    await store.putRecord(record('r2'));
    await store.putRecord(record('r1', { content: 'Updated' }));

    const records = await store.readAllRecords();
    expect(records.map((r) => r.id)).toEqual(['r1', 'r2']);
    expect(records[0]!.content).toBe('Updated');
  });

  it('should return copies that do not alias stored state', async () => {
    await store.writeAllRecords([record('r1')]);
    const first = await store.readAllRecords();
    first[0]!.content = 'mutated';

    expect((await store.readAllRecords())[0]!.content).toBe('Snippet r1');
  });

  it('should clear records and favorites but keep preferences', async () => {
    await store.writeAllRecords([record('r1')]);
    await store.writeFavoriteIds(new Set(['r1']));
    await store.writePreferences({ language: 'vi' });

    await store.clearAll();

    expect(await store.readAllRecords()).toEqual([]);
    expect(await store.readFavoriteIds()).toEqual(new Set());
    expect(await store.readPreferences()).toEqual({ language: 'vi' });
  });

  it('should emit changes after writes', async () => {
    const changes: LocalStoreChange[] = [];
    const subscription = store.changes$.subscribe((c) => changes.push(c));

    await store.putRecord(record('r1'));
    await store.clearAll();
    subscription.unsubscribe();

    expect(changes.map((c) => `${c.target}:${c.operation}`)).toEqual([
      'records:put',
      'records:clear',
      'favorites:clear',
    ]);
    expect(changes[0]!.recordId).toBe('r1');
  });

  it('should surface undecodable values as storage errors', async () => {
    storage.setItem('test:records', '{not json');
    await expect(store.readAllRecords()).rejects.toMatchObject({
      kind: 'storage',
      code: 'QK_S200',
    });
  });

  it('should surface substrate write failures as storage errors', async () => {
    const failing: KeyValueStorage = {
      getItem: () => null,
      setItem: () => {
        throw new Error('quota exceeded');
      },
      removeItem: () => undefined,
    };
    const failingStore = new KeyValueLocalStore(failing);

    await expect(failingStore.putRecord(record('r1'))).rejects.toThrow(
      'Local store write of "quipkeep:records" failed: quota exceeded'
    );
  });
});

describe('createMemoryLocalStore', () => {
  it('should seed records, favorites and preferences', async () => {
    const store = await createMemoryLocalStore({
      records: [record('r1', { isFavorite: true }), record('r2')],
      favoriteIds: ['r1'],
      preferences: { 'notifications.enabled': true },
    });

    expect(await store.readAllRecords()).toHaveLength(2);
    expect(await store.readFavoriteIds()).toEqual(new Set(['r1']));
    expect(await store.readPreferences()).toEqual({ 'notifications.enabled': true });
  });
});
