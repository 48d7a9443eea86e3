/**
 * @packageDocumentation
 *
 * Key/value backed local store for quipkeep.
 *
 * `KeyValueLocalStore` persists content records, favorites and preferences
 * as JSON values in any {@link KeyValueStorage}. `MemoryKeyValueStorage`
 * keeps them in a Map, which makes `createMemoryLocalStore` the store
 * double for tests and previews.
 *
 * ```typescript
 * import { createMemoryLocalStore } from '@quipkeep/storage-memory';
 *
 * const store = await createMemoryLocalStore({ records: [] });
 * ```
 *
 * @module @quipkeep/storage-memory
 */
export * from './adapter.js';
