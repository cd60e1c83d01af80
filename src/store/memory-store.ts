/**
 * In-process store. One Map per collection, copies on the way in and out.
 *
 * Used by tests and by STORE_DIALECT=memory for local experiments. Every
 * operation completes synchronously inside its promise, which makes
 * `mutate` trivially atomic on a single event loop.
 */

import { createDocumentStore, type DocumentBackend, type MutationResult } from './document-store.js';
import { isStoreRecord, type RecordStore, type StoreValue } from './record-store.js';

export function createMemoryBackend(): DocumentBackend {
  const collections = new Map<string, Map<string, StoreValue>>();

  function records(collection: string): Map<string, StoreValue> {
    let map = collections.get(collection);
    if (!map) {
      map = new Map();
      collections.set(collection, map);
    }
    return map;
  }

  return {
    dialect: 'memory',

    async read(collection, id) {
      const value = collections.get(collection)?.get(id);
      return value === undefined ? undefined : structuredClone(value);
    },

    async list(collection) {
      const out: Record<string, StoreValue> = {};
      for (const [id, value] of collections.get(collection) ?? []) {
        out[id] = structuredClone(value);
      }
      return out;
    },

    async listWhere(collection, field, value) {
      const out: Record<string, StoreValue> = {};
      for (const [id, record] of collections.get(collection) ?? []) {
        if (isStoreRecord(record) && record[field] === value) {
          out[id] = structuredClone(record);
        }
      }
      return out;
    },

    async mutate(collection, id, mutator): Promise<MutationResult> {
      const map = records(collection);
      const before = map.get(id);
      const next = mutator(before === undefined ? undefined : structuredClone(before));

      if (next === undefined) {
        return { before, after: before, changed: false };
      }

      const stored = next === null ? undefined : structuredClone(next);
      if (stored === undefined) {
        map.delete(id);
      } else {
        map.set(id, stored);
      }

      const after = stored === undefined ? undefined : structuredClone(stored);
      return { before, after, changed: JSON.stringify(before) !== JSON.stringify(after) };
    },

    async close() {
      collections.clear();
    },
  };
}

export function createMemoryStore(): RecordStore {
  return createDocumentStore(createMemoryBackend());
}
