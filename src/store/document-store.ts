/**
 * Path semantics on top of a one-document-per-record backend.
 *
 * Backends only know whole records (`collection`, `id` → JSON value) and an
 * atomic read-modify-write per record. Everything path-shaped (leaf writes,
 * partial updates, compare-and-swap, subtree subscriptions) lives here so
 * the memory, sqlite and postgres stores behave identically.
 */

import { randomBytes } from 'node:crypto';

import { logger } from '../middleware/logger.js';
import { StoreError, isCoordinationError } from '../core/errors.js';
import { getIn, parsePath, pathsOverlap, setIn, splitPath } from './paths.js';
import {
  isStoreRecord,
  type QueryListener,
  type RecordStore,
  type StoreDialect,
  type StoreValue,
  type TransactionResult,
  type TransactionUpdate,
  type Unsubscribe,
  type ValueListener,
} from './record-store.js';

export interface MutationResult {
  before: StoreValue | undefined;
  after: StoreValue | undefined;
  changed: boolean;
}

/**
 * `undefined` from the mutator leaves the record untouched; `null` deletes it.
 */
export type RecordMutator = (current: StoreValue | undefined) => StoreValue | null | undefined;

export interface DocumentBackend {
  readonly dialect: StoreDialect;
  read(collection: string, id: string): Promise<StoreValue | undefined>;
  list(collection: string): Promise<Record<string, StoreValue>>;
  listWhere(collection: string, field: string, value: string): Promise<Record<string, StoreValue>>;
  /** Atomic with respect to every other `mutate` on the same record. */
  mutate(collection: string, id: string, mutator: RecordMutator): Promise<MutationResult>;
  close(): Promise<void>;
}

interface ValueSubscription {
  segments: string[];
  listener: ValueListener;
  seq: number;
}

interface QuerySubscription {
  collection: string;
  field: string;
  value: string;
  listener: QueryListener;
  seq: number;
}

let lastIdTime = 0;
let idCounter = 0;

/** Time-ordered, collision-resistant record id (base36 time + counter + random). */
function generateId(): string {
  const now = Date.now();
  if (now === lastIdTime) {
    idCounter += 1;
  } else {
    lastIdTime = now;
    idCounter = 0;
  }
  return `${now.toString(36).padStart(9, '0')}${idCounter.toString(36).padStart(3, '0')}${randomBytes(5).toString('hex')}`;
}

function fieldMatches(record: StoreValue | undefined, field: string, value: string): boolean {
  return isStoreRecord(record) && record[field] === value;
}

export function createDocumentStore(backend: DocumentBackend): RecordStore {
  const valueSubs = new Set<ValueSubscription>();
  const querySubs = new Set<QuerySubscription>();
  let closed = false;

  async function guard<T>(operation: string, path: string, fn: () => Promise<T>): Promise<T> {
    if (closed) throw new StoreError(operation, path, new Error('store is closed'));
    try {
      return await fn();
    } catch (err) {
      if (isCoordinationError(err)) throw err;
      throw new StoreError(operation, path, err);
    }
  }

  function deliver(sub: ValueSubscription, value: StoreValue | undefined): void {
    try {
      sub.listener(value === undefined ? undefined : structuredClone(value));
    } catch (err) {
      logger.error({ err, path: sub.segments.join('/') }, 'Store subscriber threw');
    }
  }

  /** Re-read and deliver; a newer refresh supersedes an older one still in flight. */
  function refreshValueSubscriber(sub: ValueSubscription): void {
    const seq = ++sub.seq;
    const [collection, id, ...rest] = sub.segments;
    const read = id === undefined
      ? backend.list(collection).then((records) => (Object.keys(records).length > 0 ? records : undefined))
      : backend.read(collection, id).then((record) => getIn(record, rest));

    read
      .then((value) => {
        if (seq !== sub.seq || !valueSubs.has(sub)) return;
        deliver(sub, value);
      })
      .catch((err: unknown) => {
        logger.error({ err, path: sub.segments.join('/') }, 'Failed to refresh store subscriber');
      });
  }

  function refreshQuerySubscriber(sub: QuerySubscription): void {
    const seq = ++sub.seq;
    backend.listWhere(sub.collection, sub.field, sub.value)
      .then((records) => {
        if (seq !== sub.seq || !querySubs.has(sub)) return;
        try {
          sub.listener(records);
        } catch (err) {
          logger.error({ err, collection: sub.collection, field: sub.field }, 'Store query subscriber threw');
        }
      })
      .catch((err: unknown) => {
        logger.error({ err, collection: sub.collection }, 'Failed to refresh query subscriber');
      });
  }

  function publish(collection: string, id: string, written: string[], result: MutationResult): void {
    if (!result.changed) return;

    for (const sub of valueSubs) {
      if (!pathsOverlap(sub.segments, written)) continue;
      if (sub.segments.length === 1) {
        refreshValueSubscriber(sub);
      } else {
        sub.seq += 1;
        deliver(sub, getIn(result.after, sub.segments.slice(2)));
      }
    }

    for (const sub of querySubs) {
      if (sub.collection !== collection) continue;
      if (fieldMatches(result.before, sub.field, sub.value) || fieldMatches(result.after, sub.field, sub.value)) {
        refreshQuerySubscriber(sub);
      }
    }

    logger.debug({ collection, id, path: written.join('/') }, 'Store record changed');
  }

  async function writeRecord(
    operation: string,
    path: string,
    apply: (current: StoreValue | undefined, rest: string[]) => StoreValue | null | undefined,
  ): Promise<MutationResult> {
    const { collection, id, rest } = parsePath(path);
    if (id === null) {
      throw new StoreError(operation, path, new Error('collection-level writes are not supported'));
    }

    const result = await guard(operation, path, () =>
      backend.mutate(collection, id, (current) => apply(current, rest)),
    );
    publish(collection, id, splitPath(path), result);
    return result;
  }

  return {
    dialect: backend.dialect,

    async get(path) {
      const { collection, id, rest } = parsePath(path);
      return guard('get', path, async () => {
        if (id === null) {
          const records = await backend.list(collection);
          return Object.keys(records).length > 0 ? records : undefined;
        }
        return getIn(await backend.read(collection, id), rest);
      });
    },

    async set(path, value) {
      await writeRecord('set', path, (current, rest) => setIn(current, rest, value) ?? null);
    },

    async update(path, fields) {
      await writeRecord('update', path, (current, rest) => {
        let next = current;
        for (const [key, value] of Object.entries(fields)) {
          next = setIn(next, [...rest, ...splitPath(key)], value);
        }
        return next ?? null;
      });
    },

    async remove(path) {
      await writeRecord('remove', path, (current, rest) => setIn(current, rest, null) ?? null);
    },

    newId() {
      return generateId();
    },

    async queryEqual(collection, field, value) {
      return guard('query', `${collection}?${field}=${value}`, () => backend.listWhere(collection, field, value));
    },

    async transaction(path, update: TransactionUpdate): Promise<TransactionResult> {
      let committed = false;
      let value: StoreValue | undefined;

      await writeRecord('transaction', path, (current, rest) => {
        const existing = getIn(current, rest);
        const next = update(existing);
        if (next === undefined) {
          committed = false;
          value = existing;
          return undefined;
        }
        committed = true;
        const written = setIn(current, rest, next);
        value = getIn(written, rest);
        return written ?? null;
      });

      return { committed, value };
    },

    subscribe(path, listener): Unsubscribe {
      const sub: ValueSubscription = { segments: splitPath(path), listener, seq: 0 };
      valueSubs.add(sub);
      refreshValueSubscriber(sub);
      return () => {
        valueSubs.delete(sub);
      };
    },

    subscribeQuery(collection, field, value, listener): Unsubscribe {
      const sub: QuerySubscription = { collection, field, value, listener, seq: 0 };
      querySubs.add(sub);
      refreshQuerySubscriber(sub);
      return () => {
        querySubs.delete(sub);
      };
    },

    async close() {
      if (closed) return;
      closed = true;
      valueSubs.clear();
      querySubs.clear();
      await backend.close();
    },
  };
}
