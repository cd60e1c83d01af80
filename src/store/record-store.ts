/**
 * RecordStore: the capability contract the coordination core consumes.
 *
 * Paths are slash-separated (`safetyChecks/c1/responses/u1`). The first
 * segment names a collection, the second a record; deeper segments address
 * fields inside the record. Writes are last-write-wins at the path written.
 *
 * Keep this file backend-agnostic so the memory, sqlite and postgres
 * implementations share the exact same API contract.
 */

export type StoreValue =
  | string
  | number
  | boolean
  | null
  | StoreValue[]
  | { [key: string]: StoreValue };

export type StoreRecord = { [key: string]: StoreValue };

export type Unsubscribe = () => void;

export type ValueListener = (value: StoreValue | undefined) => void;
export type QueryListener = (records: Record<string, StoreValue>) => void;

export interface TransactionResult {
  committed: boolean;
  value: StoreValue | undefined;
}

/**
 * Returning `undefined` aborts the transaction; returning `null` removes the
 * value at the path.
 */
export type TransactionUpdate = (current: StoreValue | undefined) => StoreValue | undefined;

export type StoreDialect = 'memory' | 'sqlite' | 'postgres';

export interface RecordStore {
  readonly dialect: StoreDialect;

  get(path: string): Promise<StoreValue | undefined>;
  set(path: string, value: StoreValue): Promise<void>;
  /** Partial multi-field update under `path`. A `null` field removes it. */
  update(path: string, fields: Record<string, StoreValue>): Promise<void>;
  remove(path: string): Promise<void>;
  /** Fresh record id for `collection`. Ids sort by creation time. */
  newId(collection: string): string;

  /** Records of `collection` whose top-level `field` equals `value`, keyed by id. */
  queryEqual(collection: string, field: string, value: string): Promise<Record<string, StoreValue>>;

  /** Compare-and-swap on a single path. */
  transaction(path: string, update: TransactionUpdate): Promise<TransactionResult>;

  /** Push the value at `path` after any write at, above or below it. */
  subscribe(path: string, listener: ValueListener): Unsubscribe;
  /** Push the matching records after any write to a record that matched before or after. */
  subscribeQuery(collection: string, field: string, value: string, listener: QueryListener): Unsubscribe;

  close(): Promise<void>;
}

export function isStoreRecord(value: StoreValue | undefined): value is StoreRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
