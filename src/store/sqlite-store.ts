/**
 * SQLite record store: one JSON document per record.
 *
 * Uses better-sqlite3 (synchronous, no async overhead), so each `mutate`
 * runs as one immediate transaction and is atomic against every other
 * writer on the same file, including other processes.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

import { logger } from '../middleware/logger.js';
import { isValidSegment } from './paths.js';
import { createDocumentStore, type DocumentBackend, type MutationResult } from './document-store.js';
import type { RecordStore, StoreValue } from './record-store.js';

interface RecordRow {
  id: string;
  data: string;
}

function parseRow(row: RecordRow): StoreValue {
  const value: StoreValue = JSON.parse(row.data);
  return value;
}

function rowsToRecords(rows: RecordRow[]): Record<string, StoreValue> {
  const out: Record<string, StoreValue> = {};
  for (const row of rows) out[row.id] = parseRow(row);
  return out;
}

export function createSqliteBackend(path: string): DocumentBackend {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: InstanceType<typeof Database> = new Database(path, { timeout: 5000 });

  // Performance pragmas
  // NOTE: busy_timeout should be set before attempting journal_mode switches.
  db.pragma('busy_timeout = 5000');
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS records (
      collection TEXT NOT NULL,
      id TEXT NOT NULL,
      data TEXT NOT NULL,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (collection, id)
    );

    CREATE INDEX IF NOT EXISTS idx_records_group
      ON records (collection, json_extract(data, '$.groupId'));
  `);

  logger.info({ path }, 'SQLite record store opened');

  const selectRecord = db.prepare<[string, string], RecordRow>(
    `SELECT id, data FROM records WHERE collection = ? AND id = ?`,
  );
  const selectCollection = db.prepare<[string], RecordRow>(
    `SELECT id, data FROM records WHERE collection = ? ORDER BY id`,
  );
  const selectByGroup = db.prepare<[string, string], RecordRow>(
    `SELECT id, data FROM records WHERE collection = ? AND json_extract(data, '$.groupId') = ? ORDER BY id`,
  );
  const upsertRecord = db.prepare<[string, string, string, number]>(
    `INSERT INTO records (collection, id, data, updated_at) VALUES (?, ?, ?, ?)
     ON CONFLICT(collection, id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at`,
  );
  const deleteRecord = db.prepare<[string, string]>(
    `DELETE FROM records WHERE collection = ? AND id = ?`,
  );

  const mutateTx = db.transaction((collection: string, id: string, mutator: (current: StoreValue | undefined) => StoreValue | null | undefined): MutationResult => {
    const row = selectRecord.get(collection, id);
    const before = row ? parseRow(row) : undefined;
    const next = mutator(before);

    if (next === undefined) {
      return { before, after: before, changed: false };
    }

    if (next === null) {
      deleteRecord.run(collection, id);
      return { before, after: undefined, changed: before !== undefined };
    }

    const serialized = JSON.stringify(next);
    upsertRecord.run(collection, id, serialized, Date.now());
    return { before, after: next, changed: row?.data !== serialized };
  });

  return {
    dialect: 'sqlite',

    async read(collection, id) {
      const row = selectRecord.get(collection, id);
      return row ? parseRow(row) : undefined;
    },

    async list(collection) {
      return rowsToRecords(selectCollection.all(collection));
    },

    async listWhere(collection, field, value) {
      if (field === 'groupId') {
        return rowsToRecords(selectByGroup.all(collection, value));
      }
      if (!isValidSegment(field)) {
        throw new Error(`Invalid query field: ${field}`);
      }
      const rows = db
        .prepare<[string, string], RecordRow>(
          `SELECT id, data FROM records WHERE collection = ? AND json_extract(data, '$.${field}') = ? ORDER BY id`,
        )
        .all(collection, value);
      return rowsToRecords(rows);
    },

    async mutate(collection, id, mutator) {
      return mutateTx.immediate(collection, id, mutator);
    },

    async close() {
      db.close();
      logger.info({ path }, 'SQLite record store closed');
    },
  };
}

export function createSqliteStore(path: string): RecordStore {
  return createDocumentStore(createSqliteBackend(path));
}
