import { Pool, type PoolClient, type PoolConfig } from 'pg';

import { logger } from '../middleware/logger.js';
import { config } from '../utils/config.js';
import { isValidSegment } from './paths.js';
import { createDocumentStore, type DocumentBackend, type MutationResult } from './document-store.js';
import type { RecordStore, StoreValue } from './record-store.js';

interface RecordRow {
  id: string;
  data: string;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS records (
    collection TEXT NOT NULL,
    id TEXT NOT NULL,
    data JSONB NOT NULL,
    updated_at BIGINT NOT NULL,
    PRIMARY KEY (collection, id)
  );

  CREATE INDEX IF NOT EXISTS idx_records_group
    ON records (collection, (data->>'groupId'));
`;

function parseRow(row: RecordRow): StoreValue {
  const value: StoreValue = JSON.parse(row.data);
  return value;
}

function rowsToRecords(rows: RecordRow[]): Record<string, StoreValue> {
  const out: Record<string, StoreValue> = {};
  for (const row of rows) out[row.id] = parseRow(row);
  return out;
}

export async function createPostgresBackend(connectionString: string): Promise<DocumentBackend> {
  const poolConfig: PoolConfig = { connectionString };
  if (config.POSTGRES_SSL) {
    poolConfig.ssl = {
      rejectUnauthorized: config.POSTGRES_SSL_REJECT_UNAUTHORIZED,
    };
  }

  const pool = new Pool(poolConfig);
  pool.on('error', (err) => {
    logger.error({ err }, 'Idle Postgres client error');
  });

  await pool.query(SCHEMA_SQL);
  logger.info('Postgres record store ready');

  const readLocked = async (client: PoolClient, collection: string, id: string): Promise<RecordRow | undefined> => {
    // Row locks cannot cover a record that does not exist yet; an advisory
    // lock on the key serializes inserts as well.
    await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`${collection}/${id}`]);
    const res = await client.query<RecordRow>(
      'SELECT id, data::text AS data FROM records WHERE collection = $1 AND id = $2 FOR UPDATE',
      [collection, id],
    );
    return res.rows[0];
  };

  return {
    dialect: 'postgres',

    async read(collection, id) {
      const res = await pool.query<RecordRow>(
        'SELECT id, data::text AS data FROM records WHERE collection = $1 AND id = $2',
        [collection, id],
      );
      const row = res.rows[0];
      return row ? parseRow(row) : undefined;
    },

    async list(collection) {
      const res = await pool.query<RecordRow>(
        'SELECT id, data::text AS data FROM records WHERE collection = $1 ORDER BY id',
        [collection],
      );
      return rowsToRecords(res.rows);
    },

    async listWhere(collection, field, value) {
      if (!isValidSegment(field)) {
        throw new Error(`Invalid query field: ${field}`);
      }
      const res = await pool.query<RecordRow>(
        'SELECT id, data::text AS data FROM records WHERE collection = $1 AND data->>$2 = $3 ORDER BY id',
        [collection, field, value],
      );
      return rowsToRecords(res.rows);
    },

    async mutate(collection, id, mutator): Promise<MutationResult> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');

        const row = await readLocked(client, collection, id);
        const before = row ? parseRow(row) : undefined;
        const next = mutator(before);

        if (next === undefined) {
          await client.query('COMMIT');
          return { before, after: before, changed: false };
        }

        if (next === null) {
          await client.query('DELETE FROM records WHERE collection = $1 AND id = $2', [collection, id]);
          await client.query('COMMIT');
          return { before, after: undefined, changed: before !== undefined };
        }

        const serialized = JSON.stringify(next);
        await client.query(
          `INSERT INTO records (collection, id, data, updated_at)
           VALUES ($1, $2, $3::jsonb, $4)
           ON CONFLICT (collection, id) DO UPDATE SET data = EXCLUDED.data, updated_at = EXCLUDED.updated_at`,
          [collection, id, serialized, Date.now()],
        );
        await client.query('COMMIT');
        return { before, after: next, changed: JSON.stringify(before) !== serialized };
      } catch (err) {
        await client.query('ROLLBACK').catch(() => undefined);
        throw err;
      } finally {
        client.release();
      }
    },

    async close() {
      await pool.end();
      logger.info('Postgres record store pool closed');
    },
  };
}

export async function createPostgresStore(connectionString: string): Promise<RecordStore> {
  return createDocumentStore(await createPostgresBackend(connectionString));
}
