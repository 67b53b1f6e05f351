/**
 * @notekeep/store-kv - SQLite-backed key-value driver
 *
 * Persists blobs in a single two-column table through Kysely.
 */

import { type Kysely, sql } from 'kysely';
import type { KeyValueDriver, KeyValueOp } from './driver';

export interface KeyValueEntriesTable {
  key: string;
  value: string;
}

export interface KeyValueDb {
  kv_entries: KeyValueEntriesTable;
}

export async function ensureKeyValueSchema<DB extends KeyValueDb>(
  db: Kysely<DB>
): Promise<void> {
  await sql`
    create table if not exists ${sql.table('kv_entries')} (
      ${sql.ref('key')} text primary key not null,
      ${sql.ref('value')} text not null
    )
  `.execute(db);
}

function prefixMatch(prefix: string) {
  return sql<boolean>`substr(${sql.ref('key')}, 1, ${sql.val(prefix.length)}) = ${sql.val(prefix)}`;
}

export interface SqliteKeyValueDriverOptions {
  /** Destroy the Kysely instance when the driver is closed (default: false) */
  destroyOnClose?: boolean;
}

/**
 * Create a driver over an existing Kysely database. Call
 * `ensureKeyValueSchema(db)` first.
 */
export function createSqliteKeyValueDriver(
  db: Kysely<KeyValueDb>,
  options: SqliteKeyValueDriverOptions = {}
): KeyValueDriver {
  const applyOp = async (
    executor: Kysely<KeyValueDb>,
    op: KeyValueOp
  ): Promise<void> => {
    if (op.type === 'set') {
      await executor
        .insertInto('kv_entries')
        .values({ key: op.key, value: op.value })
        .onConflict((oc) => oc.column('key').doUpdateSet({ value: op.value }))
        .execute();
      return;
    }
    await executor.deleteFrom('kv_entries').where('key', '=', op.key).execute();
  };

  return {
    async get(key) {
      const row = await db
        .selectFrom('kv_entries')
        .select('value')
        .where('key', '=', key)
        .executeTakeFirst();
      return row?.value ?? null;
    },
    async set(key, value) {
      await applyOp(db, { type: 'set', key, value });
    },
    async delete(key) {
      await applyOp(db, { type: 'delete', key });
    },
    async batch(ops) {
      if (ops.length === 0) return;
      await db.transaction().execute(async (trx) => {
        for (const op of ops) {
          await applyOp(trx, op);
        }
      });
    },
    async *entries(prefix) {
      // Read the rows up front: the connection is shared and must not stay
      // busy while callers await other store operations mid-iteration.
      const rows = await db
        .selectFrom('kv_entries')
        .select(['key', 'value'])
        .where(prefixMatch(prefix))
        .orderBy('key')
        .execute();
      for (const row of rows) {
        yield [row.key, row.value];
      }
    },
    async clear(prefix) {
      await db.deleteFrom('kv_entries').where(prefixMatch(prefix)).execute();
    },
    async close() {
      if (options.destroyOnClose) {
        await db.destroy();
      }
    },
  };
}
