import Database from 'better-sqlite3';
import { type Kysely, sql } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createBetterSqlite3Db } from './index';

interface TestDb {
  notes: {
    id: string;
    title: string;
  };
  note_tags: {
    note_id: string;
    tag: string;
  };
}

describe('better-sqlite3 dialect', () => {
  let db: Kysely<TestDb>;

  beforeEach(async () => {
    db = createBetterSqlite3Db<TestDb>({ path: ':memory:' });
    await db.schema
      .createTable('notes')
      .addColumn('id', 'text', (col) => col.primaryKey())
      .addColumn('title', 'text', (col) => col.notNull())
      .execute();
    await db.schema
      .createTable('note_tags')
      .addColumn('note_id', 'text', (col) =>
        col.notNull().references('notes.id').onDelete('cascade')
      )
      .addColumn('tag', 'text', (col) => col.notNull())
      .execute();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('returns rows for UPDATE ... RETURNING queries', async () => {
    await db.insertInto('notes').values({ id: 'n-1', title: 'before' }).execute();

    const updated = await db
      .updateTable('notes')
      .set({ title: 'after' })
      .where('id', '=', 'n-1')
      .returning(['id', 'title'])
      .executeTakeFirstOrThrow();

    expect(updated).toEqual({ id: 'n-1', title: 'after' });
  });

  it('enforces foreign keys by default', async () => {
    await expect(
      db.insertInto('note_tags').values({ note_id: 'missing', tag: 'x' }).execute()
    ).rejects.toThrow(/FOREIGN KEY constraint failed/);
  });

  it('applies pragmas to an existing database instance', async () => {
    const database = new Database(':memory:');
    const other = createBetterSqlite3Db<TestDb>({
      database,
      foreignKeys: false,
      busyTimeoutMs: 250,
    });

    try {
      const result = await sql<{
        foreign_keys: number;
      }>`pragma foreign_keys`.execute(other);
      expect(result.rows[0]?.foreign_keys).toBe(0);
      expect(database.pragma('busy_timeout', { simple: true })).toBe(250);
    } finally {
      await other.destroy();
    }
  });
});
