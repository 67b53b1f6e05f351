import { createBetterSqlite3Db } from '@notekeep/dialect-better-sqlite3';
import { buildNote } from '@notekeep/testkit';
import { type Kysely, sql } from 'kysely';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { KeyValueBackend } from '../backend';
import type { KeyValueDriver } from '../driver';
import {
  createSqliteKeyValueDriver,
  ensureKeyValueSchema,
  type KeyValueDb,
} from '../sqlite-driver';

describe('SQLite key-value driver', () => {
  let db: Kysely<KeyValueDb>;
  let driver: KeyValueDriver;

  beforeEach(async () => {
    db = createBetterSqlite3Db<KeyValueDb>({ path: ':memory:' });
    await ensureKeyValueSchema(db);
    driver = createSqliteKeyValueDriver(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  test('set overwrites and delete removes', async () => {
    await driver.set('note:a', 'one');
    await driver.set('note:a', 'two');
    expect(await driver.get('note:a')).toBe('two');

    await driver.delete('note:a');
    await driver.delete('note:a');
    expect(await driver.get('note:a')).toBeNull();
  });

  test('entries and clear only touch the prefix', async () => {
    await driver.batch([
      { type: 'set', key: 'note:b', value: '2' },
      { type: 'set', key: 'note:a', value: '1' },
      { type: 'set', key: 'other:a', value: 'x' },
    ]);

    const seen: [string, string][] = [];
    for await (const entry of driver.entries('note:')) {
      seen.push(entry);
    }
    expect(seen).toEqual([
      ['note:a', '1'],
      ['note:b', '2'],
    ]);

    await driver.clear('note:');
    expect(await driver.get('note:a')).toBeNull();
    expect(await driver.get('other:a')).toBe('x');
  });

  test('a failing batch leaves earlier operations unapplied', async () => {
    await driver.set('note:keep', 'original');
    await sql`
      create trigger kv_guard before insert on kv_entries
      when new.key = 'note:boom'
      begin select raise(abort, 'boom'); end
    `.execute(db);

    await expect(
      driver.batch([
        { type: 'set', key: 'note:keep', value: 'changed' },
        { type: 'delete', key: 'note:other' },
        { type: 'set', key: 'note:boom', value: 'x' },
      ])
    ).rejects.toThrow(/boom/);
    expect(await driver.get('note:keep')).toBe('original');
  });

  test('backs a KeyValueBackend', async () => {
    const backend = new KeyValueBackend({ driver });
    const note = buildNote({ id: 'n-1', title: 'Persisted', tags: ['kv'] });
    await backend.put(note);

    expect(await backend.get('n-1')).toEqual(note);
    expect((await backend.search('persisted')).hits).toHaveLength(1);
  });
});
