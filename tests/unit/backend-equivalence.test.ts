import type {
  ListOptions,
  NoteFilter,
  NoteRecord,
  NoteStorageBackend,
} from '@notekeep/core';
import { createBetterSqlite3Db } from '@notekeep/dialect-better-sqlite3';
import {
  createMemoryKeyValueDriver,
  KeyValueBackend,
} from '@notekeep/store-kv';
import {
  createRelationalBackend,
  type NoteStoreDb,
} from '@notekeep/store-sqlite';
import { buildNote } from '@notekeep/testkit';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

const records: NoteRecord[] = [
  buildNote({
    id: 'a',
    title: 'Kysely guide',
    body: 'query builder walkthrough',
    tags: ['sql', 'typescript'],
    category: 'work',
    createdAt: 1_000,
    updatedAt: 5_000,
  }),
  buildNote({
    id: 'b',
    title: 'Groceries',
    body: 'eggs, milk, go to the market',
    tags: ['home'],
    category: 'personal',
    createdAt: 2_000,
    updatedAt: 3_000,
    isFavorite: true,
  }),
  buildNote({
    id: 'c',
    title: 'Sqlite pragmas',
    body: 'journal mode and kysely plugins',
    tags: ['sql'],
    category: 'work',
    createdAt: 3_000,
    updatedAt: 4_000,
    isArchived: true,
  }),
  buildNote({
    id: 'd',
    title: 'Travel plans',
    body: 'Lisbon in spring',
    createdAt: 4_000,
    updatedAt: 2_000,
    syncState: 'synced',
    remoteVersion: 'v1',
    lastSyncedAt: 2_000,
  }),
  buildNote({
    id: 'e',
    title: 'Old kysely draft',
    body: 'superseded',
    tags: ['sql'],
    createdAt: 5_000,
    updatedAt: 6_000,
    deletedAt: 6_000,
  }),
];

const listCases: [string, NoteFilter, ListOptions][] = [
  ['everything live', {}, {}],
  ['tombstones included', { includeDeleted: true }, {}],
  ['one category', { category: 'work' }, {}],
  ['no category', { category: null }, { orderBy: 'createdAt' }],
  ['every tag required', { tags: ['sql', 'typescript'] }, {}],
  ['favorites', { isFavorite: true }, {}],
  ['not archived', { isArchived: false }, { orderBy: 'title', direction: 'asc' }],
  [
    'created in a range',
    { dateRange: { field: 'createdAt', from: 2_000, to: 4_000 } },
    {},
  ],
  ['sync states', { syncStates: ['synced'] }, {}],
  ['limited', {}, { orderBy: 'updatedAt', direction: 'asc', limit: 2 }],
];

const searchCases = ['kysely', 'SQL', 'go', 'kysely market', 'nothing-matches'];

async function ids(
  backend: NoteStorageBackend,
  filter: NoteFilter,
  options: ListOptions
): Promise<string[]> {
  const scan = backend.listFiltered(filter, options);
  const found = await scan.toArray();
  return found.map((record) => record.id);
}

describe('storage engine equivalence', () => {
  let keyValue: KeyValueBackend;
  let relational: NoteStorageBackend;

  beforeAll(async () => {
    keyValue = new KeyValueBackend({ driver: createMemoryKeyValueDriver() });
    relational = await createRelationalBackend(
      createBetterSqlite3Db<NoteStoreDb>({ path: ':memory:' }),
      { destroyOnClose: true }
    );
    await keyValue.bulkPut(records);
    await relational.bulkPut(records);
  });

  afterAll(async () => {
    await keyValue.close();
    await relational.close();
  });

  it.each(listCases)('lists the same records: %s', async (_name, filter, options) => {
    const expected = await ids(keyValue, filter, options);
    expect(await ids(relational, filter, options)).toEqual(expected);
  });

  it('lists live records newest first by default', async () => {
    expect(await ids(keyValue, {}, {})).toEqual(['a', 'c', 'b', 'd']);
  });

  it.each(searchCases)('finds the same records for "%s"', async (query) => {
    const fromKeyValue = await keyValue.search(query);
    const fromRelational = await relational.search(query);

    const sortedIds = (hits: { record: NoteRecord }[]) =>
      hits.map((hit) => hit.record.id).sort();
    expect(sortedIds(fromRelational.hits)).toEqual(sortedIds(fromKeyValue.hits));
  });

  it('reports the same tag usage and counts', async () => {
    expect(await relational.tagUsage()).toEqual(await keyValue.tagUsage());

    const kvStats = await keyValue.statistics();
    const sqlStats = await relational.statistics();
    expect(sqlStats).toMatchObject({
      storageType: 'relational',
      totalNotes: kvStats.totalNotes,
      favoriteNotes: kvStats.favoriteNotes,
      archivedNotes: kvStats.archivedNotes,
      deletedNotes: kvStats.deletedNotes,
      totalCategories: kvStats.totalCategories,
      totalTags: kvStats.totalTags,
    });
  });
});
