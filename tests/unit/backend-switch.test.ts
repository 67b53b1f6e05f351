import { createNoteStore, openSqliteBackends } from '@notekeep/client';
import { ManualClock } from '@notekeep/core';
import { createIdFactory } from '@notekeep/testkit';
import { describe, expect, it } from 'vitest';

describe('switching storage engines', () => {
  it('carries every record, tombstones and sync metadata included, both ways', async () => {
    const clock = new ManualClock(1_000);
    const store = createNoteStore({
      backends: await openSqliteBackends({
        keyValuePath: ':memory:',
        relationalPath: ':memory:',
      }),
      clock,
      idGenerator: createIdFactory().next,
    });

    try {
      await store.repository.create({
        title: 'Reading list',
        body: 'Designing Data-Intensive Applications',
        tags: ['books', 'later'],
        category: 'personal',
      });
      clock.advance(10);
      await store.repository.create({ title: 'Scratch', isFavorite: true });
      clock.advance(10);
      await store.repository.create({ title: 'Archived idea', isArchived: true });
      const archived = await store.repository.get('note-003');
      expect(archived).not.toBeNull();
      if (!archived) return;
      await store.repository.commitSyncChange({
        id: 'note-003',
        expectedUpdatedAt: 1_020,
        next: {
          ...archived,
          syncState: 'conflict',
          remoteVersion: 'v2',
          remoteSnapshot: {
            title: 'Archived idea (remote)',
            body: '',
            tags: [],
            category: null,
            updatedAt: 900,
            remoteVersion: 'v3',
            deleted: false,
          },
        },
      });
      await store.repository.delete('note-002');

      const before = await store.repository.exportSnapshot();
      expect(before.records.map((record) => record.id)).toEqual([
        'note-001',
        'note-002',
        'note-003',
      ]);

      const toRelational = await store.repository.switchBackend('relational');
      expect(toRelational).toMatchObject({
        from: 'key-value',
        to: 'relational',
        copiedCount: 3,
      });
      const onRelational = await store.repository.exportSnapshot();
      expect(onRelational.storageType).toBe('relational');
      expect(onRelational.records).toEqual(before.records);

      await store.repository.update('note-001', { body: 'Edited on relational' });
      await store.repository.switchBackend('key-value');

      const back = await store.repository.exportSnapshot();
      expect(back.storageType).toBe('key-value');
      expect(back.records.map((record) => record.body)).toEqual([
        'Edited on relational',
        '',
        '',
      ]);
      expect(back.records[2]).toEqual(before.records[2]);
    } finally {
      await store.close();
    }
  });
});
