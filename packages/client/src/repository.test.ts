import {
  classifyFailure,
  ManualClock,
  MigrationError,
  type NoteRecord,
} from '@notekeep/core';
import { createBetterSqlite3Db } from '@notekeep/dialect-better-sqlite3';
import { createMemoryKeyValueDriver, KeyValueBackend } from '@notekeep/store-kv';
import {
  createRelationalBackend,
  type NoteStoreDb,
  type RelationalBackend,
} from '@notekeep/store-sqlite';
import {
  buildNote,
  buildSyncedNote,
  createCapturedTelemetry,
  createIdFactory,
} from '@notekeep/testkit';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NoteRepository } from './repository';

async function allIds(
  backend: KeyValueBackend | RelationalBackend
): Promise<string[]> {
  const records = await backend
    .listFiltered({ includeDeleted: true }, { orderBy: 'title', direction: 'asc' })
    .toArray();
  return records.map((record) => record.id).sort();
}

describe('NoteRepository', () => {
  let captured: ReturnType<typeof createCapturedTelemetry>;
  let restoreTelemetry: () => void;
  let clock: ManualClock;
  let keyValue: KeyValueBackend;
  let relational: RelationalBackend;
  let repository: NoteRepository;

  function createRepository(
    options: { migrationChunkSize?: number } = {}
  ): NoteRepository {
    return new NoteRepository({
      backends: [keyValue, relational],
      clock,
      idGenerator: createIdFactory().next,
      migrationChunkSize: options.migrationChunkSize,
    });
  }

  beforeEach(async () => {
    captured = createCapturedTelemetry();
    restoreTelemetry = captured.install();
    clock = new ManualClock(1_000);
    keyValue = new KeyValueBackend({ driver: createMemoryKeyValueDriver() });
    relational = await createRelationalBackend(
      createBetterSqlite3Db<NoteStoreDb>({ path: ':memory:' }),
      { destroyOnClose: true }
    );
    repository = createRepository();
  });

  afterEach(async () => {
    await repository.close();
    restoreTelemetry();
  });

  describe('records', () => {
    it('creates a local-only record with normalized tags', async () => {
      const record = await repository.create({
        title: 'First',
        tags: [' sync ', 'sync', 'offline'],
      });

      expect(record).toEqual({
        id: 'note-001',
        title: 'First',
        body: '',
        tags: ['sync', 'offline'],
        category: null,
        createdAt: 1_000,
        updatedAt: 1_000,
        isFavorite: false,
        isArchived: false,
        syncState: 'local_only',
        remoteVersion: null,
        deletedAt: null,
        lastSyncedAt: null,
        remoteSnapshot: null,
      });
      expect(await repository.get('note-001')).toEqual(record);
      expect(repository.activeBackendKind).toBe('key-value');
    });

    it('keeps updatedAt strictly increasing when the clock stalls', async () => {
      await repository.create({ title: 'Draft' });

      const first = await repository.update('note-001', { body: 'one' });
      const second = await repository.update('note-001', { body: 'two' });
      clock.set(5_000);
      const third = await repository.update('note-001', { title: 'Final' });

      expect([first.updatedAt, second.updatedAt, third.updatedAt]).toEqual([
        1_001, 1_002, 5_000,
      ]);
      expect(third).toMatchObject({
        title: 'Final',
        body: 'two',
        createdAt: 1_000,
      });
    });

    it('serializes concurrent updates of one record', async () => {
      await repository.create({ title: 'Counter' });

      await Promise.all(
        ['a', 'b', 'c', 'd', 'e'].map((body) =>
          repository.update('note-001', { body })
        )
      );

      const record = await repository.get('note-001');
      expect(record?.updatedAt).toBe(1_005);
      expect(record?.body).toBe('e');
    });

    it('moves a synced record to pending_push on a local edit', async () => {
      await keyValue.put(buildSyncedNote({ id: 's-1', title: 'Remote copy' }));

      const updated = await repository.update('s-1', { tags: ['edited'] });

      expect(updated.syncState).toBe('pending_push');
      expect(updated.remoteVersion).toBe('v1');
      expect(updated.tags).toEqual(['edited']);
    });

    it('rejects updates of missing or deleted records with NOT_FOUND', async () => {
      await expect(
        repository.update('missing', { title: 'x' })
      ).rejects.toMatchObject({ name: 'StorageError', kind: 'NOT_FOUND' });

      await repository.create({ title: 'Gone soon' });
      await repository.delete('note-001');
      await expect(
        repository.update('note-001', { title: 'x' })
      ).rejects.toMatchObject({ kind: 'NOT_FOUND', recordId: 'note-001' });
    });

    it('rejects patches with unknown fields', async () => {
      await repository.create({ title: 'Strict' });
      await expect(
        repository.update('note-001', JSON.parse('{"syncState":"synced"}'))
      ).rejects.toThrow(/Invalid note patch/);
    });

    it('keeps current values for patch fields given as undefined', async () => {
      await repository.create({ title: 'a', category: 'work', isFavorite: true });
      clock.set(2_000);

      const updated = await repository.update('note-001', {
        title: 'b',
        category: undefined,
        isFavorite: undefined,
      });

      expect(updated).toMatchObject({
        title: 'b',
        category: 'work',
        isFavorite: true,
        updatedAt: 2_000,
      });
      expect(await repository.get('note-001')).toEqual(updated);

      const cleared = await repository.update('note-001', { category: null });
      expect(cleared.category).toBeNull();
    });

    it('tombstones on delete and hides the record from get', async () => {
      await repository.create({ title: 'Trash me' });

      expect(await repository.delete('note-001')).toBe(true);
      expect(await repository.delete('note-001')).toBe(false);
      expect(await repository.delete('missing')).toBe(false);

      expect(await repository.get('note-001')).toBeNull();
      expect(
        await repository.get('note-001', { includeDeleted: true })
      ).toMatchObject({ deletedAt: 1_000, updatedAt: 1_001 });
    });

    it('restores a tombstoned record', async () => {
      await repository.create({ title: 'Back again' });
      await repository.delete('note-001');

      const restored = await repository.restore('note-001');

      expect(restored).toMatchObject({ deletedAt: null, updatedAt: 1_002 });
      expect(await repository.get('note-001')).toEqual(restored);
      await expect(repository.restore('missing')).rejects.toMatchObject({
        kind: 'NOT_FOUND',
      });
    });

    it('purges only tombstones', async () => {
      await repository.create({ title: 'Keep' });
      await repository.create({ title: 'Purge' });
      await repository.delete('note-002');

      expect(await repository.purge('note-001')).toBe(false);
      expect(await repository.purge('note-002')).toBe(true);
      expect(await allIds(keyValue)).toEqual(['note-001']);
    });

    it('purgeDeleted keeps tombstones the remote has not seen yet', async () => {
      await keyValue.bulkPut([
        buildNote({ id: 'a', deletedAt: 900 }),
        buildSyncedNote({ id: 'b', deletedAt: 900, syncState: 'pending_push' }),
        buildSyncedNote({ id: 'c', deletedAt: 900 }),
        buildNote({ id: 'd' }),
        buildSyncedNote({ id: 'e', deletedAt: 900, syncState: 'conflict' }),
      ]);

      expect(await repository.purgeDeleted()).toBe(2);
      expect(await allIds(keyValue)).toEqual(['b', 'd', 'e']);
    });
  });

  describe('observers', () => {
    it('notifies lifecycle hooks after each operation', async () => {
      const events: string[] = [];
      repository.observers.add({
        onCreated: (record) => {
          events.push(`created:${record.id}`);
        },
        onUpdated: (record, previous) => {
          events.push(`updated:${previous.title}->${record.title}`);
        },
        onDeleted: (record) => {
          events.push(`deleted:${record.id}`);
        },
        onRestored: (record) => {
          events.push(`restored:${record.id}`);
        },
        onPurged: (id) => {
          events.push(`purged:${id}`);
        },
      });

      await repository.create({ title: 'A' });
      await repository.update('note-001', { title: 'B' });
      await repository.delete('note-001');
      await repository.restore('note-001');
      await repository.delete('note-001');
      await repository.purge('note-001');

      await vi.waitFor(() => expect(events).toHaveLength(6));
      expect(events).toEqual([
        'created:note-001',
        'updated:A->B',
        'deleted:note-001',
        'restored:note-001',
        'deleted:note-001',
        'purged:note-001',
      ]);
    });

    it('never lets a failing observer change the result', async () => {
      repository.observers.add({
        onCreated: () => {
          throw new Error('observer boom');
        },
      });

      const record = await repository.create({ title: 'Still saved' });

      expect(record.title).toBe('Still saved');
      expect(await repository.get(record.id)).toEqual(record);
      await vi.waitFor(() => expect(captured.exceptions).toHaveLength(1));
      expect(captured.eventNames()).toContain('repository.observer.failed');
    });
  });

  describe('export and import', () => {
    it('round-trips every record, tombstones included', async () => {
      await repository.create({ title: 'One', tags: ['a'] });
      await repository.create({ title: 'Two' });
      await repository.delete('note-002');
      clock.set(9_000);

      const snapshot = await repository.exportSnapshot();
      expect(snapshot).toMatchObject({
        version: 1,
        exportedAt: 9_000,
        storageType: 'key-value',
      });
      expect(snapshot.records.map((record) => record.id)).toEqual([
        'note-001',
        'note-002',
      ]);

      const target = new NoteRepository({
        backends: [new KeyValueBackend({ driver: createMemoryKeyValueDriver() })],
        clock,
      });
      expect(await target.importSnapshot(JSON.parse(JSON.stringify(snapshot)))).toBe(2);
      expect(await target.get('note-001')).toEqual(
        await repository.get('note-001')
      );
      expect(await target.get('note-002')).toBeNull();
      expect(
        await target.get('note-002', { includeDeleted: true })
      ).toMatchObject({ deletedAt: 1_000 });
      await target.close();
    });

    it('never rolls a newer stored record back', async () => {
      await repository.create({ title: 'Original' });
      clock.advance(1);
      await repository.create({ title: 'Untouched' });
      const snapshot = await repository.exportSnapshot();
      clock.set(5_000);
      await repository.update('note-001', { title: 'Edited' });
      await repository.delete('note-002');
      await repository.purge('note-002');

      expect(await repository.importSnapshot(snapshot)).toBe(1);

      expect(await repository.get('note-001')).toMatchObject({
        title: 'Edited',
        updatedAt: 5_000,
      });
      expect(await repository.get('note-002')).toMatchObject({
        title: 'Untouched',
        updatedAt: 1_001,
      });
      expect(
        captured.events.find(
          (event) => event.event === 'repository.import.complete'
        )
      ).toMatchObject({ count: 1, skipped: 1 });

      const newer = { ...snapshot.records[0], title: 'From backup', updatedAt: 9_000 };
      expect(
        await repository.importSnapshot({ ...snapshot, records: [newer] })
      ).toBe(1);
      expect(await repository.get('note-001')).toMatchObject({
        title: 'From backup',
        updatedAt: 9_000,
      });
    });

    it('rejects a malformed snapshot without writing', async () => {
      await expect(
        repository.importSnapshot({
          version: 2,
          exportedAt: 1,
          storageType: 'key-value',
          records: [],
        })
      ).rejects.toThrow(/Invalid note snapshot: version/);
      expect(await allIds(keyValue)).toEqual([]);
    });
  });

  describe('switchBackend', () => {
    it('copies every record and flips the active backend', async () => {
      await repository.create({ title: 'One' });
      await repository.create({ title: 'Two' });
      await repository.create({ title: 'Three' });
      await repository.delete('note-002');
      const switched = vi.fn();
      repository.observers.add({ onBackendSwitched: switched });

      const result = await repository.switchBackend('relational');

      expect(result).toEqual({
        from: 'key-value',
        to: 'relational',
        copiedCount: 3,
        replayedCount: 0,
        skippedCount: 0,
      });
      expect(repository.activeBackendKind).toBe('relational');
      expect(await allIds(relational)).toEqual([
        'note-001',
        'note-002',
        'note-003',
      ]);
      expect(await repository.get('note-002', { includeDeleted: true })).toEqual(
        await keyValue.get('note-002')
      );
      await vi.waitFor(() =>
        expect(switched).toHaveBeenCalledWith({
          from: 'key-value',
          to: 'relational',
          copiedCount: 3,
        })
      );
    });

    it('traces the switch and records its duration', async () => {
      await repository.create({ title: 'One' });

      await repository.switchBackend('relational');

      expect(captured.spans).toEqual(['repository.switch_backend']);
      expect(captured.metrics).toContainEqual({
        kind: 'distribution',
        name: 'notekeep.repository.switch_duration_ms',
        value: expect.any(Number),
        options: {
          unit: 'ms',
          attributes: { from: 'key-value', to: 'relational' },
        },
      });
    });

    it('copies in chunks of the configured size', async () => {
      repository = createRepository({ migrationChunkSize: 2 });
      for (const title of ['a', 'b', 'c', 'd', 'e']) {
        await repository.create({ title });
      }
      const bulkPut = vi.spyOn(relational, 'bulkPut');

      await repository.switchBackend('relational');

      expect(bulkPut.mock.calls.map(([records]) => records.length)).toEqual([
        2, 2, 1,
      ]);
    });

    it('replays records written while the copy runs', async () => {
      await repository.create({ title: 'Original' });
      await repository.create({ title: 'Other' });
      const copy = relational.bulkPut.bind(relational);
      let edited = false;
      vi.spyOn(relational, 'bulkPut').mockImplementation(
        async (records: readonly NoteRecord[]) => {
          if (!edited) {
            edited = true;
            await repository.update('note-001', { title: 'Edited during copy' });
            await repository.create({ title: 'Created during copy' });
          }
          await copy(records);
        }
      );

      const result = await repository.switchBackend('relational');

      expect(result.copiedCount).toBe(2);
      expect(result.replayedCount).toBe(2);
      expect((await relational.get('note-001'))?.title).toBe(
        'Edited during copy'
      );
      expect((await relational.get('note-003'))?.title).toBe(
        'Created during copy'
      );
    });

    it('rolls back the target and keeps the active backend on failure', async () => {
      repository = createRepository({ migrationChunkSize: 2 });
      for (const title of ['a', 'b', 'c']) {
        await repository.create({ title });
      }
      const copy = relational.bulkPut.bind(relational);
      vi.spyOn(relational, 'bulkPut')
        .mockImplementationOnce(copy)
        .mockRejectedValueOnce(new Error('disk full'));

      const error = await repository
        .switchBackend('relational')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MigrationError);
      expect(error).toMatchObject({
        from: 'key-value',
        to: 'relational',
        copiedCount: 2,
        message: 'Switching from key-value to relational failed: disk full',
      });
      expect(repository.activeBackendKind).toBe('key-value');
      expect(await allIds(relational)).toEqual([]);
      expect(await repository.get('note-003')).toMatchObject({ title: 'c' });
      expect(captured.eventNames()).toContain('repository.switch.failed');
    });

    it('treats an abort as a cancelled migration', async () => {
      await repository.create({ title: 'Stay' });
      const controller = new AbortController();
      controller.abort();

      const error = await repository
        .switchBackend('relational', { signal: controller.signal })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MigrationError);
      expect(classifyFailure(error)).toBe('cancelled');
      expect(repository.activeBackendKind).toBe('key-value');
      expect(await allIds(relational)).toEqual([]);
    });

    it('clears stale data in the target before copying', async () => {
      await relational.put(buildNote({ id: 'stale', title: 'Left over' }));
      await repository.create({ title: 'Fresh' });

      await repository.switchBackend('relational');

      expect(await allIds(relational)).toEqual(['note-001']);
    });

    it('is a no-op for the active kind and rejects unknown kinds', async () => {
      await expect(repository.switchBackend('key-value')).resolves.toEqual({
        from: 'key-value',
        to: 'key-value',
        copiedCount: 0,
        replayedCount: 0,
        skippedCount: 0,
      });

      const single = new NoteRepository({ backends: [keyValue] });
      await expect(single.switchBackend('relational')).rejects.toThrow(
        'No backend registered for "relational"'
      );
    });
  });

  describe('sync target', () => {
    it('applies a change only when updatedAt still matches', async () => {
      const note = buildNote({ id: 'n-1', updatedAt: 1_000 });
      await keyValue.put(note);

      expect(
        await repository.commitSyncChange({
          id: 'n-1',
          expectedUpdatedAt: 999,
          next: { ...note, title: 'Late' },
        })
      ).toBe('stale');
      expect(
        await repository.commitSyncChange({
          id: 'n-1',
          expectedUpdatedAt: 1_000,
          next: { ...note, title: 'Applied', updatedAt: 2_000 },
        })
      ).toBe('applied');
      expect((await keyValue.get('n-1'))?.title).toBe('Applied');

      expect(
        await repository.commitSyncChange({
          id: 'n-2',
          expectedUpdatedAt: null,
          next: buildNote({ id: 'n-2' }),
        })
      ).toBe('applied');
      expect(
        await repository.commitSyncChange({
          id: 'n-2',
          expectedUpdatedAt: 1_000,
          next: null,
        })
      ).toBe('applied');
      expect(await allIds(keyValue)).toEqual(['n-1']);
    });

    it('reads every record, tombstones included', async () => {
      await keyValue.bulkPut([
        buildNote({ id: 'live' }),
        buildNote({ id: 'gone', deletedAt: 1_000 }),
      ]);

      const { records, errors } = await repository.readAllForSync();

      expect(records.map((record) => record.id).sort()).toEqual([
        'gone',
        'live',
      ]);
      expect(errors).toEqual([]);
    });
  });

  it('rejects duplicate backend kinds', () => {
    expect(
      () => new NoteRepository({ backends: [keyValue, keyValue] })
    ).toThrow('Duplicate backend kind "key-value"');
  });
});
