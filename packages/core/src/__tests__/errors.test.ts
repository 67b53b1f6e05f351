import { describe, expect, test } from 'vitest';
import {
  classifyFailure,
  MigrationError,
  StorageError,
  SyncCycleError,
} from '../errors';
import { parseStoredRecord } from '../record';
import { createScan } from '../scan';

describe('classifyFailure', () => {
  test('I/O and fetch failures mean retry later', () => {
    expect(
      classifyFailure(StorageError.ioFailure('disk gone', new Error('EIO')))
    ).toBe('retry_later');
    expect(
      classifyFailure(new SyncCycleError('FETCH_TIMEOUT', 'slow remote', 4))
    ).toBe('retry_later');
  });

  test('corrupt records are integrity issues', () => {
    expect(classifyFailure(StorageError.corrupt('n-1', 'bad json'))).toBe(
      'data_integrity'
    );
  });

  test('migration errors classify by their cause', () => {
    const error = new MigrationError('copy failed', 'key-value', 'relational', 3, {
      cause: StorageError.ioFailure('write failed', new Error('EIO')),
    });
    expect(classifyFailure(error)).toBe('retry_later');
  });

  test('cancellation is recognised', () => {
    expect(
      classifyFailure(new SyncCycleError('CANCELLED', 'aborted', 1))
    ).toBe('cancelled');
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(classifyFailure(abort)).toBe('cancelled');
  });

  test('anything else is unknown', () => {
    expect(classifyFailure(new Error('???'))).toBe('unknown');
    expect(classifyFailure(StorageError.notFound('n-9'))).toBe('unknown');
  });
});

describe('StorageError', () => {
  test('ioFailure carries the cause message and is retryable', () => {
    const cause = new Error('SQLITE_BUSY');
    const error = StorageError.ioFailure('Failed to write', cause, 'n-1');
    expect(error.message).toBe('Failed to write: SQLITE_BUSY');
    expect(error.kind).toBe('IO_FAILURE');
    expect(error.recordId).toBe('n-1');
    expect(error.cause).toBe(cause);
    expect(error.retryable).toBe(true);
  });
});

describe('parseStoredRecord', () => {
  test('rejects values that are not records', () => {
    expect(() => parseStoredRecord({ id: 'n-1' }, 'n-1')).toThrow(StorageError);
  });

  test('rejects a record stored under another id', () => {
    const record = {
      id: 'n-2',
      title: 't',
      body: '',
      tags: [],
      category: null,
      createdAt: 1,
      updatedAt: 1,
      isFavorite: false,
      isArchived: false,
      syncState: 'local_only',
      remoteVersion: null,
      deletedAt: null,
      lastSyncedAt: null,
      remoteSnapshot: null,
    };
    expect(() => parseStoredRecord(record, 'n-1')).toThrow(
      'Record "n-1" is corrupt: stored under "n-1" but carries id "n-2"'
    );
    expect(parseStoredRecord(record, 'n-2')).toEqual(record);
  });
});

describe('createScan', () => {
  test('restarts the producer and resets errors on every iteration', async () => {
    let runs = 0;
    const scan = createScan<number>(async function* (reportError) {
      runs += 1;
      yield 1;
      if (runs === 1) reportError(StorageError.corrupt('n-1', 'bad'));
      yield 2;
    });

    expect(await scan.toArray()).toEqual([1, 2]);
    expect(scan.errors).toHaveLength(1);
    expect(await scan.toArray()).toEqual([1, 2]);
    expect(scan.errors).toHaveLength(0);
    expect(runs).toBe(2);
  });
});
