import {
  type NoteRecord,
  type RemoteDataSource,
  type RemotePushAck,
  type RemoteRecord,
  type RemoteSearchSource,
  scoreQuery,
} from '@notekeep/core';

export interface FakeRemoteCalls {
  fetchAll: number;
  fetchSince: number[];
  push: number;
  search: number;
}

/**
 * In-process remote source. Holds records in a map, serves full and
 * incremental fetches, accepts pushes and answers searches.
 */
export interface FakeRemote extends RemoteDataSource, RemoteSearchSource {
  /** Insert or replace a remote record. */
  upsert(record: RemoteRecord): void;
  /**
   * Delete a record remotely. Full fetches stop returning it; incremental
   * fetches after `deletedAt` see a `deleted: true` marker.
   */
  remove(id: string, deletedAt: number): void;
  get(id: string): RemoteRecord | undefined;
  list(): RemoteRecord[];
  /** Ids whose pushes are answered with `rejected`. */
  rejectPushesFor(ids: readonly string[]): void;
  /** Batches received by `push`, in call order. */
  readonly pushed: NoteRecord[][];
  readonly calls: FakeRemoteCalls;
}

export interface CreateFakeRemoteOptions {
  records?: readonly RemoteRecord[];
  /** Leave `push` undefined, like a read-only remote (default: false) */
  readOnly?: boolean;
}

export function createFakeRemote(
  options: CreateFakeRemoteOptions = {}
): FakeRemote {
  const records = new Map<string, RemoteRecord>();
  const deletions = new Map<string, RemoteRecord>();
  const rejected = new Set<string>();
  const pushed: NoteRecord[][] = [];
  const calls: FakeRemoteCalls = {
    fetchAll: 0,
    fetchSince: [],
    push: 0,
    search: 0,
  };
  let versionCounter = 0;
  const nextVersion = () => {
    versionCounter += 1;
    return `r${versionCounter}`;
  };

  for (const record of options.records ?? []) {
    records.set(record.id, { ...record });
  }

  const remote: FakeRemote = {
    pushed,
    calls,
    upsert(record) {
      deletions.delete(record.id);
      records.set(record.id, { ...record });
    },
    remove(id, deletedAt) {
      const existing = records.get(id);
      records.delete(id);
      deletions.set(id, {
        id,
        title: existing?.title ?? '',
        body: existing?.body ?? '',
        updatedAt: deletedAt,
        remoteVersion: nextVersion(),
        deleted: true,
      });
    },
    get(id) {
      return records.get(id);
    },
    list() {
      return Array.from(records.values());
    },
    rejectPushesFor(ids) {
      for (const id of ids) rejected.add(id);
    },
    async fetchAll() {
      calls.fetchAll += 1;
      return Array.from(records.values(), (record) => ({ ...record }));
    },
    async fetchSince(since) {
      calls.fetchSince.push(since);
      return [...records.values(), ...deletions.values()]
        .filter((record) => record.updatedAt > since)
        .map((record) => ({ ...record }));
    },
    async search(query) {
      calls.search += 1;
      return Array.from(records.values()).filter(
        (record) => scoreQuery(record, query) > 0
      );
    },
  };

  if (!options.readOnly) {
    remote.push = async (batch) => {
      calls.push += 1;
      pushed.push(batch.map((record) => ({ ...record })));
      return batch.map((record): RemotePushAck => {
        if (rejected.has(record.id)) {
          return { id: record.id, status: 'rejected', reason: 'rejected' };
        }
        const remoteVersion = nextVersion();
        if (record.deletedAt !== null) {
          remote.remove(record.id, record.deletedAt);
        } else {
          remote.upsert({
            id: record.id,
            title: record.title,
            body: record.body,
            tags: [...record.tags],
            category: record.category,
            createdAt: record.createdAt,
            updatedAt: record.updatedAt,
            isFavorite: record.isFavorite,
            isArchived: record.isArchived,
            remoteVersion,
          });
        }
        return { id: record.id, status: 'applied', remoteVersion };
      });
    };
  }

  return remote;
}
