/**
 * @notekeep/client - Store factory
 *
 * Wires the repository, search coordinator and synchronizer from one config.
 */

import type {
  Clock,
  NoteStorageBackend,
  RemoteDataSource,
  RemoteSearchSource,
} from '@notekeep/core';
import { createBetterSqlite3Db } from '@notekeep/dialect-better-sqlite3';
import {
  createSqliteKeyValueDriver,
  ensureKeyValueSchema,
  type KeyValueDb,
  KeyValueBackend,
} from '@notekeep/store-kv';
import {
  createRelationalBackend,
  type NoteStoreDb,
} from '@notekeep/store-sqlite';
import {
  type NoteStoreConfig,
  parseNoteStoreConfig,
  type ResolvedNoteStoreConfig,
} from './config';
import type { NoteObserver } from './observers';
import { NoteRepository } from './repository';
import { SearchCoordinator } from './search-coordinator';
import { NoteSynchronizer, type SyncSleep } from './sync/synchronizer';

export interface CreateNoteStoreOptions {
  backends: readonly NoteStorageBackend[];
  /** Remote data source; without it there is no synchronizer */
  remote?: RemoteDataSource;
  /** Remote search source for `remote` and `hybrid` scopes */
  remoteSearch?: RemoteSearchSource;
  config?: NoteStoreConfig;
  clock?: Clock;
  idGenerator?: () => string;
  observers?: readonly NoteObserver[];
  /** Retry sleep for the synchronizer */
  sleep?: SyncSleep;
}

export interface NoteStore {
  readonly config: ResolvedNoteStoreConfig;
  readonly repository: NoteRepository;
  readonly search: SearchCoordinator;
  /** `null` when no remote data source was given */
  readonly synchronizer: NoteSynchronizer | null;
  close(): Promise<void>;
}

export function createNoteStore(options: CreateNoteStoreOptions): NoteStore {
  const config = parseNoteStoreConfig(options.config);

  const repository = new NoteRepository({
    backends: options.backends,
    activeBackend: config.activeBackend,
    clock: options.clock,
    idGenerator: options.idGenerator,
    observers: options.observers,
    migrationChunkSize: config.migration.chunkSize,
  });

  const search = new SearchCoordinator({
    repository,
    remote: options.remoteSearch,
    minLocalResults: config.search.minLocalResults,
  });

  const synchronizer = options.remote
    ? new NoteSynchronizer({
        target: repository,
        remote: options.remote,
        clock: options.clock,
        mode: config.sync.mode,
        fetchTimeoutMs: config.sync.fetchTimeoutMs,
        maxRetries: config.sync.maxRetries,
        initialRetryDelayMs: config.sync.initialRetryDelayMs,
        sleep: options.sleep,
      })
    : null;

  return {
    config,
    repository,
    search,
    synchronizer,
    close: () => repository.close(),
  };
}

export interface SqliteBackendsOptions {
  /** Database file for the key-value engine, or ':memory:' */
  keyValuePath: string;
  /** Database file for the relational engine, or ':memory:' */
  relationalPath: string;
  /** Create the FTS5 index (default: true) */
  fullTextSearch?: boolean;
}

/**
 * Open both engines on SQLite, each on its own connection. Closing the
 * backends closes the connections.
 */
export async function openSqliteBackends(
  options: SqliteBackendsOptions
): Promise<NoteStorageBackend[]> {
  const kvDb = createBetterSqlite3Db<KeyValueDb>({ path: options.keyValuePath });
  await ensureKeyValueSchema(kvDb);
  const keyValue = new KeyValueBackend({
    driver: createSqliteKeyValueDriver(kvDb, { destroyOnClose: true }),
  });

  const relationalDb = createBetterSqlite3Db<NoteStoreDb>({
    path: options.relationalPath,
  });
  try {
    const relational = await createRelationalBackend(relationalDb, {
      fullTextSearch: options.fullTextSearch,
      destroyOnClose: true,
    });
    return [keyValue, relational];
  } catch (error) {
    await relationalDb.destroy();
    await keyValue.close();
    throw error;
  }
}
