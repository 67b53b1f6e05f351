/**
 * @notekeep/client - Note repository
 *
 * The only facade application code talks to. Owns the active backend
 * pointer, serializes writes per record id, and migrates data between
 * backends without losing concurrent writes.
 */

import {
  type BackendKind,
  type BackendSearchResult,
  type BackendStatistics,
  type Clock,
  type CreateNoteInput,
  CreateNoteInputSchema,
  captureStoreException,
  createStoreTimer,
  describeIssues,
  distributionStoreMetric,
  generateId,
  type ListOptions,
  logStoreEvent,
  MigrationError,
  NOTE_SNAPSHOT_VERSION,
  type NoteFilter,
  type NotePatch,
  NotePatchSchema,
  type NoteRecord,
  type NoteScan,
  type NoteSnapshot,
  NoteSnapshotSchema,
  type NoteStorageBackend,
  normalizeTags,
  type SearchOptions,
  StorageError,
  type StoreSpan,
  startStoreSpan,
  systemClock,
  type TagUsage,
  throwIfAborted,
  toErrorMessage,
} from '@notekeep/core';
import { KeyedMutex, WriteBarrier } from './locks';
import { type NoteObserver, ObserverRegistry } from './observers';
import {
  isPurgeableTombstone,
  nextUpdatedAt,
  syncStateAfterLocalEdit,
} from './sync/rules';
import type {
  SyncChange,
  SyncCommitOutcome,
  SyncTarget,
} from './sync/types';

export const DEFAULT_MIGRATION_CHUNK_SIZE = 200;

export interface NoteRepositoryOptions {
  /** One backend per kind */
  backends: readonly NoteStorageBackend[];
  /** Default: the kind of the first backend */
  activeBackend?: BackendKind;
  clock?: Clock;
  idGenerator?: () => string;
  observers?: readonly NoteObserver[];
  /** Records per `bulkPut` while switching backends */
  migrationChunkSize?: number;
}

export interface GetOptions {
  /** Return tombstoned records too (default: false) */
  includeDeleted?: boolean;
}

export interface SwitchBackendOptions {
  signal?: AbortSignal;
}

export interface SwitchBackendResult {
  from: BackendKind;
  to: BackendKind;
  copiedCount: number;
  /** Records replayed because they were written during the copy */
  replayedCount: number;
  /** Corrupt source records that could not be copied */
  skippedCount: number;
}

export class NoteRepository implements SyncTarget {
  private readonly backends = new Map<BackendKind, NoteStorageBackend>();
  private readonly clock: Clock;
  private readonly idGenerator: () => string;
  private readonly migrationChunkSize: number;
  private readonly mutex = new KeyedMutex();
  private readonly barrier = new WriteBarrier();
  private activeKind: BackendKind;
  /** Ids written while a backend switch is copying */
  private migrationDirty: Set<string> | null = null;
  readonly observers: ObserverRegistry;

  constructor(options: NoteRepositoryOptions) {
    for (const backend of options.backends) {
      if (this.backends.has(backend.kind)) {
        throw new Error(`Duplicate backend kind "${backend.kind}"`);
      }
      this.backends.set(backend.kind, backend);
    }
    const first = options.backends[0];
    if (!first) {
      throw new Error('NoteRepository needs at least one backend');
    }

    this.activeKind = options.activeBackend ?? first.kind;
    if (!this.backends.has(this.activeKind)) {
      throw new Error(`No backend registered for "${this.activeKind}"`);
    }

    this.clock = options.clock ?? systemClock;
    this.idGenerator = options.idGenerator ?? generateId;
    this.migrationChunkSize =
      options.migrationChunkSize ?? DEFAULT_MIGRATION_CHUNK_SIZE;
    if (!Number.isInteger(this.migrationChunkSize) || this.migrationChunkSize < 1) {
      throw new Error('migrationChunkSize must be a positive integer');
    }
    this.observers = new ObserverRegistry(options.observers);
  }

  get activeBackendKind(): BackendKind {
    return this.activeKind;
  }

  get availableBackends(): BackendKind[] {
    return Array.from(this.backends.keys());
  }

  // ===========================================================================
  // Records
  // ===========================================================================

  async create(input: CreateNoteInput): Promise<NoteRecord> {
    const parsed = CreateNoteInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new Error(`Invalid note input: ${describeIssues(parsed.error)}`);
    }

    const fields = parsed.data;
    const id = this.idGenerator();
    const record = await this.write(id, async (backend) => {
      const now = this.clock.now();
      const next: NoteRecord = {
        id,
        title: fields.title,
        body: fields.body,
        tags: normalizeTags(fields.tags),
        category: fields.category,
        createdAt: now,
        updatedAt: now,
        isFavorite: fields.isFavorite,
        isArchived: fields.isArchived,
        syncState: 'local_only',
        remoteVersion: null,
        deletedAt: null,
        lastSyncedAt: null,
        remoteSnapshot: null,
      };
      await backend.put(next);
      return next;
    });

    this.observers.notify('onCreated', (observer) => observer.onCreated?.(record));
    return record;
  }

  /**
   * Merge `patch` into a live record. Rejects with `NOT_FOUND` when the id is
   * missing or tombstoned.
   */
  async update(id: string, patch: NotePatch): Promise<NoteRecord> {
    const parsed = NotePatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new Error(`Invalid note patch: ${describeIssues(parsed.error)}`);
    }

    const changes = parsed.data;
    const [record, previous] = await this.write(id, async (backend) => {
      const current = await backend.get(id);
      if (!current || current.deletedAt !== null) {
        throw StorageError.notFound(id);
      }
      const next: NoteRecord = {
        ...current,
        title: changes.title ?? current.title,
        body: changes.body ?? current.body,
        tags: changes.tags ? normalizeTags(changes.tags) : current.tags,
        category:
          changes.category === undefined ? current.category : changes.category,
        isFavorite: changes.isFavorite ?? current.isFavorite,
        isArchived: changes.isArchived ?? current.isArchived,
        updatedAt: nextUpdatedAt(current.updatedAt, this.clock.now()),
        syncState: syncStateAfterLocalEdit(current.syncState),
      };
      await backend.put(next);
      return [next, current] as const;
    });

    this.observers.notify('onUpdated', (observer) =>
      observer.onUpdated?.(record, previous)
    );
    return record;
  }

  async get(id: string, options: GetOptions = {}): Promise<NoteRecord | null> {
    const record = await this.activeBackend().get(id);
    if (!record) return null;
    if (record.deletedAt !== null && !options.includeDeleted) return null;
    return record;
  }

  /**
   * Tombstone a live record. Returns `false` when there was nothing to
   * delete.
   */
  async delete(id: string): Promise<boolean> {
    const record = await this.write(id, async (backend) => {
      const current = await backend.get(id);
      if (!current || current.deletedAt !== null) return null;
      const now = this.clock.now();
      const next: NoteRecord = {
        ...current,
        deletedAt: now,
        updatedAt: nextUpdatedAt(current.updatedAt, now),
        syncState: syncStateAfterLocalEdit(current.syncState),
      };
      await backend.put(next);
      return next;
    });

    if (!record) return false;
    this.observers.notify('onDeleted', (observer) => observer.onDeleted?.(record));
    return true;
  }

  /**
   * Bring a tombstoned record back. A live record is returned unchanged.
   */
  async restore(id: string): Promise<NoteRecord> {
    const { record, restored } = await this.write(id, async (backend) => {
      const current = await backend.get(id);
      if (!current) {
        throw StorageError.notFound(id);
      }
      if (current.deletedAt === null) {
        return { record: current, restored: false };
      }
      const next: NoteRecord = {
        ...current,
        deletedAt: null,
        updatedAt: nextUpdatedAt(current.updatedAt, this.clock.now()),
        syncState: syncStateAfterLocalEdit(current.syncState),
      };
      await backend.put(next);
      return { record: next, restored: true };
    });

    if (restored) {
      this.observers.notify('onRestored', (observer) =>
        observer.onRestored?.(record)
      );
    }
    return record;
  }

  /**
   * Hard-delete one tombstone. Live records are left alone.
   */
  async purge(id: string): Promise<boolean> {
    const purged = await this.write(id, async (backend) => {
      const current = await backend.get(id);
      if (!current || current.deletedAt === null) return false;
      await backend.delete(id);
      return true;
    });

    if (purged) {
      this.observers.notify('onPurged', (observer) => observer.onPurged?.(id));
    }
    return purged;
  }

  /**
   * Hard-delete every tombstone the remote no longer needs to hear about.
   * Tombstones still waiting to be pushed, or in conflict, are kept.
   */
  async purgeDeleted(): Promise<number> {
    const tombstones = await this.activeBackend()
      .listFiltered({ includeDeleted: true })
      .toArray();

    let purged = 0;
    for (const candidate of tombstones) {
      if (!isPurgeableTombstone(candidate)) continue;
      const removed = await this.write(candidate.id, async (backend) => {
        const current = await backend.get(candidate.id);
        if (!current || !isPurgeableTombstone(current)) return false;
        await backend.delete(candidate.id);
        return true;
      });
      if (!removed) continue;
      purged += 1;
      this.observers.notify('onPurged', (observer) =>
        observer.onPurged?.(candidate.id)
      );
    }

    logStoreEvent({ event: 'repository.purge_deleted', purged });
    return purged;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  listFiltered(filter?: NoteFilter, options?: ListOptions): NoteScan<NoteRecord> {
    return this.activeBackend().listFiltered(filter, options);
  }

  search(query: string, options?: SearchOptions): Promise<BackendSearchResult> {
    return this.activeBackend().search(query, options);
  }

  tagUsage(): Promise<TagUsage[]> {
    return this.activeBackend().tagUsage();
  }

  statistics(): Promise<BackendStatistics> {
    return this.activeBackend().statistics();
  }

  // ===========================================================================
  // Export / import
  // ===========================================================================

  async exportSnapshot(): Promise<NoteSnapshot> {
    const storageType = this.activeKind;
    const scan = this.activeBackend().listFiltered(
      { includeDeleted: true },
      { orderBy: 'createdAt', direction: 'asc' }
    );
    const records = await scan.toArray();
    if (scan.errors.length > 0) {
      logStoreEvent({
        event: 'repository.export.skipped_corrupt',
        level: 'warn',
        count: scan.errors.length,
      });
    }
    return {
      version: NOTE_SNAPSHOT_VERSION,
      exportedAt: this.clock.now(),
      storageType,
      records,
    };
  }

  /**
   * Write the records of a snapshot in one batch. A record is skipped when
   * the stored copy has the same or a newer `updatedAt`, so an import never
   * rolls content back. Returns the number of records written.
   */
  async importSnapshot(snapshot: unknown): Promise<number> {
    const parsed = NoteSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new Error(`Invalid note snapshot: ${describeIssues(parsed.error)}`);
    }

    const latest = new Map<string, NoteRecord>();
    for (const record of parsed.data.records) {
      const seen = latest.get(record.id);
      if (!seen || record.updatedAt > seen.updatedAt) {
        latest.set(record.id, record);
      }
    }

    const written = await this.barrier.enter(() =>
      this.mutex.runExclusiveAll(latest.keys(), async () => {
        const backend = this.activeBackend();
        const accepted: NoteRecord[] = [];
        for (const record of latest.values()) {
          const current = await this.readForImport(backend, record.id);
          if (current && current.updatedAt >= record.updatedAt) continue;
          accepted.push(record);
        }
        if (accepted.length > 0) {
          await backend.bulkPut(accepted);
        }
        for (const record of accepted) {
          this.migrationDirty?.add(record.id);
        }
        return accepted.length;
      })
    );

    logStoreEvent({
      event: 'repository.import.complete',
      count: written,
      skipped: latest.size - written,
      storageType: this.activeKind,
    });
    return written;
  }

  /** A corrupt stored copy is replaced by the imported one. */
  private async readForImport(
    backend: NoteStorageBackend,
    id: string
  ): Promise<NoteRecord | null> {
    try {
      return await backend.get(id);
    } catch (error) {
      if (error instanceof StorageError && error.kind === 'CORRUPT_RECORD') {
        return null;
      }
      throw error;
    }
  }

  // ===========================================================================
  // Backend switching
  // ===========================================================================

  /**
   * Copy every record (tombstones included) into the `kind` backend and make
   * it active. Writes keep landing on the current backend during the copy;
   * they are held only while the records written meanwhile are replayed and
   * the pointer flips.
   *
   * On failure or abort the target is cleared, the active backend stays as
   * it was, and a `MigrationError` is thrown.
   */
  async switchBackend(
    kind: BackendKind,
    options: SwitchBackendOptions = {}
  ): Promise<SwitchBackendResult> {
    const from = this.activeKind;
    const target = this.backends.get(kind);
    if (!target) {
      throw new Error(`No backend registered for "${kind}"`);
    }
    if (kind === from) {
      return { from, to: kind, copiedCount: 0, replayedCount: 0, skippedCount: 0 };
    }
    if (this.migrationDirty) {
      throw new Error('A backend switch is already in progress');
    }

    return startStoreSpan(
      { name: 'repository.switch_backend', attributes: { from, to: kind } },
      (span) => this.copyAndSwitch(from, kind, target, options.signal, span)
    );
  }

  private async copyAndSwitch(
    from: BackendKind,
    kind: BackendKind,
    target: NoteStorageBackend,
    signal: AbortSignal | undefined,
    span: StoreSpan
  ): Promise<SwitchBackendResult> {
    const source = this.activeBackend();
    const elapsed = createStoreTimer();
    const dirty = new Set<string>();
    this.migrationDirty = dirty;
    let copiedCount = 0;
    let replayedCount = 0;
    let skippedCount = 0;

    try {
      throwIfAborted(signal);
      await target.clear();

      const scan = source.listFiltered(
        { includeDeleted: true },
        { orderBy: 'createdAt', direction: 'asc', signal }
      );
      let chunk: NoteRecord[] = [];
      for await (const record of scan) {
        chunk.push(record);
        if (chunk.length >= this.migrationChunkSize) {
          throwIfAborted(signal);
          await target.bulkPut(chunk);
          copiedCount += chunk.length;
          chunk = [];
        }
      }
      if (chunk.length > 0) {
        throwIfAborted(signal);
        await target.bulkPut(chunk);
        copiedCount += chunk.length;
      }
      skippedCount = scan.errors.length;
      if (skippedCount > 0) {
        logStoreEvent({
          event: 'repository.switch.skipped_corrupt',
          level: 'warn',
          from,
          to: kind,
          count: skippedCount,
        });
      }

      await this.barrier.exclusive(async () => {
        for (const id of dirty) {
          throwIfAborted(signal);
          const record = await source.get(id);
          if (record) {
            await target.put(record);
          } else {
            await target.delete(id);
          }
          replayedCount += 1;
        }
        throwIfAborted(signal);
        this.activeKind = kind;
      });
    } catch (error) {
      span.setStatus('error');
      await this.discardPartialCopy(target, from, kind);
      logStoreEvent({
        event: 'repository.switch.failed',
        level: 'error',
        from,
        to: kind,
        copiedCount,
        error: toErrorMessage(error),
        durationMs: elapsed(),
      });
      throw new MigrationError(
        `Switching from ${from} to ${kind} failed: ${toErrorMessage(error)}`,
        from,
        kind,
        copiedCount,
        { cause: error }
      );
    } finally {
      this.migrationDirty = null;
    }

    const durationMs = elapsed();
    span.setAttribute('copied_count', copiedCount);
    span.setStatus('ok');
    distributionStoreMetric('notekeep.repository.switch_duration_ms', durationMs, {
      unit: 'ms',
      attributes: { from, to: kind },
    });
    logStoreEvent({
      event: 'repository.backend.switched',
      from,
      to: kind,
      copiedCount,
      replayedCount,
      durationMs,
    });
    this.observers.notify('onBackendSwitched', (observer) =>
      observer.onBackendSwitched?.({ from, to: kind, copiedCount })
    );
    return { from, to: kind, copiedCount, replayedCount, skippedCount };
  }

  private async discardPartialCopy(
    target: NoteStorageBackend,
    from: BackendKind,
    to: BackendKind
  ): Promise<void> {
    try {
      await target.clear();
    } catch (cleanupError) {
      logStoreEvent({
        event: 'repository.switch.cleanup_failed',
        level: 'error',
        from,
        to,
        error: toErrorMessage(cleanupError),
      });
      captureStoreException(cleanupError, {
        operation: 'repository.switch.cleanup',
        from,
        to,
      });
    }
  }

  // ===========================================================================
  // Sync target
  // ===========================================================================

  async readAllForSync(): Promise<{
    records: NoteRecord[];
    errors: readonly StorageError[];
  }> {
    const scan = this.activeBackend().listFiltered(
      { includeDeleted: true },
      { orderBy: 'createdAt', direction: 'asc' }
    );
    const records = await scan.toArray();
    return { records, errors: scan.errors };
  }

  readForSync(id: string): Promise<NoteRecord | null> {
    return this.activeBackend().get(id);
  }

  /**
   * Apply a sync write if the record still has the `updatedAt` the change
   * was computed from.
   */
  commitSyncChange(change: SyncChange): Promise<SyncCommitOutcome> {
    return this.write(change.id, async (backend) => {
      const current = await backend.get(change.id);
      const currentUpdatedAt = current ? current.updatedAt : null;
      if (currentUpdatedAt !== change.expectedUpdatedAt) {
        return 'stale';
      }
      if (change.next) {
        await backend.put(change.next);
      } else {
        await backend.delete(change.id);
      }
      return 'applied';
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async close(): Promise<void> {
    for (const backend of this.backends.values()) {
      await backend.close();
    }
  }

  private activeBackend(): NoteStorageBackend {
    const backend = this.backends.get(this.activeKind);
    if (!backend) {
      throw new Error(`No backend registered for "${this.activeKind}"`);
    }
    return backend;
  }

  /**
   * Run a write against the active backend, serialized per id and gated by
   * the switch barrier. The backend is resolved inside the gate so a write
   * held during a switch lands on the new backend.
   */
  private write<T>(
    id: string,
    task: (backend: NoteStorageBackend) => Promise<T>
  ): Promise<T> {
    return this.barrier.enter(() =>
      this.mutex.runExclusive(id, async () => {
        const result = await task(this.activeBackend());
        this.migrationDirty?.add(id);
        return result;
      })
    );
  }
}
