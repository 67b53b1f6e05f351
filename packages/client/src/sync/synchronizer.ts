/**
 * @notekeep/client - Synchronizer
 *
 * Runs one reconciliation cycle at a time between local storage and the
 * remote data source:
 *
 *   idle -> fetching -> diffing -> reconciling -> committing -> idle
 *
 * A stage error moves the cycle to `failed` and back to `idle` before the
 * cycle rejects. Records are committed one at a time, so a failing record
 * never blocks the others and is retried on the next cycle.
 */

import {
  abortReason,
  type Clock,
  captureStoreException,
  countStoreMetric,
  createStoreTimer,
  describeIssues,
  distributionStoreMetric,
  isAbortError,
  isRecord,
  logStoreEvent,
  type NoteRecord,
  needsResolution,
  type RemoteDataSource,
  type RemotePushAck,
  RemotePushAckSchema,
  type RemoteRecord,
  RemoteRecordSchema,
  StorageError,
  type StoreSpan,
  SyncCycleError,
  sleep as defaultSleep,
  startStoreSpan,
  systemClock,
  toErrorMessage,
} from '@notekeep/core';
import { diffRecords } from './diff';
import { buildSyncChange } from './reconcile';
import { nextUpdatedAt } from './rules';
import type {
  ConflictResolution,
  DiffKind,
  RunCycleOptions,
  SyncChange,
  SyncFailure,
  SyncMode,
  SyncPhase,
  SyncResult,
  SyncTarget,
} from './types';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_INITIAL_RETRY_DELAY_MS = 1_000;
const EXPONENTIAL_FACTOR = 2;

export type SyncSleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface NoteSynchronizerOptions {
  target: SyncTarget;
  remote: RemoteDataSource;
  clock?: Clock;
  /** Default: 'incremental' (falls back to a full fetch without a cursor) */
  mode?: SyncMode;
  fetchTimeoutMs?: number;
  /** Retries after the first failed fetch attempt */
  maxRetries?: number;
  initialRetryDelayMs?: number;
  /** Injected so tests do not wait out the backoff */
  sleep?: SyncSleep;
  /** Highest remote `updatedAt` already applied */
  initialCursor?: number | null;
}

type PhaseListener = (phase: SyncPhase) => void;

type CommitCounter =
  | 'newCount'
  | 'updatedCount'
  | 'conflictCount'
  | 'deletedCount'
  | 'purgedCount';

const COUNTER_BY_KIND: Partial<Record<DiffKind, CommitCounter>> = {
  new: 'newCount',
  'update-from-remote': 'updatedCount',
  conflict: 'conflictCount',
  'remote-deleted': 'deletedCount',
  'purge-confirmed': 'purgedCount',
};

class FetchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Remote fetch timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function validateRemoteBatch(raw: readonly unknown[]): {
  records: RemoteRecord[];
  failures: SyncFailure[];
} {
  const records: RemoteRecord[] = [];
  const failures: SyncFailure[] = [];
  for (const [index, item] of raw.entries()) {
    const parsed = RemoteRecordSchema.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
      continue;
    }
    const id =
      isRecord(item) && typeof item.id === 'string' && item.id.length > 0
        ? item.id
        : `#${index}`;
    failures.push({
      id,
      stage: 'validate',
      reason: describeIssues(parsed.error),
    });
  }
  return { records, failures };
}

function cancelledError(attempts: number, cause?: unknown): SyncCycleError {
  return new SyncCycleError('CANCELLED', 'Sync cycle was cancelled', attempts, {
    cause,
  });
}

function emptyResult(mode: SyncMode): SyncResult {
  return {
    mode,
    newCount: 0,
    updatedCount: 0,
    conflictCount: 0,
    deletedCount: 0,
    purgedCount: 0,
    pushedCount: 0,
    failures: [],
    failureDetails: [],
    error: null,
    durationMs: 0,
  };
}

export class NoteSynchronizer {
  private readonly target: SyncTarget;
  private readonly remote: RemoteDataSource;
  private readonly clock: Clock;
  private readonly mode: SyncMode;
  private readonly fetchTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialRetryDelayMs: number;
  private readonly sleep: SyncSleep;
  private readonly phaseListeners = new Set<PhaseListener>();
  private phase: SyncPhase = 'idle';
  private cursor: number | null;
  private inFlight: Promise<SyncResult> | null = null;

  constructor(options: NoteSynchronizerOptions) {
    this.target = options.target;
    this.remote = options.remote;
    this.clock = options.clock ?? systemClock;
    this.mode = options.mode ?? 'incremental';
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.initialRetryDelayMs =
      options.initialRetryDelayMs ?? DEFAULT_INITIAL_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.cursor = options.initialCursor ?? null;
  }

  getPhase(): SyncPhase {
    return this.phase;
  }

  getCursor(): number | null {
    return this.cursor;
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Subscribe to phase transitions. Returns an unsubscribe function.
   */
  onPhaseChange(listener: PhaseListener): () => void {
    this.phaseListeners.add(listener);
    return () => {
      this.phaseListeners.delete(listener);
    };
  }

  /**
   * Run one cycle. A call made while a cycle is running returns that cycle.
   */
  runCycle(options: RunCycleOptions = {}): Promise<SyncResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const cycle = startStoreSpan(
      { name: 'sync.cycle', attributes: { mode: options.mode ?? this.mode } },
      (span) => this.executeCycle(options, span)
    ).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  async listConflicts(): Promise<NoteRecord[]> {
    const { records } = await this.target.readAllForSync();
    return records.filter(needsResolution).sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Resolve a conflicted record.
   * - `keep_local`: keep local content, adopt the remote version token and
   *   push it on the next cycle. Against a remote deletion the token is
   *   cleared, so the push re-creates the record.
   * - `keep_remote`: take the remote content (or its deletion) as synced.
   */
  async resolveConflict(
    id: string,
    resolution: ConflictResolution
  ): Promise<NoteRecord | null> {
    const current = await this.target.readForSync(id);
    if (!current) {
      throw StorageError.notFound(id);
    }
    const snapshot = current.remoteSnapshot;
    if (!needsResolution(current) || !snapshot) {
      throw new Error(`Record "${id}" has no conflict to resolve`);
    }

    const now = this.clock.now();
    let next: NoteRecord;
    if (resolution === 'keep_local') {
      // Against a remote deletion there is no version to build on: the
      // record goes back up as a re-creation.
      next = {
        ...current,
        syncState: 'pending_push',
        remoteVersion: snapshot.deleted ? null : snapshot.remoteVersion,
        remoteSnapshot: null,
      };
    } else if (snapshot.deleted) {
      next = {
        ...current,
        deletedAt: current.deletedAt ?? now,
        updatedAt: nextUpdatedAt(current.updatedAt, now),
        syncState: 'synced',
        remoteVersion: snapshot.remoteVersion,
        lastSyncedAt: now,
        remoteSnapshot: null,
      };
    } else {
      next = {
        ...current,
        title: snapshot.title,
        body: snapshot.body,
        tags: snapshot.tags,
        category: snapshot.category,
        updatedAt: nextUpdatedAt(current.updatedAt, snapshot.updatedAt),
        deletedAt: null,
        syncState: 'synced',
        remoteVersion: snapshot.remoteVersion,
        lastSyncedAt: now,
        remoteSnapshot: null,
      };
    }

    const outcome = await this.target.commitSyncChange({
      id,
      expectedUpdatedAt: current.updatedAt,
      next,
    });
    if (outcome === 'stale') {
      throw new Error(`Record "${id}" changed while its conflict was resolved`);
    }

    logStoreEvent({
      event: 'sync.conflict.resolved',
      recordId: id,
      resolution,
    });
    return next;
  }

  private setPhase(phase: SyncPhase): void {
    if (this.phase === phase) return;
    this.phase = phase;
    for (const listener of this.phaseListeners) {
      try {
        listener(phase);
      } catch (error) {
        logStoreEvent({
          event: 'sync.phase_listener.failed',
          level: 'warn',
          phase,
          error: toErrorMessage(error),
        });
      }
    }
  }

  private ensureNotAborted(signal: AbortSignal | undefined, attempts = 0): void {
    if (signal?.aborted) {
      throw cancelledError(attempts, abortReason(signal));
    }
  }

  private calculateRetryDelay(attemptIndex: number): number {
    return this.initialRetryDelayMs * EXPONENTIAL_FACTOR ** attemptIndex;
  }

  private async executeCycle(
    options: RunCycleOptions,
    span: StoreSpan
  ): Promise<SyncResult> {
    const { signal } = options;
    const mode = options.mode ?? this.mode;
    const elapsed = createStoreTimer();
    const result = emptyResult(mode);

    try {
      this.setPhase('fetching');
      this.ensureNotAborted(signal);
      const since = mode === 'full' ? null : this.cursor;
      const raw = await this.fetchWithRetry(since, signal);

      this.setPhase('diffing');
      this.ensureNotAborted(signal);
      const validated = validateRemoteBatch(raw);
      result.failureDetails.push(...validated.failures);
      const local = await this.target.readAllForSync();
      this.ensureNotAborted(signal);
      const entries = diffRecords(local.records, validated.records, {
        complete: since === null,
      });

      this.setPhase('reconciling');
      const now = this.clock.now();
      const planned = entries.map((entry) => ({
        entry,
        change: buildSyncChange(entry, now),
      }));
      this.ensureNotAborted(signal);

      this.setPhase('committing');
      const failed = new Set<string>();
      for (const { entry, change } of planned) {
        if (!change) continue;
        this.ensureNotAborted(signal);
        const failure = await this.commit(change, 'commit');
        if (failure) {
          failed.add(change.id);
          result.failureDetails.push(failure);
          continue;
        }
        const counter = COUNTER_BY_KIND[entry.kind];
        if (counter) result[counter] += 1;
      }

      await this.pushPending(result, failed, signal);

      if (failed.size === 0) {
        this.advanceCursor(validated.records);
      }

      result.failures = Array.from(
        new Set(result.failureDetails.map((failure) => failure.id))
      );
      if (result.failures.length > 0) {
        result.error = new SyncCycleError(
          'PARTIAL_COMMIT_FAILURE',
          `${result.failures.length} record(s) failed to sync`,
          1
        );
      }
      result.durationMs = elapsed();

      logStoreEvent({
        event: 'sync.cycle.complete',
        level: result.failures.length > 0 ? 'warn' : 'info',
        mode,
        fetched: raw.length,
        newCount: result.newCount,
        updatedCount: result.updatedCount,
        conflictCount: result.conflictCount,
        deletedCount: result.deletedCount,
        purgedCount: result.purgedCount,
        pushedCount: result.pushedCount,
        failureCount: result.failures.length,
        durationMs: result.durationMs,
      });
      const outcome = result.error ? 'partial' : 'success';
      span.setAttribute('outcome', outcome);
      span.setAttribute('failure_count', result.failures.length);
      span.setStatus(result.error ? 'error' : 'ok');
      countStoreMetric('notekeep.sync.cycles', 1, {
        attributes: { outcome },
      });
      distributionStoreMetric('notekeep.sync.cycle_duration_ms', result.durationMs, {
        unit: 'ms',
        attributes: { outcome },
      });

      this.setPhase('idle');
      return result;
    } catch (error) {
      this.setPhase('failed');
      const failure =
        error instanceof SyncCycleError
          ? error
          : signal?.aborted || isAbortError(error)
            ? cancelledError(0, error)
            : error;

      logStoreEvent({
        event: 'sync.cycle.failed',
        level: 'error',
        mode,
        error: toErrorMessage(failure),
        durationMs: elapsed(),
      });
      span.setAttribute('outcome', 'failed');
      span.setStatus('error');
      countStoreMetric('notekeep.sync.cycles', 1, {
        attributes: { outcome: 'failed' },
      });
      if (!(failure instanceof SyncCycleError && failure.kind === 'CANCELLED')) {
        captureStoreException(failure, { operation: 'sync.cycle', mode });
      }

      this.setPhase('idle');
      throw failure;
    }
  }

  private advanceCursor(records: readonly RemoteRecord[]): void {
    let cursor = this.cursor;
    for (const record of records) {
      if (cursor === null || record.updatedAt > cursor) {
        cursor = record.updatedAt;
      }
    }
    this.cursor = cursor;
  }

  private async fetchWithRetry(
    since: number | null,
    signal: AbortSignal | undefined
  ): Promise<readonly unknown[]> {
    const maxAttempts = this.maxRetries + 1;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      this.ensureNotAborted(signal, attempt);
      try {
        return await this.fetchOnce(since, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw cancelledError(attempt + 1, error);
        }
        lastError = error;
        if (attempt + 1 >= maxAttempts) break;

        const delayMs = this.calculateRetryDelay(attempt);
        logStoreEvent({
          event: 'sync.fetch.retry',
          level: 'warn',
          attempt: attempt + 1,
          delayMs,
          error: toErrorMessage(error),
        });
        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            throw cancelledError(attempt + 1, sleepError);
          }
          throw sleepError;
        }
      }
    }

    const kind =
      lastError instanceof FetchTimeoutError ? 'FETCH_TIMEOUT' : 'FETCH_FAILURE';
    throw new SyncCycleError(
      kind,
      `Fetch failed after ${maxAttempts} attempt(s): ${toErrorMessage(lastError)}`,
      maxAttempts,
      { cause: lastError }
    );
  }

  /**
   * One fetch attempt bounded by the timeout. The remote call is raced
   * against the attempt's signal, so a source that ignores the signal still
   * cannot hold the cycle past the timeout.
   */
  private async fetchOnce(
    since: number | null,
    signal: AbortSignal | undefined
  ): Promise<readonly unknown[]> {
    const controller = new AbortController();
    const onAbort = () => {
      if (signal) controller.abort(abortReason(signal));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => {
      controller.abort(new FetchTimeoutError(this.fetchTimeoutMs));
    }, this.fetchTimeoutMs);

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(abortReason(controller.signal)),
        { once: true }
      );
    });
    const request = Promise.resolve().then(() =>
      since === null
        ? this.remote.fetchAll({ signal: controller.signal })
        : this.remote.fetchSince(since, { signal: controller.signal })
    );

    try {
      return await Promise.race([request, aborted]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Apply one change. Returns the failure instead of throwing so the cycle
   * continues with the next record.
   */
  private async commit(
    change: SyncChange,
    stage: 'commit' | 'push'
  ): Promise<SyncFailure | null> {
    try {
      const outcome = await this.target.commitSyncChange(change);
      if (outcome === 'stale') {
        return {
          id: change.id,
          stage,
          reason: 'Local record changed during the sync cycle',
        };
      }
      return null;
    } catch (error) {
      logStoreEvent({
        event: 'sync.commit.failed',
        level: 'warn',
        recordId: change.id,
        stage,
        error: toErrorMessage(error),
      });
      return { id: change.id, stage, reason: toErrorMessage(error) };
    }
  }

  /**
   * Push local changes the remote has not seen: `pending_push` records and
   * live records that never reached it.
   */
  private async pushPending(
    result: SyncResult,
    failed: ReadonlySet<string>,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const remote = this.remote;
    if (!remote.push) return;

    this.ensureNotAborted(signal);
    const { records } = await this.target.readAllForSync();
    const pending = records
      .filter(
        (record) =>
          !failed.has(record.id) &&
          (record.syncState === 'pending_push' ||
            (record.syncState === 'local_only' && record.deletedAt === null))
      )
      .sort((a, b) => compareIds(a.id, b.id));
    if (pending.length === 0) return;

    let rawAcks: readonly unknown[];
    try {
      rawAcks = await remote.push(pending, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError(1, error);
      }
      logStoreEvent({
        event: 'sync.push.failed',
        level: 'warn',
        count: pending.length,
        error: toErrorMessage(error),
      });
      for (const record of pending) {
        result.failureDetails.push({
          id: record.id,
          stage: 'push',
          reason: toErrorMessage(error),
        });
      }
      return;
    }

    const acks = new Map<string, RemotePushAck>();
    for (const raw of rawAcks) {
      const parsed = RemotePushAckSchema.safeParse(raw);
      if (parsed.success) {
        acks.set(parsed.data.id, parsed.data);
      }
    }

    const now = this.clock.now();
    for (const record of pending) {
      this.ensureNotAborted(signal);
      const ack = acks.get(record.id);
      if (!ack) {
        result.failureDetails.push({
          id: record.id,
          stage: 'push',
          reason: 'No acknowledgement from the remote',
        });
        continue;
      }
      if (ack.status === 'rejected') {
        result.failureDetails.push({
          id: record.id,
          stage: 'push',
          reason: ack.reason,
        });
        continue;
      }

      const failure = await this.acknowledge(record, ack.remoteVersion, now);
      if (failure) {
        result.failureDetails.push(failure);
        continue;
      }
      result.pushedCount += 1;
    }
  }

  /**
   * Mark a pushed record as synced, or purge an acknowledged tombstone. When
   * the record was edited while the push was in flight it stays
   * `pending_push` but adopts the new version token, so the next cycle does
   * not mistake our own push for a remote change.
   */
  private async acknowledge(
    record: NoteRecord,
    remoteVersion: string,
    now: number
  ): Promise<SyncFailure | null> {
    const change: SyncChange = {
      id: record.id,
      expectedUpdatedAt: record.updatedAt,
      next:
        record.deletedAt !== null
          ? null
          : { ...record, syncState: 'synced', remoteVersion, lastSyncedAt: now },
    };
    let current: NoteRecord | null;
    try {
      if ((await this.target.commitSyncChange(change)) === 'applied') {
        return null;
      }
      current = await this.target.readForSync(record.id);
    } catch (error) {
      logStoreEvent({
        event: 'sync.commit.failed',
        level: 'warn',
        recordId: record.id,
        stage: 'push',
        error: toErrorMessage(error),
      });
      return { id: record.id, stage: 'push', reason: toErrorMessage(error) };
    }

    if (!current || current.syncState === 'conflict') {
      return {
        id: record.id,
        stage: 'push',
        reason: 'Local record changed during the sync cycle',
      };
    }
    return this.commit(
      {
        id: current.id,
        expectedUpdatedAt: current.updatedAt,
        next: {
          ...current,
          syncState: 'pending_push',
          remoteVersion,
        },
      },
      'push'
    );
  }
}
