/**
 * @notekeep/client - Synchronizer types
 */

import type {
  NoteRecord,
  RemoteRecord,
  StorageError,
  SyncCycleError,
} from '@notekeep/core';

/**
 * Cycle phase. `failed` is entered when a stage throws and always returns to
 * `idle` before the cycle settles.
 */
export type SyncPhase =
  | 'idle'
  | 'fetching'
  | 'diffing'
  | 'reconciling'
  | 'committing'
  | 'failed';

export type SyncMode = 'full' | 'incremental';

export type DiffKind =
  | 'new'
  | 'update-from-remote'
  | 'conflict'
  | 'remote-deleted'
  | 'purge-confirmed'
  | 'unchanged'
  | 'skipped';

export interface DiffEntry {
  id: string;
  kind: DiffKind;
  local: NoteRecord | null;
  /** `null` when the record is absent from a full fetch */
  remote: RemoteRecord | null;
}

/**
 * One atomic write applied by the sync target under the record's lock.
 */
export interface SyncChange {
  id: string;
  /** `updatedAt` the change was computed from; `null` when it was absent */
  expectedUpdatedAt: number | null;
  /** Record to write, or `null` to purge */
  next: NoteRecord | null;
}

export type SyncCommitOutcome = 'applied' | 'stale';

/**
 * What the synchronizer needs from local storage. Implemented by the
 * repository.
 */
export interface SyncTarget {
  readAllForSync(): Promise<{
    records: NoteRecord[];
    errors: readonly StorageError[];
  }>;
  readForSync(id: string): Promise<NoteRecord | null>;
  commitSyncChange(change: SyncChange): Promise<SyncCommitOutcome>;
}

export type SyncFailureStage = 'validate' | 'commit' | 'push';

export interface SyncFailure {
  id: string;
  stage: SyncFailureStage;
  reason: string;
}

export interface SyncResult {
  mode: SyncMode;
  newCount: number;
  updatedCount: number;
  conflictCount: number;
  deletedCount: number;
  purgedCount: number;
  pushedCount: number;
  /** Ids that failed in this cycle */
  failures: string[];
  failureDetails: SyncFailure[];
  /** `PARTIAL_COMMIT_FAILURE` when `failures` is non-empty */
  error: SyncCycleError | null;
  durationMs: number;
}

export type ConflictResolution = 'keep_local' | 'keep_remote';

export interface RunCycleOptions {
  signal?: AbortSignal;
  /** Override the configured mode for this cycle */
  mode?: SyncMode;
}
