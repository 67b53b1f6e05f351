/**
 * @notekeep/client - Sync state transitions driven by local edits
 */

import type { NoteRecord, SyncState } from '@notekeep/core';

/**
 * Sync state after a local content or lifecycle edit. A synced record now
 * differs from the remote copy; the other states already describe it.
 */
export function syncStateAfterLocalEdit(state: SyncState): SyncState {
  return state === 'synced' ? 'pending_push' : state;
}

/**
 * `updatedAt` for a mutation at `now`: strictly greater than the previous
 * value even when the clock stalls or steps back.
 */
export function nextUpdatedAt(previous: number, now: number): number {
  return Math.max(now, previous + 1);
}

/**
 * True when a tombstone has nothing left to tell the remote and may be
 * hard-deleted.
 */
export function isPurgeableTombstone(record: NoteRecord): boolean {
  return (
    record.deletedAt !== null &&
    (record.syncState === 'local_only' || record.syncState === 'synced')
  );
}
