/**
 * @notekeep/client - Remote/local diff classification
 */

import type { NoteRecord, RemoteRecord } from '@notekeep/core';
import type { DiffEntry, DiffKind } from './types';

export interface DiffOptions {
  /**
   * The remote batch is the complete remote set, so a previously synced
   * record missing from it was deleted remotely.
   */
  complete: boolean;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Classify a record the remote reports as deleted (flagged, or absent from a
 * complete fetch). `null` means there is nothing to do.
 */
function classifyRemoteDeletion(local: NoteRecord): DiffKind | null {
  if (local.syncState === 'conflict') return 'skipped';
  if (local.deletedAt !== null) return 'purge-confirmed';
  // Never reached the remote, or waiting to be re-created there.
  if (local.remoteVersion === null) return null;
  if (local.syncState === 'pending_push') return 'conflict';
  return 'remote-deleted';
}

function classifyRemotePresent(
  local: NoteRecord,
  remote: RemoteRecord
): DiffKind {
  if (local.syncState === 'conflict') return 'skipped';
  if (local.syncState === 'pending_push') {
    return remote.remoteVersion !== local.remoteVersion
      ? 'conflict'
      : 'unchanged';
  }
  if (local.deletedAt !== null && local.syncState === 'local_only') {
    return 'purge-confirmed';
  }
  return remote.updatedAt > local.updatedAt ? 'update-from-remote' : 'unchanged';
}

/**
 * Keep one remote record per id, the one with the highest `updatedAt`.
 */
export function dedupeRemote(
  remote: readonly RemoteRecord[]
): Map<string, RemoteRecord> {
  const byId = new Map<string, RemoteRecord>();
  for (const record of remote) {
    const existing = byId.get(record.id);
    if (!existing || record.updatedAt >= existing.updatedAt) {
      byId.set(record.id, record);
    }
  }
  return byId;
}

/**
 * Diff the local set against a remote batch. Entries are sorted by id, the
 * order changes are committed in.
 */
export function diffRecords(
  local: readonly NoteRecord[],
  remote: readonly RemoteRecord[],
  options: DiffOptions
): DiffEntry[] {
  const remoteById = dedupeRemote(remote);
  const localById = new Map(local.map((record) => [record.id, record]));
  const entries: DiffEntry[] = [];

  for (const record of remoteById.values()) {
    const existing = localById.get(record.id) ?? null;
    if (record.deleted === true) {
      const kind = existing ? classifyRemoteDeletion(existing) : null;
      if (kind) {
        entries.push({ id: record.id, kind, local: existing, remote: record });
      }
      continue;
    }
    entries.push({
      id: record.id,
      kind: existing ? classifyRemotePresent(existing, record) : 'new',
      local: existing,
      remote: record,
    });
  }

  for (const record of local) {
    if (remoteById.has(record.id)) continue;

    if (record.deletedAt !== null && record.syncState === 'local_only') {
      entries.push({
        id: record.id,
        kind: 'purge-confirmed',
        local: record,
        remote: null,
      });
      continue;
    }

    if (options.complete && record.remoteVersion !== null) {
      const kind = classifyRemoteDeletion(record);
      if (kind) {
        entries.push({ id: record.id, kind, local: record, remote: null });
      }
    }
  }

  return entries.sort((a, b) => compareIds(a.id, b.id));
}
