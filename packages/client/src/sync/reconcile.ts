/**
 * @notekeep/client - Target record construction for diff entries
 */

import {
  type NoteRecord,
  normalizeTags,
  type RemoteRecord,
  type RemoteSnapshot,
} from '@notekeep/core';
import { nextUpdatedAt } from './rules';
import type { DiffEntry, SyncChange } from './types';

export function recordFromRemote(remote: RemoteRecord, now: number): NoteRecord {
  return {
    id: remote.id,
    title: remote.title,
    body: remote.body,
    tags: normalizeTags(remote.tags ?? []),
    category: remote.category ?? null,
    createdAt: remote.createdAt ?? remote.updatedAt,
    updatedAt: remote.updatedAt,
    isFavorite: remote.isFavorite ?? false,
    isArchived: remote.isArchived ?? false,
    syncState: 'synced',
    remoteVersion: remote.remoteVersion,
    deletedAt: null,
    lastSyncedAt: now,
    remoteSnapshot: null,
  };
}

/**
 * Apply remote content over a local record. Optional remote fields that are
 * absent leave the local value in place.
 */
export function mergeRemoteContent(
  local: NoteRecord,
  remote: RemoteRecord,
  now: number
): NoteRecord {
  return {
    ...local,
    title: remote.title,
    body: remote.body,
    tags: remote.tags === undefined ? local.tags : normalizeTags(remote.tags),
    category: remote.category === undefined ? local.category : remote.category,
    updatedAt: Math.max(remote.updatedAt, local.updatedAt + 1),
    isFavorite: remote.isFavorite ?? local.isFavorite,
    isArchived: remote.isArchived ?? local.isArchived,
    syncState: 'synced',
    remoteVersion: remote.remoteVersion,
    deletedAt: null,
    lastSyncedAt: now,
    remoteSnapshot: null,
  };
}

export function snapshotFromRemote(
  local: NoteRecord,
  remote: RemoteRecord | null,
  now: number
): RemoteSnapshot {
  if (remote === null || remote.deleted === true) {
    return {
      title: local.title,
      body: local.body,
      tags: local.tags,
      category: local.category,
      updatedAt: remote?.updatedAt ?? now,
      remoteVersion: remote?.remoteVersion ?? local.remoteVersion ?? '',
      deleted: true,
    };
  }
  return {
    title: remote.title,
    body: remote.body,
    tags: remote.tags === undefined ? local.tags : normalizeTags(remote.tags),
    category: remote.category === undefined ? local.category : remote.category,
    updatedAt: remote.updatedAt,
    remoteVersion: remote.remoteVersion,
    deleted: false,
  };
}

/**
 * Build the write for one diff entry. `null` means the entry needs no write.
 */
export function buildSyncChange(
  entry: DiffEntry,
  now: number
): SyncChange | null {
  const { local, remote } = entry;

  switch (entry.kind) {
    case 'new': {
      if (!remote) return null;
      return {
        id: entry.id,
        expectedUpdatedAt: null,
        next: recordFromRemote(remote, now),
      };
    }
    case 'update-from-remote': {
      if (!local || !remote) return null;
      return {
        id: entry.id,
        expectedUpdatedAt: local.updatedAt,
        next: mergeRemoteContent(local, remote, now),
      };
    }
    case 'conflict': {
      if (!local) return null;
      return {
        id: entry.id,
        expectedUpdatedAt: local.updatedAt,
        next: {
          ...local,
          syncState: 'conflict',
          remoteSnapshot: snapshotFromRemote(local, remote, now),
        },
      };
    }
    case 'remote-deleted': {
      if (!local) return null;
      return {
        id: entry.id,
        expectedUpdatedAt: local.updatedAt,
        next: {
          ...local,
          deletedAt: now,
          updatedAt: nextUpdatedAt(local.updatedAt, now),
          syncState: 'synced',
          remoteVersion: remote?.remoteVersion ?? local.remoteVersion,
          lastSyncedAt: now,
          remoteSnapshot: null,
        },
      };
    }
    case 'purge-confirmed': {
      if (!local) return null;
      return { id: entry.id, expectedUpdatedAt: local.updatedAt, next: null };
    }
    case 'unchanged':
    case 'skipped':
      return null;
  }
}
