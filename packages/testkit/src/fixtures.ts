import type { NoteRecord, RemoteRecord } from '@notekeep/core';

/**
 * A valid record with fixed timestamps. Override whatever the test cares
 * about.
 */
export function buildNote(overrides: Partial<NoteRecord> = {}): NoteRecord {
  return {
    id: 'note-001',
    title: 'Untitled',
    body: '',
    tags: [],
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
    ...overrides,
  };
}

/**
 * Records `note-001` .. `note-NNN`, each one millisecond newer than the last.
 */
export function buildNotes(
  count: number,
  overrides: (index: number) => Partial<NoteRecord> = () => ({})
): NoteRecord[] {
  return Array.from({ length: count }, (_, index) => {
    const id = `note-${String(index + 1).padStart(3, '0')}`;
    return buildNote({
      id,
      title: `Note ${index + 1}`,
      createdAt: 1_000 + index,
      updatedAt: 1_000 + index,
      ...overrides(index),
    });
  });
}

/**
 * A synced local record as it looks right after a sync commit.
 */
export function buildSyncedNote(
  overrides: Partial<NoteRecord> = {}
): NoteRecord {
  return buildNote({
    syncState: 'synced',
    remoteVersion: 'v1',
    lastSyncedAt: 1_000,
    ...overrides,
  });
}

export function buildRemoteRecord(
  overrides: Partial<RemoteRecord> = {}
): RemoteRecord {
  return {
    id: 'note-001',
    title: 'Untitled',
    body: '',
    updatedAt: 1_000,
    remoteVersion: 'v1',
    ...overrides,
  };
}
