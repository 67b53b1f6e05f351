/**
 * @notekeep/store-sqlite - Table types for the relational engine
 */

import type { Kysely } from 'kysely';

/**
 * Executor type that both Kysely and Transaction satisfy.
 */
export type NoteStoreExecutor = Pick<
  Kysely<NoteStoreDb>,
  'selectFrom' | 'insertInto' | 'updateTable' | 'deleteFrom'
>;

export interface NotesTable {
  id: string;
  title: string;
  body: string;
  category: string | null;
  /** ms since epoch */
  created_at: number;
  /** ms since epoch */
  updated_at: number;
  /** 0 | 1 */
  is_favorite: number;
  /** 0 | 1 */
  is_archived: number;
  /** local_only | synced | pending_push | conflict */
  sync_state: string;
  remote_version: string | null;
  deleted_at: number | null;
  last_synced_at: number | null;
  /** JSON string of RemoteSnapshot (or null) */
  remote_snapshot_json: string | null;
}

export interface NoteTagsTable {
  note_id: string;
  tag: string;
  /** Index of the tag within the record's tag list */
  position: number;
}

/**
 * FTS5 index over searchable text. `tags` holds the record's tags joined by
 * newlines.
 */
export interface NotesFtsTable {
  note_id: string;
  title: string;
  body: string;
  tags: string;
}

export interface NoteStoreDb {
  notes: NotesTable;
  note_tags: NoteTagsTable;
  notes_fts: NotesFtsTable;
}
