/**
 * @notekeep/store-sqlite - Schema creation (SQLite)
 */

import { logStoreEvent, toErrorMessage } from '@notekeep/core';
import { type Kysely, sql } from 'kysely';
import { FTS_TAG_SEPARATOR } from './fts';
import type { NoteStoreDb } from './schema';

export interface EnsureNoteSchemaOptions {
  /** Create the FTS5 index (default: true) */
  fullTextSearch?: boolean;
}

export interface NoteSchemaInfo {
  /** Whether the FTS5 index exists and can be queried */
  fullTextSearch: boolean;
}

function isFtsUnavailableError(message: string): boolean {
  const normalized = message.toLowerCase();
  return (
    normalized.includes('no such module') ||
    normalized.includes('no such tokenizer') ||
    normalized.includes('fts5')
  );
}

async function tableExists<DB>(db: Kysely<DB>, name: string): Promise<boolean> {
  const result = await sql<{ name: string }>`
    select name from sqlite_master
    where type = 'table' and name = ${sql.val(name)}
  `.execute(db);
  return result.rows.length > 0;
}

/**
 * Repopulate the FTS index from the primary tables.
 */
export async function rebuildFullTextIndex<DB extends NoteStoreDb>(
  db: Kysely<DB>
): Promise<void> {
  await sql`delete from ${sql.table('notes_fts')}`.execute(db);
  await sql`
    insert into ${sql.table('notes_fts')} (note_id, title, body, tags)
    select n.id, n.title, n.body, coalesce(
      (select group_concat(tag, ${sql.val(FTS_TAG_SEPARATOR)})
       from (select t.tag from note_tags t
             where t.note_id = n.id order by t.position)),
      ''
    )
    from notes n
  `.execute(db);
}

async function ensureFullTextIndex<DB extends NoteStoreDb>(
  db: Kysely<DB>
): Promise<boolean> {
  if (await tableExists(db, 'notes_fts')) {
    return true;
  }

  try {
    await sql`
      create virtual table ${sql.table('notes_fts')} using fts5(
        note_id unindexed,
        title,
        body,
        tags,
        tokenize = 'trigram'
      )
    `.execute(db);
  } catch (error) {
    const message = toErrorMessage(error);
    if (!isFtsUnavailableError(message)) {
      throw error;
    }
    logStoreEvent({
      event: 'relational.schema.fts_unavailable',
      level: 'warn',
      error: message,
    });
    return false;
  }

  // Existing databases gain the index after the fact.
  await rebuildFullTextIndex(db);
  return true;
}

/**
 * Ensures the note tables exist. Safe to call multiple times (idempotent).
 *
 * @returns whether full-text search is available
 */
export async function ensureNoteSchema<DB extends NoteStoreDb>(
  db: Kysely<DB>,
  options: EnsureNoteSchemaOptions = {}
): Promise<NoteSchemaInfo> {
  await db.schema
    .createTable('notes')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('body', 'text', (col) => col.notNull())
    .addColumn('category', 'text')
    .addColumn('created_at', 'bigint', (col) => col.notNull())
    .addColumn('updated_at', 'bigint', (col) => col.notNull())
    .addColumn('is_favorite', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('is_archived', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('sync_state', 'text', (col) => col.notNull())
    .addColumn('remote_version', 'text')
    .addColumn('deleted_at', 'bigint')
    .addColumn('last_synced_at', 'bigint')
    .addColumn('remote_snapshot_json', 'text')
    .execute();

  await db.schema
    .createTable('note_tags')
    .ifNotExists()
    .addColumn('note_id', 'text', (col) =>
      col.notNull().references('notes.id').onDelete('cascade')
    )
    .addColumn('tag', 'text', (col) => col.notNull())
    .addColumn('position', 'integer', (col) => col.notNull())
    .addPrimaryKeyConstraint('note_tags_pk', ['note_id', 'tag'])
    .execute();

  await db.schema
    .createIndex('idx_note_tags_tag')
    .ifNotExists()
    .on('note_tags')
    .columns(['tag'])
    .execute();

  await db.schema
    .createIndex('idx_notes_updated_at')
    .ifNotExists()
    .on('notes')
    .columns(['updated_at'])
    .execute();

  await db.schema
    .createIndex('idx_notes_category')
    .ifNotExists()
    .on('notes')
    .columns(['category'])
    .execute();

  if (options.fullTextSearch === false) {
    // The index would go stale while disabled; it is rebuilt when re-enabled.
    await sql`drop table if exists ${sql.table('notes_fts')}`.execute(db);
    return { fullTextSearch: false };
  }

  return { fullTextSearch: await ensureFullTextIndex(db) };
}

/**
 * Drops the note tables.
 */
export async function dropNoteSchema<DB extends NoteStoreDb>(
  db: Kysely<DB>
): Promise<void> {
  await sql`drop table if exists ${sql.table('notes_fts')}`.execute(db);
  await db.schema.dropTable('note_tags').ifExists().execute();
  await db.schema.dropTable('notes').ifExists().execute();
}
