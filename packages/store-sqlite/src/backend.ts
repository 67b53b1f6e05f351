/**
 * @notekeep/store-sqlite - Relational storage engine
 *
 * Records live in `notes` with their tags in `note_tags`. Search runs on the
 * FTS5 trigram index when it can and falls back to a LIKE scan scored with
 * the weighted term formula when it cannot.
 */

import {
  assertValidRecord,
  type BackendSearchResult,
  type BackendStatistics,
  compareRanked,
  createScan,
  type ListOptions,
  logStoreEvent,
  type NoteFilter,
  type NoteRecord,
  type NoteScan,
  type NoteStorageBackend,
  parseStoredRecord,
  type ScanErrorSink,
  type SearchFallbackReason,
  type SearchHit,
  type SearchOptions,
  StorageError,
  scoreTerms,
  type TagUsage,
  throwIfAborted,
  tokenizeQuery,
  toErrorMessage,
} from '@notekeep/core';
import {
  type Expression,
  type ExpressionBuilder,
  type Kysely,
  type SqlBool,
  sql,
} from 'kysely';
import {
  buildMatchExpression,
  containsPattern,
  FTS_TAG_SEPARATOR,
  hasShortTerm,
  isFtsQueryError,
} from './fts';
import { ensureNoteSchema } from './migrate';
import type { NoteStoreDb, NoteStoreExecutor, NotesTable } from './schema';

/** Ids per `in (...)` list when loading tags. */
const TAG_LOOKUP_CHUNK = 500;

const ORDER_COLUMNS = {
  updatedAt: 'updated_at',
  createdAt: 'created_at',
  title: 'title',
} as const;

export interface RelationalBackendOptions {
  db: Kysely<NoteStoreDb>;
  /** Whether the FTS5 index is available (see `ensureNoteSchema`) */
  fullTextSearch: boolean;
  /** Destroy the Kysely instance on `close()` (default: false) */
  destroyOnClose?: boolean;
}

export interface CreateRelationalBackendOptions {
  /** Create and use the FTS5 index (default: true) */
  fullTextSearch?: boolean;
  destroyOnClose?: boolean;
}

/**
 * Ensure the schema exists and open a backend over it.
 */
export async function createRelationalBackend(
  db: Kysely<NoteStoreDb>,
  options: CreateRelationalBackendOptions = {}
): Promise<RelationalBackend> {
  const { fullTextSearch } = await ensureNoteSchema(db, {
    fullTextSearch: options.fullTextSearch,
  });
  return new RelationalBackend({
    db,
    fullTextSearch,
    destroyOnClose: options.destroyOnClose,
  });
}

type NoteRow = NotesTable;

function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

function fromFlag(value: number): boolean | number {
  if (value === 1) return true;
  if (value === 0) return false;
  return value;
}

function toRow(record: NoteRecord): NoteRow {
  return {
    id: record.id,
    title: record.title,
    body: record.body,
    category: record.category,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
    is_favorite: toFlag(record.isFavorite),
    is_archived: toFlag(record.isArchived),
    sync_state: record.syncState,
    remote_version: record.remoteVersion,
    deleted_at: record.deletedAt,
    last_synced_at: record.lastSyncedAt,
    remote_snapshot_json:
      record.remoteSnapshot === null
        ? null
        : JSON.stringify(record.remoteSnapshot),
  };
}

/**
 * Decode a row plus its tags. Throws `CORRUPT_RECORD` for rows that do not
 * form a valid record.
 */
function fromRow(row: NoteRow, tags: readonly string[]): NoteRecord {
  let remoteSnapshot: unknown = null;
  if (row.remote_snapshot_json !== null) {
    try {
      remoteSnapshot = JSON.parse(row.remote_snapshot_json);
    } catch (error) {
      throw StorageError.corrupt(
        row.id,
        `remote_snapshot_json is not JSON (${toErrorMessage(error)})`
      );
    }
  }

  return parseStoredRecord(
    {
      id: row.id,
      title: row.title,
      body: row.body,
      tags,
      category: row.category,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      isFavorite: fromFlag(row.is_favorite),
      isArchived: fromFlag(row.is_archived),
      syncState: row.sync_state,
      remoteVersion: row.remote_version,
      deletedAt: row.deleted_at,
      lastSyncedAt: row.last_synced_at,
      remoteSnapshot,
    },
    row.id
  );
}

function filterExpression(
  eb: ExpressionBuilder<NoteStoreDb, 'notes'>,
  filter: NoteFilter
): Expression<SqlBool> {
  const conditions: Expression<SqlBool>[] = [];

  if (!filter.includeDeleted) {
    conditions.push(eb('notes.deleted_at', 'is', null));
  }
  if (filter.category !== undefined) {
    conditions.push(
      filter.category === null
        ? eb('notes.category', 'is', null)
        : eb('notes.category', '=', filter.category)
    );
  }
  if (filter.isFavorite !== undefined) {
    conditions.push(eb('notes.is_favorite', '=', toFlag(filter.isFavorite)));
  }
  if (filter.isArchived !== undefined) {
    conditions.push(eb('notes.is_archived', '=', toFlag(filter.isArchived)));
  }
  for (const tag of filter.tags ?? []) {
    conditions.push(
      eb.exists(
        eb
          .selectFrom('note_tags')
          .select('note_tags.note_id')
          .whereRef('note_tags.note_id', '=', 'notes.id')
          .where('note_tags.tag', '=', tag)
      )
    );
  }
  if (filter.syncStates) {
    conditions.push(
      filter.syncStates.length === 0
        ? sql<SqlBool>`0`
        : eb('notes.sync_state', 'in', [...filter.syncStates])
    );
  }
  if (filter.dateRange) {
    const column =
      filter.dateRange.field === 'createdAt'
        ? 'notes.created_at'
        : 'notes.updated_at';
    if (filter.dateRange.from !== undefined) {
      conditions.push(eb(column, '>=', filter.dateRange.from));
    }
    if (filter.dateRange.to !== undefined) {
      conditions.push(eb(column, '<=', filter.dateRange.to));
    }
  }

  return eb.and(conditions);
}

export class RelationalBackend implements NoteStorageBackend {
  readonly kind = 'relational' as const;

  private readonly db: Kysely<NoteStoreDb>;
  private readonly fullTextSearch: boolean;
  private readonly destroyOnClose: boolean;

  constructor(options: RelationalBackendOptions) {
    this.db = options.db;
    this.fullTextSearch = options.fullTextSearch;
    this.destroyOnClose = options.destroyOnClose ?? false;
  }

  /** Whether searches can use the FTS5 index. */
  get hasFullTextSearch(): boolean {
    return this.fullTextSearch;
  }

  async put(record: NoteRecord): Promise<void> {
    assertValidRecord(record);
    await this.write('Failed to write record', record.id, (trx) =>
      this.writeRecord(trx, record)
    );
  }

  async get(id: string): Promise<NoteRecord | null> {
    const row = await this.read('Failed to read record', id, () =>
      this.db
        .selectFrom('notes')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst()
    );
    if (!row) return null;
    const tags = await this.loadTags([id]);
    return fromRow(row, tags.get(id) ?? []);
  }

  async delete(id: string): Promise<void> {
    await this.write('Failed to delete record', id, async (trx) => {
      await trx.deleteFrom('note_tags').where('note_id', '=', id).execute();
      await trx.deleteFrom('notes').where('id', '=', id).execute();
      if (this.fullTextSearch) {
        await trx.deleteFrom('notes_fts').where('note_id', '=', id).execute();
      }
    });
  }

  async bulkPut(records: readonly NoteRecord[]): Promise<void> {
    if (records.length === 0) return;
    for (const record of records) {
      assertValidRecord(record);
    }
    await this.write('Failed to write batch', undefined, async (trx) => {
      for (const record of records) {
        await this.writeRecord(trx, record);
      }
    });
  }

  listFiltered(
    filter: NoteFilter = {},
    options: ListOptions = {}
  ): NoteScan<NoteRecord> {
    return createScan((reportError) =>
      this.filteredRecords(filter, options, reportError)
    );
  }

  async search(
    query: string,
    options: SearchOptions = {}
  ): Promise<BackendSearchResult> {
    const terms = tokenizeQuery(query);
    if (terms.length === 0) {
      return {
        hits: [],
        tier: this.fullTextSearch ? 'full_text' : 'substring',
        errors: [],
      };
    }
    throwIfAborted(options.signal);

    let fallbackReason: SearchFallbackReason;
    if (!this.fullTextSearch) {
      fallbackReason = 'fts_unavailable';
    } else if (hasShortTerm(terms)) {
      fallbackReason = 'short_terms';
    } else {
      try {
        return await this.fullTextQuery(terms, options);
      } catch (error) {
        if (!isFtsQueryError(error)) {
          throw error instanceof StorageError
            ? error
            : StorageError.ioFailure('Failed to search records', error);
        }
        fallbackReason = 'fts_query_error';
        logStoreEvent({
          event: 'relational.search.fts_error',
          level: 'warn',
          error: toErrorMessage(error),
        });
      }
    }

    logStoreEvent({
      event: 'relational.search.fallback',
      level: 'debug',
      reason: fallbackReason,
      termCount: terms.length,
    });
    const result = await this.substringQuery(terms, options);
    return { ...result, fallbackReason };
  }

  async clear(): Promise<void> {
    await this.write('Failed to clear records', undefined, async (trx) => {
      await trx.deleteFrom('note_tags').execute();
      await trx.deleteFrom('notes').execute();
      if (this.fullTextSearch) {
        await trx.deleteFrom('notes_fts').execute();
      }
    });
  }

  async tagUsage(): Promise<TagUsage[]> {
    const rows = await this.read('Failed to count tags', undefined, () =>
      this.db
        .selectFrom('note_tags')
        .innerJoin('notes', 'notes.id', 'note_tags.note_id')
        .where('notes.deleted_at', 'is', null)
        .select(['note_tags.tag', (eb) => eb.fn.countAll<number>().as('count')])
        .groupBy('note_tags.tag')
        .orderBy('count', 'desc')
        .orderBy('note_tags.tag', 'asc')
        .execute()
    );
    return rows.map((row) => ({ tag: row.tag, count: Number(row.count) }));
  }

  async statistics(): Promise<BackendStatistics> {
    const totals = await this.read('Failed to compute statistics', undefined, () =>
      sql<{
        total_notes: number;
        favorite_notes: number;
        archived_notes: number;
        deleted_notes: number;
        total_categories: number;
        body_length: number;
        total_words: number;
      }>`
        select
          coalesce(sum(case when deleted_at is null then 1 else 0 end), 0)
            as total_notes,
          coalesce(sum(case when deleted_at is null and is_favorite = 1
            then 1 else 0 end), 0) as favorite_notes,
          coalesce(sum(case when deleted_at is null and is_archived = 1
            then 1 else 0 end), 0) as archived_notes,
          coalesce(sum(case when deleted_at is not null then 1 else 0 end), 0)
            as deleted_notes,
          count(distinct case when deleted_at is null then category end)
            as total_categories,
          coalesce(sum(case when deleted_at is null then length(body)
            else 0 end), 0) as body_length,
          coalesce(sum(case when deleted_at is null and length(body) > 0
            then length(body) - length(replace(body, ' ', '')) + 1
            else 0 end), 0) as total_words
        from notes
      `.execute(this.db)
    );
    const tagTotals = await this.read(
      'Failed to compute statistics',
      undefined,
      () =>
        this.db
          .selectFrom('note_tags')
          .innerJoin('notes', 'notes.id', 'note_tags.note_id')
          .where('notes.deleted_at', 'is', null)
          .select((eb) =>
            eb.fn.count<number>('note_tags.tag').distinct().as('total_tags')
          )
          .executeTakeFirst()
    );

    const row = totals.rows[0];
    const totalNotes = Number(row?.total_notes ?? 0);
    return {
      storageType: this.kind,
      totalNotes,
      favoriteNotes: Number(row?.favorite_notes ?? 0),
      archivedNotes: Number(row?.archived_notes ?? 0),
      deletedNotes: Number(row?.deleted_notes ?? 0),
      totalCategories: Number(row?.total_categories ?? 0),
      totalTags: Number(tagTotals?.total_tags ?? 0),
      averageBodyLength:
        totalNotes === 0 ? 0 : Number(row?.body_length ?? 0) / totalNotes,
      totalWords: Number(row?.total_words ?? 0),
    };
  }

  async close(): Promise<void> {
    if (this.destroyOnClose) {
      await this.db.destroy();
    }
  }

  private async writeRecord(
    trx: NoteStoreExecutor,
    record: NoteRecord
  ): Promise<void> {
    const row = toRow(record);
    const { id: _id, ...columns } = row;
    await trx
      .insertInto('notes')
      .values(row)
      .onConflict((oc) => oc.column('id').doUpdateSet(columns))
      .execute();

    await trx.deleteFrom('note_tags').where('note_id', '=', record.id).execute();
    if (record.tags.length > 0) {
      await trx
        .insertInto('note_tags')
        .values(
          record.tags.map((tag, position) => ({
            note_id: record.id,
            tag,
            position,
          }))
        )
        .execute();
    }

    if (this.fullTextSearch) {
      await trx
        .deleteFrom('notes_fts')
        .where('note_id', '=', record.id)
        .execute();
      await trx
        .insertInto('notes_fts')
        .values({
          note_id: record.id,
          title: record.title,
          body: record.body,
          tags: record.tags.join(FTS_TAG_SEPARATOR),
        })
        .execute();
    }
  }

  private async write(
    message: string,
    recordId: string | undefined,
    operation: (trx: NoteStoreExecutor) => Promise<void>
  ): Promise<void> {
    try {
      await this.db.transaction().execute(operation);
    } catch (error) {
      throw StorageError.ioFailure(message, error, recordId);
    }
  }

  private async read<T>(
    message: string,
    recordId: string | undefined,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw StorageError.ioFailure(message, error, recordId);
    }
  }

  private async loadTags(
    ids: readonly string[]
  ): Promise<Map<string, string[]>> {
    const tags = new Map<string, string[]>();
    for (let start = 0; start < ids.length; start += TAG_LOOKUP_CHUNK) {
      const chunk = ids.slice(start, start + TAG_LOOKUP_CHUNK);
      const rows = await this.read('Failed to read tags', undefined, () =>
        this.db
          .selectFrom('note_tags')
          .select(['note_id', 'tag'])
          .where('note_id', 'in', chunk)
          .orderBy('note_id')
          .orderBy('position')
          .execute()
      );
      for (const row of rows) {
        const list = tags.get(row.note_id);
        if (list) list.push(row.tag);
        else tags.set(row.note_id, [row.tag]);
      }
    }
    return tags;
  }

  /**
   * Decode rows, reporting corrupt ones through `reportError` and skipping
   * them.
   */
  private async decodeRows(
    rows: readonly NoteRow[],
    reportError: ScanErrorSink
  ): Promise<NoteRecord[]> {
    const tags = await this.loadTags(rows.map((row) => row.id));
    const records: NoteRecord[] = [];
    for (const row of rows) {
      try {
        records.push(fromRow(row, tags.get(row.id) ?? []));
      } catch (error) {
        if (!(error instanceof StorageError)) throw error;
        logStoreEvent({
          event: 'relational.scan.corrupt_record',
          level: 'warn',
          recordId: row.id,
          error: error.message,
        });
        reportError(error);
      }
    }
    return records;
  }

  private async *filteredRecords(
    filter: NoteFilter,
    options: ListOptions,
    reportError: ScanErrorSink
  ): AsyncGenerator<NoteRecord, void, undefined> {
    throwIfAborted(options.signal);
    const column = ORDER_COLUMNS[options.orderBy ?? 'updatedAt'];
    const direction = options.direction ?? 'desc';

    let query = this.db
      .selectFrom('notes')
      .selectAll()
      .where((eb) => filterExpression(eb, filter))
      .orderBy(column, direction)
      .orderBy('id', 'asc');
    if (options.limit !== undefined) {
      query = query.limit(options.limit);
    }
    const rows = await this.read('Failed to list records', undefined, () =>
      query.execute()
    );
    throwIfAborted(options.signal);

    const records = await this.decodeRows(rows, reportError);
    for (const record of records) {
      throwIfAborted(options.signal);
      yield record;
    }
  }

  protected async fullTextQuery(
    terms: readonly string[],
    options: SearchOptions
  ): Promise<BackendSearchResult> {
    // No SQL limit: corrupt rows are dropped while decoding, so the limit
    // applies to the decoded hits.
    const result = await sql<NoteRow & { score: number }>`
      select n.*, -bm25(notes_fts, 0, 3, 1, 2) as score
      from notes_fts
      join notes n on n.id = notes_fts.note_id
      where notes_fts match ${sql.val(buildMatchExpression(terms))}
        and n.deleted_at is null
      order by score desc, n.updated_at desc, n.id asc
    `.execute(this.db);
    throwIfAborted(options.signal);

    const errors: StorageError[] = [];
    const scores = new Map(result.rows.map((row) => [row.id, row.score]));
    const records = await this.decodeRows(
      result.rows.map(({ score: _score, ...row }) => row),
      (error) => errors.push(error)
    );
    const hits = records.map((record) => ({
      record,
      score: scores.get(record.id) ?? 0,
    }));
    return {
      hits: options.limit === undefined ? hits : hits.slice(0, options.limit),
      tier: 'full_text',
      errors,
    };
  }

  private async substringQuery(
    terms: readonly string[],
    options: SearchOptions
  ): Promise<BackendSearchResult> {
    const rows = await this.read('Failed to search records', undefined, () =>
      this.db
        .selectFrom('notes')
        .selectAll()
        .where('notes.deleted_at', 'is', null)
        .where((eb) =>
          eb.or(
            terms.map((term) => {
              const pattern = containsPattern(term);
              return eb.or([
                sql<SqlBool>`notes.title like ${pattern} escape '\\'`,
                sql<SqlBool>`notes.body like ${pattern} escape '\\'`,
                eb.exists(
                  eb
                    .selectFrom('note_tags')
                    .select('note_tags.note_id')
                    .whereRef('note_tags.note_id', '=', 'notes.id')
                    .where(
                      sql<SqlBool>`note_tags.tag like ${pattern} escape '\\'`
                    )
                ),
              ]);
            })
          )
        )
        .execute()
    );
    throwIfAborted(options.signal);

    const errors: StorageError[] = [];
    const records = await this.decodeRows(rows, (error) => errors.push(error));
    const hits: SearchHit[] = [];
    for (const record of records) {
      const score = scoreTerms(record, terms);
      if (score > 0) hits.push({ record, score });
    }
    hits.sort((a, b) =>
      compareRanked(
        { score: a.score, updatedAt: a.record.updatedAt, id: a.record.id },
        { score: b.score, updatedAt: b.record.updatedAt, id: b.record.id }
      )
    );
    return {
      hits: options.limit === undefined ? hits : hits.slice(0, options.limit),
      tier: 'substring',
      errors,
    };
  }
}
