/**
 * @notekeep/store-kv - Key-value storage engine
 *
 * One JSON blob per record. Point lookups go straight to the driver; listing
 * and search are full scans scored with the weighted term formula.
 */

import {
  type BackendSearchResult,
  type BackendStatistics,
  assertValidRecord,
  compareRanked,
  createRecordComparator,
  createScan,
  type ListOptions,
  logStoreEvent,
  matchesFilter,
  type NoteFilter,
  type NoteRecord,
  type NoteScan,
  type NoteStorageBackend,
  type ScanErrorSink,
  type SearchHit,
  type SearchOptions,
  StorageError,
  scoreTerms,
  type TagUsage,
  throwIfAborted,
  tokenizeQuery,
} from '@notekeep/core';
import { decodeRecordBlob, encodeRecordBlob } from './codec';
import type { KeyValueDriver, KeyValueOp } from './driver';

export interface KeyValueBackendOptions {
  driver: KeyValueDriver;
  /** Key namespace for record blobs (default: 'note:') */
  keyPrefix?: string;
}

export class KeyValueBackend implements NoteStorageBackend {
  readonly kind = 'key-value' as const;

  private readonly driver: KeyValueDriver;
  private readonly keyPrefix: string;
  /** Derived tag usage; `null` until the first scan builds it. */
  private tagCounts: Map<string, number> | null = null;
  private tagCountsLoading: Promise<Map<string, number>> | null = null;
  /** Set when a write lands while the counters are being built. */
  private tagCountsStale = false;

  constructor(options: KeyValueBackendOptions) {
    this.driver = options.driver;
    this.keyPrefix = options.keyPrefix ?? 'note:';
  }

  async put(record: NoteRecord): Promise<void> {
    assertValidRecord(record);
    const previous = await this.previousForCounters(record.id);
    await this.runDriver('Failed to write record', record.id, () =>
      this.driver.set(this.keyFor(record.id), encodeRecordBlob(record))
    );
    this.adjustTagCounts(previous, record);
  }

  async get(id: string): Promise<NoteRecord | null> {
    const blob = await this.runDriver('Failed to read record', id, () =>
      this.driver.get(this.keyFor(id))
    );
    return blob === null ? null : decodeRecordBlob(blob, id);
  }

  async delete(id: string): Promise<void> {
    const previous = await this.previousForCounters(id);
    await this.runDriver('Failed to delete record', id, () =>
      this.driver.delete(this.keyFor(id))
    );
    this.adjustTagCounts(previous, null);
  }

  async bulkPut(records: readonly NoteRecord[]): Promise<void> {
    if (records.length === 0) return;
    for (const record of records) {
      assertValidRecord(record);
    }

    const latest = new Map<string, NoteRecord | null>();
    if (this.tagCounts) {
      for (const record of records) {
        if (!latest.has(record.id)) {
          latest.set(record.id, await this.previousForCounters(record.id));
        }
      }
    }

    const ops = records.map((record): KeyValueOp => ({
      type: 'set',
      key: this.keyFor(record.id),
      value: encodeRecordBlob(record),
    }));
    await this.runDriver('Failed to write batch', undefined, () =>
      this.driver.batch(ops)
    );

    if (this.tagCounts) {
      for (const record of records) {
        this.adjustTagCounts(latest.get(record.id) ?? null, record);
        latest.set(record.id, record);
      }
    }
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
    const errors: StorageError[] = [];
    if (terms.length === 0) {
      return { hits: [], tier: 'scan', errors };
    }

    const hits: SearchHit[] = [];
    const sink: ScanErrorSink = (error) => errors.push(error);
    for await (const record of this.scanRecords(sink, options.signal)) {
      if (record.deletedAt !== null) continue;
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
      tier: 'scan',
      errors,
    };
  }

  async clear(): Promise<void> {
    await this.runDriver('Failed to clear records', undefined, () =>
      this.driver.clear(this.keyPrefix)
    );
    this.tagCounts = new Map();
  }

  async tagUsage(): Promise<TagUsage[]> {
    const counts = await this.ensureTagCounts();
    return Array.from(counts, ([tag, count]) => ({ tag, count }))
      .filter((usage) => usage.count > 0)
      .sort((a, b) =>
        a.count !== b.count ? b.count - a.count : a.tag < b.tag ? -1 : 1
      );
  }

  async statistics(): Promise<BackendStatistics> {
    let totalNotes = 0;
    let favoriteNotes = 0;
    let archivedNotes = 0;
    let deletedNotes = 0;
    let bodyLength = 0;
    let totalWords = 0;
    const categories = new Set<string>();
    const tags = new Set<string>();

    for await (const record of this.scanRecords(() => {})) {
      if (record.deletedAt !== null) {
        deletedNotes += 1;
        continue;
      }
      totalNotes += 1;
      if (record.isFavorite) favoriteNotes += 1;
      if (record.isArchived) archivedNotes += 1;
      if (record.category !== null) categories.add(record.category);
      for (const tag of record.tags) tags.add(tag);
      bodyLength += Array.from(record.body).length;
      if (record.body.length > 0) {
        totalWords += record.body.split(' ').length;
      }
    }

    return {
      storageType: this.kind,
      totalNotes,
      favoriteNotes,
      archivedNotes,
      deletedNotes,
      totalCategories: categories.size,
      totalTags: tags.size,
      averageBodyLength: totalNotes === 0 ? 0 : bodyLength / totalNotes,
      totalWords,
    };
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async *filteredRecords(
    filter: NoteFilter,
    options: ListOptions,
    reportError: ScanErrorSink
  ): AsyncGenerator<NoteRecord, void, undefined> {
    const matched: NoteRecord[] = [];
    for await (const record of this.scanRecords(reportError, options.signal)) {
      if (matchesFilter(record, filter)) matched.push(record);
    }
    matched.sort(createRecordComparator(options));
    yield* options.limit === undefined
      ? matched
      : matched.slice(0, options.limit);
  }

  private keyFor(id: string): string {
    return `${this.keyPrefix}${id}`;
  }

  private async runDriver<T>(
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

  /**
   * Decode every stored record. Corrupt blobs go to `reportError` and the
   * scan continues.
   */
  private async *scanRecords(
    reportError: ScanErrorSink,
    signal?: AbortSignal
  ): AsyncGenerator<NoteRecord, void, undefined> {
    const iterator = this.driver
      .entries(this.keyPrefix)
      [Symbol.asyncIterator]();
    let done = false;
    try {
      while (true) {
        let next: IteratorResult<[string, string]>;
        try {
          next = await iterator.next();
        } catch (error) {
          done = true;
          throw StorageError.ioFailure('Failed to scan records', error);
        }
        if (next.done) {
          done = true;
          return;
        }
        throwIfAborted(signal);

        const [key, blob] = next.value;
        const id = key.slice(this.keyPrefix.length);
        let record: NoteRecord;
        try {
          record = decodeRecordBlob(blob, id);
        } catch (error) {
          if (!(error instanceof StorageError)) throw error;
          logStoreEvent({
            event: 'kv.scan.corrupt_record',
            level: 'warn',
            recordId: id,
            error: error.message,
          });
          reportError(error);
          continue;
        }
        yield record;
      }
    } finally {
      if (!done) await iterator.return?.();
    }
  }

  private async previousForCounters(id: string): Promise<NoteRecord | null> {
    if (!this.tagCounts) return null;
    try {
      return await this.get(id);
    } catch (error) {
      if (error instanceof StorageError && error.kind === 'CORRUPT_RECORD') {
        return null;
      }
      throw error;
    }
  }

  private adjustTagCounts(
    previous: NoteRecord | null,
    next: NoteRecord | null
  ): void {
    const counts = this.tagCounts;
    if (!counts) {
      if (this.tagCountsLoading) this.tagCountsStale = true;
      return;
    }

    if (previous && previous.deletedAt === null) {
      for (const tag of previous.tags) {
        const count = (counts.get(tag) ?? 0) - 1;
        if (count > 0) counts.set(tag, count);
        else counts.delete(tag);
      }
    }
    if (next && next.deletedAt === null) {
      for (const tag of next.tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }
  }

  private async ensureTagCounts(): Promise<Map<string, number>> {
    if (this.tagCounts) return this.tagCounts;
    if (!this.tagCountsLoading) {
      this.tagCountsLoading = (async () => {
        let counts: Map<string, number>;
        do {
          this.tagCountsStale = false;
          counts = new Map<string, number>();
          for await (const record of this.scanRecords(() => {})) {
            if (record.deletedAt !== null) continue;
            for (const tag of record.tags) {
              counts.set(tag, (counts.get(tag) ?? 0) + 1);
            }
          }
        } while (this.tagCountsStale);
        this.tagCounts = counts;
        return counts;
      })().finally(() => {
        this.tagCountsLoading = null;
      });
    }
    return this.tagCountsLoading;
  }
}
