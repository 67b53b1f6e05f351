/**
 * @notekeep/core - Storage backend contract
 *
 * Both storage engines (key-value and relational) implement this interface.
 * Only the repository decides which one is active.
 */

import type { StorageError } from './errors';
import type { NoteScan } from './scan';
import type { NoteRecord, SyncState } from './schemas/note';

export type BackendKind = 'key-value' | 'relational';

export interface DateRange {
  /** Timestamp field the range applies to (default: 'updatedAt') */
  field?: 'createdAt' | 'updatedAt';
  /** Inclusive lower bound (ms since epoch) */
  from?: number;
  /** Inclusive upper bound (ms since epoch) */
  to?: number;
}

export interface NoteFilter {
  /** `null` matches records without a category */
  category?: string | null;
  /** Every listed tag must be present on the record */
  tags?: readonly string[];
  isFavorite?: boolean;
  isArchived?: boolean;
  dateRange?: DateRange;
  syncStates?: readonly SyncState[];
  /** Include tombstoned records (default: false) */
  includeDeleted?: boolean;
}

export type NoteOrderField = 'updatedAt' | 'createdAt' | 'title';

export interface ListOptions {
  /** Default: 'updatedAt' */
  orderBy?: NoteOrderField;
  /** Default: 'desc' */
  direction?: 'asc' | 'desc';
  limit?: number;
  signal?: AbortSignal;
}

export interface SearchHit<TRecord = NoteRecord> {
  record: TRecord;
  score: number;
}

/**
 * Which strategy served a search.
 * - `scan`: full scan with the weighted term formula (key-value engine)
 * - `full_text`: FTS index ranking (relational engine)
 * - `substring`: LIKE fallback with the weighted term formula (relational engine)
 */
export type SearchTier = 'scan' | 'full_text' | 'substring';

export type SearchFallbackReason =
  | 'fts_unavailable'
  | 'short_terms'
  | 'fts_query_error';

export interface BackendSearchResult {
  hits: SearchHit[];
  tier: SearchTier;
  fallbackReason?: SearchFallbackReason;
  /** Corrupt records skipped while searching */
  errors: StorageError[];
}

export interface SearchOptions {
  limit?: number;
  signal?: AbortSignal;
}

export interface TagUsage {
  tag: string;
  count: number;
}

export interface BackendStatistics {
  storageType: BackendKind;
  totalNotes: number;
  favoriteNotes: number;
  archivedNotes: number;
  deletedNotes: number;
  totalCategories: number;
  totalTags: number;
  averageBodyLength: number;
  totalWords: number;
}

export interface NoteStorageBackend {
  readonly kind: BackendKind;

  /** Upsert by id; overwrites the whole record. */
  put(record: NoteRecord): Promise<void>;

  /** Resolves `null` when no record exists. */
  get(id: string): Promise<NoteRecord | null>;

  /** Idempotent: deleting a missing id is not an error. */
  delete(id: string): Promise<void>;

  /** All records are committed or none are. */
  bulkPut(records: readonly NoteRecord[]): Promise<void>;

  listFiltered(filter?: NoteFilter, options?: ListOptions): NoteScan<NoteRecord>;

  search(query: string, options?: SearchOptions): Promise<BackendSearchResult>;

  /** Remove every record. */
  clear(): Promise<void>;

  tagUsage(): Promise<TagUsage[]>;

  statistics(): Promise<BackendStatistics>;

  close(): Promise<void>;
}
