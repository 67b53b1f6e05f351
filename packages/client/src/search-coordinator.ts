/**
 * @notekeep/client - Search coordinator
 *
 * Routes a query to local storage, the remote search source, or both.
 */

import {
  compareRanked,
  describeIssues,
  logStoreEvent,
  type NoteRecord,
  type RemoteRecord,
  RemoteRecordSchema,
  type RemoteSearchSource,
  type SearchTier,
  type StorageError,
  scoreTerms,
  throwIfAborted,
  toErrorMessage,
  tokenizeQuery,
} from '@notekeep/core';
import type { NoteRepository } from './repository';

export const DEFAULT_MIN_LOCAL_RESULTS = 5;

export type SearchScope = 'local' | 'remote' | 'hybrid';

export type CoordinatedHit =
  | { source: 'local'; record: NoteRecord; score: number }
  | { source: 'remote'; record: RemoteRecord; score: number };

export interface CoordinatedSearchOptions {
  /** Default: 'local' */
  scope?: SearchScope;
  limit?: number;
  signal?: AbortSignal;
}

export interface CoordinatedSearchResult {
  scope: SearchScope;
  hits: CoordinatedHit[];
  /** Tier the local backend used, when local search ran */
  localTier: SearchTier | null;
  /** Whether the remote source was queried */
  usedRemote: boolean;
  /** Remote failure that hybrid search degraded past */
  remoteError: Error | null;
  /** Corrupt local records skipped while searching */
  errors: readonly StorageError[];
}

export interface SearchCoordinatorOptions {
  repository: NoteRepository;
  remote?: RemoteSearchSource;
  /** Hybrid search asks the remote only below this many local hits */
  minLocalResults?: number;
}

function rank(hits: CoordinatedHit[], limit: number | undefined): CoordinatedHit[] {
  const sorted = hits.sort((a, b) =>
    compareRanked(
      { score: a.score, updatedAt: a.record.updatedAt, id: a.record.id },
      { score: b.score, updatedAt: b.record.updatedAt, id: b.record.id }
    )
  );
  return limit === undefined ? sorted : sorted.slice(0, Math.max(0, limit));
}

export class SearchCoordinator {
  private readonly repository: NoteRepository;
  private readonly remote: RemoteSearchSource | null;
  private readonly minLocalResults: number;

  constructor(options: SearchCoordinatorOptions) {
    this.repository = options.repository;
    this.remote = options.remote ?? null;
    this.minLocalResults = options.minLocalResults ?? DEFAULT_MIN_LOCAL_RESULTS;
  }

  get hasRemote(): boolean {
    return this.remote !== null;
  }

  async search(
    query: string,
    options: CoordinatedSearchOptions = {}
  ): Promise<CoordinatedSearchResult> {
    const scope = options.scope ?? 'local';
    const { limit, signal } = options;
    throwIfAborted(signal);

    let result: CoordinatedSearchResult;
    if (scope === 'local') {
      result = await this.searchLocal(query, limit, signal);
    } else if (scope === 'remote') {
      result = await this.searchRemote(query, limit, signal);
    } else {
      result = await this.searchHybrid(query, limit, signal);
    }

    this.repository.observers.notify('onSearched', (observer) =>
      observer.onSearched?.({
        query,
        scope,
        hitCount: result.hits.length,
        tier: result.localTier,
      })
    );
    return result;
  }

  private async searchLocal(
    query: string,
    limit: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<CoordinatedSearchResult> {
    const local = await this.repository.search(query, { limit, signal });
    throwIfAborted(signal);
    return {
      scope: 'local',
      hits: local.hits.map((hit): CoordinatedHit => ({
        source: 'local',
        record: hit.record,
        score: hit.score,
      })),
      localTier: local.tier,
      usedRemote: false,
      remoteError: null,
      errors: local.errors,
    };
  }

  private async searchRemote(
    query: string,
    limit: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<CoordinatedSearchResult> {
    if (!this.remote) {
      throw new Error('No remote search source is configured');
    }
    const terms = tokenizeQuery(query);
    const candidates = await this.fetchRemote(query, signal);
    const hits: CoordinatedHit[] = [];
    for (const record of candidates) {
      const score = scoreTerms(record, terms);
      if (score > 0) hits.push({ source: 'remote', record, score });
    }
    return {
      scope: 'remote',
      hits: rank(hits, limit),
      localTier: null,
      usedRemote: true,
      remoteError: null,
      errors: [],
    };
  }

  /**
   * Local first. Below `minLocalResults` local hits, remote candidates are
   * merged in: a remote record whose id exists locally is ignored, and every
   * hit is re-scored with the weighted term formula so both sources rank on
   * one scale.
   */
  private async searchHybrid(
    query: string,
    limit: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<CoordinatedSearchResult> {
    const local = await this.repository.search(query, { signal });
    throwIfAborted(signal);

    const base: CoordinatedSearchResult = {
      scope: 'hybrid',
      hits: [],
      localTier: local.tier,
      usedRemote: false,
      remoteError: null,
      errors: local.errors,
    };
    const localHits: CoordinatedHit[] = local.hits.map((hit): CoordinatedHit => ({
      source: 'local',
      record: hit.record,
      score: hit.score,
    }));

    if (!this.remote || local.hits.length >= this.minLocalResults) {
      return { ...base, hits: rank(localHits, limit) };
    }

    let candidates: RemoteRecord[];
    try {
      candidates = await this.fetchRemote(query, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      logStoreEvent({
        event: 'search.remote.failed',
        level: 'warn',
        error: toErrorMessage(error),
      });
      return {
        ...base,
        hits: rank(localHits, limit),
        usedRemote: true,
        remoteError: error instanceof Error ? error : new Error(String(error)),
      };
    }

    const terms = tokenizeQuery(query);
    const merged: CoordinatedHit[] = local.hits.map((hit): CoordinatedHit => ({
      source: 'local',
      record: hit.record,
      score: scoreTerms(hit.record, terms),
    }));
    const seen = new Set(local.hits.map((hit) => hit.record.id));
    for (const record of candidates) {
      if (seen.has(record.id)) continue;
      seen.add(record.id);
      const known = await this.repository.get(record.id, {
        includeDeleted: true,
      });
      throwIfAborted(signal);
      if (known) continue;
      const score = scoreTerms(record, terms);
      if (score > 0) merged.push({ source: 'remote', record, score });
    }

    return { ...base, hits: rank(merged, limit), usedRemote: true };
  }

  /**
   * Query the remote source and keep the candidates that validate. Deleted
   * markers are dropped.
   */
  private async fetchRemote(
    query: string,
    signal: AbortSignal | undefined
  ): Promise<RemoteRecord[]> {
    if (!this.remote) return [];
    const raw = await this.remote.search(query, { signal });
    throwIfAborted(signal);

    const records: RemoteRecord[] = [];
    for (const item of raw) {
      const parsed = RemoteRecordSchema.safeParse(item);
      if (!parsed.success) {
        logStoreEvent({
          event: 'search.remote.invalid_record',
          level: 'warn',
          error: describeIssues(parsed.error),
        });
        continue;
      }
      if (parsed.data.deleted === true) continue;
      records.push(parsed.data);
    }
    return records;
  }
}
