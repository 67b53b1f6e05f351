/**
 * @notekeep/core - In-memory filtering and ordering
 *
 * Shared by engines that evaluate filters in process. The relational engine
 * translates the same filter into SQL and must agree with these semantics.
 */

import type { ListOptions, NoteFilter, NoteOrderField } from './backend';
import type { NoteRecord } from './schemas/note';

export function matchesFilter(record: NoteRecord, filter: NoteFilter): boolean {
  if (!filter.includeDeleted && record.deletedAt !== null) return false;

  if (filter.category !== undefined && record.category !== filter.category) {
    return false;
  }
  if (
    filter.isFavorite !== undefined &&
    record.isFavorite !== filter.isFavorite
  ) {
    return false;
  }
  if (
    filter.isArchived !== undefined &&
    record.isArchived !== filter.isArchived
  ) {
    return false;
  }
  if (filter.tags && filter.tags.length > 0) {
    const tags = new Set(record.tags);
    if (!filter.tags.every((tag) => tags.has(tag))) return false;
  }
  if (filter.syncStates && !filter.syncStates.includes(record.syncState)) {
    return false;
  }
  if (filter.dateRange) {
    const field = filter.dateRange.field ?? 'updatedAt';
    const value = record[field];
    if (filter.dateRange.from !== undefined && value < filter.dateRange.from) {
      return false;
    }
    if (filter.dateRange.to !== undefined && value > filter.dateRange.to) {
      return false;
    }
  }
  return true;
}

function compareField(
  a: NoteRecord,
  b: NoteRecord,
  field: NoteOrderField
): number {
  const left = a[field];
  const right = b[field];
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Comparator for `listFiltered` ordering. Ties always fall back to `id`
 * ascending so results are deterministic.
 */
export function createRecordComparator(
  options: Pick<ListOptions, 'orderBy' | 'direction'> = {}
): (a: NoteRecord, b: NoteRecord) => number {
  const field = options.orderBy ?? 'updatedAt';
  const sign = (options.direction ?? 'desc') === 'desc' ? -1 : 1;
  return (a, b) => {
    const byField = compareField(a, b, field) * sign;
    return byField !== 0 ? byField : compareIds(a.id, b.id);
  };
}

/**
 * Ranking order for search hits: score desc, updatedAt desc, id asc.
 */
export function compareRanked(
  a: { score: number; updatedAt: number; id: string },
  b: { score: number; updatedAt: number; id: string }
): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.updatedAt !== b.updatedAt) return b.updatedAt - a.updatedAt;
  return compareIds(a.id, b.id);
}

/**
 * Normalize a tag list to set semantics: trimmed, non-empty, first
 * occurrence wins.
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const raw of tags) {
    const tag = raw.trim();
    if (tag.length === 0 || seen.has(tag)) continue;
    seen.add(tag);
    out.push(tag);
  }
  return out;
}
