/**
 * @notekeep/core - Weighted term scoring
 *
 * A term scores 3 when found in the title, 2 when found in any tag and 1 when
 * found in the body (case-insensitive substring match). A record's score is
 * the sum over all distinct query terms; zero means no match.
 */

export const TITLE_WEIGHT = 3;
export const TAG_WEIGHT = 2;
export const BODY_WEIGHT = 1;

export interface ScorableRecord {
  title: string;
  body: string;
  tags?: readonly string[];
}

/**
 * Split a query into distinct lower-cased terms.
 */
export function tokenizeQuery(query: string): string[] {
  const terms = query
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => term.length > 0);
  return Array.from(new Set(terms));
}

export function scoreTerms(
  record: ScorableRecord,
  terms: readonly string[]
): number {
  if (terms.length === 0) return 0;

  const title = record.title.toLowerCase();
  const body = record.body.toLowerCase();
  const tags = (record.tags ?? []).map((tag) => tag.toLowerCase());

  let score = 0;
  for (const term of terms) {
    if (title.includes(term)) score += TITLE_WEIGHT;
    if (tags.some((tag) => tag.includes(term))) score += TAG_WEIGHT;
    if (body.includes(term)) score += BODY_WEIGHT;
  }
  return score;
}

export function scoreQuery(record: ScorableRecord, query: string): number {
  return scoreTerms(record, tokenizeQuery(query));
}
