/**
 * @notekeep/store-sqlite - Full-text query helpers
 */

import { toErrorMessage } from '@notekeep/core';

/** The trigram tokenizer cannot match terms shorter than this. */
export const TRIGRAM_MIN_TERM_LENGTH = 3;

/** Separator between tags in the `tags` FTS column. */
export const FTS_TAG_SEPARATOR = '\n';

/**
 * Build an FTS5 MATCH expression: every term becomes a quoted phrase and the
 * phrases are OR-ed, so any matching term selects the row.
 */
export function buildMatchExpression(terms: readonly string[]): string {
  return terms.map((term) => `"${term.replaceAll('"', '""')}"`).join(' OR ');
}

export function hasShortTerm(terms: readonly string[]): boolean {
  return terms.some(
    (term) => Array.from(term).length < TRIGRAM_MIN_TERM_LENGTH
  );
}

/**
 * True for errors SQLite raises when it rejects an FTS5 query, as opposed to
 * I/O or schema failures.
 */
export function isFtsQueryError(error: unknown): boolean {
  return /\bfts5\b/i.test(toErrorMessage(error));
}

/**
 * LIKE pattern matching `term` anywhere, for use with `escape '\'`.
 */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}
