import { describe, expect, test } from 'vitest';
import {
  buildMatchExpression,
  containsPattern,
  hasShortTerm,
  isFtsQueryError,
} from '../fts';

describe('full-text helpers', () => {
  test('quotes every term and joins them with OR', () => {
    expect(buildMatchExpression(['sync', 'say "hi"'])).toBe(
      '"sync" OR "say ""hi"""'
    );
  });

  test('flags terms the trigram tokenizer cannot match', () => {
    expect(hasShortTerm(['sync', 'db'])).toBe(true);
    expect(hasShortTerm(['sync', 'sql'])).toBe(false);
    expect(hasShortTerm(['日本語'])).toBe(false);
  });

  test('recognises FTS query errors by message', () => {
    expect(isFtsQueryError(new Error('fts5: syntax error near "AND"'))).toBe(
      true
    );
    expect(isFtsQueryError(new Error('no such table: notes_fts'))).toBe(false);
    expect(isFtsQueryError(new Error('disk I/O error'))).toBe(false);
  });

  test('escapes LIKE wildcards', () => {
    expect(containsPattern('50%_off\\')).toBe('%50\\%\\_off\\\\%');
  });
});
