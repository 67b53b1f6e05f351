/**
 * Unit tests for the weighted term formula shared by the key-value engine,
 * the relational substring tier and the search coordinator.
 */
import { describe, expect, test } from 'vitest';
import { scoreQuery, scoreTerms, tokenizeQuery } from '../scoring';

describe('tokenizeQuery', () => {
  test('lower-cases, splits on whitespace and drops duplicates', () => {
    expect(tokenizeQuery('  Storage   patterns STORAGE\tsql ')).toEqual([
      'storage',
      'patterns',
      'sql',
    ]);
  });

  test('returns no terms for a blank query', () => {
    expect(tokenizeQuery('   ')).toEqual([]);
  });
});

describe('scoreTerms', () => {
  const note = {
    title: 'Mobile Notes',
    body: 'storage patterns',
    tags: ['sql', 'storage'],
  };

  test('body match weighs 1 and tag match weighs 2', () => {
    expect(scoreQuery(note, 'storage')).toBe(3);
  });

  test('title match weighs 3', () => {
    expect(scoreQuery(note, 'mobile')).toBe(3);
  });

  test('sums weights across terms', () => {
    // notes: title 3; sql: tag 2; patterns: body 1
    expect(scoreQuery(note, 'notes sql patterns')).toBe(6);
  });

  test('matches substrings case-insensitively', () => {
    expect(scoreQuery(note, 'STOR')).toBe(3);
  });

  test('counts a tag once per term even when several tags match', () => {
    expect(
      scoreTerms({ title: '', body: '', tags: ['data', 'database'] }, ['data'])
    ).toBe(2);
  });

  test('scores zero when nothing matches', () => {
    expect(scoreQuery(note, 'kotlin')).toBe(0);
    expect(scoreTerms(note, [])).toBe(0);
  });
});
