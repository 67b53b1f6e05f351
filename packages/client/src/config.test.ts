import { describe, expect, it } from 'vitest';
import { parseNoteStoreConfig } from './config';

describe('parseNoteStoreConfig', () => {
  it('fills in defaults', () => {
    expect(parseNoteStoreConfig()).toEqual({
      search: { minLocalResults: 5 },
      sync: {
        fetchTimeoutMs: 30_000,
        maxRetries: 3,
        initialRetryDelayMs: 1_000,
        mode: 'incremental',
      },
      migration: { chunkSize: 200 },
    });
  });

  it('keeps explicit values next to defaults', () => {
    const config = parseNoteStoreConfig({
      activeBackend: 'relational',
      sync: { maxRetries: 0, mode: 'full' },
    });

    expect(config.activeBackend).toBe('relational');
    expect(config.sync).toEqual({
      fetchTimeoutMs: 30_000,
      maxRetries: 0,
      initialRetryDelayMs: 1_000,
      mode: 'full',
    });
  });

  it('rejects out-of-range values with the offending path', () => {
    expect(() => parseNoteStoreConfig({ sync: { maxRetries: -1 } })).toThrow(
      'Invalid note store config: sync.maxRetries: Number must be greater than or equal to 0'
    );
  });

  it('rejects unknown keys and backends', () => {
    expect(() => parseNoteStoreConfig({ search: { minLocal: 2 } })).toThrow(
      /^Invalid note store config: search: Unrecognized key/
    );
    expect(() => parseNoteStoreConfig({ activeBackend: 'indexeddb' })).toThrow(
      /^Invalid note store config: activeBackend:/
    );
  });
});
