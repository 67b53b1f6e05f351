/**
 * @notekeep/client - Store configuration
 */

import { BackendKindSchema, describeIssues } from '@notekeep/core';
import { z } from 'zod';
import { DEFAULT_MIGRATION_CHUNK_SIZE } from './repository';
import { DEFAULT_MIN_LOCAL_RESULTS } from './search-coordinator';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_INITIAL_RETRY_DELAY_MS,
  DEFAULT_MAX_RETRIES,
} from './sync/synchronizer';

export const NoteStoreConfigSchema = z
  .object({
    /** Backend that starts active; default: the first one passed in */
    activeBackend: BackendKindSchema.optional(),
    search: z
      .object({
        minLocalResults: z
          .number()
          .int()
          .min(0)
          .default(DEFAULT_MIN_LOCAL_RESULTS),
      })
      .strict()
      .default({}),
    sync: z
      .object({
        fetchTimeoutMs: z
          .number()
          .int()
          .positive()
          .default(DEFAULT_FETCH_TIMEOUT_MS),
        maxRetries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
        initialRetryDelayMs: z
          .number()
          .int()
          .min(0)
          .default(DEFAULT_INITIAL_RETRY_DELAY_MS),
        mode: z.enum(['full', 'incremental']).default('incremental'),
      })
      .strict()
      .default({}),
    migration: z
      .object({
        chunkSize: z
          .number()
          .int()
          .positive()
          .default(DEFAULT_MIGRATION_CHUNK_SIZE),
      })
      .strict()
      .default({}),
  })
  .strict();

export type NoteStoreConfig = z.input<typeof NoteStoreConfigSchema>;
export type ResolvedNoteStoreConfig = z.output<typeof NoteStoreConfigSchema>;

/**
 * Validate a configuration object and fill in defaults.
 */
export function parseNoteStoreConfig(input: unknown = {}): ResolvedNoteStoreConfig {
  const parsed = NoteStoreConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid note store config: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
