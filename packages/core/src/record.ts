/**
 * @notekeep/core - Record validation helpers
 */

import type { z } from 'zod';
import { StorageError } from './errors';
import { type NoteRecord, NoteRecordSchema } from './schemas/note';

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate a value read back from storage. Throws a `CORRUPT_RECORD`
 * StorageError naming `recordId` when the value is not a valid record.
 */
export function parseStoredRecord(value: unknown, recordId: string): NoteRecord {
  const parsed = NoteRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw StorageError.corrupt(recordId, describeIssues(parsed.error));
  }
  if (parsed.data.id !== recordId) {
    throw StorageError.corrupt(
      recordId,
      `stored under "${recordId}" but carries id "${parsed.data.id}"`
    );
  }
  return parsed.data;
}

/**
 * Validate a record before it is written. Invalid input is a caller bug, so
 * this throws a plain Error rather than a StorageError.
 */
export function assertValidRecord(record: NoteRecord): void {
  const parsed = NoteRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new Error(
      `Invalid note record "${record.id}": ${describeIssues(parsed.error)}`
    );
  }
}

export function isTombstoned(record: NoteRecord): boolean {
  return record.deletedAt !== null;
}

/**
 * True when the record holds a detected conflict waiting for resolution.
 */
export function needsResolution(record: NoteRecord): boolean {
  return record.syncState === 'conflict';
}
