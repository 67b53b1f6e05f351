/**
 * @notekeep/store-kv - Record blob codec
 *
 * Blob layout: `{"v":1,"record":{...}}`. The version lets the layout change
 * without guessing at old blobs.
 */

import {
  isRecord,
  type NoteRecord,
  parseStoredRecord,
  StorageError,
} from '@notekeep/core';

export const RECORD_BLOB_VERSION = 1;

export function encodeRecordBlob(record: NoteRecord): string {
  return JSON.stringify({ v: RECORD_BLOB_VERSION, record });
}

/**
 * Decode a blob stored under `recordId`. Throws a `CORRUPT_RECORD`
 * StorageError for unreadable or invalid blobs.
 */
export function decodeRecordBlob(blob: string, recordId: string): NoteRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw StorageError.corrupt(recordId, `invalid JSON (${detail})`);
  }

  if (!isRecord(parsed)) {
    throw StorageError.corrupt(recordId, 'blob is not an object');
  }
  if (parsed.v !== RECORD_BLOB_VERSION) {
    throw StorageError.corrupt(
      recordId,
      `unsupported blob version ${String(parsed.v)}`
    );
  }
  return parseStoredRecord(parsed.record, recordId);
}
