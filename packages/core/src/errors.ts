/**
 * @notekeep/core - Typed failures
 *
 * Thrown failures split into "retry later" (I/O, timeout) and "data
 * integrity" (corrupt record). Conflicts that need manual resolution are never
 * thrown: they live on the record as `syncState = 'conflict'`.
 */

import type { BackendKind } from './backend';

export type StorageErrorKind = 'IO_FAILURE' | 'CORRUPT_RECORD' | 'NOT_FOUND';

/**
 * Failure raised by a storage backend (or by the repository for a missing id).
 */
export class StorageError extends Error {
  constructor(
    public readonly kind: StorageErrorKind,
    message: string,
    public readonly recordId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StorageError';
  }

  get retryable(): boolean {
    return this.kind === 'IO_FAILURE';
  }

  static ioFailure(
    message: string,
    cause: unknown,
    recordId?: string
  ): StorageError {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    return new StorageError('IO_FAILURE', `${message}${detail}`, recordId, {
      cause,
    });
  }

  static corrupt(recordId: string, detail: string): StorageError {
    return new StorageError(
      'CORRUPT_RECORD',
      `Record "${recordId}" is corrupt: ${detail}`,
      recordId
    );
  }

  static notFound(recordId: string): StorageError {
    return new StorageError(
      'NOT_FOUND',
      `Record "${recordId}" not found`,
      recordId
    );
  }
}

/**
 * Raised by `switchBackend` when copying into the target backend fails.
 * The active backend is unchanged when this is thrown.
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly from: BackendKind,
    public readonly to: BackendKind,
    public readonly copiedCount: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MigrationError';
  }
}

export type SyncCycleErrorKind =
  | 'FETCH_TIMEOUT'
  | 'FETCH_FAILURE'
  | 'PARTIAL_COMMIT_FAILURE'
  | 'CANCELLED';

/**
 * Cycle-level synchronization failure.
 */
export class SyncCycleError extends Error {
  constructor(
    public readonly kind: SyncCycleErrorKind,
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SyncCycleError';
  }

  get retryable(): boolean {
    return this.kind === 'FETCH_TIMEOUT' || this.kind === 'FETCH_FAILURE';
  }
}

export type FailureClass =
  | 'retry_later'
  | 'data_integrity'
  | 'cancelled'
  | 'unknown';

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Map any caught value to the action a caller should take.
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof StorageError) {
    if (error.kind === 'CORRUPT_RECORD') return 'data_integrity';
    if (error.kind === 'IO_FAILURE') return 'retry_later';
    return 'unknown';
  }
  if (error instanceof SyncCycleError) {
    return error.kind === 'CANCELLED' ? 'cancelled' : 'retry_later';
  }
  if (error instanceof MigrationError) {
    return error.cause === undefined ? 'unknown' : classifyFailure(error.cause);
  }
  if (isAbortError(error)) return 'cancelled';
  return 'unknown';
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
