/**
 * @notekeep/core - Restartable record scans
 *
 * A scan is a lazy, finite sequence that re-runs its producer on every
 * iteration. Corrupt records are reported through `errors` instead of
 * aborting the iteration.
 */

import type { StorageError } from './errors';

export type ScanErrorSink = (error: StorageError) => void;

export type ScanProducer<T> = (reportError: ScanErrorSink) => AsyncIterable<T>;

export class NoteScan<T> implements AsyncIterable<T> {
  private lastErrors: StorageError[] = [];

  constructor(private readonly producer: ScanProducer<T>) {}

  /** Errors collected by the most recent iteration. */
  get errors(): readonly StorageError[] {
    return this.lastErrors;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    const errors: StorageError[] = [];
    this.lastErrors = errors;
    yield* this.producer((error) => {
      errors.push(error);
    });
  }

  async toArray(): Promise<T[]> {
    const out: T[] = [];
    for await (const item of this) {
      out.push(item);
    }
    return out;
  }
}

export function createScan<T>(producer: ScanProducer<T>): NoteScan<T> {
  return new NoteScan(producer);
}
