/**
 * @notekeep/core - Remote collaborator contracts
 *
 * The remote source itself is outside the store; these are the shapes the
 * synchronizer and search coordinator consume.
 */

import type { NoteRecord } from './schemas/note';
import type { RemotePushAck, RemoteRecord } from './schemas/remote';

export interface RemoteRequestOptions {
  signal?: AbortSignal;
}

export interface RemoteDataSource {
  /** Every record the remote holds. Absence means deleted. */
  fetchAll(options?: RemoteRequestOptions): Promise<readonly unknown[]>;
  /** Records changed after `since` (ms). Deletions arrive as `deleted: true`. */
  fetchSince(
    since: number,
    options?: RemoteRequestOptions
  ): Promise<readonly unknown[]>;
  /**
   * Optional upload of local changes. Returns one acknowledgement per record
   * it processed; records without an acknowledgement count as failed.
   */
  push?(
    records: readonly NoteRecord[],
    options?: RemoteRequestOptions
  ): Promise<readonly RemotePushAck[]>;
}

export interface RemoteSearchSource {
  search(
    query: string,
    options?: RemoteRequestOptions
  ): Promise<readonly RemoteRecord[]>;
}
