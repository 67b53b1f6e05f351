/**
 * @notekeep/store-kv - Key-value driver contract
 *
 * The key-value engine stores one serialized blob per key. Drivers only move
 * strings; they know nothing about records.
 */

export type KeyValueOp =
  | { type: 'set'; key: string; value: string }
  | { type: 'delete'; key: string };

export interface KeyValueDriver {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  /** Apply every operation or none of them. */
  batch(ops: readonly KeyValueOp[]): Promise<void>;
  /** Entries whose key starts with `prefix`, in key order. */
  entries(prefix: string): AsyncIterable<[string, string]>;
  /** Delete every entry whose key starts with `prefix`. */
  clear(prefix: string): Promise<void>;
  close(): Promise<void>;
}
