/**
 * @notekeep/store-kv - Key-value storage engine
 *
 * Record blobs keyed by id over a pluggable driver (in-memory or SQLite).
 */

export * from './backend';
export * from './codec';
export * from './driver';
export * from './memory-driver';
export * from './sqlite-driver';
