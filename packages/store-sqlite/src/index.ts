/**
 * @notekeep/store-sqlite - Relational storage engine on SQLite
 *
 * Tables, schema creation and the `RelationalBackend`.
 */

export * from './backend';
export * from './fts';
export * from './migrate';
export * from './schema';
