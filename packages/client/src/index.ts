/**
 * @notekeep/client - Note store client
 *
 * Repository, search coordination and synchronization over the storage
 * engines.
 */

export * from './config';
export * from './create-store';
export * from './locks';
export * from './observers';
export * from './repository';
export * from './search-coordinator';
export * from './sync/diff';
export * from './sync/reconcile';
export * from './sync/rules';
export * from './sync/synchronizer';
export * from './sync/types';
