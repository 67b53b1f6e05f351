/**
 * @notekeep/testkit - Test helpers shared by the store packages
 */

export * from './deterministic';
export * from './faults';
export * from './fixtures';
export * from './remote';
export * from './telemetry';
