/**
 * @notekeep/core - Shared types and utilities for the note store
 *
 * This package contains:
 * - The note record model and its Zod schemas
 * - The storage backend contract shared by both engines
 * - Typed errors
 * - Filtering, ordering and weighted term scoring helpers
 * - Logging and telemetry utilities
 */

// Storage backend contract
export * from './backend';
// Typed failures
export * from './errors';
// In-memory filter and ordering semantics
export * from './filter';
// Logging utilities
export * from './logger';
// Record validation helpers
export * from './record';
// Remote collaborator contracts
export * from './remote';
// Restartable scans
export * from './scan';
// Schemas (Zod)
export * from './schemas';
// Weighted term scoring
export * from './scoring';
// Telemetry abstraction
export * from './telemetry';
// Shared runtime utilities
export * from './utils';
