/**
 * @notekeep/core - Structured logging helpers
 *
 * Uses the active telemetry backend configured via `configureStoreTelemetry()`.
 */

import { getStoreTelemetry, type StoreTelemetryEvent } from './telemetry';

export type StoreLogEvent = StoreTelemetryEvent;

export type StoreLogger = (event: StoreLogEvent) => void;

/**
 * Log a store event using the currently configured telemetry backend.
 */
export const logStoreEvent: StoreLogger = (event) => {
  getStoreTelemetry().log(event);
};

/**
 * Create a timer for measuring operation duration.
 * Returns the elapsed time in milliseconds when called.
 *
 * @example
 * const elapsed = createStoreTimer();
 * await backend.bulkPut(records);
 * logStoreEvent({ event: 'bulk_put.complete', durationMs: elapsed() });
 */
export function createStoreTimer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}
