/**
 * @notekeep/core - Runtime telemetry abstraction
 *
 * Vendor-neutral logging, tracing, and metrics interfaces so the store
 * packages can emit telemetry without coupling to a specific SDK.
 */

/**
 * Supported log levels.
 */
export type StoreTelemetryLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Primitive attribute value used by spans and metrics.
 */
export type StoreTelemetryAttributeValue = string | number | boolean;

export type StoreTelemetryAttributes = Record<
  string,
  StoreTelemetryAttributeValue
>;

/**
 * Structured log event.
 */
export interface StoreTelemetryEvent {
  event: string;
  level?: StoreTelemetryLevel;
  recordId?: string;
  durationMs?: number;
  error?: string;
  [key: string]: unknown;
}

export interface StoreSpanOptions {
  name: string;
  attributes?: StoreTelemetryAttributes;
}

export interface StoreSpan {
  setAttribute(name: string, value: StoreTelemetryAttributeValue): void;
  setStatus(status: 'ok' | 'error'): void;
}

export interface StoreTracer {
  startSpan<T>(options: StoreSpanOptions, callback: (span: StoreSpan) => T): T;
}

export interface StoreMetricOptions {
  attributes?: StoreTelemetryAttributes;
  unit?: string;
}

export interface StoreMetrics {
  count(name: string, value?: number, options?: StoreMetricOptions): void;
  distribution(name: string, value: number, options?: StoreMetricOptions): void;
}

/**
 * Unified telemetry interface.
 */
export interface StoreTelemetry {
  log(event: StoreTelemetryEvent): void;
  tracer: StoreTracer;
  metrics: StoreMetrics;
  captureException(error: unknown, context?: Record<string, unknown>): void;
}

const noopSpan: StoreSpan = {
  setAttribute() {},
  setStatus() {},
};

const noopTracer: StoreTracer = {
  startSpan(_options, callback) {
    return callback(noopSpan);
  },
};

const noopMetrics: StoreMetrics = {
  count() {},
  distribution() {},
};

function createConsoleLogger(): (event: StoreTelemetryEvent) => void {
  return (event: StoreTelemetryEvent) => {
    setImmediate(() => {
      const level = event.level ?? (event.error ? 'error' : 'info');
      const payload = {
        timestamp: new Date().toISOString(),
        level,
        ...event,
      };
      console.log(JSON.stringify(payload));
    });
  };
}

/**
 * Create console-backed default telemetry (logs only; no-op tracing/metrics).
 */
export function createDefaultStoreTelemetry(): StoreTelemetry {
  const logger = createConsoleLogger();
  return {
    log(event) {
      logger(event);
    },
    tracer: noopTracer,
    metrics: noopMetrics,
    captureException(error, context) {
      const message =
        error instanceof Error
          ? error.message
          : `Unknown error: ${String(error)}`;
      logger({
        event: 'store.exception',
        level: 'error',
        error: message,
        ...(context ?? {}),
      });
    },
  };
}

/**
 * Telemetry that drops everything. Handy for tests and benchmarks.
 */
export function createSilentStoreTelemetry(): StoreTelemetry {
  return {
    log() {},
    tracer: noopTracer,
    metrics: noopMetrics,
    captureException() {},
  };
}

let activeStoreTelemetry: StoreTelemetry = createDefaultStoreTelemetry();

export function getStoreTelemetry(): StoreTelemetry {
  return activeStoreTelemetry;
}

/**
 * Replace active telemetry backend.
 */
export function configureStoreTelemetry(telemetry: StoreTelemetry): void {
  activeStoreTelemetry = telemetry;
}

/**
 * Reset telemetry backend to default console implementation.
 */
export function resetStoreTelemetry(): void {
  activeStoreTelemetry = createDefaultStoreTelemetry();
}

export function captureStoreException(
  error: unknown,
  context?: Record<string, unknown>
): void {
  activeStoreTelemetry.captureException(error, context);
}

export function startStoreSpan<T>(
  options: StoreSpanOptions,
  callback: (span: StoreSpan) => T
): T {
  return activeStoreTelemetry.tracer.startSpan(options, callback);
}

export function countStoreMetric(
  name: string,
  value?: number,
  options?: StoreMetricOptions
): void {
  activeStoreTelemetry.metrics.count(name, value, options);
}

export function distributionStoreMetric(
  name: string,
  value: number,
  options?: StoreMetricOptions
): void {
  activeStoreTelemetry.metrics.distribution(name, value, options);
}
