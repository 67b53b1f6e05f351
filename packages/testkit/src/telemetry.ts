import {
  configureStoreTelemetry,
  resetStoreTelemetry,
  type StoreMetricOptions,
  type StoreTelemetry,
  type StoreTelemetryEvent,
} from '@notekeep/core';

export interface CapturedException {
  error: unknown;
  context: Record<string, unknown> | undefined;
}

export interface CapturedMetric {
  kind: 'count' | 'distribution';
  name: string;
  value: number | undefined;
  options: StoreMetricOptions | undefined;
}

export interface CapturedTelemetry {
  telemetry: StoreTelemetry;
  events: StoreTelemetryEvent[];
  exceptions: CapturedException[];
  metrics: CapturedMetric[];
  spans: string[];
  /** Event names in the order they were logged. */
  eventNames: () => string[];
  /** Install as the active telemetry; returns a restore function. */
  install: () => () => void;
}

/**
 * Telemetry that records everything synchronously, for assertions.
 */
export function createCapturedTelemetry(): CapturedTelemetry {
  const events: StoreTelemetryEvent[] = [];
  const exceptions: CapturedException[] = [];
  const metrics: CapturedMetric[] = [];
  const spans: string[] = [];

  const telemetry: StoreTelemetry = {
    log(event) {
      events.push(event);
    },
    tracer: {
      startSpan(options, callback) {
        spans.push(options.name);
        return callback({ setAttribute() {}, setStatus() {} });
      },
    },
    metrics: {
      count(name, value, options) {
        metrics.push({ kind: 'count', name, value, options });
      },
      distribution(name, value, options) {
        metrics.push({ kind: 'distribution', name, value, options });
      },
    },
    captureException(error, context) {
      exceptions.push({ error, context });
    },
  };

  return {
    telemetry,
    events,
    exceptions,
    metrics,
    spans,
    eventNames: () => events.map((event) => event.event),
    install: () => {
      configureStoreTelemetry(telemetry);
      return resetStoreTelemetry;
    },
  };
}
