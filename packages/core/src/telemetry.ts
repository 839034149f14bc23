/**
 * @daybook/core - Runtime telemetry abstraction
 *
 * The engine reports logs, spans, counters, distributions and exceptions
 * through one `SyncTelemetry` backend. Apps install their own with
 * `configureSyncTelemetry()`; until then events go to the console as JSON.
 */

export type SyncTelemetryLevel =
  | 'trace'
  | 'debug'
  | 'info'
  | 'warn'
  | 'error'
  | 'fatal';

export type SyncTelemetryAttributes = Record<string, string | number | boolean>;

/**
 * A structured log event. `event` names what happened (`sync.push`,
 * `sync.maintenance`); the remaining keys are free-form context.
 */
export interface SyncTelemetryEvent {
  event: string;
  level?: SyncTelemetryLevel;
  userId?: string;
  durationMs?: number;
  recordCount?: number;
  conflictCount?: number;
  errorCount?: number;
  error?: string;
  [key: string]: unknown;
}

export interface SyncSpanOptions {
  name: string;
  op?: string;
  attributes?: SyncTelemetryAttributes;
}

export interface SyncSpan {
  setAttribute(name: string, value: string | number | boolean): void;
  setAttributes(attributes: SyncTelemetryAttributes): void;
  setStatus(status: 'ok' | 'error'): void;
}

export interface SyncMetricOptions {
  attributes?: SyncTelemetryAttributes;
  unit?: string;
}

export interface SyncTelemetry {
  log(event: SyncTelemetryEvent): void;
  tracer: {
    startSpan<T>(options: SyncSpanOptions, callback: (span: SyncSpan) => T): T;
  };
  metrics: {
    count(name: string, value?: number, options?: SyncMetricOptions): void;
    distribution(
      name: string,
      value: number,
      options?: SyncMetricOptions
    ): void;
  };
  captureException(error: unknown, context?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<SyncTelemetryLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const NOOP_SPAN: SyncSpan = {
  setAttribute() {},
  setAttributes() {},
  setStatus() {},
};

export interface ConsoleSyncTelemetryOptions {
  /** Events below this level are dropped. Defaults to `info`. */
  minLevel?: SyncTelemetryLevel;
  /** Line sink, `console.log` unless overridden. */
  write?: (line: string) => void;
}

/**
 * Console-backed telemetry: one JSON line per event, written on the next
 * tick. Spans and metrics are discarded.
 */
export function createDefaultSyncTelemetry(
  options: ConsoleSyncTelemetryOptions = {}
): SyncTelemetry {
  const minRank = LEVEL_RANK[options.minLevel ?? 'info'];
  const write = options.write ?? ((line: string) => console.log(line));

  const log = (event: SyncTelemetryEvent): void => {
    const level = event.level ?? (event.error ? 'error' : 'info');
    if (LEVEL_RANK[level] < minRank) return;
    const timestamp = new Date().toISOString();
    setImmediate(() => {
      write(JSON.stringify({ timestamp, ...event, level }));
    });
  };

  return {
    log,
    tracer: {
      startSpan: (_options, callback) => callback(NOOP_SPAN),
    },
    metrics: {
      count() {},
      distribution() {},
    },
    captureException(error, context) {
      log({
        event: 'sync.exception',
        level: 'error',
        error:
          error instanceof Error
            ? error.message
            : `Unknown error: ${String(error)}`,
        ...(context ?? {}),
      });
    },
  };
}

let activeSyncTelemetry: SyncTelemetry = createDefaultSyncTelemetry();

export function getSyncTelemetry(): SyncTelemetry {
  return activeSyncTelemetry;
}

export function configureSyncTelemetry(telemetry: SyncTelemetry): void {
  activeSyncTelemetry = telemetry;
}

/**
 * Go back to the console backend.
 */
export function resetSyncTelemetry(): void {
  activeSyncTelemetry = createDefaultSyncTelemetry();
}

export function captureSyncException(
  error: unknown,
  context?: Record<string, unknown>
): void {
  activeSyncTelemetry.captureException(error, context);
}

export function startSyncSpan<T>(
  options: SyncSpanOptions,
  callback: (span: SyncSpan) => T
): T {
  return activeSyncTelemetry.tracer.startSpan(options, callback);
}

export function countSyncMetric(
  name: string,
  value?: number,
  options?: SyncMetricOptions
): void {
  activeSyncTelemetry.metrics.count(name, value, options);
}

export function distributionSyncMetric(
  name: string,
  value: number,
  options?: SyncMetricOptions
): void {
  activeSyncTelemetry.metrics.distribution(name, value, options);
}
