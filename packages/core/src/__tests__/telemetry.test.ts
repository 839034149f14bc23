import { describe, expect, test } from 'vitest';
import { logSyncEvent } from '../logger';
import {
  captureSyncException,
  configureSyncTelemetry,
  countSyncMetric,
  createDefaultSyncTelemetry,
  distributionSyncMetric,
  getSyncTelemetry,
  resetSyncTelemetry,
  type SyncMetricOptions,
  type SyncSpan,
  type SyncSpanOptions,
  type SyncTelemetry,
  type SyncTelemetryEvent,
  startSyncSpan,
} from '../telemetry';

interface CapturedMetric {
  name: string;
  value: number | undefined;
  options: SyncMetricOptions | undefined;
}

interface TelemetryCalls {
  logs: SyncTelemetryEvent[];
  countMetrics: CapturedMetric[];
  distributionMetrics: CapturedMetric[];
  spans: SyncSpanOptions[];
  exceptions: Array<{
    error: unknown;
    context: Record<string, unknown> | undefined;
  }>;
}

function createCalls(): TelemetryCalls {
  return {
    logs: [],
    countMetrics: [],
    distributionMetrics: [],
    spans: [],
    exceptions: [],
  };
}

function createTestTelemetry(calls: TelemetryCalls): SyncTelemetry {
  return {
    log(event) {
      calls.logs.push(event);
    },
    tracer: {
      startSpan(options, callback) {
        calls.spans.push(options);
        const span: SyncSpan = {
          setAttribute() {},
          setAttributes() {},
          setStatus() {},
        };
        return callback(span);
      },
    },
    metrics: {
      count(name, value, options) {
        calls.countMetrics.push({ name, value, options });
      },
      distribution(name, value, options) {
        calls.distributionMetrics.push({ name, value, options });
      },
    },
    captureException(error, context) {
      calls.exceptions.push({ error, context });
    },
  };
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('sync telemetry configuration', () => {
  test('routes logger, metrics, spans, and exceptions to configured backend', () => {
    const calls = createCalls();
    const previous = getSyncTelemetry();

    try {
      configureSyncTelemetry(createTestTelemetry(calls));

      logSyncEvent({ event: 'sync.push', userId: 'user-1', recordCount: 3 });
      const spanResult = startSyncSpan(
        { name: 'sync.push', op: 'sync.push', attributes: { records: 3 } },
        () => 'done'
      );
      countSyncMetric('sync.push.records', 3);
      distributionSyncMetric('sync.push.duration_ms', 12, {
        unit: 'millisecond',
      });
      captureSyncException(new Error('boom'), { operation: 'push' });

      expect(spanResult).toBe('done');
      expect(calls.logs).toEqual([
        { event: 'sync.push', userId: 'user-1', recordCount: 3 },
      ]);
      expect(calls.spans).toEqual([
        { name: 'sync.push', op: 'sync.push', attributes: { records: 3 } },
      ]);
      expect(calls.countMetrics).toEqual([
        { name: 'sync.push.records', value: 3, options: undefined },
      ]);
      expect(calls.distributionMetrics).toEqual([
        {
          name: 'sync.push.duration_ms',
          value: 12,
          options: { unit: 'millisecond' },
        },
      ]);
      expect(calls.exceptions).toHaveLength(1);
      expect(calls.exceptions[0]?.context).toEqual({ operation: 'push' });
    } finally {
      configureSyncTelemetry(previous);
    }
  });

  test('resetSyncTelemetry swaps out custom telemetry backend', () => {
    const calls = createCalls();

    configureSyncTelemetry(createTestTelemetry(calls));
    resetSyncTelemetry();
    logSyncEvent({ event: 'sync.default.logger', level: 'debug' });

    expect(calls.logs).toHaveLength(0);
  });
});

describe('default console telemetry', () => {
  test('writes one JSON line per event at or above the minimum level', async () => {
    const lines: string[] = [];
    const telemetry = createDefaultSyncTelemetry({
      minLevel: 'warn',
      write: (line) => lines.push(line),
    });

    telemetry.log({ event: 'sync.pull', userId: 'user-1' });
    telemetry.log({ event: 'sync.delta.large_response', level: 'warn' });
    expect(lines).toHaveLength(0);

    await nextTick();

    expect(lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(lines[0] ?? '');
    expect(parsed).toMatchObject({
      event: 'sync.delta.large_response',
      level: 'warn',
    });
  });

  test('infers error level from an error field and logs captured exceptions', async () => {
    const lines: string[] = [];
    const telemetry = createDefaultSyncTelemetry({
      write: (line) => lines.push(line),
    });

    telemetry.log({ event: 'sync.push', error: 'disk full' });
    telemetry.captureException(new Error('boom'), { route: 'push' });
    await nextTick();

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      expect.objectContaining({ event: 'sync.push', level: 'error' }),
      expect.objectContaining({
        event: 'sync.exception',
        level: 'error',
        error: 'boom',
        route: 'push',
      }),
    ]);
  });
});
