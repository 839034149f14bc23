/**
 * @daybook/core - Structured logging for sync operations
 *
 * Events go to whichever backend `configureSyncTelemetry()` installed.
 */

import { getSyncTelemetry, type SyncTelemetryEvent } from './telemetry';

export function logSyncEvent(event: SyncTelemetryEvent): void {
  getSyncTelemetry().log(event);
}

/**
 * Start a wall-clock timer; the returned function yields elapsed whole
 * milliseconds.
 *
 * @example
 * const elapsed = createSyncTimer();
 * await service.pushChanges(userId, records);
 * logSyncEvent({ event: 'sync.push', userId, durationMs: elapsed() });
 */
export function createSyncTimer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}

/**
 * Message text for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
