/**
 * @daybook/server - Server-side sync engine
 *
 * Change-log based sync with:
 * - per-record optimistic versioning (server wins)
 * - batched push with per-record savepoints
 * - delta pull and full snapshot recovery
 * - retention maintenance
 */
export * from '@daybook/core';

export * from './change-log';
export * from './dialect';
export * from './errors';
export * from './migrate';
export * from './prune';
export * from './pull';
export * from './push';
export * from './records';
export * from './schema';
export * from './service';
export * from './snapshot';
