/**
 * @daybook/core - Shared types and utilities for Daybook sync
 *
 * This package contains:
 * - The syncable table registry and per-table payload schemas
 * - Zod schemas for the sync wire protocol
 * - Pure version-conflict resolution
 * - Column codecs
 * - Telemetry and structured logging
 */

// Column-level codecs applied on every store read and write
export * from './column-codecs';
// Version conflict resolution
export * from './conflict';
// Logging utilities
export * from './logger';
// Schemas (Zod)
export * from './schemas';
// Table registry
export * from './tables';
// Telemetry abstraction
export * from './telemetry';
