/**
 * @daybook/core - Column codecs
 *
 * Convert between the values clients exchange (booleans, JSON values, ISO
 * timestamps) and what each store keeps on disk.
 */

import {
  getSyncTableColumns,
  type SyncColumnType,
  type SyncTableName,
} from './tables';

export type ColumnCodecDialect = 'sqlite' | 'postgres';

export interface ColumnCodec<App, Db> {
  toDb(value: App): Db;
  fromDb(value: Db): App;
  dialects?: Partial<
    Record<
      ColumnCodecDialect,
      {
        toDb?(value: App): Db;
        fromDb?(value: Db): App;
      }
    >
  >;
}

export type AnyColumnCodec = ColumnCodec<unknown, unknown>;

export type TableColumnCodecs = Record<string, AnyColumnCodec>;

function resolveCodecToDb(
  codec: AnyColumnCodec,
  dialect: ColumnCodecDialect
): (value: unknown) => unknown {
  return codec.dialects?.[dialect]?.toDb ?? codec.toDb;
}

function resolveCodecFromDb(
  codec: AnyColumnCodec,
  dialect: ColumnCodecDialect
): (value: unknown) => unknown {
  return codec.dialects?.[dialect]?.fromDb ?? codec.fromDb;
}

export function applyCodecToDbValue(
  codec: AnyColumnCodec,
  value: unknown,
  dialect: ColumnCodecDialect
): unknown {
  if (value === null || value === undefined) return value;
  return resolveCodecToDb(codec, dialect)(value);
}

export function applyCodecFromDbValue(
  codec: AnyColumnCodec,
  value: unknown,
  dialect: ColumnCodecDialect
): unknown {
  if (value === null || value === undefined) return value;
  return resolveCodecFromDb(codec, dialect)(value);
}

export function applyCodecsToDbRow(
  row: Record<string, unknown>,
  tableCodecs: TableColumnCodecs,
  dialect: ColumnCodecDialect
): Record<string, unknown> {
  const transformed: Record<string, unknown> = { ...row };
  for (const [column, codec] of Object.entries(tableCodecs)) {
    if (!(column in transformed)) continue;
    transformed[column] = applyCodecToDbValue(
      codec,
      transformed[column],
      dialect
    );
  }
  return transformed;
}

export function applyCodecsFromDbRow(
  row: Record<string, unknown>,
  tableCodecs: TableColumnCodecs,
  dialect: ColumnCodecDialect
): Record<string, unknown> {
  const transformed: Record<string, unknown> = { ...row };
  for (const [column, codec] of Object.entries(tableCodecs)) {
    if (!(column in transformed)) continue;
    transformed[column] = applyCodecFromDbValue(
      codec,
      transformed[column],
      dialect
    );
  }
  return transformed;
}

function parseBooleanValue(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'bigint') return value !== 0n;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === 't') return true;
    if (normalized === 'false' || normalized === 'f') return false;
    const asNumber = Number(normalized);
    if (Number.isFinite(asNumber)) return asNumber !== 0;
    return false;
  }
  return Boolean(value);
}

export function numberBoolean(): ColumnCodec<unknown, unknown> {
  return {
    toDb: (value) => (parseBooleanValue(value) ? 1 : 0),
    fromDb: (value) => parseBooleanValue(value),
    dialects: {
      postgres: {
        toDb: (value) => parseBooleanValue(value),
      },
    },
  };
}

/**
 * JSON kept as text. Postgres `jsonb` comes back already parsed, so reads
 * there pass through untouched.
 */
export function stringJson(): ColumnCodec<unknown, unknown> {
  return {
    toDb: (value) => JSON.stringify(value),
    fromDb: (value) => (typeof value === 'string' ? JSON.parse(value) : value),
    dialects: {
      postgres: {
        fromDb: (value) => value,
      },
    },
  };
}

function toUtcIsoString(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
  }
  return value;
}

/**
 * Timestamps travel as ISO-8601 strings. Writes are normalized to UTC with
 * millisecond precision so text columns compare chronologically; drivers
 * that hand back `Date` objects (pg for `timestamptz`) are normalized on read.
 */
export function isoTimestamp(): ColumnCodec<unknown, unknown> {
  return {
    toDb: toUtcIsoString,
    fromDb: (value) => (value instanceof Date ? value.toISOString() : value),
  };
}

function codecForColumnType(type: SyncColumnType): AnyColumnCodec | undefined {
  switch (type) {
    case 'boolean':
      return numberBoolean();
    case 'json':
      return stringJson();
    case 'timestamp':
      return isoTimestamp();
    default:
      return undefined;
  }
}

const tableCodecCache = new Map<SyncTableName, TableColumnCodecs>();

/**
 * Codecs for every column of a registry table that needs one.
 */
export function getTableColumnCodecs(table: SyncTableName): TableColumnCodecs {
  const cached = tableCodecCache.get(table);
  if (cached) return cached;

  const codecs: TableColumnCodecs = {};
  for (const [column, spec] of Object.entries(getSyncTableColumns(table))) {
    const codec = codecForColumnType(spec.type);
    if (codec) codecs[column] = codec;
  }
  tableCodecCache.set(table, codecs);
  return codecs;
}
