/**
 * @daybook/server - Shared dialect helpers
 *
 * Pure helper functions used by all server sync dialect implementations.
 */

export function coerceNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint')
    return Number.isFinite(Number(value)) ? Number(value) : null;
  if (typeof value === 'string') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function coerceIsoString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export type ConstraintViolationCode =
  | 'NOT_NULL_CONSTRAINT'
  | 'UNIQUE_CONSTRAINT'
  | 'FOREIGN_KEY_CONSTRAINT'
  | 'CHECK_CONSTRAINT'
  | 'CONSTRAINT_VIOLATION';

export function isConstraintViolationError(message: string): boolean {
  const normalized = message.toLowerCase();
  return (
    normalized.includes('constraint') ||
    normalized.includes('not null') ||
    normalized.includes('foreign key') ||
    normalized.includes('unique') ||
    normalized.includes('duplicate key')
  );
}

export function classifyConstraintViolationCode(
  message: string
): ConstraintViolationCode {
  const normalized = message.toLowerCase();
  if (normalized.includes('not null')) return 'NOT_NULL_CONSTRAINT';
  if (normalized.includes('unique') || normalized.includes('duplicate key'))
    return 'UNIQUE_CONSTRAINT';
  if (normalized.includes('foreign key')) return 'FOREIGN_KEY_CONSTRAINT';
  if (normalized.includes('check')) return 'CHECK_CONSTRAINT';
  return 'CONSTRAINT_VIOLATION';
}
