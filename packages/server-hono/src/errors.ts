/**
 * @daybook/server-hono - Error envelope
 */

import type { ErrorCode, ErrorResponse } from '@daybook/core';
import type { Context } from 'hono';

export type ErrorStatus = 400 | 401 | 413 | 429 | 500;

export function errorResponse(
  c: Context,
  status: ErrorStatus,
  code: ErrorCode,
  message: string,
  details?: Record<string, string>
): Response {
  const body: ErrorResponse = {
    error: details ? { code, message, details } : { code, message },
  };
  return c.json(body, status);
}
