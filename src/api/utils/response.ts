/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { Failure } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Get the request id set by the request-id middleware
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') ?? 'unknown';
}

/**
 * Create error response from service error
 */
export function errorResponse(c: Context, error: Failure['error']): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId: getRequestId(c),
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create a 400 response for a body that failed validation
 */
export function invalidBodyResponse(
  c: Context,
  code: 'INVALID_JSON' | 'VALIDATION_ERROR',
  message: string
): Response {
  return c.json(
    {
      error: {
        code,
        message,
        requestId: getRequestId(c),
      },
    },
    400
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId: getRequestId(c) },
    },
    status
  );
}
