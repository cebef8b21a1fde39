/**
 * Result Pattern Implementation
 *
 * Service methods return Result<T> instead of throwing across their boundary.
 * The error code is one of the documented ErrorCode values.
 */

import type { ErrorCode } from './errors.js';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Re-wrap a failure under another code, keeping the original code in details.
 * Used where a component surfaces a lower layer's error under its own code.
 */
export function wrapFailure(
  code: ErrorCode,
  prefix: string,
  cause: Failure
): Failure {
  return failure(code, `${prefix}: ${cause.error.message}`, {
    ...cause.error.details,
    cause: cause.error.code,
  });
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
