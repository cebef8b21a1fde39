/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

import type {
  IndexingService,
  SearchService,
  DocumentStore,
} from '@/services/index.js';

/**
 * Extended Hono context with request id
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<string, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  INVALID_JSON: 400,
  NOT_FOUND: 404,
  DOCUMENT_PROCESSING_ERROR: 422,
  EMBEDDING_GENERATION_ERROR: 502,
  DATABASE_ERROR: 503,
  DATABASE_SEARCH_ERROR: 503,
  CONFIGURATION_ERROR: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ContentfulStatusCode {
  return ERROR_STATUS_MAP[code] ?? 500;
}

/**
 * Services the routes depend on
 */
export interface ApiServices {
  indexingService: IndexingService;
  searchService: SearchService;
  store: DocumentStore;
}
