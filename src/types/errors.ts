/**
 * Error codes carried by Failure results
 *
 * - CONFIGURATION_ERROR: missing or invalid settings; the process cannot index or search
 * - VALIDATION_ERROR: caller supplied empty or mismatched input
 * - EMBEDDING_GENERATION_ERROR: remote embedding calls exhausted their retry budget
 * - DATABASE_ERROR: connection or write failure; writes are rolled back
 * - DATABASE_SEARCH_ERROR: read/query failure during similarity search
 * - DOCUMENT_PROCESSING_ERROR: text extraction failed
 */
export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'EMBEDDING_GENERATION_ERROR'
  | 'DATABASE_ERROR'
  | 'DATABASE_SEARCH_ERROR'
  | 'DOCUMENT_PROCESSING_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';
