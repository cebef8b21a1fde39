/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export {
  success,
  failure,
  wrapFailure,
  isSuccess,
  isFailure,
  errorMessage,
} from './result.js';
export type { ErrorCode } from './errors.js';
export type {
  EmbeddingSettings,
  EmbeddingBatchPolicy,
  BatchEmbeddingResult,
} from './embedding.js';
export { DEFAULT_BATCH_POLICY } from './embedding.js';
export type {
  ChunkStrategy,
  Chunk,
  EmbeddingRecord,
  InsertChunksParams,
  SearchResult,
  IndexedDocument,
  FolderIndexSummary,
} from './document.js';
export { PARAGRAPH_STRATEGY } from './document.js';
