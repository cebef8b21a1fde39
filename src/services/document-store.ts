/**
 * DocumentStore contract
 *
 * SCOPE: Persist chunks with their vectors and precomputed norms;
 * score stored vectors against a query vector inside the storage engine.
 *
 * GUARDRAILS:
 * - insertChunks is all-or-nothing per call
 * - deleteBySource/deleteAll report failure as `false`, never throw
 * - Every operation is self-contained; nothing is held between calls
 */

import type {
  InsertChunksParams,
  Result,
  SearchResult,
} from '@/types/index.js';
import { failure, success } from '@/types/index.js';

export interface DocumentStore {
  /** Create the table and scoring functions if absent (idempotent) */
  ensureSchema(): Promise<Result<void>>;

  /** Write every chunk with its embedding and norm in one batch */
  insertChunks(params: InsertChunksParams): Promise<Result<{ inserted: number }>>;

  /** Remove all records for one source; true even when nothing matched */
  deleteBySource(sourceId: string): Promise<boolean>;

  /** Remove every record */
  deleteAll(): Promise<boolean>;

  /** Distinct source ids, ascending */
  listSources(): Promise<Result<string[]>>;

  /** Top `topK` records by cosine similarity to the query vector */
  matchChunks(
    queryEmbedding: number[],
    queryNorm: number,
    topK: number
  ): Promise<Result<SearchResult[]>>;
}

/**
 * Validate bulk insert input before touching storage
 */
export function validateInsertParams(params: InsertChunksParams): Result<void> {
  const { sourceId, chunks, embeddings } = params;

  if (chunks.length === 0) {
    return failure('VALIDATION_ERROR', 'Chunks list cannot be empty for indexing');
  }
  if (embeddings.length === 0) {
    return failure(
      'VALIDATION_ERROR',
      'Embeddings list cannot be empty for indexing'
    );
  }
  if (chunks.length !== embeddings.length) {
    return failure(
      'VALIDATION_ERROR',
      `Chunks count (${chunks.length}) doesn't match embeddings count (${embeddings.length})`,
      { chunkCount: chunks.length, embeddingCount: embeddings.length }
    );
  }
  if (sourceId.trim() === '') {
    return failure('VALIDATION_ERROR', 'Source identifier cannot be empty');
  }

  return success(undefined);
}
