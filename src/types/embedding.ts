/**
 * Embedding Domain Types
 *
 * SCOPE: Vector embedding generation for indexing and queries
 */

/**
 * Settings the embedding client needs from configuration
 */
export interface EmbeddingSettings {
  /** Embedding model identifier sent to the remote service */
  model: string;
}

/**
 * Batching and retry policy
 */
export interface EmbeddingBatchPolicy {
  /** Texts per remote call */
  batchSize: number;
  /** Attempts per batch, first call included */
  maxAttempts: number;
  /** Base of the exponential backoff, in seconds */
  backoffBase: number;
  /** Pause between successful batches, in milliseconds */
  interBatchDelayMs: number;
}

export const DEFAULT_BATCH_POLICY: EmbeddingBatchPolicy = {
  batchSize: 10,
  maxAttempts: 3,
  backoffBase: 2,
  interBatchDelayMs: 100,
};

/**
 * Batch embedding result from the remote service
 */
export interface BatchEmbeddingResult {
  /** Embeddings in same order as input texts */
  embeddings: number[][];
  /** Model used */
  model: string;
  /** Total tokens processed */
  totalTokens: number;
}
