/**
 * Document Domain Types
 *
 * SCOPE: Chunks, stored embedding records and search results
 */

/**
 * Chunking strategies recorded alongside each stored chunk
 */
export type ChunkStrategy = 'paragraph';

export const PARAGRAPH_STRATEGY: ChunkStrategy = 'paragraph';

/**
 * A contiguous unit of source text
 */
export interface Chunk {
  /** Originating document path */
  sourceId: string;
  text: string;
  strategy: ChunkStrategy;
}

/**
 * Persisted chunk with its vector
 */
export interface EmbeddingRecord extends Chunk {
  id: number;
  embedding: number[];
  /** Euclidean norm of `embedding`, computed when the row is written */
  embeddingNorm: number;
  createdAt: Date;
}

/**
 * Bulk insert parameters; `chunks[i]` pairs with `embeddings[i]`
 */
export interface InsertChunksParams {
  sourceId: string;
  strategy: ChunkStrategy;
  chunks: string[];
  embeddings: number[][];
}

/**
 * A scored chunk returned by similarity search
 */
export interface SearchResult {
  chunkText: string;
  sourceId: string;
  strategy: string;
  /** Cosine similarity, in [-1, 1] */
  similarity: number;
}

/**
 * Outcome of indexing one document
 */
export interface IndexedDocument {
  sourceId: string;
  chunkCount: number;
}

/**
 * Outcome of indexing every supported file in a folder
 */
export interface FolderIndexSummary {
  folder: string;
  indexed: IndexedDocument[];
  failed: Array<{
    sourceId: string;
    code: string;
    message: string;
  }>;
}
