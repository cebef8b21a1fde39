/**
 * SearchService Implementation
 *
 * SCOPE: Score stored chunks against one or more query vectors and merge
 * the per-vector rankings
 *
 * GUARDRAILS:
 * - A zero-norm query vector is skipped with a warning, never an error
 * - Multi-vector results are merged round-robin, one item per list per
 *   round, keeping the higher score when a chunk text repeats. This does not
 *   guarantee the global top-k by score and is kept that way on purpose.
 * - Store failures end the search with DATABASE_SEARCH_ERROR
 */

import { createLogger } from '@/lib/logger.js';
import { vectorNorm } from '@/lib/vector.js';
import type { Result, SearchResult } from '@/types/index.js';
import { failure, success, wrapFailure } from '@/types/index.js';

import { chunkByParagraphs } from './chunker.service.js';
import type { DocumentStore } from './document-store.js';
import type { EmbeddingService } from './embedding.service.js';

const log = createLogger('search');

export const DEFAULT_TOP_K = 5;

/**
 * SearchService interface
 */
export interface SearchService {
  /** Rank stored chunks against already-embedded query vectors */
  search(queryVectors: number[][], topK: number): Promise<Result<SearchResult[]>>;

  /** Chunk, embed and search a free-text query */
  searchQuery(query: string, topK?: number): Promise<Result<SearchResult[]>>;
}

export interface SearchServiceDeps {
  store: DocumentStore;
  embeddingService: EmbeddingService;
  defaultTopK?: number;
}

/**
 * Merge per-query ranked lists round-robin.
 *
 * Round r visits item r of every list in turn. A chunk text already selected
 * is replaced in place when the new occurrence scores higher, and otherwise
 * dropped; duplicates never count toward `topK`. The selection is returned
 * by similarity descending, ties in selection order.
 */
export function mergeRoundRobin(
  rankedLists: readonly SearchResult[][],
  topK: number
): SearchResult[] {
  const selected: SearchResult[] = [];
  const positionByText = new Map<string, number>();

  for (let round = 0; round < topK && selected.length < topK; round++) {
    for (const list of rankedLists) {
      if (selected.length >= topK) {
        break;
      }
      const candidate = list[round];
      if (candidate === undefined) {
        continue;
      }

      const existing = positionByText.get(candidate.chunkText);
      if (existing !== undefined) {
        const current = selected[existing];
        if (current !== undefined && candidate.similarity > current.similarity) {
          selected[existing] = candidate;
        }
        continue;
      }

      positionByText.set(candidate.chunkText, selected.length);
      selected.push(candidate);
    }
  }

  return [...selected].sort((a, b) => b.similarity - a.similarity);
}

const RULE_WIDE = '='.repeat(50);
const RULE_NARROW = '-'.repeat(30);

/**
 * Render results as plain text for display
 */
export function formatResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return 'No results found for your search.';
  }

  let text = `Search Results (${results.length} results):\n${RULE_WIDE}\n\n`;
  results.forEach((result, i) => {
    const percentage = (result.similarity * 100).toFixed(1);
    text += `${i + 1}. Source: ${result.sourceId} | Similarity: ${percentage}%\n`;
    text += `${result.chunkText}\n\n`;
    text += `${RULE_NARROW}\n\n`;
  });
  return text;
}

function isValidTopK(topK: number): boolean {
  return Number.isInteger(topK) && topK > 0;
}

/**
 * Create SearchService instance
 */
export function createSearchService(deps: SearchServiceDeps): SearchService {
  const { store, embeddingService } = deps;
  const defaultTopK = deps.defaultTopK ?? DEFAULT_TOP_K;

  async function search(
    queryVectors: number[][],
    topK: number
  ): Promise<Result<SearchResult[]>> {
    if (queryVectors.length === 0) {
      log.error('No embeddings provided for search');
      return failure('VALIDATION_ERROR', 'Cannot search without embeddings');
    }
    if (!isValidTopK(topK)) {
      return failure('VALIDATION_ERROR', 'topK must be a positive integer', {
        topK,
      });
    }

    log.info(`Searching with ${queryVectors.length} embeddings, topK=${topK}`);

    const rankedLists: SearchResult[][] = [];
    for (const [i, vector] of queryVectors.entries()) {
      const norm = vectorNorm(vector);
      if (norm === 0) {
        log.warn('Query vector norm is zero, cannot compute similarity', {
          vector: i + 1,
        });
        rankedLists.push([]);
        continue;
      }

      const matchResult = await store.matchChunks(vector, norm, topK);
      if (!matchResult.success) {
        return failure(
          'DATABASE_SEARCH_ERROR',
          matchResult.error.message,
          matchResult.error.details
        );
      }
      log.debug(`Search for embedding #${i + 1} found ${matchResult.data.length} results`);
      rankedLists.push(matchResult.data);
    }

    const merged = mergeRoundRobin(rankedLists, topK);
    if (merged.length === 0) {
      log.warn('No similar chunks found for any of the query embeddings');
    } else {
      log.info(
        `Merged ${merged.length} unique results from ${rankedLists.length} searches`
      );
    }
    return success(merged);
  }

  return {
    search,

    async searchQuery(
      query: string,
      topK: number = defaultTopK
    ): Promise<Result<SearchResult[]>> {
      const chunksResult = chunkByParagraphs(query);
      if (!chunksResult.success) {
        return wrapFailure('VALIDATION_ERROR', 'Invalid query', chunksResult);
      }

      const embeddingsResult = await embeddingService.generateEmbeddings(
        chunksResult.data
      );
      if (!embeddingsResult.success) {
        log.error('Failed to create query embeddings', {
          error: embeddingsResult.error.message,
        });
        return embeddingsResult;
      }

      return search(embeddingsResult.data, topK);
    },
  };
}
