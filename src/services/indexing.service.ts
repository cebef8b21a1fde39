/**
 * IndexingService Implementation
 *
 * SCOPE: Idempotent per-document pipeline
 *   delete existing → extract → chunk → embed → bulk insert
 *
 * GUARDRAILS:
 * - Steps run strictly in order; the first failure ends the pipeline
 * - No retry here beyond what the embedding service does per batch
 * - At most one live generation of records per source identifier
 * - Raw text only lives inside loadChunks(); chunks and vectors are dropped
 *   once the insert has been issued
 */

import { createLogger } from '@/lib/logger.js';
import type {
  FolderIndexSummary,
  IndexedDocument,
  Result,
} from '@/types/index.js';
import { PARAGRAPH_STRATEGY, failure, success } from '@/types/index.js';

import { chunkByParagraphs } from './chunker.service.js';
import type { DocumentStore } from './document-store.js';
import type { EmbeddingService } from './embedding.service.js';

const log = createLogger('indexing');

/**
 * Text extraction collaborator
 */
export type TextExtractor = (sourcePath: string) => Promise<Result<string>>;

/**
 * Lists the files of a folder that the extractor can handle
 */
export type FileLister = (folderPath: string) => Promise<Result<string[]>>;

/**
 * IndexingService interface
 */
export interface IndexingService {
  /** Replace every stored chunk of one document with a fresh generation */
  indexDocument(sourcePath: string): Promise<Result<IndexedDocument>>;

  /** Index every supported file in a folder; failures do not stop the batch */
  indexFolder(folderPath: string): Promise<Result<FolderIndexSummary>>;
}

export interface IndexingServiceDeps {
  store: DocumentStore;
  embeddingService: EmbeddingService;
  extractText: TextExtractor;
  listFiles: FileLister;
}

/**
 * Create IndexingService instance
 */
export function createIndexingService(deps: IndexingServiceDeps): IndexingService {
  const { store, embeddingService, extractText, listFiles } = deps;

  async function loadChunks(sourcePath: string): Promise<Result<string[]>> {
    const textResult = await extractText(sourcePath);
    if (!textResult.success) {
      return textResult;
    }
    return chunkByParagraphs(textResult.data);
  }

  async function indexDocument(
    sourcePath: string
  ): Promise<Result<IndexedDocument>> {
    log.info(`Starting document processing pipeline for: ${sourcePath}`);

    if (sourcePath.trim() === '') {
      return failure('VALIDATION_ERROR', 'Source path cannot be empty');
    }

    const cleared = await store.deleteBySource(sourcePath);
    if (!cleared) {
      log.error(`Failed to clear old data for '${sourcePath}'. Aborting.`);
      return failure(
        'DATABASE_ERROR',
        `Failed to clear existing records for ${sourcePath}`
      );
    }

    const chunksResult = await loadChunks(sourcePath);
    if (!chunksResult.success) {
      log.error(`Failed to load '${sourcePath}'`, {
        code: chunksResult.error.code,
        error: chunksResult.error.message,
      });
      return chunksResult;
    }
    const chunks = chunksResult.data;

    const embeddingsResult = await embeddingService.generateEmbeddings(chunks);
    if (!embeddingsResult.success) {
      log.error(`Failed to embed '${sourcePath}'`, {
        error: embeddingsResult.error.message,
      });
      return embeddingsResult;
    }

    const insertResult = await store.insertChunks({
      sourceId: sourcePath,
      strategy: PARAGRAPH_STRATEGY,
      chunks,
      embeddings: embeddingsResult.data,
    });
    if (!insertResult.success) {
      log.error(`Failed to store document in database: ${sourcePath}`, {
        error: insertResult.error.message,
      });
      return insertResult;
    }

    log.info(`Document processing completed successfully for: ${sourcePath}`, {
      chunks: insertResult.data.inserted,
    });
    return success({
      sourceId: sourcePath,
      chunkCount: insertResult.data.inserted,
    });
  }

  return {
    indexDocument,

    async indexFolder(folderPath: string): Promise<Result<FolderIndexSummary>> {
      const filesResult = await listFiles(folderPath);
      if (!filesResult.success) {
        return filesResult;
      }

      const summary: FolderIndexSummary = {
        folder: folderPath,
        indexed: [],
        failed: [],
      };

      log.info(`Indexing ${filesResult.data.length} documents in ${folderPath}`);

      for (const filePath of filesResult.data) {
        const result = await indexDocument(filePath);
        if (result.success) {
          summary.indexed.push(result.data);
        } else {
          summary.failed.push({
            sourceId: filePath,
            code: result.error.code,
            message: result.error.message,
          });
        }
      }

      log.info(`Folder indexing finished for ${folderPath}`, {
        indexed: summary.indexed.length,
        failed: summary.failed.length,
      });
      return success(summary);
    },
  };
}
