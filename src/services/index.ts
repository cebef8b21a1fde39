/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database and the embedding provider.
 * All retrieval logic lives here.
 */

// Chunker
export { chunkByParagraphs, joinParagraphs } from './chunker.service.js';

// EmbeddingService
export type {
  EmbeddingService,
  EmbeddingServiceClient,
  EmbeddingServiceDeps,
  OpenAIEmbeddingClientConfig,
} from './embedding.service.js';
export {
  createEmbeddingService,
  createOpenAIEmbeddingClient,
} from './embedding.service.js';

// DocumentStore
export type { DocumentStore } from './document-store.js';
export { validateInsertParams } from './document-store.js';
export type { DocumentStoreDbOptions } from './document-store.db.js';
export {
  createDocumentStoreDb,
  splitSqlStatements,
  DOCUMENT_CHUNKS_TABLE,
} from './document-store.db.js';

// SearchService
export type { SearchService, SearchServiceDeps } from './search.service.js';
export {
  createSearchService,
  mergeRoundRobin,
  formatResults,
  DEFAULT_TOP_K,
} from './search.service.js';

// IndexingService
export type {
  IndexingService,
  IndexingServiceDeps,
  TextExtractor,
  FileLister,
} from './indexing.service.js';
export { createIndexingService } from './indexing.service.js';

// Document parsing
export {
  extractText,
  listSupportedFiles,
  normalizeParagraphBreaks,
  isSupportedExtension,
  SUPPORTED_EXTENSIONS,
} from './document-parser.service.js';
