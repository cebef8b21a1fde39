/**
 * DocumentStore Database Adapter
 * Implements DocumentStore using Supabase (PostgREST + RPC)
 *
 * Scoring runs inside Postgres through match_document_chunks(), so vectors
 * are never pulled into the process for ranking.
 */

import { readFile } from 'node:fs/promises';

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { createLogger } from '@/lib/logger.js';
import { vectorNorm } from '@/lib/vector.js';
import type {
  InsertChunksParams,
  Result,
  SearchResult,
} from '@/types/index.js';
import { errorMessage, failure, success } from '@/types/index.js';

import { validateInsertParams, type DocumentStore } from './document-store.js';

const log = createLogger('document-store');

export const DOCUMENT_CHUNKS_TABLE = 'document_chunks';

/** PostgREST caps every response at max-rows (1000 by default) */
export const SOURCE_PAGE_SIZE = 1000;

export const SCHEMA_MIGRATION_URL = new URL(
  '../../supabase/migrations/001_document_chunks.sql',
  import.meta.url
);

/**
 * Row returned by match_document_chunks()
 */
const matchRowSchema = z.object({
  chunk_text: z.string(),
  source_id: z.string(),
  split_strategy: z.string(),
  similarity: z.number(),
});

/**
 * Row returned by list_document_sources()
 */
const sourceRowSchema = z.object({
  source_id: z.string(),
});

/**
 * Database row written by insertChunks
 */
interface DocumentChunkInsertRow {
  source_id: string;
  chunk_text: string;
  split_strategy: string;
  embedding: number[];
  embedding_norm: number;
}

/**
 * Split a migration file into statements.
 * Comment lines are dropped; statements end at a semicolon followed by the
 * next DDL keyword or the end of the file.
 */
export function splitSqlStatements(sql: string): string[] {
  return sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(/;\s*(?=CREATE|INSERT|ALTER|DROP|REVOKE|GRANT|$)/i)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

export interface DocumentStoreDbOptions {
  /** Schema SQL; read from the bundled migration when omitted */
  loadSchemaSql?: () => Promise<string>;
  /** Rows requested per list_document_sources() page */
  sourcePageSize?: number;
}

/**
 * Create DocumentStore instance backed by Supabase
 */
export function createDocumentStoreDb(
  supabase: SupabaseClient,
  options: DocumentStoreDbOptions = {}
): DocumentStore {
  const loadSchemaSql =
    options.loadSchemaSql ?? (() => readFile(SCHEMA_MIGRATION_URL, 'utf-8'));
  const sourcePageSize = options.sourcePageSize ?? SOURCE_PAGE_SIZE;

  return {
    async ensureSchema(): Promise<Result<void>> {
      try {
        const statements = splitSqlStatements(await loadSchemaSql());
        for (const statement of statements) {
          const { error } = await supabase.rpc('exec_sql', { sql: statement });
          if (error !== null) {
            log.error('Failed to ensure database schema', {
              error: error.message,
              statement: statement.substring(0, 80),
            });
            return failure(
              'DATABASE_ERROR',
              `Failed to ensure database schema: ${error.message}`
            );
          }
        }
        log.info('Database schema verified', { statements: statements.length });
        return success(undefined);
      } catch (error) {
        const message = errorMessage(error);
        log.error('Failed to ensure database schema', { error: message });
        return failure(
          'DATABASE_ERROR',
          `Failed to ensure database schema: ${message}`
        );
      }
    },

    async insertChunks(
      params: InsertChunksParams
    ): Promise<Result<{ inserted: number }>> {
      const validation = validateInsertParams(params);
      if (!validation.success) {
        log.error(`Data validation failed for '${params.sourceId}'`, {
          error: validation.error.message,
        });
        return validation;
      }

      const rows: DocumentChunkInsertRow[] = params.chunks.map((chunk, i) => {
        const embedding = params.embeddings[i] ?? [];
        return {
          source_id: params.sourceId,
          chunk_text: chunk,
          split_strategy: params.strategy,
          embedding,
          embedding_norm: vectorNorm(embedding),
        };
      });

      log.info(
        `Inserting ${rows.length} chunks for '${params.sourceId}' in a single batch`
      );

      try {
        // One INSERT statement: PostgREST runs it in a single transaction
        const { error } = await supabase.from(DOCUMENT_CHUNKS_TABLE).insert(rows);
        if (error !== null) {
          log.error(`Failed to store chunks for '${params.sourceId}'`, {
            error: error.message,
          });
          return failure(
            'DATABASE_ERROR',
            `Failed to store chunks: ${error.message}`
          );
        }
      } catch (error) {
        const message = errorMessage(error);
        log.error(`Failed to store chunks for '${params.sourceId}'`, {
          error: message,
        });
        return failure('DATABASE_ERROR', `Failed to store chunks: ${message}`);
      }

      log.info(`Stored ${rows.length} chunks for '${params.sourceId}'`);
      return success({ inserted: rows.length });
    },

    async deleteBySource(sourceId: string): Promise<boolean> {
      if (sourceId.trim() === '') {
        log.error('Refusing to delete with an empty source identifier');
        return false;
      }

      try {
        const { error, count } = await supabase
          .from(DOCUMENT_CHUNKS_TABLE)
          .delete({ count: 'exact' })
          .eq('source_id', sourceId);

        if (error !== null) {
          log.error(`Failed to delete data for '${sourceId}'`, {
            error: error.message,
          });
          return false;
        }

        log.info(`Deleted ${count ?? 0} rows for '${sourceId}'`);
        return true;
      } catch (error) {
        log.error(`Failed to delete data for '${sourceId}'`, {
          error: errorMessage(error),
        });
        return false;
      }
    },

    async deleteAll(): Promise<boolean> {
      log.warn('Clearing all data from the document store');

      try {
        // PostgREST refuses an unfiltered DELETE; every id is positive
        const { error, count } = await supabase
          .from(DOCUMENT_CHUNKS_TABLE)
          .delete({ count: 'exact' })
          .gt('id', 0);

        if (error !== null) {
          log.error('Failed to clear document store', { error: error.message });
          return false;
        }

        log.info(`Cleared ${count ?? 0} rows`);
        return true;
      } catch (error) {
        log.error('Failed to clear document store', {
          error: errorMessage(error),
        });
        return false;
      }
    },

    async listSources(): Promise<Result<string[]>> {
      try {
        const sources: string[] = [];

        for (let from = 0; ; from += sourcePageSize) {
          const { data, error } = await supabase
            .rpc('list_document_sources')
            .range(from, from + sourcePageSize - 1);
          if (error !== null) {
            log.error('Failed to list indexed sources', { error: error.message });
            return failure(
              'DATABASE_ERROR',
              `Failed to list indexed sources: ${error.message}`
            );
          }

          const rows = z.array(sourceRowSchema).parse(data ?? []);
          sources.push(...rows.map((row) => row.source_id));
          if (rows.length < sourcePageSize) {
            break;
          }
        }

        log.debug(`Retrieved ${sources.length} indexed sources`);
        return success(sources);
      } catch (error) {
        const message = errorMessage(error);
        log.error('Failed to list indexed sources', { error: message });
        return failure(
          'DATABASE_ERROR',
          `Failed to list indexed sources: ${message}`
        );
      }
    },

    async matchChunks(
      queryEmbedding: number[],
      queryNorm: number,
      topK: number
    ): Promise<Result<SearchResult[]>> {
      try {
        const { data, error } = await supabase.rpc('match_document_chunks', {
          query_embedding: queryEmbedding,
          query_norm: queryNorm,
          match_count: topK,
        });

        if (error !== null) {
          log.error('Similarity query failed', { error: error.message });
          return failure(
            'DATABASE_SEARCH_ERROR',
            `Failed to search database: ${error.message}`
          );
        }

        const rows = z.array(matchRowSchema).parse(data ?? []);
        return success(
          rows.map((row) => ({
            chunkText: row.chunk_text,
            sourceId: row.source_id,
            strategy: row.split_strategy,
            similarity: row.similarity,
          }))
        );
      } catch (error) {
        const message = errorMessage(error);
        log.error('Similarity query failed', { error: message });
        return failure(
          'DATABASE_SEARCH_ERROR',
          `Failed to search database: ${message}`
        );
      }
    },
  };
}
