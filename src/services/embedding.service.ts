/**
 * EmbeddingService Implementation
 *
 * SCOPE: Turn ordered text chunks into ordered embedding vectors
 * Uses an OpenAI-compatible embeddings endpoint (OpenRouter by default)
 *
 * GUARDRAILS:
 * - Input is batched (10 per call) and batches run one after another
 * - Each batch gets 3 attempts with 1s/2s exponential backoff
 * - 100ms pause between successful batches, none after the last
 * - Output preserves exact 1:1 order with the input chunks
 * - The service owns the retry loop; the SDK's own retries are disabled
 */

import OpenAI from 'openai';
import { z } from 'zod';

import { DEFAULT_EMBEDDING_BASE_URL } from '@/lib/config.js';
import { createLogger } from '@/lib/logger.js';
import type {
  BatchEmbeddingResult,
  EmbeddingBatchPolicy,
  EmbeddingSettings,
  Result,
} from '@/types/index.js';
import {
  DEFAULT_BATCH_POLICY,
  errorMessage,
  failure,
  success,
  wrapFailure,
} from '@/types/index.js';

const log = createLogger('embedding');

/**
 * Embedding client interface (abstraction over the remote service)
 */
export interface EmbeddingServiceClient {
  createBatchEmbeddings: (
    texts: string[],
    settings: EmbeddingSettings
  ) => Promise<BatchEmbeddingResult>;
}

/**
 * EmbeddingService interface
 */
export interface EmbeddingService {
  /** Generate one vector per chunk, in input order */
  generateEmbeddings(chunks: string[]): Promise<Result<number[][]>>;
}

export interface EmbeddingServiceDeps {
  client: EmbeddingServiceClient;
  /** Resolves model settings; expected to cache for the process lifetime */
  resolveSettings: () => Result<EmbeddingSettings>;
  policy?: Partial<EmbeddingBatchPolicy>;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create EmbeddingService instance
 */
export function createEmbeddingService(
  deps: EmbeddingServiceDeps
): EmbeddingService {
  const { client, resolveSettings } = deps;
  const policy: EmbeddingBatchPolicy = { ...DEFAULT_BATCH_POLICY, ...deps.policy };
  const sleep = deps.sleep ?? defaultSleep;

  /**
   * Call the remote service for one batch, retrying with exponential backoff
   */
  async function embedBatchWithRetry(
    batch: string[],
    settings: EmbeddingSettings
  ): Promise<Result<number[][]>> {
    let lastError = 'Unknown error';

    for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
      try {
        const result = await client.createBatchEmbeddings(batch, settings);
        if (result.embeddings.length !== batch.length) {
          throw new Error(
            `Expected ${batch.length} embeddings, received ${result.embeddings.length}`
          );
        }
        return success(result.embeddings);
      } catch (error) {
        lastError = errorMessage(error);
        if (attempt === policy.maxAttempts - 1) {
          break;
        }
        const waitMs = policy.backoffBase ** attempt * 1000;
        log.warn(
          `Embedding attempt ${attempt + 1} failed, retrying in ${waitMs / 1000}s`,
          { error: lastError }
        );
        await sleep(waitMs);
      }
    }

    log.error(`All ${policy.maxAttempts} embedding attempts failed`, {
      error: lastError,
    });
    return failure(
      'EMBEDDING_GENERATION_ERROR',
      `Failed after ${policy.maxAttempts} attempts: ${lastError}`,
      { attempts: policy.maxAttempts }
    );
  }

  return {
    async generateEmbeddings(chunks: string[]): Promise<Result<number[][]>> {
      if (chunks.length === 0) {
        log.error('Chunks list is empty');
        return failure(
          'VALIDATION_ERROR',
          'Cannot generate embeddings for empty chunks list'
        );
      }

      const settingsResult = resolveSettings();
      if (!settingsResult.success) {
        log.error('Configuration error', { error: settingsResult.error.message });
        return wrapFailure(
          'EMBEDDING_GENERATION_ERROR',
          'Configuration error',
          settingsResult
        );
      }
      const settings = settingsResult.data;

      const { batchSize } = policy;
      const totalBatches = Math.ceil(chunks.length / batchSize);
      const embeddings: number[][] = [];

      log.info(`Generating embeddings for ${chunks.length} chunks`);

      for (let batchStart = 0; batchStart < chunks.length; batchStart += batchSize) {
        const batchEnd = Math.min(batchStart + batchSize, chunks.length);
        const batchNumber = batchStart / batchSize + 1;

        log.debug(
          `Processing batch ${batchNumber}/${totalBatches} (chunks ${batchStart + 1}-${batchEnd})`
        );

        const batchResult = await embedBatchWithRetry(
          chunks.slice(batchStart, batchEnd),
          settings
        );
        if (!batchResult.success) {
          return failure(
            'EMBEDDING_GENERATION_ERROR',
            `Failed to generate embeddings: ${batchResult.error.message}`,
            { ...batchResult.error.details, batch: batchNumber, totalBatches }
          );
        }
        embeddings.push(...batchResult.data);

        if (batchEnd < chunks.length) {
          await sleep(policy.interBatchDelayMs);
        }
      }

      log.info(`Generated ${embeddings.length} embeddings`);
      return success(embeddings);
    },
  };
}

const embeddingVectorSchema = z.array(z.number().finite()).nonempty();

/**
 * OpenAI-compatible client configuration
 */
export interface OpenAIEmbeddingClientConfig {
  apiKey: string;
  /** Base URL override (default: OpenRouter) */
  baseURL?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Create an embedding client over the OpenAI SDK
 */
export function createOpenAIEmbeddingClient(
  config: OpenAIEmbeddingClientConfig
): EmbeddingServiceClient {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? DEFAULT_EMBEDDING_BASE_URL,
    timeout: config.timeout ?? 60000,
    maxRetries: 0,
  });

  return {
    async createBatchEmbeddings(
      texts: string[],
      settings: EmbeddingSettings
    ): Promise<BatchEmbeddingResult> {
      // Without an explicit format the SDK asks for base64 and decodes it itself
      const response = await openai.embeddings.create({
        model: settings.model,
        input: texts,
        encoding_format: 'float',
      });

      // Providers are not required to return items in request order
      const ordered = [...response.data].sort((a, b) => a.index - b.index);

      const embeddings = ordered.map((item, position) => {
        const parsed = embeddingVectorSchema.safeParse(item.embedding);
        if (!parsed.success) {
          throw new Error(
            `Invalid embedding at position ${position}: expected a non-empty array of finite numbers`
          );
        }
        return parsed.data;
      });

      return {
        embeddings,
        model: response.model,
        totalTokens: response.usage.total_tokens,
      };
    },
  };
}
