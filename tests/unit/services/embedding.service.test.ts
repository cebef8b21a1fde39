/**
 * EmbeddingService Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  createEmbeddingService,
  type EmbeddingService,
  type EmbeddingServiceClient,
} from '@/services/embedding.service.js';
import type { EmbeddingSettings, Result } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

// ─────────────────────────────────────────────────────────────
// MOCK FACTORIES
// ─────────────────────────────────────────────────────────────

const SETTINGS: EmbeddingSettings = { model: 'test-embedding-model' };

/**
 * Client that embeds `chunk-<n>` as the one-dimensional vector [n]
 */
function createIndexEchoClient(): EmbeddingServiceClient {
  return {
    createBatchEmbeddings: vi.fn(async (texts: string[]) => ({
      embeddings: texts.map((text) => [Number(text.replace('chunk-', ''))]),
      model: SETTINGS.model,
      totalTokens: texts.length,
    })),
  };
}

function makeChunks(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `chunk-${i}`);
}

function createService(
  client: EmbeddingServiceClient,
  resolveSettings: () => Result<EmbeddingSettings> = () => success(SETTINGS)
): { service: EmbeddingService; sleep: ReturnType<typeof vi.fn> } {
  const sleep = vi.fn().mockResolvedValue(undefined);
  const service = createEmbeddingService({ client, resolveSettings, sleep });
  return { service, sleep };
}

// ─────────────────────────────────────────────────────────────
// TEST SUITES
// ─────────────────────────────────────────────────────────────

describe('EmbeddingService', () => {
  let client: EmbeddingServiceClient;

  beforeEach(() => {
    client = createIndexEchoClient();
  });

  describe('generateEmbeddings', () => {
    it.each([1, 10, 11, 25])(
      'should preserve length and order for %i chunks',
      async (count) => {
        const { service } = createService(client);
        const chunks = makeChunks(count);

        const result = await service.generateEmbeddings(chunks);

        expect(result).toEqual({
          success: true,
          data: chunks.map((_, i) => [i]),
        });
      }
    );

    it.each([
      [1, 1],
      [10, 1],
      [11, 2],
      [25, 3],
    ])('should send %i chunks in %i sequential batches', async (count, batches) => {
      const { service } = createService(client);

      await service.generateEmbeddings(makeChunks(count));

      expect(client.createBatchEmbeddings).toHaveBeenCalledTimes(batches);
    });

    it('should batch at most 10 texts per call', async () => {
      const { service } = createService(client);

      await service.generateEmbeddings(makeChunks(25));

      const calls = vi.mocked(client.createBatchEmbeddings).mock.calls;
      expect(calls.map(([texts]) => texts.length)).toEqual([10, 10, 5]);
      expect(calls[2]?.[0]).toEqual(makeChunks(25).slice(20));
      expect(calls[0]?.[1]).toEqual(SETTINGS);
    });

    it('should pause 100ms between batches but not after the last', async () => {
      const { service, sleep } = createService(client);

      await service.generateEmbeddings(makeChunks(25));

      expect(sleep.mock.calls).toEqual([[100], [100]]);
    });

    it('should not pause for a single batch', async () => {
      const { service, sleep } = createService(client);

      await service.generateEmbeddings(makeChunks(10));

      expect(sleep).not.toHaveBeenCalled();
    });

    it('should fail for an empty chunk list', async () => {
      const { service } = createService(client);

      const result = await service.generateEmbeddings([]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('VALIDATION_ERROR');
        expect(result.error.message).toContain('empty');
      }
      expect(client.createBatchEmbeddings).not.toHaveBeenCalled();
    });

    it('should surface configuration errors as embedding errors', async () => {
      const { service } = createService(client, () =>
        failure('CONFIGURATION_ERROR', 'EMBEDDING_MODEL not found in environment')
      );

      const result = await service.generateEmbeddings(['hello']);

      expect(result).toEqual({
        success: false,
        error: {
          code: 'EMBEDDING_GENERATION_ERROR',
          message: 'Configuration error: EMBEDDING_MODEL not found in environment',
          details: { cause: 'CONFIGURATION_ERROR' },
        },
      });
      expect(client.createBatchEmbeddings).not.toHaveBeenCalled();
    });
  });

  describe('retry and backoff', () => {
    it('should retry a failed batch after 1s then 2s', async () => {
      vi.mocked(client.createBatchEmbeddings)
        .mockRejectedValueOnce(new Error('rate limited'))
        .mockRejectedValueOnce(new Error('rate limited'));
      const { service, sleep } = createService(client);

      const result = await service.generateEmbeddings(makeChunks(2));

      expect(result).toEqual({ success: true, data: [[0], [1]] });
      expect(client.createBatchEmbeddings).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('should give up after 3 attempts with the last error', async () => {
      vi.mocked(client.createBatchEmbeddings)
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'))
        .mockRejectedValueOnce(new Error('third'));
      const { service, sleep } = createService(client);

      const result = await service.generateEmbeddings(makeChunks(3));

      expect(result).toEqual({
        success: false,
        error: {
          code: 'EMBEDDING_GENERATION_ERROR',
          message: 'Failed to generate embeddings: Failed after 3 attempts: third',
          details: { attempts: 3, batch: 1, totalBatches: 1 },
        },
      });
      expect(client.createBatchEmbeddings).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('should stop at the first batch that exhausts its attempts', async () => {
      vi.mocked(client.createBatchEmbeddings)
        .mockImplementationOnce(async (texts: string[]) => ({
          embeddings: texts.map(() => [1]),
          model: SETTINGS.model,
          totalTokens: 1,
        }))
        .mockRejectedValue(new Error('service unavailable'));
      const { service, sleep } = createService(client);

      const result = await service.generateEmbeddings(makeChunks(25));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.details).toEqual({
          attempts: 3,
          batch: 2,
          totalBatches: 3,
        });
      }
      expect(client.createBatchEmbeddings).toHaveBeenCalledTimes(4);
      expect(sleep.mock.calls).toEqual([[100], [1000], [2000]]);
    });

    it('should treat a short response as a failed attempt', async () => {
      vi.mocked(client.createBatchEmbeddings).mockResolvedValue({
        embeddings: [[1]],
        model: SETTINGS.model,
        totalTokens: 1,
      });
      const { service } = createService(client);

      const result = await service.generateEmbeddings(['a', 'b']);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          'Failed to generate embeddings: Failed after 3 attempts: Expected 2 embeddings, received 1'
        );
      }
      expect(client.createBatchEmbeddings).toHaveBeenCalledTimes(3);
    });

    it('should honour a custom batch policy', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined);
      const service = createEmbeddingService({
        client,
        resolveSettings: () => success(SETTINGS),
        sleep,
        policy: { batchSize: 2, interBatchDelayMs: 5 },
      });

      const result = await service.generateEmbeddings(makeChunks(5));

      expect(result).toEqual({ success: true, data: [[0], [1], [2], [3], [4]] });
      expect(client.createBatchEmbeddings).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[5], [5]]);
    });
  });
});
