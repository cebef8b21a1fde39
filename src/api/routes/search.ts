/**
 * Search Routes
 * Semantic search over indexed chunks
 */

import { Hono } from 'hono';
import { z } from 'zod';

import { formatResults } from '@/services/search.service.js';
import type { Result, SearchResult } from '@/types/index.js';

import {
  errorResponse,
  invalidBodyResponse,
  successResponse,
} from '../utils/response.js';

const MAX_TOP_K = 50;

/**
 * Search service interface (minimal for routes)
 */
interface SearchRoutesDeps {
  searchService: {
    searchQuery: (query: string, topK?: number) => Promise<Result<SearchResult[]>>;
  };
}

// Zod Schemas
const searchSchema = z.object({
  query: z
    .string()
    .refine((value) => value.trim().length > 0, {
      message: 'query is required and must be a non-empty string',
    }),
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
});

/**
 * Create search routes
 */
export function createSearchRoutes(deps: SearchRoutesDeps): Hono {
  const { searchService } = deps;
  const app = new Hono();

  /**
   * POST /search
   * Body: { query, topK? }; `?format=text` returns a plain-text listing
   */
  app.post('/search', async (c) => {
    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      return invalidBodyResponse(c, 'INVALID_JSON', 'Invalid JSON body');
    }

    const validation = searchSchema.safeParse(rawBody);
    if (!validation.success) {
      return invalidBodyResponse(
        c,
        'VALIDATION_ERROR',
        validation.error.issues[0]?.message ?? 'Validation error'
      );
    }

    const { query, topK } = validation.data;
    const result = await searchService.searchQuery(query, topK);
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    if (c.req.query('format') === 'text') {
      return c.text(formatResults(result.data));
    }

    return successResponse(c, { results: result.data });
  });

  return app;
}
