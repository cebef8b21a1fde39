/**
 * Document Routes
 * Index, list and delete documents in the store
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { IndexedDocument, FolderIndexSummary, Result } from '@/types/index.js';

import {
  errorResponse,
  invalidBodyResponse,
  successResponse,
} from '../utils/response.js';

/**
 * Services the document routes depend on (minimal for routes)
 */
interface DocumentRoutesDeps {
  indexingService: {
    indexDocument: (sourcePath: string) => Promise<Result<IndexedDocument>>;
    indexFolder: (folderPath: string) => Promise<Result<FolderIndexSummary>>;
  };
  store: {
    listSources: () => Promise<Result<string[]>>;
    deleteBySource: (sourceId: string) => Promise<boolean>;
    deleteAll: () => Promise<boolean>;
  };
}

// Zod Schemas
const pathSchema = z.object({
  path: z
    .string()
    .trim()
    .min(1, 'path is required and must be a non-empty string'),
});

/**
 * Create document routes
 */
export function createDocumentRoutes(deps: DocumentRoutesDeps): Hono {
  const { indexingService, store } = deps;
  const app = new Hono();

  /**
   * Parse and validate a `{ path }` body
   */
  async function readPath(
    body: () => Promise<unknown>
  ): Promise<{ path: string } | { code: 'INVALID_JSON' | 'VALIDATION_ERROR'; message: string }> {
    let rawBody: unknown;
    try {
      rawBody = await body();
    } catch {
      return { code: 'INVALID_JSON', message: 'Invalid JSON body' };
    }

    const validation = pathSchema.safeParse(rawBody);
    if (!validation.success) {
      return {
        code: 'VALIDATION_ERROR',
        message: validation.error.issues[0]?.message ?? 'Validation error',
      };
    }
    return { path: validation.data.path };
  }

  /**
   * GET /documents
   * List indexed source identifiers
   */
  app.get('/documents', async (c) => {
    const result = await store.listSources();
    if (!result.success) {
      return errorResponse(c, result.error);
    }
    return successResponse(c, { sources: result.data });
  });

  /**
   * POST /documents
   * Index (or re-index) one document
   */
  app.post('/documents', async (c) => {
    const parsed = await readPath(() => c.req.json());
    if (!('path' in parsed)) {
      return invalidBodyResponse(c, parsed.code, parsed.message);
    }

    const result = await indexingService.indexDocument(parsed.path);
    if (!result.success) {
      return errorResponse(c, result.error);
    }
    return successResponse(c, result.data, 201);
  });

  /**
   * POST /documents/folder
   * Index every supported file in a folder
   */
  app.post('/documents/folder', async (c) => {
    const parsed = await readPath(() => c.req.json());
    if (!('path' in parsed)) {
      return invalidBodyResponse(c, parsed.code, parsed.message);
    }

    const result = await indexingService.indexFolder(parsed.path);
    if (!result.success) {
      return errorResponse(c, result.error);
    }
    return successResponse(c, result.data);
  });

  /**
   * DELETE /documents?confirm=true
   * Clear the whole store
   */
  app.delete('/documents', async (c) => {
    if (c.req.query('confirm') !== 'true') {
      return invalidBodyResponse(
        c,
        'VALIDATION_ERROR',
        'Clearing all documents requires confirm=true'
      );
    }

    const cleared = await store.deleteAll();
    if (!cleared) {
      return errorResponse(c, {
        code: 'DATABASE_ERROR',
        message: 'Failed to clear the document store',
      });
    }
    return successResponse(c, { deleted: 'all' });
  });

  /**
   * DELETE /documents/:sourceId
   * Remove every chunk of one source (URL-encoded path)
   */
  app.delete('/documents/:sourceId', async (c) => {
    const sourceId = c.req.param('sourceId');

    const deleted = await store.deleteBySource(sourceId);
    if (!deleted) {
      return errorResponse(c, {
        code: 'DATABASE_ERROR',
        message: `Failed to delete records for ${sourceId}`,
      });
    }
    return successResponse(c, { deleted: sourceId });
  });

  return app;
}
