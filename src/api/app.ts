/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { createLogger } from '@/lib/logger.js';

import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createDocumentRoutes } from './routes/documents.js';
import { createHealthRoutes } from './routes/health.js';
import { createSearchRoutes } from './routes/search.js';
import type { ApiServices } from './types.js';
import { getRequestId } from './utils/response.js';

const log = createLogger('api');

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  allowedOrigins?: string[];
  /** Hono access log; off in tests */
  accessLog?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, allowedOrigins, accessLog = true } = config;
  const app = new Hono();

  // Global middleware
  if (accessLog) {
    app.use('*', logger((message) => log.info(message)));
  }
  app.use('*', createRequestIdMiddleware());
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
    })
  );

  app.route(
    '/api/v1',
    createHealthRoutes({
      checkStorage: async () => (await services.store.listSources()).success,
    })
  );
  app.route(
    '/api/v1',
    createDocumentRoutes({
      indexingService: services.indexingService,
      store: services.store,
    })
  );
  app.route(
    '/api/v1',
    createSearchRoutes({
      searchService: services.searchService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: getRequestId(c),
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    log.error('Unhandled error', { error: err.message });

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: getRequestId(c),
        },
      },
      500
    );
  });

  return app;
}
