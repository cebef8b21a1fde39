/**
 * Application Entry Point
 *
 * Loads configuration once, wires the retrieval services and starts the
 * Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { getConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import {
  createDocumentStoreDb,
  createEmbeddingService,
  createIndexingService,
  createOpenAIEmbeddingClient,
  createSearchService,
  extractText,
  listSupportedFiles,
} from './services/index.js';
import { success } from './types/index.js';

const log = createLogger('main');

const configResult = getConfig();
if (!configResult.success) {
  log.error(`Configuration error: ${configResult.error.message}`);
  process.exit(1);
}
const config = configResult.data;
process.env.LOG_LEVEL = config.logLevel;

// Wire database adapter
const supabase = createSupabaseAdmin(config.storage);
const store = createDocumentStoreDb(supabase);

const schemaResult = await store.ensureSchema();
if (!schemaResult.success) {
  log.error(schemaResult.error.message);
  process.exit(1);
}

// Wire services
const embeddingService = createEmbeddingService({
  client: createOpenAIEmbeddingClient({
    apiKey: config.embedding.apiKey,
    baseURL: config.embedding.baseURL,
  }),
  resolveSettings: () => {
    const current = getConfig();
    return current.success
      ? success({ model: current.data.embedding.model })
      : current;
  },
});

const searchService = createSearchService({
  store,
  embeddingService,
  defaultTopK: config.searchTopK,
});

const indexingService = createIndexingService({
  store,
  embeddingService,
  extractText,
  listFiles: listSupportedFiles,
});

const app = createApp({
  services: { indexingService, searchService, store },
  allowedOrigins: config.server.allowedOrigins,
});

const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  log.info(`Server listening on port ${info.port}`);
});

// Each store operation is a self-contained request, so closing the listener
// is all a clean shutdown needs
function shutdown(signal: string): void {
  log.info(`Received ${signal}, shutting down`);
  server.close((error) => {
    if (error !== undefined) {
      log.error('Error while closing server', { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { app };
