/**
 * Application Wiring Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createApp } from '@/api/app.js';
import type { ApiServices } from '@/api/types.js';
import { failure, success } from '@/types/index.js';

function createServices(): ApiServices {
  return {
    indexingService: {
      indexDocument: vi.fn().mockResolvedValue(
        success({ sourceId: 'docs/a.txt', chunkCount: 1 })
      ),
      indexFolder: vi.fn(),
    },
    searchService: {
      search: vi.fn(),
      searchQuery: vi.fn().mockResolvedValue(success([])),
    },
    store: {
      ensureSchema: vi.fn(),
      insertChunks: vi.fn(),
      deleteBySource: vi.fn().mockResolvedValue(true),
      deleteAll: vi.fn().mockResolvedValue(true),
      listSources: vi.fn().mockResolvedValue(success(['docs/a.txt'])),
      matchChunks: vi.fn(),
    },
  };
}

describe('createApp', () => {
  let services: ApiServices;

  beforeEach(() => {
    services = createServices();
  });

  it('should mount routes under /api/v1', async () => {
    const app = createApp({ services, accessLog: false });

    const res = await app.request('/api/v1/documents');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { sources: ['docs/a.txt'] } });
  });

  it('should echo a caller-supplied request id', async () => {
    const app = createApp({ services, accessLog: false });

    const res = await app.request('/api/v1/documents', {
      headers: { 'X-Request-Id': 'req-abc' },
    });

    expect(res.headers.get('X-Request-Id')).toBe('req-abc');
    expect(await res.json()).toMatchObject({ meta: { requestId: 'req-abc' } });
  });

  it('should generate a request id when none is sent', async () => {
    const app = createApp({ services, accessLog: false });

    const res = await app.request('/api/v1/documents');

    expect(res.headers.get('X-Request-Id')).toMatch(/^[\w-]{21}$/);
  });

  it('should probe storage from the health route', async () => {
    vi.mocked(services.store.listSources).mockResolvedValue(
      failure('DATABASE_ERROR', 'Failed to list indexed sources: timeout')
    );
    const app = createApp({ services, accessLog: false });

    const res = await app.request('/api/v1/health');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ storage: 'unavailable' });
  });

  it('should return 404 for unknown endpoints', async () => {
    const app = createApp({ services, accessLog: false });

    const res = await app.request('/api/v1/unknown', {
      headers: { 'X-Request-Id': 'req-404' },
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
        requestId: 'req-404',
      },
    });
  });

  it('should turn thrown errors into 500 responses', async () => {
    vi.mocked(services.store.listSources).mockRejectedValue(new Error('socket hang up'));
    const app = createApp({ services, accessLog: false });

    const res = await app.request('/api/v1/documents', {
      headers: { 'X-Request-Id': 'req-500' },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId: 'req-500',
      },
    });
  });

  it('should allow configured CORS origins', async () => {
    const app = createApp({
      services,
      accessLog: false,
      allowedOrigins: ['http://app.test'],
    });

    const res = await app.request('/api/v1/health', {
      headers: { Origin: 'http://app.test' },
    });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://app.test');
  });
});
