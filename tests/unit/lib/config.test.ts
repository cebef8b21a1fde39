/**
 * Configuration Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { getConfig, loadConfig, resetConfigCache } from '@/lib/config.js';

const baseEnv = {
  EMBEDDING_API_KEY: 'test-secret',
  EMBEDDING_MODEL: 'test-embedding-model',
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_KEY: 'test-service-key',
};

describe('loadConfig', () => {
  it('should apply defaults for optional variables', () => {
    const result = loadConfig(baseEnv);

    expect(result).toEqual({
      success: true,
      data: {
        embedding: {
          apiKey: 'test-secret',
          model: 'test-embedding-model',
          baseURL: 'https://openrouter.ai/api/v1',
        },
        storage: {
          url: 'http://localhost:54321',
          serviceKey: 'test-service-key',
        },
        server: { port: 3000, allowedOrigins: ['http://localhost:3000'] },
        logLevel: 'info',
        searchTopK: 5,
      },
    });
  });

  it('should read overrides', () => {
    const result = loadConfig({
      ...baseEnv,
      EMBEDDING_BASE_URL: 'http://localhost:8080/v1',
      PORT: '8081',
      LOG_LEVEL: 'DEBUG',
      SEARCH_TOP_K: '12',
      ALLOWED_ORIGINS: 'http://a.test, http://b.test,',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.embedding.baseURL).toBe('http://localhost:8080/v1');
      expect(result.data.server).toEqual({
        port: 8081,
        allowedOrigins: ['http://a.test', 'http://b.test'],
      });
      expect(result.data.logLevel).toBe('debug');
      expect(result.data.searchTopK).toBe(12);
    }
  });

  it('should treat empty strings as unset', () => {
    const result = loadConfig({ ...baseEnv, PORT: '', SEARCH_TOP_K: '' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(3000);
      expect(result.data.searchTopK).toBe(5);
    }
  });

  it('should report a missing required variable by name', () => {
    const { EMBEDDING_MODEL: _omitted, ...env } = baseEnv;

    const result = loadConfig(env);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('CONFIGURATION_ERROR');
      expect(result.error.message).toBe('EMBEDDING_MODEL not found in environment');
    }
  });

  it('should report every invalid variable', () => {
    const result = loadConfig({
      ...baseEnv,
      EMBEDDING_API_KEY: '   ',
      SEARCH_TOP_K: '99',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.details?.issues).toHaveLength(2);
      expect(result.error.message).toContain('EMBEDDING_API_KEY not found in environment');
    }
  });

  it('should reject an unknown log level', () => {
    const result = loadConfig({ ...baseEnv, LOG_LEVEL: 'verbose' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        'LOG_LEVEL must be one of debug, info, warn, error, silent'
      );
    }
  });
});

describe('getConfig', () => {
  it('should cache the first successful load', () => {
    const first = getConfig(baseEnv);
    const second = getConfig({ ...baseEnv, EMBEDDING_MODEL: 'other-model' });

    expect(second.success && second.data.embedding.model).toBe('test-embedding-model');
    expect(first.success && second.success && first.data === second.data).toBe(true);
  });

  it('should not cache failures', () => {
    expect(getConfig({}).success).toBe(false);
    expect(getConfig(baseEnv).success).toBe(true);
  });

  it('should reload after the cache is reset', () => {
    getConfig(baseEnv);
    resetConfigCache();

    const result = getConfig({ ...baseEnv, EMBEDDING_MODEL: 'other-model' });

    expect(result.success && result.data.embedding.model).toBe('other-model');
  });
});
