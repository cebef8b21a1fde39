/**
 * Application configuration
 *
 * Built once from the environment and passed to the components that need it.
 * getConfig() caches the first successful load for the process lifetime.
 */

import { z } from 'zod';

import { failure, success, type Result } from '@/types/index.js';

import { LOG_LEVELS, type LogLevel } from './logger.js';

export const DEFAULT_EMBEDDING_BASE_URL = 'https://openrouter.ai/api/v1';

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} not found in environment` })
    .trim()
    .min(1, `${name} not found in environment`);

const envSchema = z.object({
  EMBEDDING_API_KEY: requiredString('EMBEDDING_API_KEY'),
  EMBEDDING_MODEL: requiredString('EMBEDDING_MODEL'),
  EMBEDDING_BASE_URL: z.string().url().default(DEFAULT_EMBEDDING_BASE_URL),
  SUPABASE_URL: requiredString('SUPABASE_URL').pipe(
    z.string().url('SUPABASE_URL must be a valid URL')
  ),
  SUPABASE_SERVICE_KEY: requiredString('SUPABASE_SERVICE_KEY'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .refine(
      (value): value is LogLevel =>
        (LOG_LEVELS as readonly string[]).includes(value),
      { message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }
    )
    .default('info'),
  SEARCH_TOP_K: z.coerce.number().int().min(1).max(50).default(5),
  ALLOWED_ORIGINS: z.string().optional(),
});

export interface AppConfig {
  embedding: {
    apiKey: string;
    model: string;
    baseURL: string;
  };
  storage: {
    url: string;
    serviceKey: string;
  };
  server: {
    port: number;
    allowedOrigins: string[];
  };
  logLevel: LogLevel;
  searchTopK: number;
}

/**
 * Validate environment variables into an immutable AppConfig
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Result<AppConfig> {
  // Empty strings count as unset so that defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    return failure(
      'CONFIGURATION_ERROR',
      issues.map((issue) => issue.message).join('; '),
      { issues }
    );
  }

  const values = parsed.data;
  const config: AppConfig = {
    embedding: {
      apiKey: values.EMBEDDING_API_KEY,
      model: values.EMBEDDING_MODEL,
      baseURL: values.EMBEDDING_BASE_URL,
    },
    storage: {
      url: values.SUPABASE_URL,
      serviceKey: values.SUPABASE_SERVICE_KEY,
    },
    server: {
      port: values.PORT,
      allowedOrigins: (values.ALLOWED_ORIGINS ?? 'http://localhost:3000')
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    logLevel: values.LOG_LEVEL,
    searchTopK: values.SEARCH_TOP_K,
  };

  return success(Object.freeze(config));
}

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration once; later calls return the cached value.
 * A failed load is not cached, so a later call may succeed.
 */
export function getConfig(
  env: Record<string, string | undefined> = process.env
): Result<AppConfig> {
  if (cachedConfig !== null) {
    return success(cachedConfig);
  }
  const result = loadConfig(env);
  if (result.success) {
    cachedConfig = result.data;
  }
  return result;
}

/**
 * Drop the cached configuration (tests only)
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}
