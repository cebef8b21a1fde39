/**
 * Supabase Client Configuration
 * Provides the service-role client used by the document store
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/**
 * Create a Supabase client that bypasses RLS.
 * Every call is its own HTTP request, so no connection outlives an operation.
 */
export function createSupabaseAdmin(
  storage: AppConfig['storage']
): SupabaseClient {
  return createClient(storage.url, storage.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
