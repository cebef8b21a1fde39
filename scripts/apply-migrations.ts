/**
 * Apply the document store schema to Supabase
 * Usage: npx tsx scripts/apply-migrations.ts
 *
 * Requires the exec_sql() helper from supabase/migrations/000_exec_sql.sql.
 */

import 'dotenv/config';

import { getConfig } from '../src/lib/config.js';
import { createSupabaseAdmin } from '../src/lib/supabase.js';
import { createDocumentStoreDb } from '../src/services/document-store.db.js';

async function main(): Promise<void> {
  const configResult = getConfig();
  if (!configResult.success) {
    console.error(`Configuration error: ${configResult.error.message}`);
    process.exit(1);
  }

  const store = createDocumentStoreDb(
    createSupabaseAdmin(configResult.data.storage)
  );

  console.log('Applying migration: 001_document_chunks.sql');
  const result = await store.ensureSchema();
  if (!result.success) {
    console.error(`Migration failed: ${result.error.message}`);
    process.exit(1);
  }
  console.log('All migrations applied successfully');
}

main().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exit(1);
});
