/**
 * Vitest Global Setup
 * This file runs before all tests
 */

import { config } from 'dotenv';
import { afterEach } from 'vitest';

import { resetConfigCache } from '@/lib/config.js';

// Load test environment variables (optional - won't fail if not present)
config({ path: '.env.test' });

afterEach(() => {
  // getConfig() caches per process; every test starts from a clean slate
  resetConfigCache();
});
