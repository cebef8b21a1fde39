/**
 * Health Route
 * Liveness plus a cheap storage probe
 */

import { Hono } from 'hono';

/**
 * Health route dependencies
 */
interface HealthRoutesDeps {
  /** Optional storage probe; omitted means storage is not checked */
  checkStorage?: () => Promise<boolean>;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps = {}): Hono {
  const app = new Hono();

  /**
   * GET /health
   * 200 when healthy, 503 when the storage probe fails
   */
  app.get('/health', async (c) => {
    const storage =
      deps.checkStorage === undefined
        ? 'unchecked'
        : (await deps.checkStorage())
          ? 'ok'
          : 'unavailable';

    return c.json(
      {
        status: storage === 'unavailable' ? 'degraded' : 'ok',
        storage,
        timestamp: new Date().toISOString(),
        version: 'v1',
      },
      storage === 'unavailable' ? 503 : 200
    );
  });

  return app;
}
