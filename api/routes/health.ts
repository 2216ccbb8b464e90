/**
 * Health routes
 *
 * GET /health and /api/v1/health: liveness, no dependencies touched.
 * GET /api/v1/health/ready: pings the shared store and the vector index.
 */

import { Hono } from 'hono';
import { toError } from '../../lib/src/errors/index.js';
import type { Logger } from '../../lib/src/logging/index.js';
import type { GatewayEnv } from '../types.js';

export interface Pingable {
  ping(): Promise<boolean>;
}

export interface HealthRoutesDeps {
  version: string;
  /** Process start, epoch milliseconds */
  startedAt: number;
  store: Pingable;
  index: Pingable;
  logger: Logger;
  now?: () => number;
}

export function createHealthRoutes(deps: HealthRoutesDeps): Hono<GatewayEnv> {
  const router = new Hono<GatewayEnv>();
  const now = deps.now ?? Date.now;

  router.get('/', (c) =>
    c.json({
      status: 'healthy',
      version: deps.version,
      uptime_seconds: Math.round((now() - deps.startedAt) / 100) / 10,
    })
  );

  router.get('/ready', async (c) => {
    const [store, index] = await Promise.all([
      probe('store', deps.store, deps.logger),
      probe('index', deps.index, deps.logger),
    ]);
    const ready = store && index;

    return c.json(
      { status: ready ? 'ready' : 'degraded', checks: { store, index } },
      ready ? 200 : 503
    );
  });

  return router;
}

async function probe(name: string, target: Pingable, logger: Logger): Promise<boolean> {
  try {
    return await target.ping();
  } catch (error) {
    logger.warn('Readiness probe failed', toError(error), { dependency: name });
    return false;
  }
}
