/**
 * GET /api/v1/usage
 *
 * Today's budget counters for the caller's origin and globally, plus answer
 * cache statistics. Reading does not consume budget.
 */

import { Hono, type MiddlewareHandler } from 'hono';
import type { BudgetLimiter } from '../../lib/src/admission/index.js';
import type { ChatService } from '../../lib/src/rag/index.js';
import type { GatewayEnv } from '../types.js';

export interface UsageRoutesDeps {
  budget: BudgetLimiter;
  chat: ChatService;
  auth: MiddlewareHandler<GatewayEnv>;
  rateLimit: MiddlewareHandler<GatewayEnv>;
}

export function createUsageRoutes(deps: UsageRoutesDeps): Hono<GatewayEnv> {
  const router = new Hono<GatewayEnv>();

  router.use(deps.auth, deps.rateLimit);

  router.get('/', async (c) => {
    const usage = await deps.budget.getUsageStats(c.get('clientId'));
    return c.json({ usage, cache: deps.chat.getCacheStats() });
  });

  return router;
}
