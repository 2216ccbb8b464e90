/**
 * Admission middleware: per-minute rate limits and daily budgets
 */

import { createMiddleware } from 'hono/factory';
import type { BudgetLimiter, RateLimiter } from '../../lib/src/admission/index.js';
import type { GatewayEnv } from '../types.js';

export function rateLimit(limiter: RateLimiter, options: { bucket: string; limit: number }) {
  return createMiddleware<GatewayEnv>(async (c, next) => {
    const result = await limiter.hit(options.bucket, c.get('clientId'), options.limit);
    c.header('X-RateLimit-Limit', String(result.limit));
    c.header('X-RateLimit-Remaining', String(result.remaining));
    await next();
  });
}

/**
 * Origin budget first, then the global one. A request rejected by the
 * origin check does not count against the global budget.
 */
export function dailyBudget(budget: BudgetLimiter) {
  return createMiddleware<GatewayEnv>(async (c, next) => {
    await budget.checkOriginDaily(c.get('clientId'));
    await budget.checkGlobalDaily();
    await next();
  });
}
