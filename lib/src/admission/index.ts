/**
 * Admission Control Module
 */

export {
  BudgetLimiter,
  BudgetLimiterConfigSchema,
  type BudgetLimiterConfig,
  type UsageStats,
  createBudgetLimiter,
} from './budget-limiter.js';
export {
  RateLimiter,
  RateLimiterConfigSchema,
  type RateLimiterConfig,
  type RateLimitResult,
  RATE_WINDOW_SECONDS,
  createRateLimiter,
} from './rate-limiter.js';
