/**
 * Rate Limiter
 *
 * Fixed one-minute windows counted in the shared store, so every instance of
 * the gateway sees the same totals. Like the budget limiter it fails closed.
 */

import { z } from 'zod';
import {
  DependencyUnavailableError,
  RateLimitedError,
  toError,
} from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import type { CounterStore } from '../store/index.js';

export const RATE_WINDOW_SECONDS = 60;

export const RateLimiterConfigSchema = z.object({
  keyPrefix: z.string().min(1).default('rate'),
});

export type RateLimiterConfig = z.infer<typeof RateLimiterConfigSchema>;

export interface RateLimitResult {
  count: number;
  limit: number;
  remaining: number;
  /** Seconds until the current window closes */
  resetSeconds: number;
}

export class RateLimiter {
  private readonly store: CounterStore;
  private readonly config: RateLimiterConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    store: CounterStore,
    config?: Partial<RateLimiterConfig>,
    options: { logger?: Logger; now?: () => number } = {}
  ) {
    this.store = store;
    this.config = RateLimiterConfigSchema.parse(config ?? {});
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
  }

  /**
   * Count one request from `clientId` against `bucket`.
   *
   * @throws {RateLimitedError} when the window's limit is exceeded
   * @throws {DependencyUnavailableError} when the counter store fails
   */
  async hit(bucket: string, clientId: string, limit: number): Promise<RateLimitResult> {
    const nowSeconds = Math.floor(this.now() / 1000);
    const window = Math.floor(nowSeconds / RATE_WINDOW_SECONDS);
    const resetSeconds = (window + 1) * RATE_WINDOW_SECONDS - nowSeconds;
    const key = `${this.config.keyPrefix}:${bucket}:${clientId}:${window}`;

    let count: number;
    try {
      count = await this.store.incr(key, RATE_WINDOW_SECONDS);
    } catch (error) {
      this.logger.error('Rate limit counter unavailable, rejecting request', toError(error), {
        bucket,
      });
      throw new DependencyUnavailableError('counter store', error);
    }

    if (count > limit) {
      this.logger.warn('Rate limit exceeded', { bucket, client: clientId, count, limit });
      throw new RateLimitedError(limit, resetSeconds);
    }

    return { count, limit, remaining: limit - count, resetSeconds };
  }
}

export function createRateLimiter(
  store: CounterStore,
  config?: Partial<RateLimiterConfig>,
  options?: { logger?: Logger; now?: () => number }
): RateLimiter {
  return new RateLimiter(store, config, options);
}
