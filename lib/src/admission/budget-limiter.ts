/**
 * Budget Limiter
 *
 * Daily request budgets per origin and across all origins. Each check
 * increments a day-bucketed counter in the shared store; the first increment
 * of a day attaches a 24-hour expiry so yesterday's keys clean themselves up.
 *
 * The limiter fails closed: if the counter store cannot be reached the check
 * raises DependencyUnavailableError and the request is rejected.
 *
 * @example
 * ```typescript
 * const budget = new BudgetLimiter(store, { originDailyLimit: 200 });
 * await budget.checkOriginDaily('203.0.113.7');
 * await budget.checkGlobalDaily();
 * ```
 */

import { z } from 'zod';
import {
  DAILY_RETRY_AFTER_SECONDS,
  DependencyUnavailableError,
  QuotaExceededError,
  toError,
  type QuotaScope,
} from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import type { CounterStore } from '../store/index.js';

// =============================================================================
// Configuration
// =============================================================================

export const BudgetLimiterConfigSchema = z.object({
  /** Requests one origin may make per UTC day */
  originDailyLimit: z.number().int().positive().default(200),
  /** Requests all origins together may make per UTC day */
  globalDailyLimit: z.number().int().positive().default(2000),
  keyPrefix: z.string().min(1).default('budget'),
});

export type BudgetLimiterConfig = z.infer<typeof BudgetLimiterConfigSchema>;

export interface UsageStats {
  /** UTC day the counters belong to, as YYYY-MM-DD */
  day: string;
  globalToday: number;
  globalLimit: number;
  originLimit: number;
  /** Present when the stats were requested for one origin */
  originToday?: number;
}

// =============================================================================
// Budget Limiter
// =============================================================================

export class BudgetLimiter {
  private readonly store: CounterStore;
  private readonly config: BudgetLimiterConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    store: CounterStore,
    config?: Partial<BudgetLimiterConfig>,
    options: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.store = store;
    this.config = BudgetLimiterConfigSchema.parse(config ?? {});
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws {QuotaExceededError} once the origin has spent its daily budget
   * @throws {DependencyUnavailableError} when the counter store fails
   */
  async checkOriginDaily(originId: string): Promise<void> {
    await this.consume('origin', this.keyFor(`ip:${originId}`), this.config.originDailyLimit, {
      origin: originId,
    });
  }

  /**
   * @throws {QuotaExceededError} once all origins together have spent the daily budget
   * @throws {DependencyUnavailableError} when the counter store fails
   */
  async checkGlobalDaily(): Promise<void> {
    await this.consume('global', this.keyFor('global'), this.config.globalDailyLimit, {});
  }

  /**
   * Current counts for today. Reading does not consume budget.
   */
  async getUsageStats(originId?: string): Promise<UsageStats> {
    const day = this.today();
    try {
      const globalToday = (await this.store.getCount(this.keyFor('global'))) ?? 0;
      const stats: UsageStats = {
        day,
        globalToday,
        globalLimit: this.config.globalDailyLimit,
        originLimit: this.config.originDailyLimit,
      };
      if (originId !== undefined) {
        stats.originToday = (await this.store.getCount(this.keyFor(`ip:${originId}`))) ?? 0;
      }
      return stats;
    } catch (error) {
      throw new DependencyUnavailableError('counter store', error);
    }
  }

  /**
   * Counter key for a scope on the current UTC day
   *
   * @example
   * budget.keyFor('global'); // 'budget:global:2024-05-01'
   */
  keyFor(scope: string): string {
    return `${this.config.keyPrefix}:${scope}:${this.today()}`;
  }

  getConfig(): BudgetLimiterConfig {
    return { ...this.config };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async consume(
    scope: QuotaScope,
    key: string,
    limit: number,
    context: Record<string, unknown>
  ): Promise<void> {
    let count: number;
    try {
      count = await this.store.incr(key, DAILY_RETRY_AFTER_SECONDS);
    } catch (error) {
      this.logger.error('Budget counter unavailable, rejecting request', toError(error), {
        scope,
      });
      throw new DependencyUnavailableError('counter store', error);
    }

    if (count > limit) {
      const details = { ...context, scope, count, limit };
      if (scope === 'global') {
        this.logger.error('Global daily budget exceeded', details);
      } else {
        this.logger.warn('Origin daily budget exceeded', details);
      }
      throw new QuotaExceededError(scope, limit);
    }
  }

  private today(): string {
    return this.now().toISOString().slice(0, 10);
  }
}

export function createBudgetLimiter(
  store: CounterStore,
  config?: Partial<BudgetLimiterConfig>,
  options?: { logger?: Logger; now?: () => Date }
): BudgetLimiter {
  return new BudgetLimiter(store, config, options);
}
