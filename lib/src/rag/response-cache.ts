/**
 * Response Cache
 *
 * Answers keyed by the identity of the normalized query and stored as JSON in
 * the shared key-value store with a fixed TTL. The cache never fails a
 * request: a store error is logged and read as a miss, or the write is
 * skipped.
 *
 * @example
 * ```typescript
 * const cache = new ResponseCache(store, { ttlSeconds: 300 });
 *
 * const hit = await cache.get(query);
 * if (hit) {
 *   return hit;
 * }
 *
 * await cache.set(query, { answer, sources, writtenAt: Date.now() });
 * ```
 */

import { createHash } from 'node:crypto';
import { toError } from '../errors/index.js';
import { queryIdentity } from '../guard/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import type { KeyValueStore } from '../store/index.js';
import {
  CacheEntrySchema,
  ResponseCacheConfigSchema,
  type CacheEntry,
  type ResponseCacheConfig,
  type ResponseCacheStats,
} from './types.js';

export class ResponseCache {
  private readonly store: KeyValueStore;
  private readonly config: ResponseCacheConfig;
  private readonly logger: Logger;
  private stats = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(store: KeyValueStore, config?: Partial<ResponseCacheConfig>, logger?: Logger) {
    this.store = store;
    this.config = ResponseCacheConfigSchema.parse(config ?? {});
    this.logger = logger ?? createSilentLogger();
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Cache key for a query. Queries that differ only in surrounding or
   * repeated whitespace or letter case share a key.
   */
  keyFor(query: string): string {
    const digest = createHash('sha256').update(queryIdentity(query), 'utf8').digest('hex');
    return `${this.config.keyPrefix}${digest}`;
  }

  async get(query: string): Promise<CacheEntry | undefined> {
    const key = this.keyFor(query);

    let raw: string | undefined;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.stats.errors++;
      this.stats.misses++;
      this.logger.warn('Cache read failed, continuing without cache', toError(error), { key });
      return undefined;
    }

    if (raw === undefined) {
      this.stats.misses++;
      return undefined;
    }

    const entry = this.decode(raw);
    if (!entry) {
      this.stats.misses++;
      this.logger.warn('Ignoring malformed cache entry', { key });
      return undefined;
    }

    this.stats.hits++;
    return entry;
  }

  /**
   * Store an answer. Writing the same entry again only refreshes its TTL.
   */
  async set(query: string, entry: CacheEntry): Promise<void> {
    const key = this.keyFor(query);

    try {
      await this.store.set(key, JSON.stringify(entry), this.config.ttlSeconds);
      this.stats.writes++;
    } catch (error) {
      this.stats.errors++;
      this.logger.warn('Cache write failed, answer not cached', toError(error), { key });
    }
  }

  getStats(): ResponseCacheStats {
    const lookups = this.stats.hits + this.stats.misses;
    return {
      ...this.stats,
      hitRate: lookups > 0 ? this.stats.hits / lookups : 0,
      ttlSeconds: this.config.ttlSeconds,
    };
  }

  getConfig(): ResponseCacheConfig {
    return { ...this.config };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private decode(raw: string): CacheEntry | undefined {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      return undefined;
    }
    const parsed = CacheEntrySchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  }
}

export function createResponseCache(
  store: KeyValueStore,
  config?: Partial<ResponseCacheConfig>,
  logger?: Logger
): ResponseCache {
  return new ResponseCache(store, config, logger);
}
