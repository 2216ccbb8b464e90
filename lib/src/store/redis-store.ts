/**
 * Redis-backed store
 *
 * One ioredis connection shared by the admission counters and the response
 * cache. Commands fail fast instead of queueing while disconnected, so a
 * down Redis surfaces as an error on the call that needed it.
 */

import { Redis, type RedisOptions } from 'ioredis';
import type { Logger } from '../logging/index.js';
import { createSilentLogger } from '../logging/index.js';
import { toError } from '../errors/index.js';
import type { SharedStore } from './types.js';

// INCR and the first-hit EXPIRE run as one script, so a counter never
// survives without its expiry
const INCR_WITH_EXPIRY = `local count = redis.call('INCR', KEYS[1])
if count == 1 then redis.call('EXPIRE', KEYS[1], ARGV[1]) end
return count`;

export interface RedisStoreOptions {
  url: string;
  /** Milliseconds before a connect attempt is abandoned */
  connectTimeoutMs?: number;
  logger?: Logger;
}

export class RedisStore implements SharedStore {
  private readonly client: Redis;
  private readonly logger: Logger;

  constructor(options: RedisStoreOptions) {
    this.logger = options.logger ?? createSilentLogger();

    const redisOptions: RedisOptions = {
      connectTimeout: options.connectTimeoutMs ?? 2000,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      lazyConnect: true,
    };
    this.client = new Redis(options.url, redisOptions);

    this.client.on('error', (error: Error) => {
      this.logger.warn('Redis connection error', error);
    });
  }

  /**
   * Open the connection. Called once at startup.
   */
  async connect(): Promise<void> {
    await this.client.connect();
    this.logger.info('Redis connected');
  }

  async incr(key: string, ttlSeconds: number): Promise<number> {
    const count = await this.client.eval(INCR_WITH_EXPIRY, 1, key, ttlSeconds);
    if (typeof count !== 'number') {
      throw new Error(`Unexpected INCR reply for ${key}`);
    }
    return count;
  }

  async getCount(key: string): Promise<number | undefined> {
    const value = await this.client.get(key);
    return value === null ? undefined : Number.parseInt(value, 10);
  }

  async get(key: string): Promise<string | undefined> {
    const value = await this.client.get(key);
    return value ?? undefined;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn('Redis ping failed', toError(error));
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
