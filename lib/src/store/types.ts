/**
 * Store Types
 *
 * The two narrow interfaces the gateway needs from shared storage. All
 * mutation goes through single-key atomic operations, so no in-process
 * locking is required.
 */

/**
 * Atomic counters for admission control
 */
export interface CounterStore {
  /**
   * Increment and return the new value (1 for a missing key). A counter
   * created by this call expires after `ttlSeconds`, set in the same atomic
   * step; an existing counter keeps its expiry.
   */
  incr(key: string, ttlSeconds: number): Promise<number>;
  /** Current counter value, or undefined when absent */
  getCount(key: string): Promise<number | undefined>;
}

/**
 * String key/value storage with expiry, used by the response cache
 */
export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

/**
 * A store that implements both interfaces and owns a connection
 */
export interface SharedStore extends CounterStore, KeyValueStore {
  /** Round-trip check used by the readiness probe */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export const StoreDriver = {
  REDIS: 'redis',
  MEMORY: 'memory',
} as const;

export type StoreDriver = (typeof StoreDriver)[keyof typeof StoreDriver];
