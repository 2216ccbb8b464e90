/**
 * In-process store with Redis-like expiry semantics. Used for local
 * development and tests; state is not shared between processes.
 */

import type { SharedStore } from './types.js';

interface Entry {
  value: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

export class MemoryStore implements SharedStore {
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async incr(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.live(key);
    const current = entry === undefined ? 0 : Number(entry.value);
    if (!Number.isInteger(current)) {
      throw new Error(`Value at ${key} is not an integer`);
    }
    const next = current + 1;
    const expiresAt = entry === undefined ? this.now() + ttlSeconds * 1000 : entry.expiresAt;
    this.entries.set(key, { value: String(next), expiresAt });
    return next;
  }

  async getCount(key: string): Promise<number | undefined> {
    const entry = this.live(key);
    return entry === undefined ? undefined : Number(entry.value);
  }

  async get(key: string): Promise<string | undefined> {
    return this.live(key)?.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Remaining time to live in seconds, -2 when absent
   */
  ttl(key: string): number {
    const entry = this.live(key);
    if (entry === undefined) return -2;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  get size(): number {
    return this.entries.size;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
