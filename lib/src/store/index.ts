/**
 * Store Module
 */

export {
  type CounterStore,
  type KeyValueStore,
  type SharedStore,
  StoreDriver,
} from './types.js';
export { MemoryStore } from './memory-store.js';
export { RedisStore, type RedisStoreOptions } from './redis-store.js';
