/**
 * Retry Module
 */

export {
  RetryConfigSchema,
  DEFAULT_RETRY_CONFIG,
  RetryEventType,
  type RetryConfig,
  type RetryPolicy,
  type RetryEvent,
  type RetryEventHandler,
} from './types.js';

export {
  calculateRetryDelay,
  createRetryEvent,
  sleep,
  mergeRetryConfig,
  RetryAbortedError,
  withRetry,
  withRetryGenerator,
  type WithRetryOptions,
} from './retry.js';
