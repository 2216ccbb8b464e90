/**
 * Retry Types
 *
 * Configuration and event types shared by every component that retries
 * calls to an upstream service (vector search, embeddings, generation).
 */

import { z } from 'zod';

// ============================================================================
// Retry Configuration Types
// ============================================================================

/**
 * Configuration options for retry behavior
 */
export const RetryConfigSchema = z.object({
  /** Maximum number of retry attempts (excluding the initial request) */
  maxRetries: z.number().int().nonnegative().default(2),
  /** Initial delay in milliseconds before the first retry */
  initialDelayMs: z.number().int().nonnegative().default(1000),
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: z.number().int().nonnegative().default(4000),
  /** Exponential backoff multiplier (2 means each retry waits twice as long) */
  backoffMultiplier: z.number().positive().default(2),
  /** Whether to add random jitter to retry delays */
  jitter: z.boolean().default(false),
  /** Maximum jitter as a fraction of the delay (0.0 to 1.0) */
  jitterFactor: z.number().min(0).max(1).default(0.25),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Default retry configuration: three attempts in total, waiting 1s then 2s.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = RetryConfigSchema.parse({});

// ============================================================================
// Retry Policy
// ============================================================================

/**
 * Decides which failures are worth another attempt and how long the
 * upstream asked us to wait.
 */
export interface RetryPolicy {
  /** Defaults to retrying every failure */
  isRetryable?: ((error: unknown) => boolean) | undefined;
  /** A provider-supplied wait hint, e.g. from a Retry-After header */
  retryAfterMs?: ((error: unknown) => number | undefined) | undefined;
}

// ============================================================================
// Retry Events
// ============================================================================

export const RetryEventType = {
  ATTEMPT_START: 'attempt_start',
  ATTEMPT_FAILED: 'attempt_failed',
  ATTEMPT_SUCCEEDED: 'attempt_succeeded',
  RETRYING: 'retrying',
  MAX_RETRIES_EXCEEDED: 'max_retries_exceeded',
} as const;

export type RetryEventType = (typeof RetryEventType)[keyof typeof RetryEventType];

/**
 * Event emitted during retry operations for logging/monitoring
 */
export interface RetryEvent {
  type: RetryEventType;
  /** Which attempt number this was (1-based) */
  attemptNumber: number;
  maxRetries: number;
  /** Name and message of the failure, for failed attempts */
  error?: { name: string; message: string } | undefined;
  /** Delay before next retry (only for 'retrying' events) */
  nextDelayMs?: number | undefined;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;
