/**
 * Chat Pipeline Types
 *
 * Shapes shared by the answer cache, the context formatter and the chat
 * orchestrator.
 */

import { z } from 'zod';

// =============================================================================
// Fixed Replies
// =============================================================================

/** Returned in place of an answer when a query looks like prompt injection */
export const REFUSAL_MESSAGE = 'Bu sorguyu işleyemiyorum. Lütfen farklı bir soru sorun.';

/** Context block handed to the model when retrieval finds nothing */
export const NO_RESULTS_CONTEXT = 'Veritabanında ilgili bilgi bulunamadı.';

// =============================================================================
// Cache Types
// =============================================================================

export const ResponseCacheConfigSchema = z.object({
  /** Lifetime of a cached answer */
  ttlSeconds: z.number().int().positive().default(300),
  keyPrefix: z.string().min(1).default('chat:cache:'),
});

export type ResponseCacheConfig = z.infer<typeof ResponseCacheConfigSchema>;

/**
 * Stored JSON value. Only answers that completed without error are written.
 */
export const CacheEntrySchema = z.object({
  answer: z.string(),
  sources: z.array(z.string()),
  writtenAt: z.number().int().nonnegative(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface ResponseCacheStats {
  hits: number;
  misses: number;
  writes: number;
  /** Store failures absorbed as misses or skipped writes */
  errors: number;
  hitRate: number;
  ttlSeconds: number;
}

// =============================================================================
// Chat Types
// =============================================================================

export interface ChatReply {
  response: string;
  sources: string[];
  cached: boolean;
}

export const ChatOutcomeKind = {
  REFUSED: 'refused',
  STREAM: 'stream',
} as const;

export type ChatOutcomeKind = (typeof ChatOutcomeKind)[keyof typeof ChatOutcomeKind];

/**
 * Result of opening a streamed answer. Injection is reported as a value so
 * the caller can send the refusal without treating it as a failure.
 */
export type ChatStream =
  | { kind: typeof ChatOutcomeKind.REFUSED; reply: ChatReply }
  | {
      kind: typeof ChatOutcomeKind.STREAM;
      cached: boolean;
      fragments: AsyncGenerator<string, void, unknown>;
    };

export interface ChatRequestOptions {
  /** Cancels retrieval and generation; a cancelled answer is never cached */
  signal?: AbortSignal | undefined;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Generate a unique request ID for tracing
 */
export function generateRequestId(): string {
  return `req-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}
