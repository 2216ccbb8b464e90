/**
 * LLM Adapter Types
 *
 * Provider-neutral message, option and response shapes used by the
 * generation client. Provider adapters translate these to their SDKs.
 */

import { z } from 'zod';

// ============================================================================
// LLM Provider Types
// ============================================================================

export const LLMProvider = {
  ANTHROPIC: 'anthropic',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

// ============================================================================
// Message Types
// ============================================================================

export const LLMMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1),
});

export type LLMMessage = z.infer<typeof LLMMessageSchema>;

// ============================================================================
// Configuration Types
// ============================================================================

export const LLMConfigSchema = z.object({
  provider: z.enum(['anthropic']),
  /** Model identifier, e.g. 'claude-3-5-haiku-latest' */
  model: z.string().min(1),
  /** Maximum tokens in the response */
  maxTokens: z.number().int().positive().max(100000),
  /** Sampling temperature (0-1) */
  temperature: z.number().min(0).max(1),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

export const DEFAULT_LLM_CONFIG: Pick<LLMConfig, 'maxTokens' | 'temperature'> = {
  maxTokens: 500,
  temperature: 0.3,
};

// ============================================================================
// Response Types
// ============================================================================

export const LLMTokenUsageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
});

export type LLMTokenUsage = z.infer<typeof LLMTokenUsageSchema>;

export const LLMResponseSchema = z.object({
  content: z.string(),
  usage: LLMTokenUsageSchema,
  model: z.string().min(1),
});

export type LLMResponse = z.infer<typeof LLMResponseSchema>;

/**
 * A chunk of streamed response content. The last chunk has `done: true`,
 * empty content and the final usage.
 */
export const LLMStreamChunkSchema = z.object({
  content: z.string(),
  done: z.boolean(),
  usage: LLMTokenUsageSchema.optional(),
});

export type LLMStreamChunk = z.infer<typeof LLMStreamChunkSchema>;

// ============================================================================
// Request Types
// ============================================================================

export const LLMCompletionOptionsSchema = z.object({
  temperature: z.number().min(0).max(1).optional(),
  maxTokens: z.number().int().positive().max(100000).optional(),
  stopSequences: z.array(z.string()).optional(),
});

export type LLMCompletionOptions = z.infer<typeof LLMCompletionOptionsSchema> & {
  /** Aborts the provider request, including an open stream */
  signal?: AbortSignal | undefined;
};

// ============================================================================
// Error Types
// ============================================================================

export const LLMErrorCode = {
  RATE_LIMIT: 'rate_limit',
  AUTH_ERROR: 'auth_error',
  INVALID_REQUEST: 'invalid_request',
  MODEL_NOT_FOUND: 'model_not_found',
  TIMEOUT: 'timeout',
  SERVER_ERROR: 'server_error',
  NETWORK_ERROR: 'network_error',
  /** The caller aborted the request */
  ABORTED: 'aborted',
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export interface LLMErrorInfo {
  code: LLMErrorCode;
  message: string;
  provider: LLMProvider;
  retryable: boolean;
  /** Suggested retry delay in milliseconds */
  retryAfterMs?: number | undefined;
  originalError?: unknown;
}

// ============================================================================
// Provider-Specific Configuration Types
// ============================================================================

export const AnthropicConfigSchema = LLMConfigSchema.extend({
  provider: z.literal('anthropic'),
  apiKey: z.string().min(1),
  /** Base URL for API requests (for proxies) */
  baseUrl: z.string().url().optional(),
  /** Per-request timeout in milliseconds */
  timeoutMs: z.number().int().positive().optional(),
});

export type AnthropicConfig = z.infer<typeof AnthropicConfigSchema>;
