/**
 * LLM Module
 */

export {
  LLMProvider,
  LLMMessageSchema,
  type LLMMessage,
  LLMConfigSchema,
  type LLMConfig,
  DEFAULT_LLM_CONFIG,
  LLMTokenUsageSchema,
  type LLMTokenUsage,
  LLMResponseSchema,
  type LLMResponse,
  LLMStreamChunkSchema,
  type LLMStreamChunk,
  LLMCompletionOptionsSchema,
  type LLMCompletionOptions,
  LLMErrorCode,
  type LLMErrorInfo,
  AnthropicConfigSchema,
  type AnthropicConfig,
} from './types.js';

export {
  LLMError,
  RateLimitError,
  AuthenticationError,
  InvalidRequestError,
  ModelNotFoundError,
  TimeoutError,
  ServerError,
  NetworkError,
  AbortedError,
  isLLMError,
  isRetryableError,
  getRetryAfterMs,
} from './errors.js';

export { LLMAdapter } from './adapter.js';
export { AnthropicAdapter, type AnthropicAdapterConfig } from './adapters/anthropic.js';
