/**
 * Chat Pipeline Module
 *
 * @example
 * ```typescript
 * import { ChatService, ResponseCache } from './rag/index.js';
 * ```
 */

export {
  REFUSAL_MESSAGE,
  NO_RESULTS_CONTEXT,
  ResponseCacheConfigSchema,
  type ResponseCacheConfig,
  CacheEntrySchema,
  type CacheEntry,
  type ResponseCacheStats,
  type ChatReply,
  ChatOutcomeKind,
  type ChatStream,
  type ChatRequestOptions,
  generateRequestId,
} from './types.js';
export { ResponseCache, createResponseCache } from './response-cache.js';
export { CONTEXT_SEPARATOR, formatContext, extractSources, replayFragments } from './context.js';
export {
  ChatService,
  type ChatServiceDeps,
  type ChatServiceConfig,
  createChatService,
} from './chat-service.js';
