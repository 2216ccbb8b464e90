/**
 * Chat Service
 *
 * Orchestrates one question: size check, injection check, cache lookup,
 * retrieval, context assembly, generation and a single cache write.
 * Admission (API key, rate limits, daily budgets) happens before a request
 * reaches this service.
 *
 * @example
 * ```typescript
 * const chat = new ChatService({ guard, retriever, generator, cache });
 *
 * const reply = await chat.answer('Pepsi ürünleri nelerdir?');
 * console.log(reply.response, reply.sources, reply.cached);
 *
 * const opened = await chat.openStream('Pepsi ürünleri nelerdir?');
 * if (opened.kind === 'stream') {
 *   for await (const fragment of opened.fragments) {
 *     process.stdout.write(fragment);
 *   }
 * }
 * ```
 */

import type { GenerationClient } from '../generation/index.js';
import { normalizeQuery, type InputGuard } from '../guard/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import type { RetrievalClient } from '../retrieval/index.js';
import { extractSources, formatContext, replayFragments } from './context.js';
import type { ResponseCache } from './response-cache.js';
import {
  ChatOutcomeKind,
  REFUSAL_MESSAGE,
  type ChatReply,
  type ChatRequestOptions,
  type ChatStream,
  type ResponseCacheStats,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ChatServiceDeps {
  guard: InputGuard;
  retriever: Pick<RetrievalClient, 'search'>;
  generator: Pick<GenerationClient, 'generate' | 'generateStream'>;
  cache: ResponseCache;
  logger?: Logger;
}

export interface ChatServiceConfig {
  /** Passages retrieved per question */
  topK: number;
}

const DEFAULT_CHAT_SERVICE_CONFIG: ChatServiceConfig = { topK: 3 };

/** Outcome of the checks that run before any external call */
type Screening =
  | { kind: 'refused'; reply: ChatReply }
  | { kind: 'accepted'; query: string };

// =============================================================================
// Chat Service
// =============================================================================

export class ChatService {
  private readonly guard: InputGuard;
  private readonly retriever: Pick<RetrievalClient, 'search'>;
  private readonly generator: Pick<GenerationClient, 'generate' | 'generateStream'>;
  private readonly cache: ResponseCache;
  private readonly config: ChatServiceConfig;
  private readonly logger: Logger;

  constructor(deps: ChatServiceDeps, config?: Partial<ChatServiceConfig>) {
    this.guard = deps.guard;
    this.retriever = deps.retriever;
    this.generator = deps.generator;
    this.cache = deps.cache;
    this.config = { ...DEFAULT_CHAT_SERVICE_CONFIG, ...config };
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * Answer in one piece.
   *
   * @throws {QueryTooLargeError} before any external call
   * @throws {RetrievalError | GenerationError} when a dependency fails; nothing is cached
   */
  async answer(rawQuery: string, options: ChatRequestOptions = {}): Promise<ChatReply> {
    const screening = this.screen(rawQuery);
    if (screening.kind === 'refused') {
      return screening.reply;
    }
    const { query } = screening;

    const hit = await this.cache.get(query);
    if (hit) {
      this.logger.info('Answer served from cache');
      return { response: hit.answer, sources: hit.sources, cached: true };
    }

    const results = await this.retriever.search(query, this.config.topK, options.signal);
    const sources = extractSources(results);
    const response = await this.generator.generate(query, formatContext(results), options.signal);

    if (options.signal?.aborted) {
      this.logger.info('Request cancelled, answer not cached');
    } else {
      await this.cache.set(query, { answer: response, sources, writtenAt: Date.now() });
    }

    return { response, sources, cached: false };
  }

  /**
   * Open a streamed answer. The cache lookup happens here; retrieval and
   * generation start when the fragments are first pulled. A fresh answer is
   * cached only after its last fragment, so a failed or abandoned stream
   * leaves no entry.
   *
   * @throws {QueryTooLargeError} before any external call
   */
  async openStream(rawQuery: string, options: ChatRequestOptions = {}): Promise<ChatStream> {
    const screening = this.screen(rawQuery);
    if (screening.kind === 'refused') {
      return { kind: ChatOutcomeKind.REFUSED, reply: screening.reply };
    }
    const { query } = screening;

    const hit = await this.cache.get(query);
    if (hit) {
      this.logger.info('Streaming answer from cache');
      return { kind: ChatOutcomeKind.STREAM, cached: true, fragments: replayCached(hit.answer) };
    }

    return {
      kind: ChatOutcomeKind.STREAM,
      cached: false,
      fragments: this.streamFresh(query, options.signal),
    };
  }

  getCacheStats(): ResponseCacheStats {
    return this.cache.getStats();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private screen(rawQuery: string): Screening {
    const query = normalizeQuery(rawQuery);
    this.guard.validateSize(query);

    if (this.guard.detectInjection(query)) {
      this.logger.warn('Injection pattern matched, refusing query', { length: query.length });
      return {
        kind: 'refused',
        reply: { response: REFUSAL_MESSAGE, sources: [], cached: false },
      };
    }

    return { kind: 'accepted', query };
  }

  private async *streamFresh(
    query: string,
    signal?: AbortSignal
  ): AsyncGenerator<string, void, unknown> {
    const results = await this.retriever.search(query, this.config.topK, signal);
    const sources = extractSources(results);
    const buffer: string[] = [];

    for await (const fragment of this.generator.generateStream(
      query,
      formatContext(results),
      signal
    )) {
      buffer.push(fragment);
      yield fragment;
    }

    if (signal?.aborted) {
      this.logger.info('Stream cancelled, answer not cached', { fragments: buffer.length });
      return;
    }

    await this.cache.set(query, { answer: buffer.join(''), sources, writtenAt: Date.now() });
  }
}

async function* replayCached(answer: string): AsyncGenerator<string, void, unknown> {
  yield* replayFragments(answer);
}

export function createChatService(
  deps: ChatServiceDeps,
  config?: Partial<ChatServiceConfig>
): ChatService {
  return new ChatService(deps, config);
}
