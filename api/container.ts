/**
 * Service container
 *
 * Constructs every long-lived service once at startup from the validated
 * configuration and hands them to the app by reference.
 */

import { createBudgetLimiter, createRateLimiter } from '../lib/src/admission/index.js';
import type { GatewayConfig } from '../lib/src/config/index.js';
import { toError } from '../lib/src/errors/index.js';
import { GenerationClient, buildSystemPrompt } from '../lib/src/generation/index.js';
import { createInputGuard } from '../lib/src/guard/index.js';
import { AnthropicAdapter, DEFAULT_LLM_CONFIG } from '../lib/src/llm/index.js';
import type { Logger } from '../lib/src/logging/index.js';
import { createChatService, createResponseCache } from '../lib/src/rag/index.js';
import {
  EmbeddingClient,
  LabelDetector,
  QdrantIndex,
  RetrievalClient,
} from '../lib/src/retrieval/index.js';
import { MemoryStore, RedisStore, StoreDriver, type SharedStore } from '../lib/src/store/index.js';
import type { AppDeps } from './app.js';

export interface Container {
  deps: AppDeps;
  store: SharedStore;
  /** Release connections held by the container */
  close(): Promise<void>;
}

async function openStore(config: GatewayConfig, logger: Logger): Promise<SharedStore> {
  if (config.store.driver === StoreDriver.MEMORY) {
    logger.warn('Using in-memory store; counters and cache are not shared between instances');
    return new MemoryStore();
  }

  const store = new RedisStore({
    url: config.store.redisUrl,
    connectTimeoutMs: config.store.connectTimeoutMs,
    logger: logger.child('redis'),
  });
  try {
    await store.connect();
  } catch (error) {
    // Admission checks fail closed and the cache degrades until Redis is back
    logger.error('Redis unreachable at startup', toError(error));
  }
  return store;
}

export async function createContainer(config: GatewayConfig, logger: Logger): Promise<Container> {
  const store = await openStore(config, logger);

  const index = new QdrantIndex({
    url: config.retrieval.qdrantUrl,
    ...(config.retrieval.qdrantApiKey !== undefined
      ? { apiKey: config.retrieval.qdrantApiKey }
      : {}),
    collectionName: config.retrieval.collectionName,
    labelField: config.retrieval.labelField,
    timeoutMs: config.retrieval.timeoutMs,
  });

  const retriever = new RetrievalClient(
    {
      embedder: new EmbeddingClient({
        baseUrl: config.retrieval.embeddingUrl,
        ...(config.retrieval.embeddingApiKey !== undefined
          ? { apiKey: config.retrieval.embeddingApiKey }
          : {}),
        model: config.retrieval.embeddingModel,
        timeoutMs: config.retrieval.timeoutMs,
      }),
      index,
      labelDetector: new LabelDetector(),
      logger: logger.child('retrieval'),
    },
    { defaultTopK: config.retrieval.topK }
  );

  const generationLogger = logger.child('generation');
  const generator = new GenerationClient(
    new AnthropicAdapter({
      provider: 'anthropic',
      model: config.generation.model,
      maxTokens: DEFAULT_LLM_CONFIG.maxTokens,
      temperature: DEFAULT_LLM_CONFIG.temperature,
      apiKey: config.generation.anthropicApiKey,
      timeoutMs: config.generation.timeoutMs,
      onRetryEvent: (event) => {
        if (event.type === 'retrying') {
          generationLogger.warn('Model call failed, retrying', {
            attempt: event.attemptNumber,
            nextDelayMs: event.nextDelayMs,
          });
        }
      },
    }),
    { systemPrompt: buildSystemPrompt(config.generation.companyName), logger: generationLogger }
  );

  const chatLogger = logger.child('chat');
  const chat = createChatService(
    {
      guard: createInputGuard({
        maxChars: config.limits.maxQueryChars,
        maxTokens: config.limits.maxQueryTokens,
      }),
      retriever,
      generator,
      cache: createResponseCache(store, { ttlSeconds: config.cache.ttlSeconds }, chatLogger),
      logger: chatLogger,
    },
    { topK: config.retrieval.topK }
  );

  const admissionLogger = logger.child('admission');

  return {
    store,
    deps: {
      config,
      logger,
      chat,
      budget: createBudgetLimiter(
        store,
        {
          originDailyLimit: config.limits.originDailyLimit,
          globalDailyLimit: config.limits.globalDailyLimit,
        },
        { logger: admissionLogger }
      ),
      rateLimiter: createRateLimiter(store, {}, { logger: admissionLogger }),
      store,
      index,
      startedAt: Date.now(),
    },
    close: () => store.close(),
  };
}
