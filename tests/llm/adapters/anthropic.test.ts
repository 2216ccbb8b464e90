/**
 * Unit Tests for Anthropic Adapter
 *
 * Uses a mocked Anthropic SDK to test request mapping, stream handling,
 * error translation and retries without network calls.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import {
  AnthropicAdapter,
  type AnthropicAdapterConfig,
} from '../../../lib/src/llm/adapters/anthropic.js';
import {
  LLMError,
  RateLimitError,
  AuthenticationError,
  InvalidRequestError,
  ModelNotFoundError,
  ServerError,
  TimeoutError,
  NetworkError,
  AbortedError,
} from '../../../lib/src/llm/errors.js';
import type { LLMMessage, LLMStreamChunk } from '../../../lib/src/llm/types.js';
import type { RetryEvent } from '../../../lib/src/retry/index.js';

// =============================================================================
// Mock Setup
// =============================================================================

vi.mock('@anthropic-ai/sdk', () => {
  const MockAnthropic = vi.fn();

  class APIError extends Error {
    status: number | undefined;
    headers: Record<string, string> | undefined;
    constructor(
      status: number | undefined,
      _error: unknown,
      message: string | undefined,
      headers: Record<string, string> | undefined
    ) {
      super(message);
      this.name = 'APIError';
      this.status = status;
      this.headers = headers;
    }
  }

  class APIConnectionError extends Error {
    constructor({ message }: { message?: string } = {}) {
      super(message ?? 'Connection error.');
      this.name = 'APIConnectionError';
    }
  }

  class APIConnectionTimeoutError extends APIConnectionError {
    constructor({ message }: { message?: string } = {}) {
      super({ message: message ?? 'Request timed out.' });
      this.name = 'APIConnectionTimeoutError';
    }
  }

  class APIUserAbortError extends Error {
    constructor() {
      super('Request was aborted.');
      this.name = 'APIUserAbortError';
    }
  }

  Object.assign(MockAnthropic, {
    APIError,
    APIConnectionError,
    APIConnectionTimeoutError,
    APIUserAbortError,
  });

  return {
    default: MockAnthropic,
    APIError,
    APIConnectionError,
    APIConnectionTimeoutError,
    APIUserAbortError,
  };
});

// =============================================================================
// Test Fixtures
// =============================================================================

const createMockConfig = (
  overrides: Partial<AnthropicAdapterConfig> = {}
): AnthropicAdapterConfig => ({
  provider: 'anthropic' as const,
  model: 'claude-3-5-haiku-latest',
  maxTokens: 500,
  temperature: 0.3,
  apiKey: 'test-api-key',
  retry: { maxRetries: 0 },
  ...overrides,
});

const createMockMessages = (): LLMMessage[] => [{ role: 'user', content: 'Merhaba' }];

const createMockMessagesWithSystem = (): LLMMessage[] => [
  { role: 'system', content: 'Sen yardımcı bir asistansın.' },
  { role: 'user', content: 'Merhaba' },
];

const createMockResponse = (text = 'Merhaba, nasıl yardımcı olabilirim?') => ({
  id: 'msg_123',
  type: 'message' as const,
  role: 'assistant' as const,
  content: [{ type: 'text' as const, text }],
  model: 'claude-3-5-haiku-latest',
  stop_reason: 'end_turn',
  usage: { input_tokens: 10, output_tokens: 20 },
});

function createMockStream(events: unknown[], failAfter?: Error) {
  return {
    abort: vi.fn(),
    [Symbol.asyncIterator]: async function* () {
      for (const event of events) {
        yield event;
      }
      if (failAfter) {
        throw failAfter;
      }
    },
  };
}

const textStreamEvents = (...parts: string[]) => [
  { type: 'message_start', message: { usage: { input_tokens: 10 } } },
  ...parts.map((text) => ({ type: 'content_block_delta', delta: { type: 'text_delta', text } })),
  { type: 'message_delta', usage: { output_tokens: 5 } },
  { type: 'message_stop' },
];

async function collect(generator: AsyncGenerator<LLMStreamChunk>): Promise<LLMStreamChunk[]> {
  const chunks: LLMStreamChunk[] = [];
  for await (const chunk of generator) {
    chunks.push(chunk);
  }
  return chunks;
}

// =============================================================================
// Test Suites
// =============================================================================

describe('AnthropicAdapter', () => {
  let mockClient: {
    messages: {
      create: ReturnType<typeof vi.fn>;
      stream: ReturnType<typeof vi.fn>;
    };
  };

  beforeEach(() => {
    vi.clearAllMocks();

    mockClient = {
      messages: {
        create: vi.fn(),
        stream: vi.fn(),
      },
    };

    vi.mocked(Anthropic).mockImplementation(() => mockClient as unknown as Anthropic);
  });

  // ===========================================================================
  // Constructor Tests
  // ===========================================================================

  describe('constructor', () => {
    it('should expose provider and model', () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      expect(adapter.provider).toBe('anthropic');
      expect(adapter.model).toBe('claude-3-5-haiku-latest');
    });

    it('should create the SDK client with SDK retries disabled', () => {
      new AnthropicAdapter(createMockConfig({ baseUrl: 'https://proxy.example.com', timeoutMs: 5000 }));

      expect(Anthropic).toHaveBeenCalledWith({
        apiKey: 'test-api-key',
        baseURL: 'https://proxy.example.com',
        timeout: 5000,
        maxRetries: 0,
      });
    });

    it('should return a copy of its configuration', () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      const config = adapter.getConfig();

      expect(config.maxTokens).toBe(500);
      expect(config.temperature).toBe(0.3);
    });
  });

  // ===========================================================================
  // complete()
  // ===========================================================================

  describe('complete()', () => {
    it('should generate a completion successfully', async () => {
      mockClient.messages.create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());

      const result = await adapter.complete(createMockMessages());

      expect(result).toEqual({
        content: 'Merhaba, nasıl yardımcı olabilirim?',
        model: 'claude-3-5-haiku-latest',
        usage: { inputTokens: 10, outputTokens: 20 },
      });
    });

    it('should move the system message into the system parameter', async () => {
      mockClient.messages.create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());

      await adapter.complete(createMockMessagesWithSystem());

      expect(mockClient.messages.create).toHaveBeenCalledWith(
        {
          model: 'claude-3-5-haiku-latest',
          max_tokens: 500,
          temperature: 0.3,
          system: 'Sen yardımcı bir asistansın.',
          messages: [{ role: 'user', content: 'Merhaba' }],
        },
        undefined
      );
    });

    it('should let completion options override the configured defaults', async () => {
      mockClient.messages.create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());

      await adapter.complete(createMockMessages(), { maxTokens: 100, temperature: 0 });

      const params = mockClient.messages.create.mock.calls[0]?.[0];
      expect(params.max_tokens).toBe(100);
      expect(params.temperature).toBe(0);
    });

    it('should pass the abort signal as a request option', async () => {
      mockClient.messages.create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());
      const controller = new AbortController();

      await adapter.complete(createMockMessages(), { signal: controller.signal });

      expect(mockClient.messages.create.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
    });

    it('should join text blocks and skip other block types', async () => {
      mockClient.messages.create.mockResolvedValue({
        ...createMockResponse(),
        content: [
          { type: 'text', text: 'Birinci ' },
          { type: 'tool_use', id: 'tool_1', name: 'noop', input: {} },
          { type: 'text', text: 'ikinci' },
        ],
      });
      const adapter = new AnthropicAdapter(createMockConfig());

      const result = await adapter.complete(createMockMessages());

      expect(result.content).toBe('Birinci ikinci');
    });

    it('should reject an empty message list', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      await expect(adapter.complete([])).rejects.toThrow(InvalidRequestError);
      expect(mockClient.messages.create).not.toHaveBeenCalled();
    });

    it('should reject a message list with only a system message', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      await expect(
        adapter.complete([{ role: 'system', content: 'Sistem' }])
      ).rejects.toThrow('Messages must contain at least one user or assistant message');
    });
  });

  // ===========================================================================
  // stream()
  // ===========================================================================

  describe('stream()', () => {
    it('should yield text deltas followed by a final chunk with usage', async () => {
      mockClient.messages.stream.mockReturnValue(
        createMockStream(textStreamEvents('Pepsi', ' ürünleri'))
      );
      const adapter = new AnthropicAdapter(createMockConfig());

      const chunks = await collect(adapter.stream(createMockMessages()));

      expect(chunks).toEqual([
        { content: 'Pepsi', done: false },
        { content: ' ürünleri', done: false },
        { content: '', done: true, usage: { inputTokens: 10, outputTokens: 5 } },
      ]);
    });

    it('should not abort a stream that completed', async () => {
      const stream = createMockStream(textStreamEvents('Tamam'));
      mockClient.messages.stream.mockReturnValue(stream);
      const adapter = new AnthropicAdapter(createMockConfig());

      await collect(adapter.stream(createMockMessages()));

      expect(stream.abort).not.toHaveBeenCalled();
    });

    it('should abort the underlying request when the consumer stops early', async () => {
      const stream = createMockStream(textStreamEvents('Bir', 'iki', 'üç'));
      mockClient.messages.stream.mockReturnValue(stream);
      const adapter = new AnthropicAdapter(createMockConfig());

      for await (const chunk of adapter.stream(createMockMessages())) {
        expect(chunk.content).toBe('Bir');
        break;
      }

      expect(stream.abort).toHaveBeenCalledTimes(1);
    });

    it('should throw InvalidRequestError for empty messages', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      const generator = adapter.stream([]);
      await expect(generator.next()).rejects.toThrow(InvalidRequestError);
    });

    it('should surface a failure after partial output without restarting', async () => {
      mockClient.messages.stream.mockReturnValue(
        createMockStream(
          textStreamEvents('Yarım').slice(0, 2),
          new Anthropic.APIError(500, undefined, 'upstream reset', undefined)
        )
      );
      const adapter = new AnthropicAdapter(createMockConfig({ retry: { maxRetries: 2, initialDelayMs: 1 } }));

      const seen: string[] = [];
      await expect(async () => {
        for await (const chunk of adapter.stream(createMockMessages())) {
          seen.push(chunk.content);
        }
      }).rejects.toThrow(ServerError);

      expect(seen).toEqual(['Yarım']);
      expect(mockClient.messages.stream).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Error Handling Tests
  // ===========================================================================

  describe('error handling', () => {
    const cases: Array<[string, () => Error, new (...args: never[]) => LLMError]> = [
      ['429 status', () => new Anthropic.APIError(429, undefined, 'slow down', undefined), RateLimitError],
      ['401 status', () => new Anthropic.APIError(401, undefined, 'bad key', undefined), AuthenticationError],
      ['403 status', () => new Anthropic.APIError(403, undefined, 'forbidden', undefined), AuthenticationError],
      ['400 status', () => new Anthropic.APIError(400, undefined, 'bad request', undefined), InvalidRequestError],
      ['404 status', () => new Anthropic.APIError(404, undefined, 'no model', undefined), ModelNotFoundError],
      ['500 status', () => new Anthropic.APIError(500, undefined, 'boom', undefined), ServerError],
      ['connection timeout', () => new Anthropic.APIConnectionTimeoutError({ message: 'timed out' }), TimeoutError],
      ['connection failure', () => new Anthropic.APIConnectionError({ message: 'refused' }), NetworkError],
      ['caller abort', () => new Anthropic.APIUserAbortError(), AbortedError],
    ];

    it.each(cases)('should map %s to the matching LLMError', async (_label, makeError, expected) => {
      mockClient.messages.create.mockRejectedValue(makeError());
      const adapter = new AnthropicAdapter(createMockConfig());

      await expect(adapter.complete(createMockMessages())).rejects.toBeInstanceOf(expected);
    });

    it('should read retry-after seconds from a rate limit response', async () => {
      mockClient.messages.create.mockRejectedValue(
        new Anthropic.APIError(429, undefined, 'slow down', { 'retry-after': '7' })
      );
      const adapter = new AnthropicAdapter(createMockConfig());

      const error = await adapter.complete(createMockMessages()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error instanceof RateLimitError && error.retryAfterMs).toBe(7000);
    });

    it('should wrap unknown errors as a non-retryable LLMError', async () => {
      mockClient.messages.create.mockRejectedValue(new Error('weird'));
      const adapter = new AnthropicAdapter(createMockConfig());

      const error = await adapter.complete(createMockMessages()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LLMError);
      expect(error instanceof LLMError && error.code).toBe('unknown');
      expect(error instanceof LLMError && error.retryable).toBe(false);
    });
  });

  // ===========================================================================
  // Retry Tests
  // ===========================================================================

  describe('retry behavior', () => {
    it('should retry a server error and return the next success', async () => {
      mockClient.messages.create
        .mockRejectedValueOnce(new Anthropic.APIError(503, undefined, 'overloaded', undefined))
        .mockResolvedValueOnce(createMockResponse('İkinci deneme'));
      const adapter = new AnthropicAdapter(
        createMockConfig({ retry: { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5 } })
      );

      const result = await adapter.complete(createMockMessages());

      expect(result.content).toBe('İkinci deneme');
      expect(mockClient.messages.create).toHaveBeenCalledTimes(2);
    });

    it('should cap a provider retry-after hint at maxDelayMs', async () => {
      const events: RetryEvent[] = [];
      mockClient.messages.create
        .mockRejectedValueOnce(new Anthropic.APIError(429, undefined, 'slow down', { 'retry-after': '30' }))
        .mockResolvedValueOnce(createMockResponse());
      const adapter = new AnthropicAdapter(
        createMockConfig({
          retry: { maxRetries: 1, initialDelayMs: 1, maxDelayMs: 5 },
          onRetryEvent: (event) => events.push(event),
        })
      );

      await adapter.complete(createMockMessages());

      const retrying = events.find((e) => e.type === 'retrying');
      expect(retrying?.nextDelayMs).toBe(5);
    });

    it('should not retry an authentication error', async () => {
      mockClient.messages.create.mockRejectedValue(new Anthropic.APIError(401, undefined, 'bad key', undefined));
      const adapter = new AnthropicAdapter(
        createMockConfig({ retry: { maxRetries: 3, initialDelayMs: 1 } })
      );

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(AuthenticationError);
      expect(mockClient.messages.create).toHaveBeenCalledTimes(1);
    });

    it('should give up after the retry budget is spent', async () => {
      mockClient.messages.create.mockRejectedValue(new Anthropic.APIError(500, undefined, 'boom', undefined));
      const adapter = new AnthropicAdapter(
        createMockConfig({ retry: { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 2 } })
      );

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(ServerError);
      expect(mockClient.messages.create).toHaveBeenCalledTimes(3);
    });

    it('should restart a stream that failed before producing output', async () => {
      mockClient.messages.stream
        .mockReturnValueOnce(createMockStream([], new Anthropic.APIError(529, undefined, 'overloaded', undefined)))
        .mockReturnValueOnce(createMockStream(textStreamEvents('Tamam')));
      const adapter = new AnthropicAdapter(
        createMockConfig({ retry: { maxRetries: 1, initialDelayMs: 1 } })
      );

      const chunks = await collect(adapter.stream(createMockMessages()));

      expect(chunks.map((c) => c.content).join('')).toBe('Tamam');
      expect(mockClient.messages.stream).toHaveBeenCalledTimes(2);
    });
  });
});
