/**
 * Anthropic LLM Adapter
 *
 * Completion and streaming over the Anthropic Messages API, with retries for
 * rate limits and transient failures. A stream is only retried before its
 * first chunk; once text has been emitted a failure propagates.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock,
  MessageCreateParamsNonStreaming,
  MessageParam,
  TextBlock,
} from '@anthropic-ai/sdk/resources/messages';

import { LLMAdapter } from '../adapter.js';
import {
  type AnthropicConfig,
  type LLMCompletionOptions,
  type LLMMessage,
  type LLMResponse,
  type LLMStreamChunk,
  LLMProvider,
} from '../types.js';
import {
  AbortedError,
  AuthenticationError,
  InvalidRequestError,
  LLMError,
  ModelNotFoundError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
  getRetryAfterMs,
  isRetryableError,
} from '../errors.js';
import {
  withRetry,
  withRetryGenerator,
  type RetryConfig,
  type RetryEventHandler,
  type WithRetryOptions,
} from '../../retry/index.js';

// =============================================================================
// Extended Configuration Types
// =============================================================================

export interface AnthropicAdapterConfig extends AnthropicConfig {
  retry?: Partial<RetryConfig> | undefined;
  /** Event handler for retry events (useful for logging) */
  onRetryEvent?: RetryEventHandler | undefined;
}

// =============================================================================
// AnthropicAdapter Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const adapter = new AnthropicAdapter({
 *   provider: 'anthropic',
 *   model: 'claude-3-5-haiku-latest',
 *   maxTokens: 500,
 *   temperature: 0.3,
 *   apiKey: config.anthropicApiKey,
 *   retry: { maxRetries: 2 },
 * });
 *
 * for await (const chunk of adapter.stream(messages)) {
 *   process.stdout.write(chunk.content);
 * }
 * ```
 */
export class AnthropicAdapter extends LLMAdapter {
  private readonly client: Anthropic;
  protected override readonly config: AnthropicConfig;
  private readonly retryOptions: WithRetryOptions;

  constructor(config: AnthropicAdapterConfig) {
    super(config);
    this.config = config;

    this.retryOptions = {
      config: config.retry,
      onRetryEvent: config.onRetryEvent,
      isRetryable: isRetryableError,
      retryAfterMs: getRetryAfterMs,
    };

    // Retries are handled by withRetry, not by the SDK
    this.client = new Anthropic({
      apiKey: config.apiKey,
      ...(config.baseUrl !== undefined ? { baseURL: config.baseUrl } : {}),
      ...(config.timeoutMs !== undefined ? { timeout: config.timeoutMs } : {}),
      maxRetries: 0,
    });
  }

  // ===========================================================================
  // Abstract Method Implementations
  // ===========================================================================

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    const params = this.buildParams(messages, options);
    const signal = options?.signal;

    return withRetry(
      async () => {
        try {
          const response = await this.client.messages.create(
            params,
            signal !== undefined ? { signal } : undefined
          );

          return {
            content: this.extractTextContent(response.content),
            model: response.model,
            usage: {
              inputTokens: response.usage.input_tokens,
              outputTokens: response.usage.output_tokens,
            },
          };
        } catch (error) {
          throw this.handleError(error);
        }
      },
      { ...this.retryOptions, abortSignal: signal }
    );
  }

  async *stream(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown> {
    const params = this.buildParams(messages, options);
    const signal = options?.signal;
    const self = this;

    yield* withRetryGenerator<LLMStreamChunk>(
      async function* () {
        const stream = self.client.messages.stream(
          params,
          signal !== undefined ? { signal } : undefined
        );
        let completed = false;
        let inputTokens = 0;
        let outputTokens = 0;

        try {
          for await (const event of stream) {
            if (event.type === 'message_start') {
              inputTokens = event.message.usage.input_tokens;
            } else if (event.type === 'message_delta') {
              outputTokens = event.usage.output_tokens;
            } else if (
              event.type === 'content_block_delta' &&
              event.delta.type === 'text_delta'
            ) {
              yield { content: event.delta.text, done: false };
            } else if (event.type === 'message_stop') {
              completed = true;
              yield {
                content: '',
                done: true,
                usage: { inputTokens, outputTokens },
              };
            }
          }
        } catch (error) {
          throw self.handleError(error);
        } finally {
          // Consumer returned early: drop the HTTP request
          if (!completed) {
            stream.abort();
          }
        }
      },
      { ...this.retryOptions, abortSignal: signal }
    );
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private buildParams(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): MessageCreateParamsNonStreaming {
    this.validateMessages(messages);

    const merged = this.mergeOptions(options);
    const [systemMessage, conversationMessages] =
      this.extractSystemMessage(messages);

    const params: MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: merged.maxTokens,
      temperature: merged.temperature,
      messages: this.convertMessages(conversationMessages),
    };

    if (systemMessage !== undefined) {
      params.system = systemMessage;
    }
    if (merged.stopSequences !== undefined) {
      params.stop_sequences = merged.stopSequences;
    }

    return params;
  }

  private convertMessages(messages: LLMMessage[]): MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role === 'assistant' ? 'assistant' : 'user',
      content: msg.content,
    }));
  }

  private extractTextContent(content: ContentBlock[]): string {
    return content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Maps Anthropic SDK errors to LLMError subclasses.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof Anthropic.APIUserAbortError) {
      return new AbortedError(LLMProvider.ANTHROPIC, error);
    }

    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new TimeoutError(
        `Request timeout: ${error.message}`,
        LLMProvider.ANTHROPIC,
        1000,
        error
      );
    }

    if (error instanceof Anthropic.APIConnectionError) {
      return new NetworkError(
        `Connection error: ${error.message}`,
        LLMProvider.ANTHROPIC,
        2000,
        error
      );
    }

    if (error instanceof Anthropic.APIError) {
      const { status, message } = error;

      if (status === 401 || status === 403) {
        return new AuthenticationError(
          `Authentication failed: ${message}`,
          LLMProvider.ANTHROPIC,
          error
        );
      }

      if (status === 429) {
        return new RateLimitError(
          `Rate limit exceeded: ${message}`,
          LLMProvider.ANTHROPIC,
          this.extractRetryAfter(error),
          error
        );
      }

      if (status === 400) {
        return new InvalidRequestError(
          `Invalid request: ${message}`,
          LLMProvider.ANTHROPIC,
          error
        );
      }

      if (status === 404) {
        return new ModelNotFoundError(
          `Model not found: ${message}`,
          LLMProvider.ANTHROPIC,
          error
        );
      }

      if (status !== undefined && status >= 500) {
        return new ServerError(
          `Server error: ${message}`,
          LLMProvider.ANTHROPIC,
          undefined,
          error
        );
      }
    }

    return LLMError.fromError(error, LLMProvider.ANTHROPIC);
  }

  /**
   * Reads the retry-after header (seconds) from a rate limit error.
   */
  private extractRetryAfter(
    error: InstanceType<typeof Anthropic.APIError>
  ): number | undefined {
    const retryAfter = error.headers?.['retry-after'];
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        return seconds * 1000;
      }
    }
    return undefined;
  }
}
