/**
 * LLM Adapter Base Class
 *
 * Abstract base for provider adapters. The generation client depends on this
 * class only, so tests substitute a scripted adapter for the real SDK.
 */

import {
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
  type LLMStreamChunk,
  type LLMCompletionOptions,
  type LLMProvider,
} from './types.js';
import { InvalidRequestError } from './errors.js';

/**
 * @example
 * ```typescript
 * class ScriptedAdapter extends LLMAdapter {
 *   async complete(): Promise<LLMResponse> {
 *     return { content: 'ok', model: this.model, usage: { inputTokens: 1, outputTokens: 1 } };
 *   }
 *
 *   async *stream(): AsyncGenerator<LLMStreamChunk, void, unknown> {
 *     yield { content: 'ok', done: false };
 *     yield { content: '', done: true };
 *   }
 * }
 * ```
 */
export abstract class LLMAdapter {
  protected readonly config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = { ...config };
  }

  // ===========================================================================
  // Abstract Methods - Must be implemented by subclasses
  // ===========================================================================

  /**
   * Generates a completion for the given messages.
   *
   * @throws {LLMError} If the completion fails
   */
  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse>;

  /**
   * Generates a streaming completion for the given messages. Returning early
   * from the generator releases the underlying request.
   *
   * @throws {LLMError} If the stream fails, possibly after some chunks
   */
  abstract stream(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown>;

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  getConfig(): Readonly<LLMConfig> {
    return { ...this.config };
  }

  // ===========================================================================
  // Protected Helper Methods
  // ===========================================================================

  /**
   * Merges completion options with the adapter's default config.
   */
  protected mergeOptions(
    options?: LLMCompletionOptions
  ): Required<Pick<LLMCompletionOptions, 'temperature' | 'maxTokens'>> &
    Omit<LLMCompletionOptions, 'temperature' | 'maxTokens'> {
    return {
      temperature: options?.temperature ?? this.config.temperature,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      stopSequences: options?.stopSequences,
      signal: options?.signal,
    };
  }

  /**
   * Splits the system message off the conversation.
   *
   * @returns Tuple of [systemMessage | undefined, otherMessages]
   */
  protected extractSystemMessage(
    messages: LLMMessage[]
  ): [string | undefined, LLMMessage[]] {
    const systemMessage = messages.find((m) => m.role === 'system');
    const otherMessages = messages.filter((m) => m.role !== 'system');

    return [systemMessage?.content, otherMessages];
  }

  /**
   * @throws {InvalidRequestError} If there is no user or assistant message
   */
  protected validateMessages(messages: LLMMessage[]): void {
    if (messages.length === 0) {
      throw new InvalidRequestError(
        'Messages array must not be empty',
        this.config.provider
      );
    }

    if (!messages.some((m) => m.role !== 'system')) {
      throw new InvalidRequestError(
        'Messages must contain at least one user or assistant message',
        this.config.provider
      );
    }
  }
}
