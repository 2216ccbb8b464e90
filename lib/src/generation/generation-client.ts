/**
 * Generation Client
 *
 * Turns (query, context) into an answer, in one piece or as a stream of
 * text fragments. Output length and temperature are fixed here and are not
 * caller-tunable.
 */

import { GenerationError, toError } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { DEFAULT_LLM_CONFIG, type LLMAdapter, type LLMCompletionOptions } from '../llm/index.js';
import { buildMessages, buildSystemPrompt } from './prompt.js';

export interface GenerationClientOptions {
  /** Overrides the default system instruction */
  systemPrompt?: string;
  logger?: Logger;
}

export class GenerationClient {
  private readonly adapter: LLMAdapter;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(adapter: LLMAdapter, options: GenerationClientOptions = {}) {
    this.adapter = adapter;
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt();
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * @throws {GenerationError} when the provider call fails
   */
  async generate(query: string, context: string, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.adapter.complete(
        buildMessages(this.systemPrompt, query, context),
        this.completionOptions(signal)
      );

      this.logger.info('Answer generated', {
        model: response.model,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
      });
      return response.content;
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Generation failed', cause);
      throw new GenerationError(`Generation failed: ${cause.message}`, { cause });
    }
  }

  /**
   * Yields text fragments as the provider produces them. A failure after
   * the first fragment is thrown as a GenerationError with `partial` set;
   * the sequence otherwise ends cleanly.
   */
  async *generateStream(
    query: string,
    context: string,
    signal?: AbortSignal
  ): AsyncGenerator<string, void, unknown> {
    let emitted = 0;

    try {
      for await (const chunk of this.adapter.stream(
        buildMessages(this.systemPrompt, query, context),
        this.completionOptions(signal)
      )) {
        if (chunk.content.length > 0) {
          emitted++;
          yield chunk.content;
        }
        if (chunk.done && chunk.usage) {
          this.logger.info('Answer streamed', {
            fragments: emitted,
            inputTokens: chunk.usage.inputTokens,
            outputTokens: chunk.usage.outputTokens,
          });
        }
      }
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Streaming generation failed', cause, { fragments: emitted });
      throw new GenerationError(`Streaming generation failed: ${cause.message}`, {
        cause,
        partial: emitted > 0,
      });
    }
  }

  private completionOptions(signal?: AbortSignal): LLMCompletionOptions {
    return {
      maxTokens: DEFAULT_LLM_CONFIG.maxTokens,
      temperature: DEFAULT_LLM_CONFIG.temperature,
      signal,
    };
  }
}
