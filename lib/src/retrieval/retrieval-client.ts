/**
 * Retrieval Client
 *
 * Query text in, ranked passages out. Label detection runs once up front;
 * the embed + index round trip is the retried unit. An empty result from a
 * successful query is returned as-is, a failure after the last attempt
 * becomes a RetrievalError.
 */

import { RetrievalError, toError } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { withRetry, type RetryEvent } from '../retry/index.js';
import type { LabelDetector } from './label-detector.js';
import {
  METADATA_DEFAULTS,
  RetrievalConfigSchema,
  type EmbeddingProvider,
  type RetrievalConfig,
  type SearchResult,
  type VectorIndex,
  type VectorMatch,
} from './types.js';

export interface RetrievalClientDeps {
  embedder: EmbeddingProvider;
  index: VectorIndex;
  labelDetector: LabelDetector;
  logger?: Logger;
}

export class RetrievalClient {
  private readonly config: RetrievalConfig;
  private readonly embedder: EmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly labelDetector: LabelDetector;
  private readonly logger: Logger;

  constructor(deps: RetrievalClientDeps, config?: Partial<RetrievalConfig>) {
    this.config = RetrievalConfigSchema.parse(config ?? {});
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.labelDetector = deps.labelDetector;
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * @throws {RetrievalError} wrapping the last failure once retries are spent
   */
  async search(
    query: string,
    topK: number = this.config.defaultTopK,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const label = this.labelDetector.detect(query);
    this.logger.debug('Label detected', { label });

    try {
      const matches = await withRetry(
        async () => {
          const vector = await this.embedder.embed(query, signal);
          return this.index.query(vector, topK, { label }, signal);
        },
        {
          config: {
            maxRetries: this.config.maxRetries,
            initialDelayMs: this.config.initialDelayMs,
            maxDelayMs: this.config.maxDelayMs,
            backoffMultiplier: 2,
            jitter: false,
          },
          onRetryEvent: (event) => this.logRetryEvent(event),
          abortSignal: signal,
        }
      );

      const results = matches
        .map(toSearchResult)
        .sort((a, b) => b.score - a.score)
        .slice(0, topK);

      this.logger.debug('Search completed', { label, results: results.length });
      return results;
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Search failed after retries', cause, { label });
      throw new RetrievalError(`Search failed: ${cause.message}`, cause);
    }
  }

  private logRetryEvent(event: RetryEvent): void {
    if (event.type === 'retrying') {
      this.logger.warn('Search attempt failed, retrying', {
        attempt: event.attemptNumber,
        nextDelayMs: event.nextDelayMs,
        error: event.error?.message,
      });
    }
  }
}

function stringField(
  metadata: Record<string, unknown>,
  key: string,
  fallback: string
): string {
  const value = metadata[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Map a raw match to a SearchResult, filling missing fields with defaults
 */
export function toSearchResult(match: VectorMatch): SearchResult {
  const { metadata } = match;
  return {
    text: stringField(metadata, 'text', METADATA_DEFAULTS.text),
    label: stringField(metadata, 'label', METADATA_DEFAULTS.label),
    docType: stringField(metadata, 'doc_type', METADATA_DEFAULTS.docType),
    url: stringField(metadata, 'url', METADATA_DEFAULTS.url),
    score: Number.isFinite(match.score) ? match.score : METADATA_DEFAULTS.score,
  };
}
