/**
 * HTTP embedding client
 *
 * Talks to an OpenAI-compatible `/embeddings` endpoint. E5-family models
 * expect a `query: ` prefix on search queries, which is applied here.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { EmbeddingProvider } from './types.js';

export const EmbeddingClientConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default('multilingual-e5-large'),
  /** Prepended to every input, e.g. `query: ` for E5 models */
  inputPrefix: z.string().default('query: '),
  timeoutMs: z.number().int().positive().default(10000),
});

export type EmbeddingClientConfig = z.infer<typeof EmbeddingClientConfigSchema>;

const EmbeddingResponseSchema = z.object({
  data: z
    .array(z.object({ embedding: z.array(z.number()).min(1) }))
    .min(1),
});

export class EmbeddingClient implements EmbeddingProvider {
  private readonly config: EmbeddingClientConfig;
  private readonly http: AxiosInstance;

  constructor(config: Partial<EmbeddingClientConfig> & { baseUrl: string }, http?: AxiosInstance) {
    this.config = EmbeddingClientConfigSchema.parse(config);
    this.http =
      http ??
      axios.create({
        baseURL: this.config.baseUrl,
        timeout: this.config.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
        },
      });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.http.post(
      '/embeddings',
      { model: this.config.model, input: [`${this.config.inputPrefix}${text}`] },
      signal !== undefined ? { signal } : {}
    );

    const parsed = EmbeddingResponseSchema.parse(response.data);
    const first = parsed.data[0];
    if (first === undefined) {
      throw new Error('Embedding response contained no vectors');
    }
    return first.embedding;
  }
}
