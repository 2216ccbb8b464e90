/**
 * Qdrant-backed vector index
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import type { IndexFilter, VectorIndex, VectorMatch } from './types.js';

export const QdrantIndexConfigSchema = z.object({
  url: z.string().url(),
  apiKey: z.string().min(1).optional(),
  collectionName: z.string().min(1).default('brand-knowledge'),
  /** Payload field holding the passage's category label */
  labelField: z.string().min(1).default('brand'),
  timeoutMs: z.number().int().positive().default(10000),
});

export type QdrantIndexConfig = z.infer<typeof QdrantIndexConfigSchema>;

/**
 * The slice of the Qdrant client this index calls
 */
export type QdrantSearchClient = Pick<QdrantClient, 'search' | 'collectionExists'>;

export function createQdrantClient(config: QdrantIndexConfig): QdrantClient {
  return new QdrantClient({
    url: config.url,
    ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
    timeout: config.timeoutMs,
  });
}

export class QdrantIndex implements VectorIndex {
  private readonly config: QdrantIndexConfig;
  private readonly client: QdrantSearchClient;

  constructor(
    config: Partial<QdrantIndexConfig> & { url: string },
    client?: QdrantSearchClient
  ) {
    this.config = QdrantIndexConfigSchema.parse(config);
    this.client = client ?? createQdrantClient(this.config);
  }

  async query(
    vector: number[],
    topK: number,
    filter: IndexFilter
  ): Promise<VectorMatch[]> {
    const points = await this.client.search(this.config.collectionName, {
      vector,
      limit: topK,
      with_payload: true,
      with_vector: false,
      filter: {
        must: [{ key: this.config.labelField, match: { value: filter.label } }],
      },
    });

    return points.map((point) => ({
      score: point.score,
      metadata: this.withLabel(point.payload ?? {}),
    }));
  }

  async ping(): Promise<boolean> {
    const result = await this.client.collectionExists(this.config.collectionName);
    return result.exists;
  }

  /**
   * Expose the configured label field under the neutral `label` key
   */
  private withLabel(payload: Record<string, unknown>): Record<string, unknown> {
    if (this.config.labelField === 'label' || !(this.config.labelField in payload)) {
      return payload;
    }
    return { ...payload, label: payload[this.config.labelField] };
  }
}
