/**
 * Retrieval Types
 *
 * Shapes exchanged between the retrieval client and its two collaborators,
 * the embedding provider and the vector index.
 */

import { z } from 'zod';

// =============================================================================
// Search Result
// =============================================================================

/**
 * One ranked passage. Produced per request and never persisted.
 */
export const SearchResultSchema = z.object({
  /** Passage text */
  text: z.string(),
  /** Category label the passage was indexed under */
  label: z.string(),
  docType: z.string(),
  /** Source link, empty when the passage has none */
  url: z.string(),
  /** Similarity score (0-1) */
  score: z.number(),
});

export type SearchResult = z.infer<typeof SearchResultSchema>;

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Turns text into a query vector
 */
export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/**
 * Restricts a query to passages indexed under one label
 */
export interface IndexFilter {
  label: string;
}

export interface VectorMatch {
  score: number;
  /** Raw payload as stored in the index; fields may be missing */
  metadata: Record<string, unknown>;
}

/**
 * Nearest-neighbour lookup over the passage index
 */
export interface VectorIndex {
  query(
    vector: number[],
    topK: number,
    filter: IndexFilter,
    signal?: AbortSignal
  ): Promise<VectorMatch[]>;
  /** Round-trip check used by the readiness probe */
  ping(): Promise<boolean>;
}

// =============================================================================
// Configuration
// =============================================================================

export const RetrievalConfigSchema = z.object({
  /** Passages requested per query */
  defaultTopK: z.number().int().positive().max(20).default(3),
  /** Retries after the first attempt, so 2 means 3 attempts */
  maxRetries: z.number().int().nonnegative().default(2),
  initialDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(4000),
});

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

/**
 * Fallback values for metadata fields missing from a match
 */
export const METADATA_DEFAULTS = {
  text: '',
  label: 'unknown',
  docType: 'unknown',
  url: '',
  score: 0,
} as const;
