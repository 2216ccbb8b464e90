/**
 * Retrieval Module
 */

export {
  SearchResultSchema,
  type SearchResult,
  type EmbeddingProvider,
  type IndexFilter,
  type VectorMatch,
  type VectorIndex,
  RetrievalConfigSchema,
  type RetrievalConfig,
  METADATA_DEFAULTS,
} from './types.js';
export {
  LabelDetector,
  LabelDetectorConfigSchema,
  type LabelDetectorConfig,
  DEFAULT_LABELS,
  DEFAULT_FALLBACK_LABEL,
  similarity,
} from './label-detector.js';
export {
  EmbeddingClient,
  EmbeddingClientConfigSchema,
  type EmbeddingClientConfig,
} from './embedding-client.js';
export {
  QdrantIndex,
  QdrantIndexConfigSchema,
  type QdrantIndexConfig,
  type QdrantSearchClient,
  createQdrantClient,
} from './qdrant-index.js';
export {
  RetrievalClient,
  type RetrievalClientDeps,
  toSearchResult,
} from './retrieval-client.js';
