/**
 * Unit Tests for QdrantIndex
 */

import { describe, it, expect, vi } from 'vitest';
import { QdrantIndex, type QdrantSearchClient } from '../../lib/src/retrieval/index.js';

function createClient(points: Array<{ id: number; score: number; payload?: Record<string, unknown> | null }>) {
  const search = vi.fn().mockResolvedValue(points);
  const collectionExists = vi.fn().mockResolvedValue({ exists: true });
  return {
    search,
    collectionExists,
    client: { search, collectionExists } as unknown as QdrantSearchClient,
  };
}

describe('QdrantIndex', () => {
  it('should search the collection filtered on the label field', async () => {
    const { search, client } = createClient([]);
    const index = new QdrantIndex({ url: 'http://localhost:6333' }, client);

    await index.query([0.1, 0.2], 3, { label: 'pepsi' });

    expect(search).toHaveBeenCalledWith('brand-knowledge', {
      vector: [0.1, 0.2],
      limit: 3,
      with_payload: true,
      with_vector: false,
      filter: { must: [{ key: 'brand', match: { value: 'pepsi' } }] },
    });
  });

  it('should copy the label field to a neutral label key', async () => {
    const { client } = createClient([
      { id: 1, score: 0.9, payload: { brand: 'pepsi', text: 'Pepsi Max', url: 'https://example.com/pepsi' } },
    ]);
    const index = new QdrantIndex({ url: 'http://localhost:6333' }, client);

    const matches = await index.query([0.1], 1, { label: 'pepsi' });

    expect(matches).toEqual([
      {
        score: 0.9,
        metadata: { brand: 'pepsi', label: 'pepsi', text: 'Pepsi Max', url: 'https://example.com/pepsi' },
      },
    ]);
  });

  it('should tolerate points without a payload', async () => {
    const { client } = createClient([{ id: 2, score: 0.4, payload: null }]);
    const index = new QdrantIndex({ url: 'http://localhost:6333', labelField: 'category' }, client);

    expect(await index.query([0.1], 1, { label: 'x' })).toEqual([{ score: 0.4, metadata: {} }]);
  });

  it('should report readiness from collection existence', async () => {
    const { collectionExists, client } = createClient([]);
    collectionExists.mockResolvedValueOnce({ exists: false });
    const index = new QdrantIndex({ url: 'http://localhost:6333', collectionName: 'docs' }, client);

    expect(await index.ping()).toBe(false);
    expect(collectionExists).toHaveBeenCalledWith('docs');
  });
});
