import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EmbeddingProvider, IndexRecord } from '../../types/rag.js';
import { BagOfWordsEmbedder, FixedVectorEmbedder } from '../../test-utils.js';
import { EmbeddingSpaceMismatch, EmbeddingUnavailable, InvalidArgument } from '../../utils/errors.js';
import { Retriever } from './search.js';
import { VectorIndex } from './vector-index.js';

function record(sequence: number): IndexRecord {
  return {
    id: `faq#${sequence}`,
    source_id: 'faq',
    page: sequence + 1,
    sequence,
    compressed_text: `passage ${sequence}`,
    original_text: `Original passage ${sequence}.`,
    compression: { ratio: 1, outcome: 'skipped' },
  };
}

function makeIndex(vectors: number[][], space = 'test:fixed'): VectorIndex {
  const dimension = vectors.length > 0 ? vectors[0].length : 0;
  return new VectorIndex(
    {
      build_id: 'build-1',
      built_at: '2026-03-01T12:00:00.000Z',
      embedding_space: space,
      dimension,
      metric: 'cosine',
      record_count: vectors.length,
    },
    vectors.map((_, i) => record(i)),
    new Float32Array(vectors.flat()),
  );
}

const INDEX_VECTORS = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, 0],
];

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Retriever.retrieve', () => {
  it('returns the k nearest records by ascending distance', async () => {
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), new FixedVectorEmbedder({ tuition: [1, 0] }));

    const hits = await retriever.retrieve('tuition', 3);

    expect(hits.map((h) => h.record.id)).toEqual(['faq#1', 'faq#3', 'faq#2']);
    expect(hits[0].distance).toBe(0);
    expect(hits[2].distance).toBeCloseTo(1 - Math.SQRT1_2, 6);
  });

  it('breaks ties by ingestion order', async () => {
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), new FixedVectorEmbedder({ q: [2, 0] }));

    const hits = await retriever.retrieve('q', 2);

    expect(hits.map((h) => h.record.sequence)).toEqual([1, 3]);
  });

  it('returns every record when k exceeds the index size', async () => {
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), new FixedVectorEmbedder({ q: [0, 1] }));
    expect(await retriever.retrieve('q', 50)).toHaveLength(4);
  });

  it.each([0, -1, 1.5])('rejects k=%s', async (k) => {
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), new FixedVectorEmbedder({ q: [0, 1] }));
    await expect(retriever.retrieve('q', k)).rejects.toThrow(InvalidArgument);
  });

  it('returns nothing from an empty index without embedding the query', async () => {
    const embedder = new BagOfWordsEmbedder({ space: 'test:fixed' });
    const retriever = new Retriever(makeIndex([]), embedder);

    expect(await retriever.retrieve('anything at all', 4)).toEqual([]);
    expect(embedder.calls).toHaveLength(0);
  });

  it('returns nothing from an empty index built in another embedding space', async () => {
    const embedder = new BagOfWordsEmbedder({ space: 'openai:text-embedding-3-small' });
    const retriever = new Retriever(makeIndex([], 'huggingface:all-MiniLM-L6-v2'), embedder);

    expect(await retriever.retrieve('When is the deadline?', 3)).toEqual([]);
    expect(embedder.calls).toHaveLength(0);
  });

  it('rejects a provider from another embedding space', async () => {
    const embedder = new BagOfWordsEmbedder({ space: 'openai:text-embedding-3-small' });
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), embedder);

    await expect(retriever.retrieve('q', 1)).rejects.toThrow(EmbeddingSpaceMismatch);
    expect(embedder.calls).toHaveLength(0);
  });

  it('rejects a query vector of the wrong dimension', async () => {
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), new FixedVectorEmbedder({ q: [1, 0, 0] }));
    await expect(retriever.retrieve('q', 1)).rejects.toThrow(EmbeddingSpaceMismatch);
  });

  it('wraps provider failures in EmbeddingUnavailable', async () => {
    const embedder: EmbeddingProvider = {
      embedding_space: 'test:fixed',
      max_batch_size: 1,
      embed: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    };
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), embedder);

    await expect(retriever.retrieve('q', 1)).rejects.toThrow(EmbeddingUnavailable);
  });

  it('passes the query timeout to the provider', async () => {
    const embedder = new BagOfWordsEmbedder({ space: 'test:fixed', dimension: 2 });
    const retriever = new Retriever(makeIndex(INDEX_VECTORS), embedder);

    await retriever.retrieve('q', 1, { timeout_ms: 1234 });

    expect(embedder.callOptions).toEqual([{ timeout_ms: 1234 }]);
  });
});
