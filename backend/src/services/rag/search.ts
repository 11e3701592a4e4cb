/**
 * Vector Similarity Search Service
 *
 * Embeds the query with the same provider the index was built with and runs
 * exact k-nearest-neighbor search over the loaded VectorIndex.
 */

import type { CallOptions, EmbeddingProvider, RetrievalResult } from '../../types/rag.js';
import {
  EmbeddingSpaceMismatch,
  EmbeddingUnavailable,
  InvalidArgument,
} from '../../utils/errors.js';
import type { VectorIndex } from './vector-index.js';

export class Retriever {
  constructor(
    private readonly index: VectorIndex,
    private readonly embedder: EmbeddingProvider,
  ) {}

  get size(): number {
    return this.index.size;
  }

  /**
   * Return at most `k` records by ascending distance.
   *
   * 1. Validate k
   * 2. Short-circuit an empty index (no embedding call, no space check)
   * 3. Check the embedding space
   * 4. Embed the query and check its dimension
   * 5. Search
   */
  async retrieve(query: string, k: number, options: CallOptions = {}): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgument(`k must be a positive integer (got ${k})`);
    }

    if (this.index.size === 0) {
      return [];
    }

    // Vectors from another provider or model would give meaningless distances
    if (this.embedder.embedding_space !== this.index.manifest.embedding_space) {
      throw new EmbeddingSpaceMismatch(this.index.manifest.embedding_space, this.embedder.embedding_space);
    }

    let vectors: number[][];
    try {
      vectors = await this.embedder.embed([query], options);
    } catch (err) {
      throw new EmbeddingUnavailable('Query embedding failed', err);
    }

    const queryVector = vectors[0];
    if (!queryVector || queryVector.length !== this.index.manifest.dimension) {
      throw new EmbeddingSpaceMismatch(
        `${this.index.manifest.embedding_space} (dimension ${this.index.manifest.dimension})`,
        `${this.embedder.embedding_space} (dimension ${queryVector?.length ?? 0})`,
      );
    }

    const hits = this.index.search(queryVector, k);
    console.log(`[Retriever] ${hits.length} hit(s) for k=${k} over ${this.index.size} records`);
    return hits;
  }
}
