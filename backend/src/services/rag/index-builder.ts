/**
 * Index Builder
 *
 * Embeds the compressed text of every record and assembles an immutable
 * VectorIndex. All-or-nothing: if any batch still fails after its retries
 * the build throws EmbeddingUnavailable and no index is produced.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DistanceMetric, EmbeddingProvider, IndexRecord } from '../../types/rag.js';
import { EmbeddingUnavailable, InvariantViolation } from '../../utils/errors.js';
import { mapInBatches, withRetry } from '../../utils/retry.js';
import type { RetryOptions } from '../../utils/retry.js';
import { VectorIndex } from './vector-index.js';

export interface BuildIndexOptions {
  metric: DistanceMetric;
  concurrency: number;
  retry?: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'isRetryable'>;
}

/**
 * Embed texts in provider-sized batches, `concurrency` batches at a time.
 * Each batch is retried independently.
 */
export async function embedTexts(
  texts: readonly string[],
  embedder: EmbeddingProvider,
  options: Omit<BuildIndexOptions, 'metric'>,
): Promise<number[][]> {
  const batchSize = Math.max(1, embedder.max_batch_size);
  const batches: string[][] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    batches.push(texts.slice(i, i + batchSize));
  }

  const results = await mapInBatches(batches, options.concurrency, async (batch, index) => {
    try {
      const vectors = await withRetry(() => embedder.embed(batch), {
        ...options.retry,
        label: 'Embeddings',
      });
      if (vectors.length !== batch.length) {
        throw new InvariantViolation(`Embedding provider returned ${vectors.length} vectors for ${batch.length} texts`);
      }
      return vectors;
    } catch (err) {
      if (err instanceof InvariantViolation) throw err;
      throw new EmbeddingUnavailable(`Embedding batch ${index + 1}/${batches.length} failed`, err);
    }
  });

  return results.flat();
}

export async function buildIndex(
  records: readonly IndexRecord[],
  embedder: EmbeddingProvider,
  options: BuildIndexOptions,
): Promise<VectorIndex> {
  const vectors = await embedTexts(records.map((r) => r.compressed_text), embedder, options);

  const dimension = vectors.length > 0 ? vectors[0].length : 0;
  if (vectors.length > 0 && dimension === 0) {
    throw new InvariantViolation('Embedding provider returned an empty vector');
  }

  const packed = new Float32Array(vectors.length * dimension);
  vectors.forEach((vector, i) => {
    if (vector.length !== dimension) {
      throw new InvariantViolation(`Vector ${i} has dimension ${vector.length}, expected ${dimension}`);
    }
    packed.set(vector, i * dimension);
  });

  const index = new VectorIndex(
    {
      build_id: uuidv4(),
      built_at: new Date().toISOString(),
      embedding_space: embedder.embedding_space,
      dimension,
      metric: options.metric,
      record_count: records.length,
    },
    records,
    packed,
  );

  console.log(`[IndexBuilder] Built index ${index.manifest.build_id} with ${index.size} records (dimension ${dimension})`);
  return index;
}
