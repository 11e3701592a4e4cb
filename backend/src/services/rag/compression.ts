/**
 * Chunk Compression Service
 *
 * Shortens each chunk through the summarization provider before it is
 * embedded. Compression is best-effort: any provider failure falls back to
 * the original text and is reported through `outcome: 'fallback'`.
 */

import type {
  Chunk,
  CompressedChunk,
  CompressionOptions,
  SummarizationProvider,
} from '../../types/rag.js';
import { errorMessage, InvariantViolation } from '../../utils/errors.js';
import { mapInBatches } from '../../utils/retry.js';

export const DEFAULT_COMPRESSION_OPTIONS: CompressionOptions = {
  enabled: true,
  target_ratio: 0.5,
  min_length: 200,
  concurrency: 5,
};

function identity(chunk: Chunk, outcome: 'skipped' | 'fallback'): CompressedChunk {
  return {
    source_id: chunk.source_id,
    sequence: chunk.sequence,
    compressed_text: chunk.text,
    ratio: 1,
    outcome,
  };
}

export async function compressChunk(
  chunk: Chunk,
  summarizer: SummarizationProvider,
  options: CompressionOptions = DEFAULT_COMPRESSION_OPTIONS,
): Promise<CompressedChunk> {
  if (chunk.text.length === 0) {
    throw new InvariantViolation(`Cannot compress empty chunk ${chunk.source_id}#${chunk.sequence}`);
  }

  if (!options.enabled || chunk.text.length < options.min_length) {
    return identity(chunk, 'skipped');
  }

  const targetLength = Math.max(1, Math.floor(chunk.text.length * options.target_ratio));

  let summary: string;
  try {
    summary = await summarizer.summarize(
      { text: chunk.text, target_length: targetLength },
      { timeout_ms: options.timeout_ms },
    );
  } catch (err) {
    console.warn(`[Compression] ${chunk.source_id}#${chunk.sequence} fell back to original text: ${errorMessage(err)}`);
    return identity(chunk, 'fallback');
  }

  const compressed = typeof summary === 'string' ? summary.trim() : '';
  if (!compressed) {
    console.warn(`[Compression] ${chunk.source_id}#${chunk.sequence} fell back to original text: empty summary`);
    return identity(chunk, 'fallback');
  }
  if (compressed.length > chunk.text.length) {
    console.warn(`[Compression] ${chunk.source_id}#${chunk.sequence} fell back to original text: summary longer than input`);
    return identity(chunk, 'fallback');
  }

  return {
    source_id: chunk.source_id,
    sequence: chunk.sequence,
    compressed_text: compressed,
    ratio: compressed.length / chunk.text.length,
    outcome: 'compressed',
  };
}

/**
 * Compress chunks with at most `concurrency` summarizer calls in flight.
 * One chunk's failure never affects its siblings.
 */
export async function compressChunks(
  chunks: readonly Chunk[],
  summarizer: SummarizationProvider,
  options: CompressionOptions = DEFAULT_COMPRESSION_OPTIONS,
): Promise<CompressedChunk[]> {
  if (!options.enabled) {
    return chunks.map((chunk) => {
      if (chunk.text.length === 0) {
        throw new InvariantViolation(`Cannot compress empty chunk ${chunk.source_id}#${chunk.sequence}`);
      }
      return identity(chunk, 'skipped');
    });
  }

  const results = await mapInBatches(chunks, options.concurrency, (chunk) =>
    compressChunk(chunk, summarizer, options)
  );

  const compressed = results.filter((r) => r.outcome === 'compressed');
  const fallbacks = results.filter((r) => r.outcome === 'fallback').length;
  if (compressed.length > 0) {
    const avgRatio = compressed.reduce((sum, r) => sum + r.ratio, 0) / compressed.length;
    console.log(`[Compression] Compressed ${compressed.length}/${results.length} chunks, average ratio ${avgRatio.toFixed(2)}`);
  }
  if (fallbacks > 0) {
    console.warn(`[Compression] ${fallbacks}/${results.length} chunks fell back to original text`);
  }

  return results;
}
