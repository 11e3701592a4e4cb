/**
 * Dual-record builder: the compressed text is what gets embedded, the
 * original text and provenance are what gets returned to generation.
 */

import type { Chunk, CompressedChunk, IndexRecord } from '../../types/rag.js';
import { InvariantViolation } from '../../utils/errors.js';

export function recordId(sourceId: string, sequence: number): string {
  return `${sourceId}#${sequence}`;
}

export function buildIndexRecord(chunk: Chunk, compressed: CompressedChunk): IndexRecord {
  if (chunk.source_id !== compressed.source_id || chunk.sequence !== compressed.sequence) {
    throw new InvariantViolation(
      `Compressed chunk ${recordId(compressed.source_id, compressed.sequence)} ` +
      `does not belong to chunk ${recordId(chunk.source_id, chunk.sequence)}`
    );
  }

  return Object.freeze({
    id: recordId(chunk.source_id, chunk.sequence),
    source_id: chunk.source_id,
    page: chunk.page,
    sequence: chunk.sequence,
    compressed_text: compressed.compressed_text,
    original_text: chunk.text,
    compression: Object.freeze({
      ratio: compressed.ratio,
      outcome: compressed.outcome,
    }),
  });
}

export function buildIndexRecords(chunks: readonly Chunk[], compressed: readonly CompressedChunk[]): IndexRecord[] {
  if (chunks.length !== compressed.length) {
    throw new InvariantViolation(`Got ${compressed.length} compressed chunks for ${chunks.length} chunks`);
  }
  return chunks.map((chunk, i) => buildIndexRecord(chunk, compressed[i]));
}
