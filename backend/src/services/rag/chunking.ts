/**
 * Content Chunking Service
 *
 * Splits normalized document text into fixed-size character windows with a
 * configured overlap. Consecutive chunks of the same source share exactly
 * `overlap` characters, so dropping the overlap from every chunk after the
 * first reproduces the input.
 */

import type { Chunk, ChunkingOptions, SourceDocument } from '../../types/rag.js';
import { InvalidConfiguration } from '../../utils/errors.js';

export function validateChunkingOptions(options: ChunkingOptions): void {
  const { chunk_size, overlap } = options;
  if (!Number.isInteger(chunk_size) || !Number.isInteger(overlap)) {
    throw new InvalidConfiguration(`chunk_size and overlap must be integers (got ${chunk_size}, ${overlap})`);
  }
  if (chunk_size <= 0) {
    throw new InvalidConfiguration(`chunk_size must be positive (got ${chunk_size})`);
  }
  if (overlap <= 0 || overlap >= chunk_size) {
    throw new InvalidConfiguration(`overlap must be in (0, chunk_size) (got ${overlap} for chunk_size ${chunk_size})`);
  }
}

/**
 * Chunk one span of text.
 *
 * The returned iterable is lazy and restartable: every iteration walks the
 * text again from the start. Options are validated eagerly.
 */
export function chunkText(
  text: string,
  sourceId: string,
  options: ChunkingOptions,
  page: number | null = null,
  firstSequence = 0,
): Iterable<Chunk> {
  validateChunkingOptions(options);
  const { chunk_size, overlap } = options;
  const stride = chunk_size - overlap;

  return {
    *[Symbol.iterator](): Iterator<Chunk> {
      // Windows count code points so a surrogate pair is never split
      const chars = Array.from(text);
      let sequence = firstSequence;
      for (let start = 0; start < chars.length; start += stride) {
        const end = Math.min(start + chunk_size, chars.length);
        yield {
          text: chars.slice(start, end).join(''),
          source_id: sourceId,
          page,
          sequence: sequence++,
        };
        if (end === chars.length) return;
      }
    },
  };
}

/**
 * Chunk every page of a document. Pages are chunked independently (no chunk
 * spans a page break) and `sequence` runs across the whole document.
 */
export function chunkDocument(document: SourceDocument, options: ChunkingOptions): Chunk[] {
  validateChunkingOptions(options);
  const chunks: Chunk[] = [];

  for (const { page, text } of document.pages) {
    for (const chunk of chunkText(text, document.source_id, options, page, chunks.length)) {
      chunks.push(chunk);
    }
  }

  return chunks;
}

/**
 * Inverse of chunkText for a single span: first chunk whole, then each later
 * chunk without its leading overlap.
 */
export function reconstructText(chunks: Iterable<Chunk>, overlap: number): string {
  let text = '';
  let first = true;
  for (const chunk of chunks) {
    text += first ? chunk.text : Array.from(chunk.text).slice(overlap).join('');
    first = false;
  }
  return text;
}
