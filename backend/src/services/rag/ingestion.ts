/**
 * Content Ingestion Service
 *
 * Single-writer batch pipeline: chunk → compress → pair → embed → publish.
 * The index is published only after every record has been embedded; an
 * EmbeddingUnavailable failure leaves the live index as it was.
 */

import type {
  Chunk,
  CompressionOptions,
  CompressionOutcome,
  DistanceMetric,
  EmbeddingProvider,
  SourceDocument,
  SummarizationProvider,
} from '../../types/rag.js';
import { errorMessage } from '../../utils/errors.js';
import type { RetryOptions } from '../../utils/retry.js';
import { chunkDocument, validateChunkingOptions } from './chunking.js';
import { compressChunks } from './compression.js';
import { buildIndex } from './index-builder.js';
import type { IndexStore } from './index-store.js';
import { buildIndexRecords } from './records.js';
import type { VectorIndex } from './vector-index.js';

export interface IngestionDeps {
  embedder: EmbeddingProvider;
  summarizer: SummarizationProvider;
  store: IndexStore;
}

export interface IngestionSettings {
  chunk_size: number;
  overlap: number;
  compression: CompressionOptions;
  metric: DistanceMetric;
  concurrency: number;
  retry?: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'isRetryable'>;
}

export interface IngestionSummary {
  build_id: string;
  documents: number;
  skipped_documents: number;
  pages: number;
  chunks: number;
  records: number;
  compression: Record<CompressionOutcome, number> & { average_ratio: number };
  embedding_space: string;
}

export function countOutcomes(outcomes: { outcome: CompressionOutcome; ratio: number }[]): IngestionSummary['compression'] {
  const counts = { compressed: 0, skipped: 0, fallback: 0 };
  let ratioSum = 0;
  for (const { outcome, ratio } of outcomes) {
    counts[outcome]++;
    if (outcome === 'compressed') ratioSum += ratio;
  }
  return {
    ...counts,
    average_ratio: counts.compressed > 0 ? ratioSum / counts.compressed : 1,
  };
}

/**
 * Ingest a corpus and publish it as the new live index.
 *
 * 1. Chunk each document page by page
 * 2. Compress chunks (failures fall back to the original text)
 * 3. Pair chunks with their compressed text into index records
 * 4. Embed compressed text and build the index (all-or-nothing)
 * 5. Publish atomically
 */
export async function ingestCorpus(
  documents: readonly SourceDocument[],
  deps: IngestionDeps,
  settings: IngestionSettings,
): Promise<{ index: VectorIndex; summary: IngestionSummary }> {
  const chunking = { chunk_size: settings.chunk_size, overlap: settings.overlap };
  validateChunkingOptions(chunking);

  // 1. Chunk
  const chunks: Chunk[] = [];
  let skippedDocuments = 0;
  let pages = 0;
  for (const document of documents) {
    const documentChunks = chunkDocument(document, chunking);
    pages += document.pages.length;
    if (documentChunks.length === 0) {
      skippedDocuments++;
      console.warn(`[Ingestion] "${document.source_id}" has no text; skipping`);
      continue;
    }
    chunks.push(...documentChunks);
  }
  console.log(`[Ingestion] Chunked ${documents.length - skippedDocuments} document(s) into ${chunks.length} chunks`);

  // 2. Compress
  const compressed = await compressChunks(chunks, deps.summarizer, settings.compression);

  // 3. Pair
  const records = buildIndexRecords(chunks, compressed);

  // 4. Embed + build
  let index: VectorIndex;
  try {
    index = await buildIndex(records, deps.embedder, {
      metric: settings.metric,
      concurrency: settings.concurrency,
      retry: settings.retry,
    });
  } catch (err) {
    console.error(`[Ingestion] Aborted before publishing; live index unchanged: ${errorMessage(err)}`);
    throw err;
  }

  // 5. Publish
  await deps.store.publish(index);

  const summary: IngestionSummary = {
    build_id: index.manifest.build_id,
    documents: documents.length,
    skipped_documents: skippedDocuments,
    pages,
    chunks: chunks.length,
    records: records.length,
    compression: countOutcomes(compressed),
    embedding_space: index.manifest.embedding_space,
  };

  console.log(`[Ingestion] Published ${summary.records} records as build ${summary.build_id}`);
  return { index, summary };
}
