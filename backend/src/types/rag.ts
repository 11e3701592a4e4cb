// RAG pipeline types for the document index and its capability providers

// ============================================================================
// Source documents
// ============================================================================

export interface DocumentPage {
  page: number | null;
  text: string;
}

export interface SourceDocument {
  source_id: string;
  pages: DocumentPage[];
}

// ============================================================================
// Chunking
// ============================================================================

export interface Chunk {
  text: string;
  source_id: string;
  page: number | null;
  sequence: number;
}

export interface ChunkingOptions {
  chunk_size: number;
  overlap: number;
}

// ============================================================================
// Compression
// ============================================================================

export type CompressionOutcome = 'compressed' | 'skipped' | 'fallback';

export const COMPRESSION_OUTCOME_VALUES: CompressionOutcome[] = ['compressed', 'skipped', 'fallback'];

export interface CompressedChunk {
  source_id: string;
  sequence: number;
  compressed_text: string;
  ratio: number;
  outcome: CompressionOutcome;
}

export interface CompressionOptions {
  enabled: boolean;
  target_ratio: number;
  min_length: number;
  concurrency: number;
  timeout_ms?: number;
}

// ============================================================================
// Index records
// ============================================================================

export interface IndexRecord {
  readonly id: string;
  readonly source_id: string;
  readonly page: number | null;
  readonly sequence: number;
  readonly compressed_text: string;
  readonly original_text: string;
  readonly compression: {
    readonly ratio: number;
    readonly outcome: CompressionOutcome;
  };
}

export type DistanceMetric = 'cosine' | 'euclidean';

export const DISTANCE_METRIC_VALUES: DistanceMetric[] = ['cosine', 'euclidean'];

export interface IndexManifest {
  build_id: string;
  built_at: string;
  embedding_space: string;
  dimension: number;
  metric: DistanceMetric;
  record_count: number;
}

// ============================================================================
// Retrieval and answers
// ============================================================================

export interface RetrievalHit {
  record: IndexRecord;
  distance: number;
}

export type RetrievalResult = RetrievalHit[];

export interface SourceCitation {
  source_id: string;
  page: number | null;
}

export interface AnswerContext {
  text: string;
  sources: SourceCitation[];
}

export interface Answer {
  answer: string;
  sources: SourceCitation[];
}

// ============================================================================
// Capability providers
// ============================================================================

export interface CallOptions {
  /** Per-call timeout; providers fall back to their client default */
  timeout_ms?: number;
}

export interface EmbeddingProvider {
  /** "<provider>:<model>"; vectors from different spaces are not comparable */
  readonly embedding_space: string;
  readonly max_batch_size: number;
  embed(texts: string[], options?: CallOptions): Promise<number[][]>;
}

export interface SummarizationRequest {
  text: string;
  target_length: number;
}

export interface SummarizationProvider {
  summarize(request: SummarizationRequest, options?: CallOptions): Promise<string>;
}

export interface GenerationRequest {
  system: string;
  message: string;
  max_tokens?: number;
  temperature?: number;
}

export interface GenerationProvider {
  generate(request: GenerationRequest, options?: CallOptions): Promise<string>;
}
