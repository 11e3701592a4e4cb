/**
 * Knowledge Base
 *
 * Query-serving facade over the live index. The loaded VectorIndex is an
 * immutable snapshot; a rebuild swaps the reference once the new build is
 * published, so in-flight queries finish against the snapshot they started
 * with.
 */

import type { RagConfig } from '../../config/rag-config.js';
import type {
  Answer,
  CompressionOutcome,
  DistanceMetric,
  EmbeddingProvider,
  GenerationProvider,
  SourceDocument,
  SummarizationProvider,
} from '../../types/rag.js';
import { IngestionInProgress, InvalidArgument } from '../../utils/errors.js';
import { NOT_AVAILABLE_ANSWER, synthesizeAnswer } from './chat.js';
import { IndexStore } from './index-store.js';
import { countOutcomes, ingestCorpus } from './ingestion.js';
import type { IngestionSettings, IngestionSummary } from './ingestion.js';
import { Retriever } from './search.js';
import type { VectorIndex } from './vector-index.js';

const MIN_QUESTION_LENGTH = 3;
const MAX_QUESTION_LENGTH = 1000;

export interface KnowledgeBaseDeps {
  embedder: EmbeddingProvider;
  summarizer: SummarizationProvider;
  generator: GenerationProvider;
  store: IndexStore;
  loadCorpus: () => Promise<SourceDocument[]>;
}

export interface KnowledgeBaseOptions {
  topK: number;
  contextBudgetChars: number;
  queryTimeoutMs: number;
  ingestion: IngestionSettings;
}

export interface AskOptions {
  k?: number;
  timeout_ms?: number;
}

export interface KnowledgeBaseStats {
  ready: boolean;
  ingesting: boolean;
  build_id: string | null;
  built_at: string | null;
  embedding_space: string | null;
  dimension: number;
  metric: DistanceMetric | null;
  total_records: number;
  compression: Record<CompressionOutcome, number> & { average_ratio: number };
}

export function validateQuestion(question: unknown): string {
  if (typeof question !== 'string' || question.trim().length === 0) {
    throw new InvalidArgument('Please enter a question');
  }
  const trimmed = question.trim();
  if (trimmed.length < MIN_QUESTION_LENGTH) {
    throw new InvalidArgument('Question is too short. Please provide more details.');
  }
  if (trimmed.length > MAX_QUESTION_LENGTH) {
    throw new InvalidArgument(`Question is too long. Please keep it under ${MAX_QUESTION_LENGTH} characters.`);
  }
  return trimmed;
}

export class KnowledgeBase {
  private index: VectorIndex | null = null;
  private ingestion: Promise<IngestionSummary> | null = null;

  constructor(
    private readonly deps: KnowledgeBaseDeps,
    private readonly options: KnowledgeBaseOptions,
  ) {}

  /**
   * (Re)load the live index from the store. Returns false when no valid
   * index has been published yet.
   */
  async load(): Promise<boolean> {
    const index = await this.deps.store.load();
    this.index = index;
    if (index) {
      console.log(`[KnowledgeBase] Loaded build ${index.manifest.build_id} with ${index.size} records`);
    } else {
      console.warn('[KnowledgeBase] No index found; run ingestion first');
    }
    return index !== null;
  }

  get ready(): boolean {
    return this.index !== null;
  }

  async ask(question: string, options: AskOptions = {}): Promise<Answer> {
    const query = validateQuestion(question);
    const k = options.k ?? this.options.topK;
    const timeoutMs = options.timeout_ms ?? this.options.queryTimeoutMs;

    const index = this.index;
    if (!index) {
      return { answer: NOT_AVAILABLE_ANSWER, sources: [] };
    }

    const retriever = new Retriever(index, this.deps.embedder);
    const hits = await retriever.retrieve(query, k, { timeout_ms: timeoutMs });

    return synthesizeAnswer(query, hits, this.deps.generator, {
      context_budget_chars: this.options.contextBudgetChars,
      timeout_ms: timeoutMs,
    });
  }

  /**
   * Run ingestion over the corpus (or the given documents) and swap in the
   * new index. Only one run at a time.
   */
  async reingest(documents?: SourceDocument[]): Promise<IngestionSummary> {
    if (this.ingestion) {
      throw new IngestionInProgress();
    }

    this.ingestion = (async () => {
      const corpus = documents ?? await this.deps.loadCorpus();
      const { index, summary } = await ingestCorpus(
        corpus,
        { embedder: this.deps.embedder, summarizer: this.deps.summarizer, store: this.deps.store },
        this.options.ingestion,
      );
      this.index = index;
      return summary;
    })();

    try {
      return await this.ingestion;
    } finally {
      this.ingestion = null;
    }
  }

  stats(): KnowledgeBaseStats {
    const index = this.index;
    return {
      ready: index !== null,
      ingesting: this.ingestion !== null,
      build_id: index?.manifest.build_id ?? null,
      built_at: index?.manifest.built_at ?? null,
      embedding_space: index?.manifest.embedding_space ?? null,
      dimension: index?.manifest.dimension ?? 0,
      metric: index?.manifest.metric ?? null,
      total_records: index?.size ?? 0,
      compression: countOutcomes(index ? index.records.map((r) => r.compression) : []),
    };
  }
}

export function knowledgeBaseOptionsFromConfig(config: RagConfig): KnowledgeBaseOptions {
  return {
    topK: config.retrieval.topK,
    contextBudgetChars: config.retrieval.contextBudgetChars,
    queryTimeoutMs: config.retrieval.queryTimeoutMs,
    ingestion: {
      chunk_size: config.chunking.chunkSize,
      overlap: config.chunking.overlap,
      compression: {
        enabled: config.compression.enabled,
        target_ratio: config.compression.targetRatio,
        min_length: config.compression.minLength,
        concurrency: config.ingestion.concurrency,
      },
      metric: config.retrieval.metric,
      concurrency: config.ingestion.concurrency,
      retry: {
        attempts: config.ingestion.retryAttempts,
        baseDelayMs: config.ingestion.retryBaseDelayMs,
      },
    },
  };
}

export function createIndexStore(config: RagConfig): IndexStore {
  return new IndexStore(config.indexDir, config.keepBuilds);
}
