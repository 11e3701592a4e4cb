/**
 * RAG Configuration
 * Chunking, compression, retrieval and provider settings read from the environment
 */

import type { DistanceMetric } from '../types/rag.js';
import { DISTANCE_METRIC_VALUES } from '../types/rag.js';
import { InvalidConfiguration } from '../utils/errors.js';

export type EmbeddingProviderName = 'openai' | 'huggingface';
export type LlmProviderName = 'anthropic' | 'openai';

const EMBEDDING_PROVIDERS: EmbeddingProviderName[] = ['openai', 'huggingface'];
const LLM_PROVIDERS: LlmProviderName[] = ['anthropic', 'openai'];

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
  openai: 'text-embedding-3-small',
  huggingface: 'sentence-transformers/all-MiniLM-L6-v2',
};

const DEFAULT_LLM_MODELS: Record<LlmProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
};

export interface RagConfig {
  port: number;
  corpusDir: string;
  indexDir: string;
  keepBuilds: number;

  chunking: {
    chunkSize: number;
    overlap: number;
  };

  compression: {
    enabled: boolean;
    targetRatio: number;
    // Chunks shorter than this are indexed as-is
    minLength: number;
  };

  retrieval: {
    topK: number;
    contextBudgetChars: number;
    metric: DistanceMetric;
    queryTimeoutMs: number;
  };

  ingestion: {
    concurrency: number;
    retryAttempts: number;
    retryBaseDelayMs: number;
  };

  embedding: {
    provider: EmbeddingProviderName;
    model: string;
  };

  llm: {
    provider: LlmProviderName;
    model: string;
    temperature: number;
    maxOutputTokens: number;
  };

  apiKeys: {
    openai?: string;
    anthropic?: string;
    huggingface?: string;
  };

  frontendUrls: string[];
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidConfiguration(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function floatFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfiguration(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function boolFrom(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new InvalidConfiguration(`${name} must be a boolean, got "${env[name]}"`);
}

function oneOf<T extends string>(env: Env, name: string, allowed: T[], fallback: T): T {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new InvalidConfiguration(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

function parseOrigins(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((url) => url.trim())
    .filter(Boolean)
    .map((url) => (url.startsWith('http://') || url.startsWith('https://') ? url : `https://${url}`));
}

/**
 * Build the configuration from environment variables, applying defaults.
 * Throws InvalidConfiguration for values that cannot be parsed.
 */
export function loadRagConfig(env: Env = process.env): RagConfig {
  const embeddingProvider = oneOf(env, 'EMBEDDING_PROVIDER', EMBEDDING_PROVIDERS, 'openai');
  const llmProvider = oneOf(env, 'LLM_PROVIDER', LLM_PROVIDERS, 'anthropic');

  return {
    port: intFrom(env, 'PORT', 3001),
    corpusDir: env.CORPUS_DIR || 'data/corpus',
    indexDir: env.INDEX_DIR || 'data/vector_index',
    keepBuilds: intFrom(env, 'INDEX_KEEP_BUILDS', 2),

    chunking: {
      chunkSize: intFrom(env, 'CHUNK_SIZE', 500),
      overlap: intFrom(env, 'CHUNK_OVERLAP', 100),
    },

    compression: {
      enabled: boolFrom(env, 'ENABLE_COMPRESSION', true),
      targetRatio: floatFrom(env, 'COMPRESSION_RATIO', 0.5),
      minLength: intFrom(env, 'COMPRESSION_MIN_LENGTH', 200),
    },

    retrieval: {
      topK: intFrom(env, 'TOP_K', 4),
      contextBudgetChars: intFrom(env, 'CONTEXT_BUDGET_CHARS', 4000),
      metric: oneOf(env, 'DISTANCE_METRIC', DISTANCE_METRIC_VALUES, 'cosine'),
      queryTimeoutMs: intFrom(env, 'QUERY_TIMEOUT_MS', 30000),
    },

    ingestion: {
      concurrency: intFrom(env, 'INGEST_CONCURRENCY', 5),
      retryAttempts: intFrom(env, 'EMBEDDING_RETRY_ATTEMPTS', 3),
      retryBaseDelayMs: intFrom(env, 'EMBEDDING_RETRY_BASE_DELAY_MS', 1000),
    },

    embedding: {
      provider: embeddingProvider,
      model: env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODELS[embeddingProvider],
    },

    llm: {
      provider: llmProvider,
      model: env.LLM_MODEL || DEFAULT_LLM_MODELS[llmProvider],
      temperature: floatFrom(env, 'GENERATION_TEMPERATURE', 0.3),
      maxOutputTokens: intFrom(env, 'MAX_OUTPUT_TOKENS', 500),
    },

    apiKeys: {
      openai: env.OPENAI_API_KEY || undefined,
      anthropic: env.ANTHROPIC_API_KEY || undefined,
      huggingface: env.HUGGINGFACE_API_KEY || undefined,
    },

    frontendUrls: parseOrigins(env.FRONTEND_URL),
  };
}

/**
 * Validate configuration values. Fatal at startup.
 */
export function validateRagConfig(config: RagConfig): void {
  const { chunking, compression, retrieval, ingestion } = config;

  if (chunking.chunkSize <= 0) {
    throw new InvalidConfiguration('CHUNK_SIZE must be positive');
  }
  if (chunking.overlap <= 0 || chunking.overlap >= chunking.chunkSize) {
    throw new InvalidConfiguration('CHUNK_OVERLAP must be positive and smaller than CHUNK_SIZE');
  }
  if (compression.targetRatio <= 0 || compression.targetRatio > 1) {
    throw new InvalidConfiguration('COMPRESSION_RATIO must be in (0, 1]');
  }
  if (compression.minLength < 0) {
    throw new InvalidConfiguration('COMPRESSION_MIN_LENGTH must not be negative');
  }
  if (retrieval.topK <= 0) {
    throw new InvalidConfiguration('TOP_K must be positive');
  }
  if (retrieval.contextBudgetChars <= 0) {
    throw new InvalidConfiguration('CONTEXT_BUDGET_CHARS must be positive');
  }
  if (retrieval.queryTimeoutMs <= 0) {
    throw new InvalidConfiguration('QUERY_TIMEOUT_MS must be positive');
  }
  if (ingestion.concurrency <= 0) {
    throw new InvalidConfiguration('INGEST_CONCURRENCY must be positive');
  }
  if (ingestion.retryAttempts <= 0) {
    throw new InvalidConfiguration('EMBEDDING_RETRY_ATTEMPTS must be positive');
  }
  if (ingestion.retryBaseDelayMs < 0) {
    throw new InvalidConfiguration('EMBEDDING_RETRY_BASE_DELAY_MS must not be negative');
  }
  if (config.keepBuilds < 1) {
    throw new InvalidConfiguration('INDEX_KEEP_BUILDS must be at least 1');
  }

  if (config.embedding.provider === 'openai' && !config.apiKeys.openai) {
    throw new InvalidConfiguration('OPENAI_API_KEY is required for the openai embedding provider');
  }
  if (config.embedding.provider === 'huggingface' && !config.apiKeys.huggingface) {
    throw new InvalidConfiguration('HUGGINGFACE_API_KEY is required for the huggingface embedding provider');
  }
  if (config.llm.provider === 'anthropic' && !config.apiKeys.anthropic) {
    throw new InvalidConfiguration('ANTHROPIC_API_KEY is required for the anthropic LLM provider');
  }
  if (config.llm.provider === 'openai' && !config.apiKeys.openai) {
    throw new InvalidConfiguration('OPENAI_API_KEY is required for the openai LLM provider');
  }
}
