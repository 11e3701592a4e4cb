/**
 * Embedding Providers
 *
 * OpenAI: text-embedding-3-small by default (1536 dimensions), batches of 100.
 * HuggingFace: Inference API feature extraction, L2-normalised vectors.
 *
 * Each provider reports an `embedding_space` ("<provider>:<model>") that is
 * stored with the index and checked at query time.
 */

import axios, { AxiosError } from 'axios';
import type { AxiosInstance } from 'axios';
import type { CallOptions, EmbeddingProvider } from '../../types/rag.js';

const OPENAI_BASE_URL = 'https://api.openai.com/v1';
const HUGGINGFACE_BASE_URL = 'https://api-inference.huggingface.co';
const DEFAULT_TIMEOUT_MS = 30000;
// Safety: truncate any input to ~6000 tokens worth of characters (8191 limit)
// cl100k_base worst case is ~3 chars/token, so 18000 chars ≈ 6000 tokens
const MAX_INPUT_CHARS = 18000;

function truncateInput(text: string): string {
  return text.length > MAX_INPUT_CHARS ? text.substring(0, MAX_INPUT_CHARS) : text;
}

function logAuthErrors(provider: string) {
  return (error: AxiosError) => {
    if (error.response?.status === 401 || error.response?.status === 403) {
      console.error(`[Embeddings] ${provider} authentication error - API key may be invalid`);
    }
    throw error;
  };
}

export interface OpenAIEmbeddingsOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
}

export class OpenAIEmbeddings implements EmbeddingProvider {
  readonly embedding_space: string;
  readonly max_batch_size = 100;
  private readonly model: string;
  private readonly client: AxiosInstance;

  constructor(options: OpenAIEmbeddingsOptions) {
    this.model = options.model ?? 'text-embedding-3-small';
    this.embedding_space = `openai:${this.model}`;
    this.client = axios.create({
      baseURL: options.baseURL ?? OPENAI_BASE_URL,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${options.apiKey}`,
      },
    });
    this.client.interceptors.response.use((response) => response, logAuthErrors('OpenAI'));
  }

  async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.post<{
      data: { embedding: number[]; index: number }[];
      usage: { prompt_tokens: number; total_tokens: number };
    }>(
      '/embeddings',
      { model: this.model, input: texts.map(truncateInput) },
      { timeout: options.timeout_ms },
    );

    // Sort by index to match input order
    return [...response.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}

function l2norm(vec: number[]): number[] {
  const n = Math.sqrt(vec.reduce((s, v) => s + v * v, 0)) || 1;
  return vec.map((v) => v / n);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

export interface HuggingFaceEmbeddingsOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
}

export class HuggingFaceEmbeddings implements EmbeddingProvider {
  readonly embedding_space: string;
  readonly max_batch_size = 32;
  private readonly model: string;
  private readonly client: AxiosInstance;

  constructor(options: HuggingFaceEmbeddingsOptions) {
    this.model = options.model ?? 'sentence-transformers/all-MiniLM-L6-v2';
    this.embedding_space = `huggingface:${this.model}`;
    this.client = axios.create({
      baseURL: options.baseURL ?? HUGGINGFACE_BASE_URL,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${options.apiKey}`,
      },
    });
    this.client.interceptors.response.use((response) => response, logAuthErrors('HuggingFace'));
  }

  async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    const { data } = await this.client.post<unknown>(
      `/pipeline/feature-extraction/${encodeURIComponent(this.model)}`,
      { inputs: texts.map(truncateInput), options: { wait_for_model: true } },
      { timeout: options.timeout_ms },
    );

    // A single input may come back as a bare vector
    const rows = isNumberArray(data) ? [data] : data;
    if (!Array.isArray(rows) || !rows.every(isNumberArray)) {
      throw new Error('HuggingFace feature-extraction returned an unexpected payload');
    }
    return rows.map(l2norm);
  }
}
