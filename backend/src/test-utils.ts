/**
 * In-process stand-ins for the embedding, summarization and generation
 * providers. Used by tests only.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import type { Server } from 'node:http';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Express } from 'express';
import type {
  CallOptions,
  EmbeddingProvider,
  GenerationProvider,
  GenerationRequest,
  SummarizationProvider,
  SummarizationRequest,
} from './types/rag.js';

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

export interface BagOfWordsOptions {
  dimension?: number;
  space?: string;
  batchSize?: number;
  /** Throw on every call after this many successful calls */
  failAfterCalls?: number;
}

/**
 * Deterministic embedder: each distinct word gets its own dimension (in
 * first-seen order, wrapping past `dimension`), a text's vector counts its
 * words.
 */
export class BagOfWordsEmbedder implements EmbeddingProvider {
  readonly embedding_space: string;
  readonly max_batch_size: number;
  readonly calls: string[][] = [];
  readonly callOptions: CallOptions[] = [];
  private readonly dimension: number;
  private readonly vocabulary = new Map<string, number>();
  private failAfterCalls: number | undefined;

  constructor(options: BagOfWordsOptions = {}) {
    this.dimension = options.dimension ?? 256;
    this.embedding_space = options.space ?? 'test:bag-of-words';
    this.max_batch_size = options.batchSize ?? 16;
    this.failAfterCalls = options.failAfterCalls;
  }

  failAfter(calls: number | undefined): void {
    this.failAfterCalls = calls;
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const word of tokenize(text)) {
      let slot = this.vocabulary.get(word);
      if (slot === undefined) {
        slot = this.vocabulary.size % this.dimension;
        this.vocabulary.set(word, slot);
      }
      vector[slot] += 1;
    }
    return vector;
  }

  async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    if (this.failAfterCalls !== undefined && this.calls.length >= this.failAfterCalls) {
      this.calls.push(texts);
      throw new Error('embedding service unreachable');
    }
    this.calls.push(texts);
    this.callOptions.push(options);
    return texts.map((text) => this.vectorize(text));
  }

  get embeddedTexts(): number {
    return this.calls.reduce((sum, batch) => sum + batch.length, 0);
  }
}

/**
 * Embedder returning fixed vectors looked up by text.
 */
export class FixedVectorEmbedder implements EmbeddingProvider {
  readonly max_batch_size = 100;

  constructor(
    private readonly vectors: Record<string, number[]>,
    readonly embedding_space = 'test:fixed',
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => {
      const vector = this.vectors[text];
      if (!vector) throw new Error(`No fixed vector for "${text}"`);
      return vector;
    });
  }
}

export type SummarizeFn = (request: SummarizationRequest) => string | Promise<string>;

export class FakeSummarizer implements SummarizationProvider {
  readonly requests: SummarizationRequest[] = [];

  constructor(private readonly fn: SummarizeFn = (request) => request.text) {}

  async summarize(request: SummarizationRequest): Promise<string> {
    this.requests.push(request);
    return this.fn(request);
  }
}

export type GenerateFn = (request: GenerationRequest) => string | Promise<string>;

export class FakeGenerator implements GenerationProvider {
  readonly requests: GenerationRequest[] = [];
  readonly callOptions: CallOptions[] = [];

  constructor(private readonly fn: GenerateFn) {}

  get callCount(): number {
    return this.requests.length;
  }

  async generate(request: GenerationRequest, options: CallOptions = {}): Promise<string> {
    this.requests.push(request);
    this.callOptions.push(options);
    return this.fn(request);
  }
}

export async function makeTempDir(prefix = 'doc-qa-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/**
 * Serve an express app on an ephemeral localhost port.
 */
export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((done, fail) => {
          server.close((err) => (err ? fail(err) : done()));
        }),
      });
    });
  });
}
