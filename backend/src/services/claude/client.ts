/**
 * Claude API Client
 *
 * Calls Anthropic's Messages API through axios (no SDK dependency).
 * Model: claude-sonnet-4-20250514 by default.
 *
 * Serves both chunk summarization and grounded answer generation.
 * 429/529 responses are retried with 1s/2s/4s backoff.
 */

import axios, { AxiosError } from 'axios';
import type { AxiosInstance } from 'axios';
import type {
  CallOptions,
  GenerationProvider,
  GenerationRequest,
  SummarizationProvider,
  SummarizationRequest,
} from '../../types/rag.js';
import { withRetry } from '../../utils/retry.js';
import { buildSummarizationPrompt } from '../rag/prompts.js';

const CLAUDE_API_URL = 'https://api.anthropic.com/v1';
const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const API_VERSION = '2023-06-01';

export interface ClaudeClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  baseURL?: string;
}

interface MessagesResponse {
  content: { type: string; text?: string }[];
}

function isRetryableClaudeError(err: unknown): boolean {
  if (err instanceof AxiosError) {
    const status = err.response?.status;
    return status === 429 || status === 529 || status === 503;
  }
  return false;
}

export class ClaudeClient implements GenerationProvider, SummarizationProvider {
  private readonly client: AxiosInstance;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: ClaudeClientOptions) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 1024;
    this.temperature = options.temperature ?? 0.3;
    this.client = axios.create({
      baseURL: options.baseURL ?? CLAUDE_API_URL,
      timeout: options.timeoutMs ?? 60000,
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': options.apiKey,
        'anthropic-version': API_VERSION,
      },
    });
  }

  /**
   * Send a message to Claude and return the response text.
   */
  async generate(request: GenerationRequest, options: CallOptions = {}): Promise<string> {
    const response = await withRetry(
      () => this.client.post<MessagesResponse>(
        '/messages',
        {
          model: this.model,
          max_tokens: request.max_tokens ?? this.maxTokens,
          temperature: request.temperature ?? this.temperature,
          system: request.system,
          messages: [{ role: 'user', content: request.message }],
        },
        { timeout: options.timeout_ms },
      ),
      { isRetryable: isRetryableClaudeError, label: 'Claude' },
    );

    const textBlock = response.data.content.find((b) => b.type === 'text');
    return textBlock?.text ?? '';
  }

  summarize(request: SummarizationRequest, options: CallOptions = {}): Promise<string> {
    return this.generate(buildSummarizationPrompt(request), options);
  }
}
