/**
 * OpenAI Chat Completions Client
 *
 * Alternative LLM provider for summarization and answer generation.
 * Same retry policy as the Claude client.
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

const OPENAI_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_MODEL = 'gpt-4o-mini';

export interface OpenAIChatClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  baseURL?: string;
}

interface ChatCompletionResponse {
  choices: { message: { role: string; content: string | null } }[];
}

function isRetryableOpenAIError(err: unknown): boolean {
  if (err instanceof AxiosError) {
    const status = err.response?.status;
    return status === 429 || status === 503;
  }
  return false;
}

export class OpenAIChatClient implements GenerationProvider, SummarizationProvider {
  private readonly client: AxiosInstance;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: OpenAIChatClientOptions) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 1024;
    this.temperature = options.temperature ?? 0.3;
    this.client = axios.create({
      baseURL: options.baseURL ?? OPENAI_BASE_URL,
      timeout: options.timeoutMs ?? 60000,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${options.apiKey}`,
      },
    });
  }

  async generate(request: GenerationRequest, options: CallOptions = {}): Promise<string> {
    const response = await withRetry(
      () => this.client.post<ChatCompletionResponse>(
        '/chat/completions',
        {
          model: this.model,
          max_tokens: request.max_tokens ?? this.maxTokens,
          temperature: request.temperature ?? this.temperature,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.message },
          ],
        },
        { timeout: options.timeout_ms },
      ),
      { isRetryable: isRetryableOpenAIError, label: 'OpenAI' },
    );

    return response.data.choices[0]?.message.content ?? '';
  }

  summarize(request: SummarizationRequest, options: CallOptions = {}): Promise<string> {
    return this.generate(buildSummarizationPrompt(request), options);
  }
}
