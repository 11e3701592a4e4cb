import type { RagConfig } from '../../config/rag-config.js';
import type { EmbeddingProvider, GenerationProvider, SummarizationProvider } from '../../types/rag.js';
import { InvalidConfiguration } from '../../utils/errors.js';
import { ClaudeClient } from '../claude/client.js';
import { OpenAIChatClient } from '../openai/client.js';
import { HuggingFaceEmbeddings, OpenAIEmbeddings } from './embeddings.js';

export interface Providers {
  embedder: EmbeddingProvider;
  summarizer: SummarizationProvider;
  generator: GenerationProvider;
}

function requireKey(key: string | undefined, name: string): string {
  if (!key) {
    throw new InvalidConfiguration(`${name} environment variable is required`);
  }
  return key;
}

export function createEmbeddingProvider(config: RagConfig): EmbeddingProvider {
  const { provider, model } = config.embedding;
  switch (provider) {
    case 'openai':
      return new OpenAIEmbeddings({ apiKey: requireKey(config.apiKeys.openai, 'OPENAI_API_KEY'), model });
    case 'huggingface':
      return new HuggingFaceEmbeddings({ apiKey: requireKey(config.apiKeys.huggingface, 'HUGGINGFACE_API_KEY'), model });
  }
}

export function createLlmProvider(config: RagConfig): GenerationProvider & SummarizationProvider {
  const { provider, model, temperature, maxOutputTokens } = config.llm;
  switch (provider) {
    case 'anthropic':
      return new ClaudeClient({
        apiKey: requireKey(config.apiKeys.anthropic, 'ANTHROPIC_API_KEY'),
        model,
        temperature,
        maxTokens: maxOutputTokens,
      });
    case 'openai':
      return new OpenAIChatClient({
        apiKey: requireKey(config.apiKeys.openai, 'OPENAI_API_KEY'),
        model,
        temperature,
        maxTokens: maxOutputTokens,
      });
  }
}

export function createProviders(config: RagConfig): Providers {
  const llm = createLlmProvider(config);
  return {
    embedder: createEmbeddingProvider(config),
    summarizer: llm,
    generator: llm,
  };
}
