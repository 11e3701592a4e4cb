/**
 * Prompt templates for compression and grounded answering.
 */

import type { GenerationRequest, SummarizationRequest } from '../../types/rag.js';

export const NOT_AVAILABLE_ANSWER =
  "I don't have that information in the provided documents. Please contact the university office for assistance.";

const SUMMARIZATION_SYSTEM_PROMPT = `You are a text summarization expert. Summarize the text you are given concisely while preserving all key information, facts, dates, figures, names and requirements.

Rules:
- Output only the summary, with no preamble.
- Never add information that is not in the text.
- The summary must be shorter than the text.`;

export function buildSummarizationPrompt(request: SummarizationRequest): GenerationRequest {
  return {
    system: SUMMARIZATION_SYSTEM_PROMPT,
    message: `Summarize the following text in about ${request.target_length} characters.

Text to summarize:
${request.text}

Summary:`,
    temperature: 0,
    // ~3 chars per token, with headroom
    max_tokens: Math.max(64, Math.ceil(request.target_length / 2)),
  };
}

export function buildAnswerSystemPrompt(context: string): string {
  return `You are a helpful university FAQ assistant. Your role is to answer student questions based ONLY on the provided university documents.

Rules:
1. Answer based ONLY on the context provided below.
2. If the answer is not in the context, reply with exactly: "${NOT_AVAILABLE_ANSWER}"
3. Be concise and accurate.
4. If you mention dates, policies, or specific information, take them verbatim from the context.
5. Be friendly and helpful in tone.

## Context

${context}`;
}
