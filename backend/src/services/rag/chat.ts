/**
 * Answer Synthesis Service
 *
 * Grounded generation over retrieved passages.
 * 1. Assembles the original text of the hits into a bounded context
 * 2. Answers "not available" without calling the model when the context is empty
 * 3. Calls the generation provider with a context-only system prompt
 * 4. Maps a refusal or empty reply to the fixed "not available" answer
 */

import type {
  Answer,
  AnswerContext,
  CallOptions,
  GenerationProvider,
  RetrievalResult,
  SourceCitation,
} from '../../types/rag.js';
import { GenerationUnavailable, InvalidArgument } from '../../utils/errors.js';
import { buildAnswerSystemPrompt, NOT_AVAILABLE_ANSWER } from './prompts.js';

export { NOT_AVAILABLE_ANSWER } from './prompts.js';

const PASSAGE_SEPARATOR = '\n\n';
const REFUSAL_MARKER = "i don't have that information";

export interface SynthesisOptions extends CallOptions {
  context_budget_chars: number;
}

/**
 * Concatenate distinct original texts in retrieval order, cut at the budget.
 * Sources list only the passages that made it in, once per source_id + page.
 */
export function buildAnswerContext(result: RetrievalResult, budgetChars: number): AnswerContext {
  if (!Number.isInteger(budgetChars) || budgetChars <= 0) {
    throw new InvalidArgument(`Context budget must be a positive integer (got ${budgetChars})`);
  }

  const seenTexts = new Set<string>();
  const seenSources = new Set<string>();
  const sources: SourceCitation[] = [];
  let text = '';

  for (const { record } of result) {
    if (!record.original_text || seenTexts.has(record.original_text)) continue;

    const separator = text ? PASSAGE_SEPARATOR : '';
    const remaining = budgetChars - text.length - separator.length;
    if (remaining <= 0) break;

    const truncated = record.original_text.length > remaining;
    text += separator + (truncated ? record.original_text.slice(0, remaining) : record.original_text);
    seenTexts.add(record.original_text);

    const sourceKey = `${record.source_id}\u0000${record.page ?? ''}`;
    if (!seenSources.has(sourceKey)) {
      seenSources.add(sourceKey);
      sources.push({ source_id: record.source_id, page: record.page });
    }

    if (truncated) break;
  }

  return { text, sources };
}

/**
 * Only a reply that opens with the refusal counts; a grounded answer that
 * merely caveats part of the question keeps its text and sources.
 */
function isRefusal(reply: string): boolean {
  const normalized = reply.trim().toLowerCase().replace(/[‘’]/g, "'");
  return normalized.length === 0 || normalized.startsWith(REFUSAL_MARKER);
}

export async function synthesizeAnswer(
  query: string,
  result: RetrievalResult,
  generator: GenerationProvider,
  options: SynthesisOptions,
): Promise<Answer> {
  const context = buildAnswerContext(result, options.context_budget_chars);

  if (!context.text) {
    return { answer: NOT_AVAILABLE_ANSWER, sources: [] };
  }

  let reply: string;
  try {
    reply = await generator.generate(
      { system: buildAnswerSystemPrompt(context.text), message: query },
      { timeout_ms: options.timeout_ms },
    );
  } catch (err) {
    console.error('[RAG Chat] Generation failed:', err instanceof Error ? err.message : err);
    throw new GenerationUnavailable('Answer generation failed', err);
  }

  if (isRefusal(reply)) {
    return { answer: NOT_AVAILABLE_ANSWER, sources: [] };
  }

  return { answer: reply.trim(), sources: context.sources };
}
