import { RAG_MAX_TOKENS } from '../config/defaults.js';
import { MissingSourceError } from '../errors.js';
import { noopDebug, type DebugSink } from '../logging/logger.js';
import { SUMMARY_ANSWER_PROMPT, interpolate } from '../prompts/templates.js';
import type { Document, LanguageModel } from '../llm/types.js';

export const CITATION_MARKER = 'SOURCE:';

export interface ParsedAnswer {
  answer: string;
  citation: string;
}

/** Render passages as "Extract: ...\nSource: ..." blocks, one per line. */
export function stringifyPassages(passages: readonly Document[]): string {
  return passages
    .map((passage, i) => {
      if (!Object.hasOwn(passage.metadata, 'source')) {
        throw new MissingSourceError(i);
      }
      return `Extract: ${passage.content}\nSource: ${String(passage.metadata.source)}`;
    })
    .join('\n');
}

/**
 * Split a model answer on the first citation marker. Without a marker, the
 * whole text is the answer and the citation is empty.
 */
export function parseCitedAnswer(text: string): ParsedAnswer {
  const trimmed = text.trim();
  const at = trimmed.indexOf(CITATION_MARKER);
  if (at === -1) {
    return { answer: trimmed, citation: '' };
  }
  return {
    answer: trimmed.slice(0, at).trim(),
    citation: trimmed.slice(at + CITATION_MARKER.length).trim(),
  };
}

/**
 * Answer `question` from the given passages, citing their sources.
 *
 * The returned document's `metadata.source` is always `"SOURCE: "` followed by
 * the citation, so an answer without citations still carries `"SOURCE: "`.
 */
export async function getSummaryAnswer(
  llm: Pick<LanguageModel, 'generate'>,
  question: string,
  passages: readonly Document[],
  debug: DebugSink = noopDebug,
): Promise<Document> {
  const extracts = stringifyPassages(passages);
  const prompt = interpolate(SUMMARY_ANSWER_PROMPT, {
    question: `Question:${question}`,
    extracts,
  });
  debug(prompt, 'SUMMARIZE_PROMPT= ');

  const response = await llm.generate(prompt, RAG_MAX_TOKENS);
  const finalAnswer = response.message.trim();
  debug(finalAnswer, 'SUMMARIZE_RESPONSE= ');

  const { answer, citation } = parseCitedAnswer(finalAnswer);
  return {
    content: answer,
    metadata: {
      source: `${CITATION_MARKER} ${citation}`,
      cached: response.cached,
    },
  };
}
