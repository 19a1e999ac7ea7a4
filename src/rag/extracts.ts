import { RAG_MAX_TOKENS } from '../config/defaults.js';
import { noopDebug, type DebugSink } from '../logging/logger.js';
import { EXTRACTION_PROMPT, NO_ANSWER, interpolate } from '../prompts/templates.js';
import type { Document, LanguageModel } from '../llm/types.js';

/**
 * Ask the model for the text in `passage` that is relevant to `question`,
 * copied verbatim.
 */
export async function getVerbatimExtract(
  llm: Pick<LanguageModel, 'generate'>,
  question: string,
  passage: Document,
  debug: DebugSink = noopDebug,
): Promise<string> {
  const prompt = interpolate(EXTRACTION_PROMPT, { question, content: passage.content });
  debug(prompt, 'EXTRACT-PROMPT= ');
  const response = await llm.generate(prompt, RAG_MAX_TOKENS);
  const extract = response.message.trim();
  debug(extract, 'EXTRACT-RESPONSE= ');
  return extract;
}

/**
 * Extract verbatim relevant text from every passage, one concurrent model call
 * per passage.
 *
 * Results come back in input order with each passage's metadata carried over,
 * so sources can be cited downstream. If any call fails, the whole batch
 * rejects with that error.
 */
export async function getVerbatimExtracts(
  llm: Pick<LanguageModel, 'generate'>,
  question: string,
  passages: readonly Document[],
  debug: DebugSink = noopDebug,
): Promise<Document[]> {
  if (passages.length === 0) return [];

  // Promise.all keeps input order whatever order the calls settle in
  const extracts = await Promise.all(
    passages.map((passage) => getVerbatimExtract(llm, question, passage, debug)),
  );

  return passages.map((passage, i) => ({
    content: extracts[i],
    metadata: { ...passage.metadata },
  }));
}

/** Drop extracts where the model found nothing relevant. */
export function relevantExtracts(extracts: readonly Document[]): Document[] {
  return extracts.filter((doc) => doc.content !== NO_ANSWER);
}
