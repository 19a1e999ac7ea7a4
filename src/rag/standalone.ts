import { RAG_MAX_TOKENS } from '../config/defaults.js';
import { noopDebug, type DebugSink } from '../logging/logger.js';
import { collateChatHistory, type ChatTurn } from '../prompts/dialog.js';
import { STANDALONE_QUESTION_PROMPT, interpolate } from '../prompts/templates.js';
import type { LanguageModel } from '../llm/types.js';

/**
 * Rephrase a follow-up question so it can be understood without the
 * conversation that came before it.
 */
export async function followupToStandalone(
  llm: Pick<LanguageModel, 'generate'>,
  history: readonly ChatTurn[],
  question: string,
  debug: DebugSink = noopDebug,
): Promise<string> {
  const prompt = interpolate(STANDALONE_QUESTION_PROMPT, {
    history: collateChatHistory(history),
    question,
  });
  debug(prompt, 'FOLLOWUP->STANDALONE-PROMPT= ');
  const standalone = (await llm.generate(prompt, RAG_MAX_TOKENS)).message.trim();
  debug(standalone, 'FOLLOWUP->STANDALONE-RESPONSE= ');
  return standalone;
}
