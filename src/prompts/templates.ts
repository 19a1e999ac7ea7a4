/**
 * Fill `{{name}}` placeholders. Unknown names are left as they are, and
 * substituted values are never scanned again.
 */
export function interpolate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}

/** What the extraction prompt asks the model to reply when a passage is irrelevant. */
export const NO_ANSWER = 'NO_ANSWER';

export const EXTRACTION_PROMPT = `
Here is a passage of text. Copy out, word for word, only the sentences from it
that are relevant to the question below. Do not paraphrase, summarize or add
anything of your own. If nothing in the passage is relevant, reply with
${NO_ANSWER}.

Passage:
{{content}}

Question: {{question}}

Relevant verbatim text:
`.trim();

export const SUMMARY_ANSWER_PROMPT = `
Use the extracts below to answer the question. Keep to what the extracts say.
After the answer, on a new line, write "SOURCE:" followed by the sources of the
extracts you used, separated by commas. If the extracts do not answer the
question, say "I don't know." and leave out the SOURCE line.

{{extracts}}

{{question}}
Answer:
`.trim();

export const STANDALONE_QUESTION_PROMPT = `
Given the conversation below, and a follow-up question, rephrase the follow-up
question as a standalone question.

Chat history: {{history}}
Follow-up question: {{question}}
`.trim();
