/** One exchange of a conversation: [question, answer]. */
export type ChatTurn = readonly [question: string, answer: string];

/** Flatten a conversation (oldest first) into a plain transcript. */
export function collateChatHistory(history: readonly ChatTurn[]): string {
  return history.map(([question, answer]) => `Question: ${question}\nAnswer: ${answer}`).join('\n');
}
