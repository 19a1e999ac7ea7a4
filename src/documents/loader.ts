import { readFile, readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { DataError, errorMessage } from '../errors.js';
import type { Document } from '../llm/types.js';
import type { ChatTurn } from '../prompts/dialog.js';

const DOCUMENT_EXTENSIONS = new Set(['.md', '.txt']);

/**
 * Read every .md and .txt file in `dir` (not recursive) as a Document whose
 * source is the file name. Files come back sorted by name.
 */
export async function loadDocuments(dir: string): Promise<Document[]> {
  const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    throw new DataError(`Cannot read documents from ${dir}: ${errorMessage(err)}`, { cause: err });
  });

  const files = entries
    .filter((e) => e.isFile() && DOCUMENT_EXTENSIONS.has(extname(e.name).toLowerCase()))
    .map((e) => e.name)
    .sort();

  const docs: Document[] = [];
  for (const file of files) {
    const content = await readFile(join(dir, file), 'utf-8');
    if (!content.trim()) continue;
    docs.push({ content: content.trim(), metadata: { source: file } });
  }
  return docs;
}

const ChatHistorySchema = z.array(
  z.object({
    question: z.string(),
    answer: z.string(),
  }),
);

/** Read a YAML list of `{ question, answer }` exchanges, oldest first. */
export async function loadChatHistory(file: string): Promise<ChatTurn[]> {
  const raw = await readFile(file, 'utf-8').catch((err: unknown) => {
    throw new DataError(`Cannot read chat history from ${file}: ${errorMessage(err)}`, { cause: err });
  });
  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (err) {
    throw new DataError(`Invalid YAML in ${file}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = ChatHistorySchema.safeParse(data ?? []);
  if (!parsed.success) {
    throw new DataError(`Invalid chat history in ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data.map(({ question, answer }) => [question, answer] as const);
}
