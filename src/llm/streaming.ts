import type { LanguageModel } from './types.js';

/**
 * Run `body` with streaming set to `allowed && desired` on `llm`, then put the
 * previous flag back on every exit path.
 */
export async function streamingIfAllowed<T>(
  llm: Pick<LanguageModel, 'setStream'>,
  allowed: boolean,
  body: () => T | Promise<T>,
  desired = true,
): Promise<T> {
  const previous = llm.setStream(allowed && desired);
  try {
    return await body();
  } finally {
    llm.setStream(previous);
  }
}
