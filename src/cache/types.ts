import type { LLMResponse } from '../llm/types.js';

/** Stores responses keyed by a digest of the request that produced them. */
export interface ResponseCache {
  get(key: string): Promise<LLMResponse | undefined>;
  set(key: string, response: LLMResponse): Promise<void>;
}
