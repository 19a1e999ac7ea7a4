import type { LLMResponse } from '../llm/types.js';
import type { ResponseCache } from './types.js';

export class MemoryCache implements ResponseCache {
  private readonly entries = new Map<string, LLMResponse>();

  async get(key: string): Promise<LLMResponse | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, response: LLMResponse): Promise<void> {
    this.entries.set(key, response);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
