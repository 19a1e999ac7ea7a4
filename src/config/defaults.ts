import type { ProviderType } from './schema.js';

export const DEFAULT_CHAT_MODELS: Record<ProviderType, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  google: 'gemini-1.5-flash',
  ollama: 'llama3.1',
};

/** Only the OpenAI-compatible providers still expose a completions endpoint. */
export const DEFAULT_COMPLETION_MODELS: Partial<Record<ProviderType, string>> = {
  openai: 'gpt-3.5-turbo-instruct',
  ollama: 'llama3.1',
};

export const ENV_KEYS = {
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  ANTHROPIC_API_KEY: 'ANTHROPIC_API_KEY',
  GOOGLE_API_KEY: 'GOOGLE_API_KEY',
  OLLAMA_BASE_URL: 'OLLAMA_BASE_URL',
  UPSTASH_REDIS_REST_URL: 'UPSTASH_REDIS_REST_URL',
  UPSTASH_REDIS_REST_TOKEN: 'UPSTASH_REDIS_REST_TOKEN',
  CITEWISE_DEBUG: 'CITEWISE_DEBUG',
  CITEWISE_STREAM: 'CITEWISE_STREAM',
  CITEWISE_PROVIDER: 'CITEWISE_PROVIDER',
} as const;

/** Token budget for the extraction, summary and standalone-question calls. */
export const RAG_MAX_TOKENS = 1024;
