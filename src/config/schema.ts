import { z } from 'zod';

export const ProviderTypeSchema = z.enum(['openai', 'anthropic', 'google', 'ollama']);

export const CacheConfigSchema = z.object({
  type: z.enum(['memory', 'redis', 'none']).default('memory'),
  /** Upstash REST URL. Falls back to UPSTASH_REDIS_REST_URL. */
  url: z.string().url().optional(),
  /** Upstash REST token. Falls back to UPSTASH_REDIS_REST_TOKEN. */
  token: z.string().min(1).optional(),
  prefix: z.string().default('citewise:llm'),
  ttlSeconds: z.number().int().positive().optional(),
});

export const LLMConfigSchema = z.object({
  type: ProviderTypeSchema.default('openai'),
  chatModel: z.string().min(1).optional(),
  completionModel: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).default(0),
  /** Route `generate` through the chat endpoint instead of legacy completions. */
  useChatForCompletion: z.boolean().default(true),
  stream: z.boolean().default(false),
  maxRetries: z.number().int().min(0).max(10).default(3),
  cache: CacheConfigSchema.default({}),
});

export const SettingsSchema = z.object({
  debug: z.boolean().default(false),
  /** Whether streaming is allowed at all. Scoped overrides can only narrow it. */
  stream: z.boolean().default(true),
});

export type ProviderType = z.infer<typeof ProviderTypeSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type LLMConfigInput = z.input<typeof LLMConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
