import { z } from 'zod';

export const RoleSchema = z.enum(['user', 'system', 'assistant']);

export const LLMMessageSchema = z.object({
  role: RoleSchema,
  name: z.string().min(1).optional(),
  content: z.string(),
});

export const LLMResponseSchema = z.object({
  message: z.string(),
  /** Token count, reported by the API or estimated for streamed output */
  usage: z.number().int().nonnegative(),
  /** True when the response cache served this instead of a live call */
  cached: z.boolean().default(false),
});

export type Role = z.infer<typeof RoleSchema>;
export type LLMMessage = Readonly<z.infer<typeof LLMMessageSchema>>;
export type LLMResponse = Readonly<z.infer<typeof LLMResponseSchema>>;

/** A unit of text plus arbitrary metadata; input context and answer container alike. */
export interface Document {
  readonly content: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export function formatMessage(message: LLMMessage): string {
  const who = message.name ? `${message.role} (${message.name})` : message.role;
  return `${who}: ${message.content}`;
}

/**
 * The capability set every model handle offers, whatever provider backs it.
 */
export interface LanguageModel {
  generate(prompt: string, maxTokens?: number): Promise<LLMResponse>;
  chat(messages: string | readonly LLMMessage[], maxTokens?: number): Promise<LLMResponse>;
  /** Shorthand for `generate`. */
  call(prompt: string, maxTokens?: number): Promise<LLMResponse>;
  /** Enable or disable streaming output. Returns the previous value. */
  setStream(stream: boolean): boolean;
  getStream(): boolean;
}
