import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { LLMConfig } from '../config/schema.js';
import { DEFAULT_CHAT_MODELS, DEFAULT_COMPLETION_MODELS } from '../config/defaults.js';
import type { ResponseCache } from '../cache/types.js';
import { CitewiseError, ConfigError, ProviderError, errorMessage } from '../errors.js';
import type { ChatMessage, ChatOptions, ChatProvider, ProviderResult } from '../providers/types.js';
import type { LanguageModel, LLMMessage, LLMResponse } from './types.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

/**
 * Estimate tokens from text length (rough: ~3.5 chars per token).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 3.5);
}

type CacheableRequest =
  | { kind: 'chat'; model: string; messages: ChatMessage[]; maxTokens: number; temperature: number }
  | { kind: 'completion'; model: string; prompt: string; maxTokens: number; temperature: number };

export function cacheKey(request: CacheableRequest): string {
  return createHash('sha256').update(JSON.stringify(request)).digest('hex');
}

export interface ModelDeps {
  provider: ChatProvider;
  logger: Logger;
  cache?: ResponseCache;
  /** Where streamed chunks are written as they arrive */
  output?: (chunk: string) => void;
}

/**
 * A LanguageModel backed by a remote provider, with an optional response cache
 * in front of it.
 */
export class ApiLanguageModel implements LanguageModel {
  readonly config: LLMConfig;
  private readonly provider: ChatProvider;
  private readonly cache?: ResponseCache;
  private readonly logger: Logger;
  private readonly output: (chunk: string) => void;
  private streaming: boolean;

  constructor(config: LLMConfig, deps: ModelDeps) {
    this.config = config;
    this.provider = deps.provider;
    this.cache = deps.cache;
    this.logger = deps.logger.child({ provider: deps.provider.name });
    this.output = deps.output ?? ((chunk) => process.stdout.write(chunk));
    this.streaming = config.stream;
  }

  get chatModel(): string {
    return this.config.chatModel ?? DEFAULT_CHAT_MODELS[this.config.type];
  }

  get completionModel(): string | undefined {
    return this.config.completionModel ?? DEFAULT_COMPLETION_MODELS[this.config.type];
  }

  setStream(stream: boolean): boolean {
    const previous = this.streaming;
    this.streaming = stream;
    return previous;
  }

  getStream(): boolean {
    return this.streaming;
  }

  call(prompt: string, maxTokens?: number): Promise<LLMResponse> {
    return this.generate(prompt, maxTokens);
  }

  async generate(prompt: string, maxTokens?: number): Promise<LLMResponse> {
    const tokens = this.resolveMaxTokens(maxTokens);
    const complete = this.provider.complete;
    const model = this.completionModel;
    if (this.config.useChatForCompletion || !complete || !model) {
      return this.chat(prompt, tokens);
    }

    const options = this.chatOptions(model, tokens);
    return this.dispatch(
      { kind: 'completion', model, prompt, maxTokens: tokens, temperature: options.temperature },
      async () => {
        const result = await complete.call(this.provider, prompt, options);
        // The completions endpoint does not stream; emit the whole text at once
        if (this.streaming) this.output(result.text);
        return result;
      },
    );
  }

  async chat(messages: string | readonly LLMMessage[], maxTokens?: number): Promise<LLMResponse> {
    const tokens = this.resolveMaxTokens(maxTokens);
    const chatMessages: ChatMessage[] =
      typeof messages === 'string'
        ? [
            { role: 'system', content: DEFAULT_SYSTEM_PROMPT },
            { role: 'user', content: messages },
          ]
        : messages.map((m) => ({ ...m }));

    const options = this.chatOptions(this.chatModel, tokens);
    return this.dispatch(
      {
        kind: 'chat',
        model: options.model,
        messages: chatMessages,
        maxTokens: tokens,
        temperature: options.temperature,
      },
      () => (this.streaming ? this.streamChat(chatMessages, options) : this.provider.chat(chatMessages, options)),
    );
  }

  private resolveMaxTokens(maxTokens: number | undefined): number {
    const tokens = maxTokens ?? this.config.maxTokens;
    if (!Number.isInteger(tokens) || tokens <= 0) {
      throw new ConfigError(`maxTokens must be a positive integer, got ${tokens}`);
    }
    return tokens;
  }

  private chatOptions(model: string, maxTokens: number): ChatOptions {
    return { model, maxTokens, temperature: this.config.temperature };
  }

  private async streamChat(messages: ChatMessage[], options: ChatOptions): Promise<ProviderResult> {
    const parts: string[] = [];
    for await (const chunk of this.provider.stream(messages, options)) {
      parts.push(chunk);
      this.output(chunk);
    }
    return { text: parts.join('') };
  }

  private async dispatch(request: CacheableRequest, send: () => Promise<ProviderResult>): Promise<LLMResponse> {
    const key = this.cache ? cacheKey(request) : undefined;

    if (key) {
      const hit = await this.cacheGet(key);
      if (hit) {
        this.logger.debug({ kind: request.kind, model: request.model, cached: true }, 'llm request');
        if (this.streaming) this.output(hit.message);
        return { ...hit, cached: true };
      }
    }

    let result: ProviderResult;
    try {
      result = await send();
    } catch (err) {
      if (err instanceof CitewiseError) throw err;
      throw new ProviderError(this.provider.name, errorMessage(err), { cause: err });
    }

    const response: LLMResponse = {
      message: result.text,
      usage: result.usage ?? estimateTokens(result.text),
      cached: false,
    };
    this.logger.debug(
      { kind: request.kind, model: request.model, cached: false, usage: response.usage },
      'llm request',
    );

    if (key) {
      await this.cacheSet(key, response);
    }
    return response;
  }

  /** A failing cache backend counts as a miss. */
  private async cacheGet(key: string): Promise<LLMResponse | undefined> {
    if (!this.cache) return undefined;
    try {
      return await this.cache.get(key);
    } catch (err) {
      this.logger.warn({ err }, `cache read failed: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async cacheSet(key: string, response: LLMResponse): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(key, response);
    } catch (err) {
      this.logger.warn({ err }, `cache write failed: ${errorMessage(err)}`);
    }
  }
}
