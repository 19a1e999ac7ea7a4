import { describe, expect, it, vi } from 'vitest';
import { MemoryCache } from '../../cache/memory.js';
import type { ResponseCache } from '../../cache/types.js';
import { parseLLMConfig } from '../../config/loader.js';
import { ConfigError, ProviderError } from '../../errors.js';
import { createLogger } from '../../logging/logger.js';
import { ApiLanguageModel, DEFAULT_SYSTEM_PROMPT, cacheKey, estimateTokens } from '../model.js';
import type { ChatProvider } from '../../providers/types.js';
import type { LLMResponse } from '../types.js';
import { FakeChatProvider, chatOnlyProvider } from '../../__tests__/helpers/fakeProvider.js';

const logger = createLogger({ level: 'silent' });

function buildModel(
  provider: ChatProvider,
  config: Record<string, unknown> = {},
  options: { cache?: ResponseCache; output?: (chunk: string) => void } = {},
) {
  return new ApiLanguageModel(parseLLMConfig(config), {
    provider,
    logger,
    cache: options.cache,
    output: options.output,
  });
}

describe('ApiLanguageModel', () => {
  it('wraps a bare prompt in a system and user message', async () => {
    const provider = new FakeChatProvider();
    const model = buildModel(provider);

    const response = await model.chat('Hello');

    expect(response).toEqual({ message: 'Fake response', usage: 7, cached: false });
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0].messages).toEqual([
      { role: 'system', content: DEFAULT_SYSTEM_PROMPT },
      { role: 'user', content: 'Hello' },
    ]);
    expect(provider.requests[0].options).toEqual({ model: 'gpt-4o-mini', maxTokens: 1024, temperature: 0 });
  });

  it('passes explicit messages through, names included', async () => {
    const provider = new FakeChatProvider();
    const model = buildModel(provider);

    await model.chat([{ role: 'user', name: 'ana', content: 'Hi' }], 64);

    expect(provider.requests[0].messages).toEqual([{ role: 'user', name: 'ana', content: 'Hi' }]);
    expect(provider.requests[0].options.maxTokens).toBe(64);
  });

  it('routes generate and call through chat by default', async () => {
    const provider = new FakeChatProvider();
    const model = buildModel(provider);

    await model.generate('one', 10);
    await model.call('two', 10);

    expect(provider.completions).toHaveLength(0);
    expect(provider.requests.map((r) => r.messages[1].content)).toEqual(['one', 'two']);
  });

  it('uses the completions endpoint when chat-for-completion is off', async () => {
    const provider = new FakeChatProvider();
    const model = buildModel(provider, { useChatForCompletion: false });

    const response = await model.generate('Complete me', 32);

    expect(response.message).toBe('Fake response');
    expect(provider.requests).toHaveLength(0);
    expect(provider.completions).toEqual([
      { prompt: 'Complete me', options: { model: 'gpt-3.5-turbo-instruct', maxTokens: 32, temperature: 0 } },
    ]);
  });

  it('falls back to chat when the provider has no completions endpoint', async () => {
    const provider = chatOnlyProvider('from chat');
    const model = buildModel(provider, { useChatForCompletion: false });

    const response = await model.generate('Complete me');

    expect(response.message).toBe('from chat');
  });

  it('serves a repeated request from the cache', async () => {
    const provider = new FakeChatProvider();
    const cache = new MemoryCache();
    const model = buildModel(provider, {}, { cache });

    const first = await model.generate('Same prompt', 100);
    const second = await model.generate('Same prompt', 100);

    expect(first.cached).toBe(false);
    expect(second).toEqual({ message: 'Fake response', usage: 7, cached: true });
    expect(provider.requests).toHaveLength(1);
    expect(cache.size).toBe(1);
  });

  it('keys the cache on request parameters', async () => {
    const provider = new FakeChatProvider();
    const model = buildModel(provider, {}, { cache: new MemoryCache() });

    await model.generate('Same prompt', 100);
    const other = await model.generate('Same prompt', 200);

    expect(other.cached).toBe(false);
    expect(provider.requests).toHaveLength(2);
  });

  it('streams chunks to the output sink when streaming is on', async () => {
    const provider = new FakeChatProvider(() => ({ text: 'streamed text!' }));
    const chunks: string[] = [];
    const model = buildModel(provider, {}, { output: (chunk) => chunks.push(chunk) });

    expect(model.setStream(true)).toBe(false);
    const response = await model.generate('Go');

    expect(chunks).toEqual(['streame', 'd text!']);
    expect(response).toEqual({ message: 'streamed text!', usage: 4, cached: false });
  });

  it('writes completions output to the sink when streaming is on', async () => {
    const provider = new FakeChatProvider(() => ({ text: 'completed text' }));
    const chunks: string[] = [];
    const model = buildModel(provider, { useChatForCompletion: false }, { output: (chunk) => chunks.push(chunk) });

    model.setStream(true);
    const response = await model.generate('Q');

    expect(provider.completions).toHaveLength(1);
    expect(chunks.join('')).toBe('completed text');
    expect(response.message).toBe('completed text');
  });

  it('treats a failing cache read as a miss', async () => {
    const provider = new FakeChatProvider();
    const set = vi.fn<(key: string, value: LLMResponse) => Promise<void>>(async () => undefined);
    const cache: ResponseCache = {
      get: async () => {
        throw new Error('cache unreachable');
      },
      set,
    };
    const model = buildModel(provider, {}, { cache });

    const response = await model.generate('Go');

    expect(response).toEqual({ message: 'Fake response', usage: 7, cached: false });
    expect(provider.requests).toHaveLength(1);
    expect(set).toHaveBeenCalledTimes(1);
  });

  it('returns the response when the cache write fails', async () => {
    const provider = new FakeChatProvider();
    const cache: ResponseCache = {
      get: async () => undefined,
      set: async () => {
        throw new Error('cache unreachable');
      },
    };
    const model = buildModel(provider, {}, { cache });

    const response = await model.generate('Go');

    expect(response).toEqual({ message: 'Fake response', usage: 7, cached: false });
    expect(provider.requests).toHaveLength(1);
  });

  it('does not write to the output sink when streaming is off', async () => {
    const chunks: string[] = [];
    const model = buildModel(new FakeChatProvider(), {}, { output: (chunk) => chunks.push(chunk) });

    await model.generate('Go');

    expect(chunks).toEqual([]);
  });

  it('starts from the configured stream flag', () => {
    const model = buildModel(new FakeChatProvider(), { stream: true });

    expect(model.getStream()).toBe(true);
    expect(model.setStream(false)).toBe(true);
    expect(model.getStream()).toBe(false);
  });

  it('wraps transport failures in ProviderError and caches nothing', async () => {
    const cause = new Error('socket hang up');
    const cache = new MemoryCache();
    const model = buildModel(
      new FakeChatProvider(() => {
        throw cause;
      }),
      {},
      { cache },
    );

    const err = await model.generate('Q').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (err instanceof ProviderError) {
      expect(err.message).toBe('[fake] socket hang up');
      expect(err.provider).toBe('fake');
      expect(err.cause).toBe(cause);
    }
    expect(cache.size).toBe(0);
  });

  it('rejects a non-positive token budget', async () => {
    const provider = new FakeChatProvider();
    const model = buildModel(provider);

    await expect(model.generate('Q', 0)).rejects.toThrow(ConfigError);
    expect(provider.requests).toHaveLength(0);
  });
});

describe('estimateTokens', () => {
  it('rounds up at 3.5 characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(2);
    expect(estimateTokens('abcdefg')).toBe(2);
  });
});

describe('cacheKey', () => {
  it('is stable for equal requests and differs by kind', () => {
    const chat = { kind: 'chat' as const, model: 'm', messages: [], maxTokens: 1, temperature: 0 };
    const completion = { kind: 'completion' as const, model: 'm', prompt: '', maxTokens: 1, temperature: 0 };

    expect(cacheKey(chat)).toBe(cacheKey({ ...chat }));
    expect(cacheKey(chat)).not.toBe(cacheKey(completion));
    expect(cacheKey(chat)).toMatch(/^[0-9a-f]{64}$/);
  });
});
