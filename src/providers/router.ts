import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { ConfigError } from '../errors.js';
import { ENV_KEYS } from '../config/defaults.js';
import type { ProviderType } from '../config/schema.js';
import type {
  ChatProvider,
  ChatMessage,
  ChatOptions,
  ProviderFactory,
  ProviderResult,
  ProviderSettings,
} from './types.js';
import { withRetry } from './retry.js';

function requireKey(name: string): string {
  const key = process.env[name];
  if (!key) throw new ConfigError(`${name} environment variable not set. Add it to .env or export it.`);
  return key;
}

function toOpenAIMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((m) => (m.name ? { role: m.role, content: m.content, name: m.name } : { role: m.role, content: m.content }));
}

// --- OpenAI-compatible Factory (OpenAI, Ollama) ---

function openaiCompatible(name: string, client: OpenAI, settings: ProviderSettings): ChatProvider {
  const retry = <T>(fn: () => Promise<T>) =>
    withRetry(fn, { maxRetries: settings.maxRetries, onRetry: settings.onRetry });

  return {
    name,

    async chat(messages: ChatMessage[], options: ChatOptions): Promise<ProviderResult> {
      return retry(async () => {
        const res = await client.chat.completions.create(
          {
            model: options.model,
            messages: toOpenAIMessages(messages),
            temperature: options.temperature,
            max_tokens: options.maxTokens,
          }
        );
        return {
          text: res.choices[0]?.message?.content ?? '',
          usage: res.usage?.total_tokens,
        };
      });
    },

    async *stream(messages: ChatMessage[], options: ChatOptions): AsyncGenerator<string> {
      const stream = await client.chat.completions.create(
        {
          model: options.model,
          messages: toOpenAIMessages(messages),
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          stream: true,
        }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    },

    async complete(prompt: string, options: ChatOptions): Promise<ProviderResult> {
      return retry(async () => {
        const res = await client.completions.create(
          {
            model: options.model,
            prompt,
            temperature: options.temperature,
            max_tokens: options.maxTokens,
          }
        );
        return {
          text: res.choices[0]?.text ?? '',
          usage: res.usage?.total_tokens,
        };
      });
    },
  };
}

const openaiFactory: ProviderFactory = (settings) =>
  openaiCompatible('openai', new OpenAI({ apiKey: requireKey(ENV_KEYS.OPENAI_API_KEY) }), settings);

const ollamaFactory: ProviderFactory = (settings) => {
  const baseURL = process.env[ENV_KEYS.OLLAMA_BASE_URL] ?? 'http://localhost:11434/v1';
  return openaiCompatible('ollama', new OpenAI({ baseURL, apiKey: 'ollama' }), settings);
};

// --- Anthropic Factory ---

const anthropicFactory: ProviderFactory = (settings) => {
  const client = new Anthropic({ apiKey: requireKey(ENV_KEYS.ANTHROPIC_API_KEY) });

  function toAnthropicMessages(messages: ChatMessage[]) {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const msgs: Anthropic.MessageParam[] = [];
    for (const m of messages) {
      if (m.role === 'user' || m.role === 'assistant') {
        msgs.push({ role: m.role, content: m.content });
      }
    }
    return { system: system || undefined, messages: msgs };
  }

  return {
    name: 'anthropic',

    async chat(messages: ChatMessage[], options: ChatOptions): Promise<ProviderResult> {
      return withRetry(
        async () => {
          const { system, messages: msgs } = toAnthropicMessages(messages);
          const res = await client.messages.create(
            {
              model: options.model,
              system,
              messages: msgs,
              temperature: options.temperature,
              max_tokens: options.maxTokens,
            }
          );
          const textBlock = res.content.find((b) => b.type === 'text');
          return {
            text: textBlock && textBlock.type === 'text' ? textBlock.text : '',
            usage: res.usage.input_tokens + res.usage.output_tokens,
          };
        },
        { maxRetries: settings.maxRetries, onRetry: settings.onRetry },
      );
    },

    async *stream(messages: ChatMessage[], options: ChatOptions): AsyncGenerator<string> {
      const { system, messages: msgs } = toAnthropicMessages(messages);
      const stream = client.messages.stream(
        {
          model: options.model,
          system,
          messages: msgs,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
        }
      );

      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    },
  };
};

// --- Google Factory ---

const googleFactory: ProviderFactory = (settings) => {
  const ai = new GoogleGenerativeAI(requireKey(ENV_KEYS.GOOGLE_API_KEY));

  function toGoogleParams(messages: ChatMessage[], options: ChatOptions) {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const contents = messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    const genModel = ai.getGenerativeModel({
      model: options.model,
      systemInstruction: system || undefined,
      generationConfig: {
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens,
      },
    });
    return { genModel, contents };
  }

  return {
    name: 'google',

    async chat(messages: ChatMessage[], options: ChatOptions): Promise<ProviderResult> {
      return withRetry(
        async () => {
          const { genModel, contents } = toGoogleParams(messages, options);
          const response = await genModel.generateContent({ contents });
          return {
            text: response.response.text(),
            usage: response.response.usageMetadata?.totalTokenCount,
          };
        },
        { maxRetries: settings.maxRetries, onRetry: settings.onRetry },
      );
    },

    async *stream(messages: ChatMessage[], options: ChatOptions): AsyncGenerator<string> {
      const { genModel, contents } = toGoogleParams(messages, options);
      const response = await genModel.generateContentStream({ contents });

      for await (const chunk of response.stream) {
        const text = chunk.text();
        if (text) yield text;
      }
    },
  };
};

// --- Provider Routing ---

const FACTORIES: Record<ProviderType, ProviderFactory> = {
  openai: openaiFactory,
  anthropic: anthropicFactory,
  google: googleFactory,
  ollama: ollamaFactory,
};

/** Build the ChatProvider for a provider kind. */
export function getProvider(type: ProviderType, settings: ProviderSettings): ChatProvider {
  const factory = FACTORIES[type];
  if (!factory) {
    throw new ConfigError(`Unsupported provider type "${String(type)}". Expected one of: ${listProviders().join(', ')}`);
  }
  return factory(settings);
}

/** List available provider kinds (for help text) */
export function listProviders(): ProviderType[] {
  return Object.keys(FACTORIES).filter((key): key is ProviderType => key in FACTORIES);
}
