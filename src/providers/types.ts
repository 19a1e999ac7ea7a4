export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  name?: string;
}

export interface ChatOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface ProviderResult {
  text: string;
  /** Tokens reported by the API; undefined when it reports none */
  usage?: number;
}

export interface ChatProvider {
  readonly name: string;
  /** Send messages and get a complete response */
  chat(messages: ChatMessage[], options: ChatOptions): Promise<ProviderResult>;
  /** Send messages and stream response chunks */
  stream(messages: ChatMessage[], options: ChatOptions): AsyncGenerator<string>;
  /** Legacy text completion; only OpenAI-compatible providers have it */
  complete?(prompt: string, options: ChatOptions): Promise<ProviderResult>;
}

export interface ProviderSettings {
  maxRetries: number;
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
}

export type ProviderFactory = (settings: ProviderSettings) => ChatProvider;
