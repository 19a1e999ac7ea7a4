// citewise public API
export { createLanguageModel, type CreateModelOptions } from './llm/factory.js';
export { ApiLanguageModel, estimateTokens, cacheKey, DEFAULT_SYSTEM_PROMPT } from './llm/model.js';
export { streamingIfAllowed } from './llm/streaming.js';
export { formatMessage, LLMMessageSchema, LLMResponseSchema, RoleSchema } from './llm/types.js';
export type { Document, LanguageModel, LLMMessage, LLMResponse, Role } from './llm/types.js';
export { getVerbatimExtract, getVerbatimExtracts, relevantExtracts } from './rag/extracts.js';
export { getSummaryAnswer, parseCitedAnswer, stringifyPassages, CITATION_MARKER } from './rag/summary.js';
export { followupToStandalone } from './rag/standalone.js';
export { collateChatHistory, type ChatTurn } from './prompts/dialog.js';
export {
  interpolate,
  EXTRACTION_PROMPT,
  SUMMARY_ANSWER_PROMPT,
  STANDALONE_QUESTION_PROMPT,
  NO_ANSWER,
} from './prompts/templates.js';
export { getProvider, listProviders } from './providers/router.js';
export type { ChatProvider, ChatMessage, ChatOptions, ProviderResult } from './providers/types.js';
export { createCache, MemoryCache, RedisCache, type RedisClient, type ResponseCache } from './cache/index.js';
export { LLMConfigSchema, SettingsSchema, CacheConfigSchema, ProviderTypeSchema } from './config/schema.js';
export type { LLMConfig, LLMConfigInput, Settings, CacheConfig, ProviderType } from './config/schema.js';
export { loadProjectConfig, resolveConfig, parseLLMConfig, parseSettings } from './config/loader.js';
export { createLogger, createDebugSink, type DebugSink } from './logging/logger.js';
export { loadDocuments, loadChatHistory } from './documents/loader.js';
export { formatAnswer, formatExtracts } from './output/terminal.js';
export {
  CitewiseError,
  ConfigError,
  ProviderError,
  DataError,
  MissingSourceError,
} from './errors.js';
