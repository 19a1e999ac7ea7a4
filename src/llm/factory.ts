import type { Logger } from 'pino';
import { createCache } from '../cache/index.js';
import type { ResponseCache } from '../cache/types.js';
import { parseLLMConfig } from '../config/loader.js';
import type { LLMConfigInput } from '../config/schema.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';
import { isRateLimit } from '../providers/retry.js';
import { getProvider } from '../providers/router.js';
import type { ChatProvider } from '../providers/types.js';
import { ApiLanguageModel } from './model.js';

export interface CreateModelOptions {
  /** Use this provider instead of building one from `config.type` */
  provider?: ChatProvider;
  /** Use this cache instead of the one `config.cache` names; `null` disables caching */
  cache?: ResponseCache | null;
  logger?: Logger;
  output?: (chunk: string) => void;
}

/**
 * Create a language model for the provider named in the config.
 * Throws ConfigError for an unknown provider type or a missing API key.
 */
export function createLanguageModel(
  input: LLMConfigInput | Record<string, unknown> = {},
  options: CreateModelOptions = {},
): ApiLanguageModel {
  const config = parseLLMConfig(input);
  const logger = options.logger ?? createLogger();

  const provider =
    options.provider ??
    getProvider(config.type, {
      maxRetries: config.maxRetries,
      onRetry: (attempt, delayMs, err) => {
        const reason = isRateLimit(err) ? 'rate limited' : errorMessage(err);
        logger.warn({ provider: config.type, attempt, delayMs }, `retrying after: ${reason}`);
      },
    });

  const cache = options.cache === null ? undefined : options.cache ?? createCache(config.cache);

  return new ApiLanguageModel(config, { provider, cache, logger, output: options.output });
}
