import { Redis } from '@upstash/redis';
import { LLMResponseSchema, type LLMResponse } from '../llm/types.js';
import { ConfigError } from '../errors.js';
import { ENV_KEYS } from '../config/defaults.js';
import type { CacheConfig } from '../config/schema.js';
import type { ResponseCache } from './types.js';

/** The two Upstash commands the cache needs. */
export interface RedisClient {
  get(key: string): Promise<unknown>;
  set(key: string, value: LLMResponse, opts?: { ex: number }): Promise<unknown>;
}

export function createRedisClient(config: CacheConfig): RedisClient {
  const url = config.url ?? process.env[ENV_KEYS.UPSTASH_REDIS_REST_URL];
  const token = config.token ?? process.env[ENV_KEYS.UPSTASH_REDIS_REST_TOKEN];
  if (!url || !token) {
    throw new ConfigError(
      `Redis cache needs cache.url and cache.token (or ${ENV_KEYS.UPSTASH_REDIS_REST_URL} and ${ENV_KEYS.UPSTASH_REDIS_REST_TOKEN}).`,
    );
  }
  return new Redis({ url, token });
}

export class RedisCache implements ResponseCache {
  constructor(
    private readonly client: RedisClient,
    private readonly prefix: string,
    private readonly ttlSeconds?: number,
  ) {}

  private keyFor(key: string): string {
    return `${this.prefix}:${key}`;
  }

  async get(key: string): Promise<LLMResponse | undefined> {
    const raw = await this.client.get(this.keyFor(key));
    if (raw === null || raw === undefined) return undefined;
    // Entries written by another version are treated as misses
    const parsed = LLMResponseSchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  }

  async set(key: string, response: LLMResponse): Promise<void> {
    if (this.ttlSeconds) {
      await this.client.set(this.keyFor(key), response, { ex: this.ttlSeconds });
    } else {
      await this.client.set(this.keyFor(key), response);
    }
  }
}
