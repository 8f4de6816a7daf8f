import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { CacheBackendError } from '../errors.js';
import { NullCache, type Cache } from './cache.js';

export interface CacheOptions {
  enabled: boolean;
  redisUrl?: string | undefined;
}

export type RedisClientFactory = (redisUrl: string) => Redis;

/**
 * Redis-backed cache. Errors are logged and swallowed into misses.
 */
export class RedisCache implements Cache {
  constructor(
    private readonly client: Redis,
    private readonly logger: Logger
  ) {}

  async get(key: string): Promise<unknown> {
    try {
      const raw = await this.client.get(key);
      if (raw === null) return undefined;
      const value: unknown = JSON.parse(raw);
      return value;
    } catch (error) {
      this.logger.warn({ key, err: new CacheBackendError('cache get failed', { cause: error }) }, 'cache_get_failed');
      return undefined;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.client.set(key, JSON.stringify(value), 'EX', ttlSeconds);
    } catch (error) {
      this.logger.warn({ key, err: new CacheBackendError('cache set failed', { cause: error }) }, 'cache_set_failed');
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.debug({ err: error }, 'cache_close_failed');
      this.client.disconnect();
    }
  }
}

function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    lazyConnect: true,
    connectTimeout: 2000,
    commandTimeout: 2000,
    maxRetriesPerRequest: 1,
  });
}

/** Strip credentials before a URL reaches the logs. */
export function redactUrl(raw: string): string {
  try {
    const url = new URL(raw);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return '<invalid url>';
  }
}

/**
 * Build the configured cache. Falls back to NullCache when Redis is not
 * configured or does not answer PING.
 */
export async function buildCache(
  options: CacheOptions,
  logger: Logger,
  createClient: RedisClientFactory = createRedisClient
): Promise<Cache> {
  if (!options.enabled) {
    logger.info('cache_disabled');
    return new NullCache();
  }

  if (!options.redisUrl) {
    logger.warn('cache_enabled_but_no_redis_url');
    return new NullCache();
  }

  const client = createClient(options.redisUrl);
  // Without a listener ioredis prints connection errors to stderr itself
  client.on('error', (error: unknown) => {
    logger.warn({ err: new CacheBackendError('redis connection error', { cause: error }) }, 'cache_connection_error');
  });

  try {
    await client.connect();
    await client.ping();
    logger.info({ redisUrl: redactUrl(options.redisUrl) }, 'cache_enabled');
    return new RedisCache(client, logger);
  } catch (error) {
    logger.warn({ err: error, redisUrl: redactUrl(options.redisUrl) }, 'cache_init_failed');
    client.disconnect();
    return new NullCache();
  }
}
