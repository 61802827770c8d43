import { CacheUnavailableError } from '../errors';
import { createLogger, Logger } from '../logger';

/**
 * Redis commands the cache needs. ioredis satisfies this directly.
 */
export interface CacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}

/**
 * Ephemeral short code -> URL mapping. Never authoritative.
 */
export interface ResolutionCache {
  get(shortCode: string): Promise<string | null>;
  set(shortCode: string, originalUrl: string): Promise<void>;
}

export interface RedisResolutionCacheOptions {
  keyPrefix: string;
  ttlSeconds: number;
  logger?: Logger;
}

/**
 * Best-effort Redis cache: every failure degrades to a miss
 */
export class RedisResolutionCache implements ResolutionCache {
  private readonly keyPrefix: string;
  private readonly ttlSeconds: number;
  private readonly logger: Logger;

  constructor(private readonly client: CacheClient, options: RedisResolutionCacheOptions) {
    this.keyPrefix = options.keyPrefix;
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger ?? createLogger('cache');
  }

  key(shortCode: string): string {
    return `${this.keyPrefix}${shortCode}`;
  }

  async get(shortCode: string): Promise<string | null> {
    try {
      return await this.client.get(this.key(shortCode));
    } catch (error) {
      this.logger.warn(
        `Cache read failed for ${shortCode}`,
        new CacheUnavailableError('cache get failed', { cause: error })
      );
      return null;
    }
  }

  async set(shortCode: string, originalUrl: string): Promise<void> {
    try {
      await this.client.set(this.key(shortCode), originalUrl, 'EX', this.ttlSeconds);
    } catch (error) {
      this.logger.warn(
        `Cache write failed for ${shortCode}`,
        new CacheUnavailableError('cache set failed', { cause: error })
      );
    }
  }
}
