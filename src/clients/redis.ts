import Redis from 'ioredis';
import { AppConfig } from '../config';
import { createLogger } from '../logger';

const logger = createLogger('redis');

/**
 * Build the Redis client shared by the counter and the cache.
 *
 * Commands fail fast while disconnected and time out after
 * `commandTimeout`, so callers see an error instead of blocking.
 */
export function createRedisClient(options: AppConfig['redis']): Redis {
  const redis = new Redis(options.url, {
    lazyConnect: true,
    connectTimeout: options.connectionTimeout,
    commandTimeout: options.commandTimeout,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 200, 2000),
  });

  // Emitted on every failed (re)connect; commands report their own errors
  redis.on('error', (error: Error) => {
    logger.warn('Connection error', error);
  });

  return redis;
}
