import { createApp } from './app';
import { createPgPool, ensureSchema } from './clients/postgres';
import { createRedisClient } from './clients/redis';
import { config } from './config';
import { createLogger } from './logger';
import { IdAllocator } from './services/id-allocator';
import { ResolveService } from './services/resolve.service';
import { ShortenService } from './services/shorten.service';
import { RedisResolutionCache } from './services/url-cache';
import { PostgresUrlStore } from './services/url-store';

const logger = createLogger('server');

async function main() {
  const redis = createRedisClient(config.redis);
  const pool = createPgPool(config.database);

  try {
    // Connect to Redis
    logger.info(`Connecting to Redis at ${config.redis.url}...`);
    await redis.connect();
    await redis.ping();
    logger.info('Connected to Redis successfully');

    // Connect to PostgreSQL
    await pool.query('SELECT 1');
    logger.info('Connected to PostgreSQL successfully');

    const store = new PostgresUrlStore(pool);
    const writes = config.role !== 'redirect';
    const reads = config.role !== 'convert';

    let shortenService: ShortenService | undefined;
    if (writes) {
      if (config.database.ensureSchema) {
        await ensureSchema(pool);
        logger.info('Database tables created/verified successfully');
      }

      const allocator = new IdAllocator(redis, config.counter);
      await allocator.initialize();
      shortenService = new ShortenService({
        allocator,
        store,
        minLength: config.shortener.minLength,
      });
    }

    let resolveService: ResolveService | undefined;
    if (reads) {
      const cache = new RedisResolutionCache(redis, config.cache);
      resolveService = new ResolveService({ cache, store });
    }

    // Create and start Express app
    const app = createApp({
      role: config.role,
      baseUrl: config.baseUrl,
      shortenService,
      resolveService,
    });

    const server = app.listen(config.port, () => {
      logger.info(`URL shortener (${config.role}) running at http://localhost:${config.port}`);
      logger.info(`Base URL for short links: ${config.baseUrl}`);
      if (writes) logger.info('  POST   /api/v1/urls             - Create short URL');
      if (reads) logger.info('  GET    /:shortCode              - Redirect to original URL');
      if (reads) logger.info('  GET    /api/v1/urls/:shortCode  - Get URL record');
      logger.info('  GET    /api/health              - Health check');
    });

    // Graceful shutdown
    let closing = false;
    const shutdown = async () => {
      if (closing) return;
      closing = true;
      logger.info('Shutting down...');
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await Promise.allSettled([redis.quit(), pool.end()]);
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());
  } catch (error) {
    logger.error('Failed to start server', error);
    redis.disconnect();
    await pool.end().catch((endError: unknown) => logger.warn('Failed to close pool', endError));
    process.exit(1);
  }
}

void main();
