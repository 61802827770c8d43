import { ValidationError } from '../errors';
import { createLogger, Logger } from '../logger';
import { Resolution, UrlRecord, UrlRecordResponse } from '../types';
import { ResolutionCache } from './url-cache';
import { UrlRecordStore } from './url-store';

export interface ResolveServiceDeps {
  cache: ResolutionCache;
  store: UrlRecordStore;
  logger?: Logger;
}

/**
 * Read path: cache-aside lookup with write-back on miss.
 * A cache hit returns without touching the store.
 */
export class ResolveService {
  private readonly logger: Logger;

  constructor(private readonly deps: ResolveServiceDeps) {
    this.logger = deps.logger ?? createLogger('resolve');
  }

  async resolve(shortCode: string): Promise<Resolution> {
    requireShortCode(shortCode);

    const cached = await this.deps.cache.get(shortCode);
    if (cached !== null) {
      this.logger.debug(`cache hit ${shortCode}`);
      return { originalUrl: cached, source: 'cache' };
    }

    // NotFoundError / StoreUnavailableError propagate to the caller
    const record = await this.deps.store.getByShortCode(shortCode);
    await this.deps.cache.set(shortCode, record.originalUrl);

    this.logger.debug(`cache miss ${shortCode}, loaded from store`);
    return { originalUrl: record.originalUrl, source: 'store' };
  }

  /**
   * Full record for the metadata endpoint. The cache only holds the URL,
   * so this always reads the store; it still warms the cache.
   */
  async getRecord(shortCode: string): Promise<UrlRecord> {
    requireShortCode(shortCode);

    const record = await this.deps.store.getByShortCode(shortCode);
    await this.deps.cache.set(shortCode, record.originalUrl);
    return record;
  }
}

function requireShortCode(shortCode: string): void {
  if (shortCode.trim() === '') {
    throw new ValidationError('short code is required');
  }
}

export function toUrlRecordResponse(record: UrlRecord): UrlRecordResponse {
  return {
    id: record.id,
    originalUrl: record.originalUrl,
    shortCode: record.shortCode,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}
