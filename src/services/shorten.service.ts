import {
  AllocationFailedError,
  AllocatorUnavailableError,
  PersistenceFailedError,
  StoreUnavailableError,
  ValidationError,
} from '../errors';
import { createLogger, Logger } from '../logger';
import { CreateUrlResponse, UrlRecord } from '../types';
import { DEFAULT_MIN_LENGTH, encodeShortCode, generateSalt, isValidUrl } from '../utils/shortcode';
import { IdAllocator } from './id-allocator';
import { UrlRecordStore } from './url-store';

export interface ShortenServiceDeps {
  allocator: Pick<IdAllocator, 'nextId'>;
  store: UrlRecordStore;
  minLength?: number;
  random?: () => number;
  logger?: Logger;
}

/**
 * Write path: allocate an id, encode it, persist the record.
 *
 * A new code is not written to the resolution cache; it stays cold
 * until its first read. A duplicate code is surfaced, never retried.
 */
export class ShortenService {
  private readonly minLength: number;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(private readonly deps: ShortenServiceDeps) {
    this.minLength = deps.minLength ?? DEFAULT_MIN_LENGTH;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger ?? createLogger('shorten');
  }

  async createShortUrl(originalUrl: string): Promise<UrlRecord> {
    if (!isValidUrl(originalUrl)) {
      throw new ValidationError('invalid url');
    }

    let id: number;
    try {
      id = await this.deps.allocator.nextId();
    } catch (error) {
      if (error instanceof AllocatorUnavailableError) {
        throw new AllocationFailedError('failed to generate short URL', { cause: error });
      }
      throw error;
    }

    const shortCode = encodeShortCode(id, generateSalt(this.random), this.minLength);

    let record: UrlRecord;
    try {
      record = await this.deps.store.save(originalUrl, shortCode);
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw new PersistenceFailedError('failed to save URL', { cause: error });
      }
      throw error;
    }

    this.logger.info(
      `Allocated id ${id} for ${originalUrl} shortCode=${shortCode} recordId=${record.id}`
    );
    return record;
  }
}

export function toCreateUrlResponse(record: UrlRecord, baseUrl: string): CreateUrlResponse {
  return {
    id: record.id,
    shortCode: record.shortCode,
    originalUrl: record.originalUrl,
    shortUrl: `${baseUrl.replace(/\/+$/, '')}/${record.shortCode}`,
  };
}
