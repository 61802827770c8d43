import { DuplicateShortCodeError, NotFoundError, StoreUnavailableError } from '../errors';
import { UrlRecord } from '../types';

// Row shape of the urls table
export type UrlRow = {
  id: number;
  original_url: string;
  short_code: string;
  created_at: Date;
  updated_at: Date;
};

/**
 * Query surface the store needs. A pg Pool satisfies this directly.
 */
export interface UrlQueryable {
  query(text: string, values: unknown[]): Promise<{ rows: UrlRow[] }>;
}

/**
 * Authoritative mapping of short codes to URL records
 */
export interface UrlRecordStore {
  save(originalUrl: string, shortCode: string): Promise<UrlRecord>;
  getByShortCode(shortCode: string): Promise<UrlRecord>;
}

const UNIQUE_VIOLATION = '23505';

const INSERT_URL = `
  INSERT INTO urls (original_url, short_code)
  VALUES ($1, $2)
  RETURNING id, original_url, short_code, created_at, updated_at
`;

const SELECT_BY_SHORT_CODE = `
  SELECT id, original_url, short_code, created_at, updated_at
  FROM urls
  WHERE short_code = $1
`;

function toUrlRecord(row: UrlRow): UrlRecord {
  return {
    id: row.id,
    originalUrl: row.original_url,
    shortCode: row.short_code,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

/**
 * PostgreSQL-backed record store
 */
export class PostgresUrlStore implements UrlRecordStore {
  constructor(private readonly db: UrlQueryable) {}

  async save(originalUrl: string, shortCode: string): Promise<UrlRecord> {
    let rows: UrlRow[];
    try {
      ({ rows } = await this.db.query(INSERT_URL, [originalUrl, shortCode]));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateShortCodeError(shortCode, { cause: error });
      }
      throw new StoreUnavailableError('failed to save URL', { cause: error });
    }

    const row = rows[0];
    if (!row) {
      throw new StoreUnavailableError('insert returned no row');
    }
    return toUrlRecord(row);
  }

  async getByShortCode(shortCode: string): Promise<UrlRecord> {
    let rows: UrlRow[];
    try {
      ({ rows } = await this.db.query(SELECT_BY_SHORT_CODE, [shortCode]));
    } catch (error) {
      throw new StoreUnavailableError('failed to get URL', { cause: error });
    }

    const row = rows[0];
    if (!row) {
      throw new NotFoundError(shortCode);
    }
    return toUrlRecord(row);
  }
}
