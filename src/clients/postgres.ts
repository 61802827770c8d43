import { readFile } from 'fs/promises';
import * as path from 'path';
import { Pool } from 'pg';
import { AppConfig } from '../config';
import { createLogger } from '../logger';

const SCHEMA_PATH = path.resolve(__dirname, '../../sql/schema.sql');

// Serializes schema setup across replicas starting together
export const SCHEMA_LOCK_ID = 727001;

const logger = createLogger('postgres');

export function createPgPool(options: AppConfig['database']): Pool {
  const pool = new Pool({
    connectionString: options.url,
    max: options.poolMax,
    connectionTimeoutMillis: options.connectionTimeout,
    query_timeout: options.queryTimeout,
    statement_timeout: options.queryTimeout,
  });

  // Idle clients the server drops are discarded by the pool; the next
  // query opens a new connection
  pool.on('error', (error: Error) => {
    logger.error('Idle client error', error);
  });

  return pool;
}

export interface SchemaClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
}

export interface SchemaPool {
  connect(): Promise<SchemaClient>;
}

/**
 * Create the urls table, its indexes and the updated_at trigger if missing
 */
export async function ensureSchema(pool: SchemaPool, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf8');
  const client = await pool.connect();
  try {
    await client.query('SELECT pg_advisory_lock($1)', [SCHEMA_LOCK_ID]);
    try {
      await client.query(sql);
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [SCHEMA_LOCK_ID]);
    }
  } finally {
    client.release();
  }
}
