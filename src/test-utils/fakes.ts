import { CounterClient } from '../services/id-allocator';
import { CacheClient } from '../services/url-cache';
import { UrlQueryable, UrlRow } from '../services/url-store';

/**
 * In-process stand-in for the Redis commands used by the counter and cache,
 * with failure injection. `eval` mirrors the counter floor rule without
 * running Lua; the script itself runs under ioredis-mock in the allocator tests.
 */
export class FakeRedis implements CounterClient, CacheClient {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  failWith: Error | null = null;

  private check(): void {
    if (this.failWith) throw this.failWith;
  }

  async incr(key: string): Promise<number> {
    this.check();
    const next = Number(this.values.get(key) ?? '0') + 1;
    this.values.set(key, String(next));
    return next;
  }

  async eval(_script: string, _numKeys: number, ...args: (string | number)[]): Promise<unknown> {
    this.check();
    const [key, floor, value] = args;
    const stored = this.values.get(String(key));
    if (stored === undefined || Number(stored) < Number(floor)) {
      this.values.set(String(key), String(value));
      return 1;
    }
    return 0;
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<unknown> {
    this.check();
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }
}

/**
 * In-process stand-in for the urls table. Enforces the short_code
 * unique constraint the way PostgreSQL reports it.
 */
export class FakeUrlDatabase implements UrlQueryable {
  readonly rows: UrlRow[] = [];
  failWith: Error | null = null;
  now = new Date('2024-01-01T00:00:00.000Z');
  private sequence = 0;

  async query(text: string, values: unknown[]): Promise<{ rows: UrlRow[] }> {
    if (this.failWith) throw this.failWith;

    if (text.includes('INSERT INTO urls')) {
      const [originalUrl, shortCode] = values.map(String);
      if (this.rows.some((row) => row.short_code === shortCode)) {
        throw Object.assign(
          new Error('duplicate key value violates unique constraint "urls_short_code_key"'),
          { code: '23505' }
        );
      }
      const row: UrlRow = {
        id: ++this.sequence,
        original_url: originalUrl,
        short_code: shortCode,
        created_at: this.now,
        updated_at: this.now,
      };
      this.rows.push(row);
      return { rows: [row] };
    }

    if (text.includes('WHERE short_code = $1')) {
      return { rows: this.rows.filter((row) => row.short_code === String(values[0])) };
    }

    throw new Error(`unexpected query: ${text}`);
  }
}

export function connectionRefused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:6379'), { code: 'ECONNREFUSED' });
}
