import { describe, it, expect } from 'vitest';
import { DuplicateShortCodeError, NotFoundError, StoreUnavailableError } from '../errors';
import { connectionRefused, FakeUrlDatabase } from '../test-utils/fakes';
import { PostgresUrlStore } from './url-store';

describe('PostgresUrlStore', () => {
  it('saves a record and returns it with store-assigned fields', async () => {
    const db = new FakeUrlDatabase();
    const store = new PostgresUrlStore(db);

    const record = await store.save('https://example.com', '0000Q8y');

    expect(record).toEqual({
      id: 1,
      originalUrl: 'https://example.com',
      shortCode: '0000Q8y',
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      updatedAt: new Date('2024-01-01T00:00:00.000Z'),
    });
  });

  it('looks up a saved record by short code', async () => {
    const store = new PostgresUrlStore(new FakeUrlDatabase());
    await store.save('https://example.com/a', 'aaaaaaa');
    await store.save('https://example.com/b', 'bbbbbbb');

    const record = await store.getByShortCode('bbbbbbb');

    expect(record.id).toBe(2);
    expect(record.originalUrl).toBe('https://example.com/b');
  });

  it('rejects a second record with the same short code', async () => {
    const db = new FakeUrlDatabase();
    const store = new PostgresUrlStore(db);
    await store.save('https://example.com/a', 'samecode');

    const attempt = store.save('https://example.com/b', 'samecode');

    await expect(attempt).rejects.toBeInstanceOf(DuplicateShortCodeError);
    await expect(attempt).rejects.toThrow('short code already exists: samecode');
    expect(db.rows).toHaveLength(1);
  });

  it('reports an unknown code as NotFoundError', async () => {
    const store = new PostgresUrlStore(new FakeUrlDatabase());

    await expect(store.getByShortCode('does-not-exist')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reports connection failures as StoreUnavailableError', async () => {
    const db = new FakeUrlDatabase();
    db.failWith = connectionRefused();
    const store = new PostgresUrlStore(db);

    await expect(store.save('https://example.com', 'abcdefg')).rejects.toBeInstanceOf(
      StoreUnavailableError
    );
    await expect(store.getByShortCode('abcdefg')).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('keeps the driver error as the cause', async () => {
    const db = new FakeUrlDatabase();
    const failure = connectionRefused();
    db.failWith = failure;
    const store = new PostgresUrlStore(db);

    const error = await store.getByShortCode('abcdefg').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error instanceof Error && error.cause).toBe(failure);
  });
});
