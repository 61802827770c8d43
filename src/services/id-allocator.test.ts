import { describe, it, expect, beforeEach } from 'vitest';
import RedisMock from 'ioredis-mock';
import { AllocatorUnavailableError } from '../errors';
import { connectionRefused } from '../test-utils/fakes';
import { IdAllocator } from './id-allocator';

// ioredis-mock runs EVAL scripts through a Lua interpreter, so these
// tests exercise the floor script itself
describe('IdAllocator', () => {
  let redis: InstanceType<typeof RedisMock>;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
  });

  it('returns the floor on the first allocation after initialization', async () => {
    const allocator = new IdAllocator(redis, { key: 'url_counter', floor: 100 });

    expect(await allocator.initialize()).toBe(true);
    expect(await redis.get('url_counter')).toBe('99');
    expect(await allocator.nextId()).toBe(100);
    expect(await allocator.nextId()).toBe(101);
  });

  it('raises a counter that is below the floor', async () => {
    await redis.set('url_counter', '5');
    const allocator = new IdAllocator(redis, { key: 'url_counter', floor: 100 });

    expect(await allocator.initialize()).toBe(true);
    expect(await allocator.nextId()).toBe(100);
  });

  it('leaves a counter at or above the floor untouched', async () => {
    await redis.set('url_counter', '250');
    const allocator = new IdAllocator(redis, { key: 'url_counter', floor: 100 });

    expect(await allocator.initialize()).toBe(false);
    expect(await redis.get('url_counter')).toBe('250');
    expect(await allocator.nextId()).toBe(251);
  });

  it('treats a counter exactly at the floor as already initialized', async () => {
    await redis.set('url_counter', '100');
    const allocator = new IdAllocator(redis, { key: 'url_counter', floor: 100 });

    expect(await allocator.initialize()).toBe(false);
    expect(await allocator.nextId()).toBe(101);
  });

  it('does not reset a counter another replica already advanced', async () => {
    const first = new IdAllocator(redis, { key: 'url_counter', floor: 100 });
    const second = new IdAllocator(redis, { key: 'url_counter', floor: 100 });

    await first.initialize();
    expect(await first.nextId()).toBe(100);
    expect(await second.initialize()).toBe(false);
    expect(await second.nextId()).toBe(101);
  });

  it('handles floors above 32 bits', async () => {
    const allocator = new IdAllocator(redis, { key: 'url_counter', floor: 56800235584 });

    expect(await allocator.initialize()).toBe(true);
    expect(await allocator.nextId()).toBe(56800235584);
  });

  it('issues distinct ids across concurrent callers sharing one counter', async () => {
    const allocators = Array.from(
      { length: 5 },
      () => new IdAllocator(redis, { key: 'url_counter', floor: 1000 })
    );
    await allocators[0].initialize();

    const perCaller = await Promise.all(
      allocators.map(async (allocator) => {
        const ids: number[] = [];
        for (let i = 0; i < 20; i++) {
          ids.push(await allocator.nextId());
        }
        return ids;
      })
    );

    const all = perCaller.flat();
    expect(new Set(all).size).toBe(100);
    expect(Math.min(...all)).toBe(1000);
    for (const ids of perCaller) {
      for (let i = 1; i < ids.length; i++) {
        expect(ids[i]).toBeGreaterThan(ids[i - 1]);
      }
    }
  });

  it('reports an unreachable counter store as AllocatorUnavailableError', async () => {
    const allocator = new IdAllocator(
      {
        incr: async () => {
          throw connectionRefused();
        },
        eval: async () => {
          throw connectionRefused();
        },
      },
      { key: 'url_counter', floor: 100 }
    );

    await expect(allocator.nextId()).rejects.toBeInstanceOf(AllocatorUnavailableError);
    await expect(allocator.initialize()).rejects.toBeInstanceOf(AllocatorUnavailableError);
  });

  it('rejects an increment it cannot confirm', async () => {
    const allocator = new IdAllocator(
      {
        incr: async () => Number.NaN,
        eval: async () => 0,
      },
      { key: 'url_counter', floor: 100 }
    );

    await expect(allocator.nextId()).rejects.toThrow('counter returned an unusable value: NaN');
  });
});
