import { AllocatorUnavailableError } from '../errors';
import { createLogger, Logger } from '../logger';

/**
 * Redis commands the allocator needs. ioredis satisfies this directly.
 */
export interface CounterClient {
  incr(key: string): Promise<number>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}

export interface IdAllocatorOptions {
  key: string;
  floor: number;
  logger?: Logger;
}

/**
 * Reset KEYS[1] to ARGV[2] when it is missing or below ARGV[1].
 * Runs server-side so concurrent replica startups cannot interleave
 * their check and set.
 */
const FLOOR_SCRIPT = `
local current = tonumber(redis.call('GET', KEYS[1]))
if current == nil or current < tonumber(ARGV[1]) then
  redis.call('SET', KEYS[1], ARGV[2])
  return 1
end
return 0
`;

/**
 * Issues globally unique, strictly increasing ids from a shared counter
 */
export class IdAllocator {
  private readonly key: string;
  private readonly floor: number;
  private readonly logger: Logger;

  constructor(private readonly client: CounterClient, options: IdAllocatorOptions) {
    this.key = options.key;
    this.floor = options.floor;
    this.logger = options.logger ?? createLogger('allocator');
  }

  /**
   * Raise the counter so the next allocation returns at least `floor`.
   * Called once per replica at startup.
   */
  async initialize(): Promise<boolean> {
    let reset: unknown;
    try {
      reset = await this.client.eval(
        FLOOR_SCRIPT,
        1,
        this.key,
        String(this.floor),
        String(this.floor - 1)
      );
    } catch (error) {
      throw new AllocatorUnavailableError('failed to initialize counter', { cause: error });
    }

    if (Number(reset) === 1) {
      this.logger.info(`Initialized counter ${this.key} to start from ${this.floor}`);
      return true;
    }
    this.logger.info(`Counter ${this.key} already at or above ${this.floor}`);
    return false;
  }

  /**
   * Atomically increment the counter and return the new value
   */
  async nextId(): Promise<number> {
    let value: number;
    try {
      value = await this.client.incr(this.key);
    } catch (error) {
      throw new AllocatorUnavailableError('failed to get next id', { cause: error });
    }

    if (!Number.isSafeInteger(value)) {
      throw new AllocatorUnavailableError(`counter returned an unusable value: ${value}`);
    }
    return value;
  }
}
