import { Redis } from 'ioredis';
import type { KeyValueStore } from './types.js';

const SCAN_COUNT = 100;

/**
 * Redis-backed store using plain GET/SET string keys.
 *
 * The client is owned by the caller, which also manages connect/quit.
 */
export class RedisStore implements KeyValueStore {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(key, value);
  }

  /**
   * Collects matching keys with SCAN so large keyspaces never block Redis.
   * Glob metacharacters in the prefix are escaped.
   */
  keys(prefix: string): Promise<string[]> {
    const match = `${prefix.replace(/[*?[\]\\]/g, '\\$&')}*`;
    const stream = this.redis.scanStream({ match, count: SCAN_COUNT });
    const found = new Set<string>();

    return new Promise((resolve, reject) => {
      stream.on('data', (batch: string[]) => {
        for (const key of batch) found.add(key);
      });
      stream.on('end', () => resolve([...found]));
      stream.on('error', reject);
    });
  }
}

/** Creates the ioredis client the same way for the engine and for tooling. */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
