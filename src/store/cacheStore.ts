import Redis from 'ioredis';
import { AppConfig } from '../shared/config';
import { Clock } from '../shared/clock';
import { StoreUnavailableError } from '../shared/errors';

/**
 * Key-value store with per-key TTL, shared by every backend instance.
 * All cross-request coordination (denylist, epochs, leases) lives here.
 */
export interface CacheStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Atomically stores the value only if the key is absent. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Like setIfAbsent, but hands back the value that blocked the write, in the same step. */
  setIfAbsentOrGet(key: string, value: string, ttlMs: number): Promise<string | null>;
  get(key: string): Promise<string | null>;
  /** Overwrites the key; a non-positive TTL stores nothing. */
  set(key: string, value: string, ttlMs: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  deleteIfEquals(key: string, expected: string): Promise<boolean>;
  replaceIfEquals(key: string, expected: string, value: string, ttlMs: number): Promise<boolean>;
  /** Atomic counter without expiry. */
  increment(key: string): Promise<number>;
}

// PX only accepts positive integers
function toPx(ttlMs: number): number {
  return Math.max(1, Math.ceil(ttlMs));
}

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

export class InMemoryCacheStore implements CacheStore {
  private entries: Map<string, MemoryEntry> = new Map();

  constructor(private readonly clock: Clock) {}

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.entries.clear();
  }

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== null && entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private write(key: string, value: string, ttlMs: number): void {
    this.entries.set(key, {
      value,
      expiresAt: this.clock.now().getTime() + toPx(ttlMs),
    });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.write(key, value, ttlMs);
    return true;
  }

  async setIfAbsentOrGet(key: string, value: string, ttlMs: number): Promise<string | null> {
    const current = this.live(key);
    if (current) {
      return current.value;
    }
    this.write(key, value, ttlMs);
    return null;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) return;
    this.write(key, value, ttlMs);
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== null;
    this.entries.delete(key);
    return existed;
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    if (this.live(key)?.value !== expected) {
      return false;
    }
    this.entries.delete(key);
    return true;
  }

  async replaceIfEquals(key: string, expected: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)?.value !== expected) {
      return false;
    }
    this.write(key, value, ttlMs);
    return true;
  }

  async increment(key: string): Promise<number> {
    const current = this.live(key);
    const next = (current ? parseInt(current.value, 10) : 0) + 1;
    this.entries.set(key, { value: String(next), expiresAt: current?.expiresAt ?? null });
    return next;
  }
}

const SET_IF_ABSENT_OR_GET = `
local current = redis.call('GET', KEYS[1])
if current then
  return current
end
redis.call('SET', KEYS[1], ARGV[1], 'PX', ARGV[2])
return false`;

const DELETE_IF_EQUALS = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0`;

const REPLACE_IF_EQUALS = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
  return 1
end
return 0`;

export class RedisCacheStore implements CacheStore {
  private client: Redis | null = null;

  constructor(private readonly redisUrl: string) {}

  async connect(): Promise<void> {
    this.client = new Redis(this.redisUrl, {
      maxRetriesPerRequest: 3,
      commandTimeout: 5000,
      retryStrategy: (times) => {
        if (times > 3) return null;
        return Math.min(times * 100, 1000);
      },
    });
    this.client.on('error', (err: Error) => {
      console.error(`[cache] Redis connection error: ${err.message}`);
    });

    await this.run('connect', client => client.ping());
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  private async run<T>(operation: string, fn: (client: Redis) => Promise<T>): Promise<T> {
    if (!this.client) {
      throw new StoreUnavailableError(`${operation} (not connected)`);
    }
    try {
      return await fn(this.client);
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.run('setIfAbsent', client => client.set(key, value, 'PX', toPx(ttlMs), 'NX'));
    return result === 'OK';
  }

  async setIfAbsentOrGet(key: string, value: string, ttlMs: number): Promise<string | null> {
    const result = await this.run('setIfAbsentOrGet', client =>
      client.eval(SET_IF_ABSENT_OR_GET, 1, key, value, toPx(ttlMs))
    );
    return typeof result === 'string' ? result : null;
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', client => client.get(key));
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) return;
    await this.run('set', client => client.set(key, value, 'PX', toPx(ttlMs)));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.run('delete', client => client.del(key));
    return removed === 1;
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const result = await this.run('deleteIfEquals', client => client.eval(DELETE_IF_EQUALS, 1, key, expected));
    return result === 1;
  }

  async replaceIfEquals(key: string, expected: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.run('replaceIfEquals', client =>
      client.eval(REPLACE_IF_EQUALS, 1, key, expected, value, toPx(ttlMs))
    );
    return result === 1;
  }

  async increment(key: string): Promise<number> {
    return this.run('increment', client => client.incr(key));
  }
}

/**
 * Runs a write once more after a store outage. A second failure propagates;
 * the caller decides whether to try later.
 */
export async function retryOnce<T>(operation: string, key: string, write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (error) {
    if (!(error instanceof StoreUnavailableError)) throw error;
    console.warn(`[cache] ${operation} failed for ${key}, retrying once`);
    return write();
  }
}

export function setIfAbsentWithRetry(
  store: CacheStore,
  key: string,
  value: string,
  ttlMs: number
): Promise<boolean> {
  return retryOnce('setIfAbsent', key, () => store.setIfAbsent(key, value, ttlMs));
}

export function cacheKeys(prefix: string) {
  return {
    denylist: (nonce: string) => `${prefix}denylist:${nonce}`,
    epoch: (principalId: string) => `${prefix}epoch:${principalId}`,
    lease: (recordId: string) => `${prefix}lease:${recordId}`,
  };
}

export type CacheKeys = ReturnType<typeof cacheKeys>;

// Tests and single-process dev runs never need Redis
export function createCacheStore(appConfig: AppConfig, clock: Clock): CacheStore {
  if (appConfig.isTest) {
    return new InMemoryCacheStore(clock);
  }
  return new RedisCacheStore(appConfig.redisUrl);
}
