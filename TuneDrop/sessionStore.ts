import Redis from 'ioredis';

// Generic async key-value store used behind the session manager
export interface KeyValueStore<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
  delete(key: string): Promise<void>;
  /** Releases connections, where the store holds any */
  close?(): Promise<void>;
}

// --------------------- In-memory store (long-polling) ---------------------
// Entries live until the process exits; nothing is evicted.
export class MemoryStore<V> implements KeyValueStore<V> {
  private readonly data = new Map<string, V>();

  async get(key: string): Promise<V | undefined> {
    return this.data.get(key);
  }

  async set(key: string, value: V): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  get size(): number {
    return this.data.size;
  }
}

// --------------------- Redis-backed store (webhook) ---------------------
export interface RedisStoreOptions<V> {
  /** Validates a parsed JSON value; anything rejected reads as absent */
  decode: (raw: unknown) => V | undefined;
  /** Expiry for every key; omitted means keys never expire */
  ttlSeconds?: number;
  keyPrefix?: string;
}

export class RedisStore<V> implements KeyValueStore<V> {
  private readonly redis: Redis;
  private readonly decode: (raw: unknown) => V | undefined;
  private readonly ttlSeconds?: number;
  private readonly keyPrefix: string;

  constructor(redisUrl: string, options: RedisStoreOptions<V>) {
    this.redis = new Redis(redisUrl, {
      // Connect on the first command rather than at cold start
      lazyConnect: true,
      maxRetriesPerRequest: 1,
    });
    this.decode = options.decode;
    this.ttlSeconds = options.ttlSeconds;
    this.keyPrefix = options.keyPrefix ?? 'session:';
  }

  private async ensureConnected(): Promise<void> {
    if (this.redis.status === 'end' || this.redis.status === 'close') {
      await this.redis.connect();
    }
  }

  async get(key: string): Promise<V | undefined> {
    await this.ensureConnected();
    const json = await this.redis.get(this.keyPrefix + key);
    if (!json) return undefined;
    try {
      return this.decode(JSON.parse(json));
    } catch (err) {
      console.warn(`[sessionStore] Discarding unreadable value for key ${key}`, err);
      return undefined;
    }
  }

  async set(key: string, value: V): Promise<void> {
    await this.ensureConnected();
    const json = JSON.stringify(value);
    if (this.ttlSeconds != null) {
      await this.redis.set(this.keyPrefix + key, json, 'EX', this.ttlSeconds);
    } else {
      await this.redis.set(this.keyPrefix + key, json);
    }
  }

  async delete(key: string): Promise<void> {
    await this.ensureConnected();
    await this.redis.del(this.keyPrefix + key);
  }

  async close(): Promise<void> {
    if (this.redis.status === 'ready') {
      await this.redis.quit();
    }
  }
}

// --------------------- Factory ---------------------
export interface SessionStoreSettings {
  redisUrl?: string;
  ttlSeconds?: number;
}

export function createSessionStore<V>(
  settings: SessionStoreSettings,
  decode: (raw: unknown) => V | undefined,
): KeyValueStore<V> {
  if (settings.redisUrl) {
    console.log('[sessionStore] Using Redis session store');
    return new RedisStore<V>(settings.redisUrl, { decode, ttlSeconds: settings.ttlSeconds });
  }
  return new MemoryStore<V>();
}
