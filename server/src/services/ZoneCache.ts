import NodeCache from 'node-cache';
import type { Redis } from 'ioredis';
import { env } from '../config/env';
import { toBoundingBox } from '../schemas/boundingBox';
import { BoundingBox } from '../types/lead';

/** Raw key/value store holding serialized boxes; entries expire after the cache TTL. */
interface ZoneStore {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
  close(): Promise<void>;
}

class MemoryZoneStore implements ZoneStore {
  private readonly store: NodeCache;

  constructor(ttlSeconds: number) {
    this.store = new NodeCache({ stdTTL: ttlSeconds, useClones: false });
  }

  async read(key: string): Promise<string | null> {
    return this.store.get<string>(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.store.set(key, value);
  }

  async close(): Promise<void> {
    this.store.close();
  }
}

class RedisZoneStore implements ZoneStore {
  private ready = false;

  private constructor(
    private readonly client: Redis,
    private readonly ttlSeconds: number,
  ) {
    client.on('ready', () => {
      this.ready = true;
    });
    client.on('error', (err: Error) => {
      if (this.ready) console.warn('[zone-cache] Redis error:', err.message);
      this.ready = false;
    });
  }

  /** Resolves to null when Redis cannot be reached at startup. */
  static async open(url: string, ttlSeconds: number): Promise<RedisZoneStore | null> {
    const { default: RedisClient } = await import('ioredis');
    const client = new RedisClient(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      connectTimeout: 3000,
      maxRetriesPerRequest: 1,
    });
    const store = new RedisZoneStore(client, ttlSeconds);

    try {
      await client.connect();
      return store;
    } catch (err) {
      console.warn('[zone-cache] Redis connect failed:', err instanceof Error ? err.message : err);
      client.disconnect();
      return null;
    }
  }

  async read(key: string): Promise<string | null> {
    if (!this.ready) return null;
    return this.client.get(key);
  }

  async write(key: string, value: string): Promise<void> {
    if (!this.ready) return;
    await this.client.setex(key, this.ttlSeconds, value);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Memoizes text-resolved zones per (hint, country).
 * Redis when REDIS_URL is set and reachable, in-process otherwise.
 */
export class ZoneCache {
  private readonly memory: MemoryZoneStore;
  private store: ZoneStore;
  private usingRedis = false;

  constructor(private readonly ttlSeconds = env.CACHE_TTL_SECONDS) {
    this.memory = new MemoryZoneStore(ttlSeconds);
    this.store = this.memory;
  }

  async connect(redisUrl = env.REDIS_URL): Promise<void> {
    if (env.NODE_ENV === 'test' || !redisUrl) return;

    const redis = await RedisZoneStore.open(redisUrl, this.ttlSeconds);
    if (redis) {
      this.store = redis;
      this.usingRedis = true;
      console.info('[zone-cache] connected to Redis');
    } else {
      console.warn('[zone-cache] Redis unavailable, keeping zones in memory');
    }
  }

  get isRedis(): boolean {
    return this.usingRedis;
  }

  /** A stored entry that no longer parses as a usable box counts as a miss. */
  async get(hint: string, country: string): Promise<BoundingBox | null> {
    const key = ZoneCache.keyFor(hint, country);
    try {
      const raw = await this.store.read(key);
      if (raw === null) return null;
      const box = toBoundingBox(JSON.parse(raw));
      if (!box) console.warn(`[zone-cache] ignoring unusable entry ${key}`);
      return box;
    } catch (err) {
      console.warn(`[zone-cache] read failed for ${key}:`, err instanceof Error ? err.message : err);
      return null;
    }
  }

  async set(hint: string, country: string, box: BoundingBox): Promise<void> {
    try {
      await this.store.write(ZoneCache.keyFor(hint, country), JSON.stringify(box));
    } catch (err) {
      console.warn('[zone-cache] write failed:', err instanceof Error ? err.message : err);
    }
  }

  async quit(): Promise<void> {
    if (this.store !== this.memory) {
      await this.store.close();
    }
    await this.memory.close();
  }

  /** Hints are matched case-insensitively with surrounding whitespace ignored. */
  static keyFor(hint: string, country: string): string {
    return `zone:${country.trim().toLowerCase()}:${hint.trim().toLowerCase()}`;
  }
}
