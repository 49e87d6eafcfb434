import Redis from 'ioredis';
import type { CacheStats, ResultCacheStore } from '../types';
import { createLogger, type Logger } from '../lib/logger';
import { resolveTtlSeconds, toJson } from '../lib/serialize';
import { round } from '../lib/stats';

/**
 * The subset of the ioredis client the store relies on.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  keys(pattern: string): Promise<string[]>;
  del(...keys: string[]): Promise<number>;
  strlen(key: string): Promise<number>;
}

export type RedisStoreOptions = {
  prefix?: string;
  enabled?: boolean;
  defaultTtlSeconds?: number;
  maxAgeSeconds?: number;
  maxSizeBytes?: number; // only used for utilization reporting
  logger?: Logger;
};

type StoredEntry = {
  value: unknown;
  createdAt: number;
};

/**
 * Shared result cache backed by Redis, for several processes calling the same API.
 * Expiry is delegated to Redis through SETEX.
 */
export class RedisStore implements ResultCacheStore<unknown> {
  private readonly prefix: string;
  private readonly enabled: boolean;
  private readonly defaultTtlSeconds: number;
  private readonly maxAgeSeconds: number;
  private readonly maxSizeBytes?: number;
  private readonly logger: Logger;
  private hits = 0;

  constructor(
    private readonly client: RedisCacheClient,
    options: RedisStoreOptions = {},
  ) {
    const {
      prefix = 'governor:',
      enabled = true,
      defaultTtlSeconds = 300,
      maxAgeSeconds = 3600,
      maxSizeBytes,
      logger = createLogger({ name: 'redis-store' }),
    } = options;
    this.prefix = prefix;
    this.enabled = enabled;
    this.defaultTtlSeconds = defaultTtlSeconds;
    this.maxAgeSeconds = maxAgeSeconds;
    this.maxSizeBytes = maxSizeBytes;
    this.logger = logger;
  }

  static fromUrl(url: string, options: RedisStoreOptions = {}): RedisStore {
    return new RedisStore(new Redis(url), options);
  }

  async get(key: string): Promise<unknown> {
    if (!this.enabled) return undefined;

    const raw = await this.client.get(this.prefix + key);
    if (raw === null) return undefined;

    const entry = parseEntry(raw);
    if (!entry) {
      this.logger.warn('Discarding unreadable cache entry', { key });
      await this.client.del(this.prefix + key);
      return undefined;
    }
    this.hits += 1;
    return entry.value;
  }

  async put(key: string, value: unknown, ttlSeconds?: number): Promise<boolean> {
    if (!this.enabled) return false;

    const payload = toJson({ value, createdAt: Date.now() } satisfies StoredEntry);
    if (payload === undefined) {
      this.logger.warn('Value cannot be encoded as JSON, not caching', { key });
      return false;
    }

    const ttl = resolveTtlSeconds(ttlSeconds, this.defaultTtlSeconds, this.maxAgeSeconds);
    await this.client.setex(this.prefix + key, Math.ceil(ttl), payload);
    return true;
  }

  async invalidate(pattern?: string): Promise<number> {
    const glob =
      pattern === undefined
        ? `${escapeGlob(this.prefix)}*`
        : `${escapeGlob(this.prefix)}*${escapeGlob(pattern)}*`;
    const keys = (await this.client.keys(glob)).filter(
      (key) => pattern === undefined || key.slice(this.prefix.length).includes(pattern),
    );
    if (keys.length === 0) return 0;
    return this.client.del(...keys);
  }

  async getStats(): Promise<CacheStats> {
    const keys = await this.client.keys(`${escapeGlob(this.prefix)}*`);
    const sizes = await Promise.all(keys.map((key) => this.client.strlen(key)));
    const sizeBytes = sizes.reduce((sum, size) => sum + size, 0);
    const entriesCount = keys.length;

    return {
      entriesCount,
      sizeBytes,
      sizeMb: round(sizeBytes / (1024 * 1024), 2),
      utilizationPercentage: this.maxSizeBytes ? round((sizeBytes / this.maxSizeBytes) * 100, 1) : 0,
      totalHits: this.hits,
      avgHitsPerEntry: entriesCount > 0 ? round(this.hits / entriesCount, 1) : 0,
    };
  }
}

// `createdAt` is informational; reads only need `value`
function parseEntry(raw: string): Pick<StoredEntry, 'value'> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || !('value' in parsed)) return undefined;
  return { value: parsed.value };
}

export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, (char) => `\\${char}`);
}
