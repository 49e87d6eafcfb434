import type { CacheEntry, CacheStats, ResultCacheStore } from '../types';
import { createLogger, type Logger } from '../lib/logger';
import { estimateSizeBytes, resolveTtlSeconds } from '../lib/serialize';
import { round } from '../lib/stats';

export type ByteBoundedCacheOptions = {
  enabled?: boolean;
  maxSizeBytes?: number; // default 50 MB
  defaultTtlSeconds?: number;
  maxAgeSeconds?: number;
  logger?: Logger;
};

const BYTES_PER_MB = 1024 * 1024;

/**
 * In-process result cache bounded by TTL and by total serialized size.
 * Map insertion order doubles as recency order: the first key is the LRU entry.
 */
export class ByteBoundedCache<V = unknown> implements ResultCacheStore<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private currentSizeBytes = 0;

  private readonly enabled: boolean;
  private readonly maxSizeBytes: number;
  private readonly defaultTtlSeconds: number;
  private readonly maxAgeSeconds: number;
  private readonly logger: Logger;

  constructor(options: ByteBoundedCacheOptions = {}) {
    const {
      enabled = true,
      maxSizeBytes = 50 * BYTES_PER_MB,
      defaultTtlSeconds = 300,
      maxAgeSeconds = 3600,
      logger = createLogger({ name: 'cache' }),
    } = options;
    this.enabled = enabled;
    this.maxSizeBytes = maxSizeBytes;
    this.defaultTtlSeconds = defaultTtlSeconds;
    this.maxAgeSeconds = maxAgeSeconds;
    this.logger = logger;
  }

  async get(key: string): Promise<V | undefined> {
    if (!this.enabled) return undefined;

    const now = Date.now();
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (now > entry.expiresAt) {
      this.remove(key);
      return undefined;
    }

    entry.hitCount += 1;
    entry.lastAccessedAt = now;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async put(key: string, value: V, ttlSeconds?: number): Promise<boolean> {
    if (!this.enabled) return false;

    const { sizeBytes, estimated } = estimateSizeBytes(value);
    if (estimated) {
      this.logger.warn('Could not serialize cache value, using fallback size', { key, sizeBytes });
    }

    const ttl = resolveTtlSeconds(ttlSeconds, this.defaultTtlSeconds, this.maxAgeSeconds);
    const now = Date.now();

    this.remove(key);
    while (this.currentSizeBytes + sizeBytes > this.maxSizeBytes && this.entries.size > 0) {
      this.evictLeastRecentlyUsed();
    }

    this.entries.set(key, {
      value,
      createdAt: now,
      expiresAt: now + ttl * 1000,
      lastAccessedAt: now,
      hitCount: 0,
      sizeBytes,
    });
    this.currentSizeBytes += sizeBytes;
    return true;
  }

  async invalidate(pattern?: string): Promise<number> {
    if (pattern === undefined) {
      const removed = this.entries.size;
      this.entries.clear();
      this.currentSizeBytes = 0;
      return removed;
    }

    const keys = [...this.entries.keys()].filter((key) => key.includes(pattern));
    for (const key of keys) this.remove(key);
    return keys.length;
  }

  purgeExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.remove(key);
        removed += 1;
      }
    }
    return removed;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && Date.now() <= entry.expiresAt;
  }

  get size(): number {
    return this.entries.size;
  }

  get sizeBytes(): number {
    return this.currentSizeBytes;
  }

  async getStats(): Promise<CacheStats> {
    let totalHits = 0;
    for (const entry of this.entries.values()) totalHits += entry.hitCount;
    const entriesCount = this.entries.size;

    return {
      entriesCount,
      sizeBytes: this.currentSizeBytes,
      sizeMb: round(this.currentSizeBytes / BYTES_PER_MB, 2),
      utilizationPercentage: round((this.currentSizeBytes / this.maxSizeBytes) * 100, 1),
      totalHits,
      avgHitsPerEntry: entriesCount > 0 ? round(totalHits / entriesCount, 1) : 0,
    };
  }

  private remove(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    this.entries.delete(key);
    this.currentSizeBytes -= entry.sizeBytes;
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    this.logger.debug('Evicting least recently used cache entry', { key: oldest.value });
    this.remove(oldest.value);
  }
}
