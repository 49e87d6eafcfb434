export type Priority = 'high' | 'normal' | 'low';

export interface RequestDescriptor {
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  cacheKey?: string;
  cacheTtl?: number; // seconds
  priority?: Priority;
  timeout?: number; // seconds
  signal?: AbortSignal; // cancels this caller's wait only
}

export interface CacheEntry<V = unknown> {
  value: V;
  createdAt: number; // epoch ms
  expiresAt: number;
  lastAccessedAt: number;
  hitCount: number;
  sizeBytes: number;
}

export interface CacheStats {
  entriesCount: number;
  sizeBytes: number;
  sizeMb: number;
  utilizationPercentage: number;
  totalHits: number;
  avgHitsPerEntry: number;
}

/**
 * Result cache contract shared by the in-memory and Redis stores.
 */
export interface ResultCacheStore<V = unknown> {
  get(key: string): Promise<V | undefined>;
  put(key: string, value: V, ttlSeconds?: number): Promise<boolean>;
  invalidate(pattern?: string): Promise<number>;
  getStats(): Promise<CacheStats>;
}
