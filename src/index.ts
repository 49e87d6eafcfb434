export * from './lib/optimizer';
export * from './lib/rateLimit';
export * from './lib/backoff';
export * from './lib/batch';
export * from './lib/dedup';
export * from './lib/connection';
export * from './lib/executor';
export * from './lib/keys';
export * from './lib/metrics';
export * from './lib/prometheus';
export * from './lib/config';
export * from './lib/errors';
export * from './lib/logger';
export * from './stores/memoryStore';
export * from './stores/redisStore';
export type { Priority, RequestDescriptor, CacheEntry, CacheStats, ResultCacheStore } from './types';
