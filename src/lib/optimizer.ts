import type { RequestDescriptor, ResultCacheStore } from '../types';
import { ByteBoundedCache } from '../stores/memoryStore';
import { RequestBatcher, type BatchExecutor } from './batch';
import { resolveOptimizationConfig, type OptimizationConfig } from './config';
import { ConnectionManager } from './connection';
import { RequestDeduplicator } from './dedup';
import { HttpStatusError } from './errors';
import type { RequestExecutor } from './executor';
import { createDedupKey } from './keys';
import { createLogger, type Logger } from './logger';
import { MetricsCollector } from './metrics';
import type { AdaptiveRateLimiter } from './rateLimit';

export type RequestOptimizerOptions<TResult> = {
  executor: RequestExecutor<TResult>;
  config?: Partial<OptimizationConfig>;
  store?: ResultCacheStore<TResult>;
  rateLimiter?: AdaptiveRateLimiter;
  connections?: ConnectionManager;
  logger?: Logger;
  hooks?: {
    onCacheHit?: (info: { key: string; descriptor: RequestDescriptor }) => void;
    onCacheMiss?: (info: { key: string; descriptor: RequestDescriptor }) => void;
    onDeduplicated?: (info: { key: string }) => void;
    onError?: (info: { error: unknown; descriptor: RequestDescriptor }) => void;
  };
};

const IDEMPOTENT_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);

/**
 * Coordinates cache, deduplication, admission control and the pooled client
 * for every request sent to the upstream API.
 */
export class RequestOptimizer<TResult = unknown> {
  readonly config: OptimizationConfig;
  private readonly executor: RequestExecutor<TResult>;
  private readonly store: ResultCacheStore<TResult>;
  private readonly rateLimiter?: AdaptiveRateLimiter;
  private readonly connections: ConnectionManager;
  private readonly deduplicator: RequestDeduplicator<TResult>;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly hooks: RequestOptimizerOptions<TResult>['hooks'];

  constructor(options: RequestOptimizerOptions<TResult>) {
    this.config = resolveOptimizationConfig(options.config);
    this.executor = options.executor;
    this.logger = options.logger ?? createLogger({ name: 'optimizer' });
    this.hooks = options.hooks;
    this.rateLimiter = options.rateLimiter;
    this.metrics = new MetricsCollector(this.config.responseTimeSampleSize);

    this.store =
      options.store ??
      new ByteBoundedCache<TResult>({
        enabled: this.config.cacheEnabled,
        maxSizeBytes: this.config.cacheMaxSizeMb * 1024 * 1024,
        defaultTtlSeconds: this.config.cacheDefaultTtlSeconds,
        maxAgeSeconds: this.config.cacheMaxAgeSeconds,
        logger: this.logger,
      });

    this.connections =
      options.connections ??
      new ConnectionManager({
        maxConnections: this.config.maxConnections,
        keepaliveExpirySeconds: this.config.keepaliveExpirySeconds,
        connectTimeoutSeconds: this.config.connectTimeoutSeconds,
        readTimeoutSeconds: this.config.readTimeoutSeconds,
        http2Enabled: this.config.http2Enabled,
        logger: this.logger,
      });

    this.deduplicator = new RequestDeduplicator<TResult>({
      logger: this.logger,
      hooks: {
        onJoin: ({ key }) => {
          this.metrics.recordDeduplicated();
          this.notify(() => this.hooks?.onDeduplicated?.({ key }));
        },
      },
    });
  }

  async performRequest(descriptor: RequestDescriptor): Promise<TResult> {
    const start = Date.now();
    const method = descriptor.method.toUpperCase();
    const idempotent = IDEMPOTENT_METHODS.has(method);
    const cacheKey = idempotent && this.config.cacheEnabled ? descriptor.cacheKey : undefined;

    if (cacheKey !== undefined) {
      const cached = await this.store.get(cacheKey);
      if (cached !== undefined) {
        this.metrics.recordCacheHit();
        this.logger.debug('Cache hit', { key: cacheKey, elapsedMs: Date.now() - start });
        this.notify(() => this.hooks?.onCacheHit?.({ key: cacheKey, descriptor }));
        return cached;
      }
      this.metrics.recordCacheMiss();
      this.notify(() => this.hooks?.onCacheMiss?.({ key: cacheKey, descriptor }));
    }

    if (this.config.deduplicationEnabled && idempotent) {
      const dedupKey = createDedupKey(method, descriptor.url, descriptor.headers, descriptor.body);
      return this.deduplicator.join(dedupKey, () => this.execute(descriptor, cacheKey), descriptor.signal);
    }

    return this.execute(descriptor, cacheKey);
  }

  /**
   * Batcher whose flushes count towards this optimizer's statistics.
   */
  createBatcher<TItem, TBatchResult>(
    execute: BatchExecutor<TItem, TBatchResult>,
  ): RequestBatcher<TItem, TBatchResult> {
    return new RequestBatcher(execute, {
      enabled: this.config.batchEnabled,
      maxBatchSize: this.config.maxBatchSize,
      batchTimeoutSeconds: this.config.batchTimeoutSeconds,
      batchMaxWaitSeconds: this.config.batchMaxWaitSeconds,
      logger: this.logger,
      hooks: {
        onFlush: ({ size }) => this.metrics.recordBatched(size),
      },
    });
  }

  invalidateCache(pattern?: string): Promise<number> {
    return this.store.invalidate(pattern);
  }

  getMetricsCollector(): MetricsCollector {
    return this.metrics;
  }

  getRateLimiter(): AdaptiveRateLimiter | undefined {
    return this.rateLimiter;
  }

  async getStats() {
    const summary = this.metrics.getSummary();
    const cache = await this.store.getStats();
    const rateLimiter = this.rateLimiter ? this.rateLimiter.getStats() : null;

    return {
      ...summary,
      cache,
      rateLimiter,
      connections: this.connections.getStats(),
      deduplication: this.deduplicator.getStats(),
      optimizations: {
        caching: this.config.cacheEnabled,
        requestBatching: this.config.batchEnabled,
        requestDeduplication: this.config.deduplicationEnabled,
        http2: this.config.http2Enabled,
        adaptiveRateLimiting: this.rateLimiter !== undefined,
      },
      recommendations: this.recommendations(cache.utilizationPercentage, rateLimiter?.recommendations ?? []),
    };
  }

  async close(): Promise<void> {
    await this.connections.close();
  }

  private async execute(descriptor: RequestDescriptor, cacheKey: string | undefined): Promise<TResult> {
    if (this.rateLimiter) {
      await this.rateLimiter.acquire(descriptor.priority ?? 'normal');
    }

    const start = Date.now();
    let result: TResult;
    try {
      const client = await this.connections.getClient();
      result = await this.executor(client, descriptor);
    } catch (error) {
      if (this.rateLimiter && error instanceof HttpStatusError && error.isRateLimited) {
        this.rateLimiter.reportRateLimitHit(error.retryAfterSeconds);
      }
      this.metrics.recordFailure();
      this.logger.error('Request failed', { method: descriptor.method, url: descriptor.url, error });
      this.notify(() => this.hooks?.onError?.({ error, descriptor }));
      throw error;
    }

    const elapsedSeconds = (Date.now() - start) / 1000;
    this.rateLimiter?.reportSuccess(elapsedSeconds);
    this.metrics.recordRequest(elapsedSeconds);
    if (elapsedSeconds > this.config.slowRequestThresholdSeconds) {
      this.logger.warn('Slow request', { method: descriptor.method, url: descriptor.url, elapsedSeconds });
    }

    if (cacheKey !== undefined) {
      // Cache write failures are logged, not propagated
      try {
        await this.store.put(cacheKey, result, descriptor.cacheTtl);
      } catch (error) {
        this.logger.warn('Failed to store result in cache', { key: cacheKey, error });
      }
    }
    return result;
  }

  private recommendations(cacheUtilization: number, fromRateLimiter: string[]): string[] {
    const current = this.metrics.getCurrentMetrics();
    const recommendations = [...fromRateLimiter];

    if (this.metrics.cacheHitRatio() < 0.3 && current.totalRequests > 100) {
      recommendations.push('Low cache hit ratio - consider increasing cache TTL or size');
    }
    if (this.metrics.averageResponseTime() > this.config.slowRequestThresholdSeconds) {
      recommendations.push('High average response time - check network or API performance');
    }
    if (current.deduplicatedRequests > current.totalRequests * 0.1) {
      recommendations.push('High request deduplication - consider request optimization');
    }
    if (cacheUtilization > 90) {
      recommendations.push('Cache near capacity - consider increasing cache size');
    }
    return recommendations;
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.warn('Optimizer hook failed', { error });
    }
  }
}
