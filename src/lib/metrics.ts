import { BoundedSample, percentile, round } from './stats';

export interface MetricsData {
  totalRequests: number;
  cachedResponses: number;
  cacheMisses: number;
  batchedRequests: number;
  deduplicatedRequests: number;
  failedRequests: number;
  responseTimeSum: number; // seconds, physical requests only
  responseTimeCount: number;
  fastestRequestSeconds: number;
  slowestRequestSeconds: number;
  responseTimeBuckets: Map<string, number>; // upper bound -> count
  lastUpdated: number;
}

// Histogram buckets for response time (in seconds)
const RESPONSE_TIME_BUCKETS = [
  0.001, // 1ms
  0.005,
  0.01,
  0.025,
  0.05,
  0.1,
  0.25,
  0.5,
  1.0,
  2.5,
  5.0,
  10.0, // 10s
  Number.POSITIVE_INFINITY,
];

const bucketLabel = (bucket: number) => (bucket === Number.POSITIVE_INFINITY ? '+Inf' : bucket.toString());

const emptyMetrics = (): MetricsData => ({
  totalRequests: 0,
  cachedResponses: 0,
  cacheMisses: 0,
  batchedRequests: 0,
  deduplicatedRequests: 0,
  failedRequests: 0,
  responseTimeSum: 0,
  responseTimeCount: 0,
  fastestRequestSeconds: Number.POSITIVE_INFINITY,
  slowestRequestSeconds: 0,
  responseTimeBuckets: new Map(),
  lastUpdated: Date.now(),
});

/**
 * Per-optimizer metrics state. All mutation goes through the record* methods.
 */
export class MetricsCollector {
  private metrics: MetricsData = emptyMetrics();
  private readonly samples: BoundedSample;

  constructor(sampleSize = 1000) {
    this.samples = new BoundedSample(sampleSize);
  }

  recordCacheHit(): void {
    this.metrics.totalRequests++;
    this.metrics.cachedResponses++;
    this.touch();
  }

  recordCacheMiss(): void {
    this.metrics.cacheMisses++;
    this.touch();
  }

  recordRequest(responseTimeSeconds: number): void {
    this.metrics.totalRequests++;
    this.metrics.responseTimeSum += responseTimeSeconds;
    this.metrics.responseTimeCount++;
    this.metrics.fastestRequestSeconds = Math.min(this.metrics.fastestRequestSeconds, responseTimeSeconds);
    this.metrics.slowestRequestSeconds = Math.max(this.metrics.slowestRequestSeconds, responseTimeSeconds);
    this.samples.push(responseTimeSeconds);
    this.recordResponseTimeBucket(responseTimeSeconds);
    this.touch();
  }

  recordFailure(): void {
    this.metrics.totalRequests++;
    this.metrics.failedRequests++;
    this.touch();
  }

  recordDeduplicated(): void {
    this.metrics.deduplicatedRequests++;
    this.touch();
  }

  recordBatched(count: number): void {
    this.metrics.batchedRequests += count;
    this.touch();
  }

  getCurrentMetrics(): MetricsData {
    return { ...this.metrics, responseTimeBuckets: new Map(this.metrics.responseTimeBuckets) };
  }

  getSummary() {
    const current = this.metrics;
    const samples = this.samples.snapshot();
    return {
      requests: {
        total: current.totalRequests,
        cached: current.cachedResponses,
        batched: current.batchedRequests,
        deduplicated: current.deduplicatedRequests,
        failed: current.failedRequests,
      },
      performance: {
        avgResponseTimeSeconds: round(this.averageResponseTime(), 3),
        fastestRequestSeconds:
          current.fastestRequestSeconds === Number.POSITIVE_INFINITY ? 0 : round(current.fastestRequestSeconds, 3),
        slowestRequestSeconds: round(current.slowestRequestSeconds, 3),
        p50ResponseTimeSeconds: round(percentile(samples, 50), 3),
        p95ResponseTimeSeconds: round(percentile(samples, 95), 3),
        p99ResponseTimeSeconds: round(percentile(samples, 99), 3),
        cacheHitRatio: round(this.cacheHitRatio(), 3),
      },
    };
  }

  averageResponseTime(): number {
    return this.metrics.responseTimeCount > 0 ? this.metrics.responseTimeSum / this.metrics.responseTimeCount : 0;
  }

  cacheHitRatio(): number {
    return this.metrics.totalRequests > 0 ? this.metrics.cachedResponses / this.metrics.totalRequests : 0;
  }

  getPrometheusMetrics(prefix = 'request_governor_'): string {
    const current = this.metrics;
    const lines: string[] = [];
    const counter = (name: string, help: string, value: number) => {
      lines.push(`# HELP ${prefix}${name} ${help}`, `# TYPE ${prefix}${name} counter`, `${prefix}${name} ${value}`, '');
    };

    counter('requests_total', 'Total number of requests', current.totalRequests);
    counter('cache_hits_total', 'Total number of cache hits', current.cachedResponses);
    counter('cache_misses_total', 'Total number of cache misses', current.cacheMisses);
    counter('deduplicated_requests_total', 'Requests served by an in-flight identical request', current.deduplicatedRequests);
    counter('batched_requests_total', 'Requests executed as part of a batch', current.batchedRequests);
    counter('failed_requests_total', 'Physical requests that failed', current.failedRequests);

    lines.push(
      `# HELP ${prefix}cache_hit_ratio Cache hit ratio (0-1)`,
      `# TYPE ${prefix}cache_hit_ratio gauge`,
      `${prefix}cache_hit_ratio ${this.cacheHitRatio()}`,
      '',
      `# HELP ${prefix}response_time_seconds Response time histogram`,
      `# TYPE ${prefix}response_time_seconds histogram`,
    );

    // Prometheus buckets are cumulative
    let cumulative = 0;
    for (const bucket of RESPONSE_TIME_BUCKETS) {
      const label = bucketLabel(bucket);
      cumulative += current.responseTimeBuckets.get(label) ?? 0;
      lines.push(`${prefix}response_time_seconds_bucket{le="${label}"} ${cumulative}`);
    }
    lines.push(
      `${prefix}response_time_seconds_sum ${current.responseTimeSum}`,
      `${prefix}response_time_seconds_count ${current.responseTimeCount}`,
      '',
    );

    return lines.join('\n');
  }

  reset(): void {
    this.metrics = emptyMetrics();
    this.samples.clear();
  }

  private recordResponseTimeBucket(responseTimeSeconds: number): void {
    const bucket = RESPONSE_TIME_BUCKETS.find((upper) => responseTimeSeconds <= upper) ?? Number.POSITIVE_INFINITY;
    const label = bucketLabel(bucket);
    this.metrics.responseTimeBuckets.set(label, (this.metrics.responseTimeBuckets.get(label) ?? 0) + 1);
  }

  private touch(): void {
    this.metrics.lastUpdated = Date.now();
  }
}
