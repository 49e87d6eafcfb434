import type { Priority } from '../types';
import { nextBackoff, selectBackoffPolicy } from './backoff';
import { resolveRateLimiterConfig, type RateLimiterConfig } from './config';
import { createLogger, type Logger } from './logger';
import { average, BoundedSample, round } from './stats';

export type RateLimiterRegime =
  | 'normal'
  | 'burst-limited'
  | 'window-limited'
  | 'backing-off'
  | 'adapting';

export type RateLimiterMetrics = {
  totalRequests: number;
  requestsDelayed: number;
  totalDelaySeconds: number;
  rateLimitHits: number;
  backoffEvents: number;
  avgRequestInterval: number;
  currentRatePerSecond: number;
  avgResponseTimeSeconds: number;
};

export type AdaptiveRateLimiterOptions = {
  config?: Partial<RateLimiterConfig>;
  logger?: Logger;
  random?: () => number; // jitter source, [0, 1)
  hooks?: {
    onDelayed?: (info: { delaySeconds: number; regime: RateLimiterRegime; priority: Priority }) => void;
    onRateLimitHit?: (info: { consecutiveHits: number; backoffSeconds: number }) => void;
    onRecovered?: (info: { afterHits: number }) => void;
    onCapacityChanged?: (info: { previous: number; current: number }) => void;
  };
};

type Decision = { delaySeconds: number; regime: RateLimiterRegime };

const ADAPT_INCREASE_MARGIN = 1.2;

const emptyMetrics = (): RateLimiterMetrics => ({
  totalRequests: 0,
  requestsDelayed: 0,
  totalDelaySeconds: 0,
  rateLimitHits: 0,
  backoffEvents: 0,
  avgRequestInterval: 0,
  currentRatePerSecond: 0,
  avgResponseTimeSeconds: 0,
});

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Admission gate in front of a rate-limited API. Never rejects: it computes
 * how long a caller must wait and suspends it for that long.
 */
export class AdaptiveRateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly hooks: AdaptiveRateLimiterOptions['hooks'];

  private windowTimes: number[] = [];
  private burstTimes: number[] = [];
  private maxRequestsPerWindow: number;

  private consecutiveHits = 0;
  private lastHitAt: number | undefined;
  private currentBackoffSeconds: number;

  private readonly intervals: BoundedSample;
  private lastAdjustmentAt: number;
  private regime: RateLimiterRegime = 'normal';

  private metrics = emptyMetrics();
  private responseTimeSum = 0;
  private responseTimeCount = 0;

  constructor(options: AdaptiveRateLimiterOptions = {}) {
    this.config = resolveRateLimiterConfig(options.config);
    this.logger = options.logger ?? createLogger({ name: 'rate-limiter' });
    this.random = options.random ?? Math.random;
    this.hooks = options.hooks;

    this.maxRequestsPerWindow = this.config.maxRequestsPerWindow;
    this.currentBackoffSeconds = this.config.minBackoffSeconds;
    this.intervals = new BoundedSample(this.config.intervalSampleSize);
    this.lastAdjustmentAt = Date.now();
  }

  /**
   * Wait until a request may be sent. Resolves with the total delay applied, in seconds.
   *
   * The delay is re-checked after every sleep, and the admission is recorded in
   * the same synchronous step as the check that allowed it.
   */
  async acquire(priority: Priority = 'normal'): Promise<number> {
    let waitedSeconds = 0;

    for (;;) {
      const now = Date.now();
      this.prune(now);
      const { delaySeconds, regime } = this.calculateDelay(now, priority);
      if (delaySeconds <= 0) {
        if (waitedSeconds === 0) this.regime = regime;
        break;
      }

      this.regime = regime;
      if (waitedSeconds === 0) this.metrics.requestsDelayed += 1;
      this.metrics.totalDelaySeconds += delaySeconds;
      this.logger.debug('Rate limiting: delaying request', { delaySeconds: round(delaySeconds, 3), regime, priority });
      this.notify(() => this.hooks?.onDelayed?.({ delaySeconds, regime, priority }));
      await sleep(Math.ceil(delaySeconds * 1000));
      waitedSeconds += delaySeconds;
    }

    const requestTime = Date.now();
    this.windowTimes.push(requestTime);
    this.burstTimes.push(requestTime);
    this.metrics.totalRequests += 1;
    this.updateRateMetrics();

    if (this.shouldAdapt(requestTime)) this.adapt(requestTime);

    return waitedSeconds;
  }

  reportRateLimitHit(serverSuggestedDelaySeconds?: number): void {
    this.metrics.rateLimitHits += 1;
    this.consecutiveHits += 1;
    this.lastHitAt = Date.now();

    const policy = selectBackoffPolicy(this.config.backoffStrategy, serverSuggestedDelaySeconds);
    this.currentBackoffSeconds = nextBackoff(this.currentBackoffSeconds, policy, this.config);
    this.metrics.backoffEvents += 1;

    this.logger.warn('Rate limit hit, backing off', {
      consecutiveHits: this.consecutiveHits,
      backoffSeconds: round(this.currentBackoffSeconds, 3),
      policy: policy.kind,
    });
    this.notify(() =>
      this.hooks?.onRateLimitHit?.({
        consecutiveHits: this.consecutiveHits,
        backoffSeconds: this.currentBackoffSeconds,
      }),
    );
  }

  reportSuccess(responseTimeSeconds = 0): void {
    if (this.consecutiveHits > 0) {
      const afterHits = this.consecutiveHits;
      this.logger.info('Rate limit cleared', { afterHits });
      this.consecutiveHits = 0;
      this.currentBackoffSeconds = this.config.minBackoffSeconds;
      this.notify(() => this.hooks?.onRecovered?.({ afterHits }));
    }

    const lastRequest = this.windowTimes[this.windowTimes.length - 1];
    if (lastRequest !== undefined) {
      this.intervals.push((Date.now() - lastRequest) / 1000);
    }

    if (responseTimeSeconds > 0) {
      this.responseTimeSum += responseTimeSeconds;
      this.responseTimeCount += 1;
      this.metrics.avgResponseTimeSeconds = this.responseTimeSum / this.responseTimeCount;
    }
  }

  getRegime(): RateLimiterRegime {
    return this.regime;
  }

  getCurrentBackoffSeconds(): number {
    return this.currentBackoffSeconds;
  }

  getCapacity(): number {
    return this.maxRequestsPerWindow;
  }

  getMetrics(): RateLimiterMetrics {
    return { ...this.metrics };
  }

  getStats() {
    const efficiency = this.efficiency();
    const avgDelay =
      this.metrics.requestsDelayed > 0 ? this.metrics.totalDelaySeconds / this.metrics.requestsDelayed : 0;

    return {
      config: {
        maxRequestsPerWindow: this.maxRequestsPerWindow,
        windowSeconds: this.config.windowSeconds,
        burstLimit: this.config.burstLimit,
        burstWindowSeconds: this.config.burstWindowSeconds,
        backoffStrategy: this.config.backoffStrategy,
      },
      currentState: {
        requestsInWindow: this.windowTimes.length,
        requestsInBurstWindow: this.burstTimes.length,
        consecutiveRateLimits: this.consecutiveHits,
        currentBackoffSeconds: this.currentBackoffSeconds,
        currentRatePerSecond: round(this.metrics.currentRatePerSecond, 2),
        regime: this.regime,
      },
      performance: {
        totalRequests: this.metrics.totalRequests,
        requestsDelayed: this.metrics.requestsDelayed,
        efficiencyPercentage: round(efficiency * 100, 1),
        avgDelaySeconds: round(avgDelay, 3),
        avgResponseTimeSeconds: round(this.metrics.avgResponseTimeSeconds, 3),
        rateLimitHits: this.metrics.rateLimitHits,
        backoffEvents: this.metrics.backoffEvents,
      },
      recommendations: this.recommendations(efficiency),
    };
  }

  reset(): void {
    this.windowTimes = [];
    this.burstTimes = [];
    this.maxRequestsPerWindow = this.config.maxRequestsPerWindow;
    this.consecutiveHits = 0;
    this.lastHitAt = undefined;
    this.currentBackoffSeconds = this.config.minBackoffSeconds;
    this.intervals.clear();
    this.lastAdjustmentAt = Date.now();
    this.regime = 'normal';
    this.metrics = emptyMetrics();
    this.responseTimeSum = 0;
    this.responseTimeCount = 0;
  }

  private prune(now: number): void {
    const windowCutoff = now - this.config.windowSeconds * 1000;
    this.windowTimes = this.windowTimes.filter((t) => t > windowCutoff);

    const burstCutoff = now - this.config.burstWindowSeconds * 1000;
    this.burstTimes = this.burstTimes.filter((t) => t > burstCutoff);
  }

  // First non-zero check wins: burst, window, backoff, priority floor
  private calculateDelay(now: number, priority: Priority): Decision {
    if (this.burstTimes.length >= this.config.burstLimit) {
      const burstDelay = (this.config.burstWindowSeconds * 1000 - (now - this.burstTimes[0])) / 1000;
      if (burstDelay > 0) {
        return { delaySeconds: burstDelay + this.jitter(burstDelay), regime: 'burst-limited' };
      }
    }

    if (this.windowTimes.length >= this.maxRequestsPerWindow) {
      const windowDelay = (this.config.windowSeconds * 1000 - (now - this.windowTimes[0])) / 1000;
      if (windowDelay > 0) {
        const base =
          this.consecutiveHits > 0 ? Math.max(windowDelay, this.currentBackoffSeconds) : windowDelay;
        return { delaySeconds: base + this.jitter(base), regime: 'window-limited' };
      }
    }

    if (this.consecutiveHits > 0 && this.lastHitAt !== undefined) {
      const remaining = this.currentBackoffSeconds - (now - this.lastHitAt) / 1000;
      if (remaining > 0) return { delaySeconds: remaining, regime: 'backing-off' };
    }

    const lastRequest = this.windowTimes[this.windowTimes.length - 1];
    if (lastRequest !== undefined) {
      const minInterval = this.config.priorityIntervals[priority];
      const sinceLast = (now - lastRequest) / 1000;
      if (sinceLast < minInterval) return { delaySeconds: minInterval - sinceLast, regime: 'normal' };
    }

    return { delaySeconds: 0, regime: 'normal' };
  }

  private jitter(baseDelaySeconds: number): number {
    if (!this.config.jitterEnabled) return 0;
    return this.random() * baseDelaySeconds * 0.1;
  }

  private updateRateMetrics(): void {
    const count = this.windowTimes.length;
    if (count < 2) return;
    const spanSeconds = (this.windowTimes[count - 1] - this.windowTimes[0]) / 1000;
    if (spanSeconds <= 0) return;
    this.metrics.currentRatePerSecond = count / spanSeconds;
    this.metrics.avgRequestInterval = spanSeconds / (count - 1);
  }

  private shouldAdapt(now: number): boolean {
    return (
      this.config.adaptiveEnabled &&
      now - this.lastAdjustmentAt > this.config.adaptiveIntervalSeconds * 1000
    );
  }

  /**
   * Slow control loop over the interval sample: raises capacity when requests
   * consistently complete faster than allowed, lowers it under repeated hits.
   */
  private adapt(now: number): void {
    this.lastAdjustmentAt = now;
    const samples = this.intervals.snapshot();
    if (samples.length < this.config.adaptiveMinSamples) return;

    const avgInterval = average(samples);
    const achievableRate = avgInterval > 0 ? 1 / avgInterval : Number.POSITIVE_INFINITY;
    const configuredRate = this.maxRequestsPerWindow / this.config.windowSeconds;
    const previous = this.maxRequestsPerWindow;

    if (
      achievableRate > configuredRate * ADAPT_INCREASE_MARGIN &&
      this.consecutiveHits === 0 &&
      previous < this.config.adaptiveCeiling
    ) {
      this.maxRequestsPerWindow = Math.min(previous + this.config.adaptiveStep, this.config.adaptiveCeiling);
    } else if (this.consecutiveHits > this.config.adaptiveHitThreshold && previous > this.config.adaptiveFloor) {
      this.maxRequestsPerWindow = Math.max(previous - this.config.adaptiveStep, this.config.adaptiveFloor);
    }

    if (this.maxRequestsPerWindow !== previous) {
      this.regime = 'adapting';
      this.logger.info('Adaptive rate limit adjustment', { previous, current: this.maxRequestsPerWindow });
      this.notify(() => this.hooks?.onCapacityChanged?.({ previous, current: this.maxRequestsPerWindow }));
    }
  }

  private efficiency(): number {
    if (this.metrics.totalRequests === 0) return 1;
    return 1 - this.metrics.requestsDelayed / this.metrics.totalRequests;
  }

  private recommendations(efficiency: number): string[] {
    const recommendations: string[] = [];
    if (efficiency < 0.8) {
      recommendations.push('Low efficiency detected - consider reducing request rate');
    }
    if (this.consecutiveHits > 5) {
      recommendations.push('Frequent rate limits - API limits may have changed');
    }
    if (this.metrics.currentRatePerSecond > 8) {
      recommendations.push('High request rate - monitor for rate limit hits');
    }
    if (this.windowTimes.length >= this.maxRequestsPerWindow) {
      recommendations.push('Operating at rate limit capacity - consider request batching');
    }
    return recommendations;
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.warn('Rate limiter hook failed', { error });
    }
  }
}
