import { ConfigError } from './errors';
import type { Priority } from '../types';

export type BackoffStrategy = 'linear' | 'exponential' | 'fibonacci';

export interface OptimizationConfig {
  // Connection pooling
  maxConnections: number;
  keepaliveExpirySeconds: number;
  connectTimeoutSeconds: number;
  readTimeoutSeconds: number;
  http2Enabled: boolean;

  // Request batching
  batchEnabled: boolean;
  maxBatchSize: number;
  batchTimeoutSeconds: number;
  batchMaxWaitSeconds: number;

  // Caching
  cacheEnabled: boolean;
  cacheMaxSizeMb: number;
  cacheDefaultTtlSeconds: number;
  cacheMaxAgeSeconds: number;

  deduplicationEnabled: boolean;

  // Monitoring
  slowRequestThresholdSeconds: number;
  responseTimeSampleSize: number;
}

export interface RateLimiterConfig {
  maxRequestsPerWindow: number;
  windowSeconds: number;
  burstLimit: number;
  burstWindowSeconds: number;
  backoffStrategy: BackoffStrategy;
  minBackoffSeconds: number;
  maxBackoffSeconds: number;
  backoffMultiplier: number;
  jitterEnabled: boolean;
  adaptiveEnabled: boolean;
  adaptiveIntervalSeconds: number;
  adaptiveMinSamples: number;
  adaptiveStep: number;
  adaptiveCeiling: number;
  adaptiveFloor: number;
  adaptiveHitThreshold: number;
  intervalSampleSize: number;
  priorityIntervals: Record<Priority, number>; // seconds
}

export const DEFAULT_OPTIMIZATION_CONFIG: Readonly<OptimizationConfig> = Object.freeze({
  maxConnections: 10,
  keepaliveExpirySeconds: 30,
  connectTimeoutSeconds: 10,
  readTimeoutSeconds: 30,
  http2Enabled: true,

  batchEnabled: true,
  maxBatchSize: 50,
  batchTimeoutSeconds: 0.5,
  batchMaxWaitSeconds: 2,

  cacheEnabled: true,
  cacheMaxSizeMb: 50,
  cacheDefaultTtlSeconds: 300, // 5 minutes
  cacheMaxAgeSeconds: 3600,

  deduplicationEnabled: true,

  slowRequestThresholdSeconds: 5,
  responseTimeSampleSize: 1000,
});

export const DEFAULT_RATE_LIMITER_CONFIG: Readonly<RateLimiterConfig> = Object.freeze({
  maxRequestsPerWindow: 80,
  windowSeconds: 10,
  burstLimit: 20,
  burstWindowSeconds: 2,
  backoffStrategy: 'exponential',
  minBackoffSeconds: 0.1,
  maxBackoffSeconds: 60,
  backoffMultiplier: 2,
  jitterEnabled: true,
  adaptiveEnabled: true,
  adaptiveIntervalSeconds: 300,
  adaptiveMinSamples: 10,
  adaptiveStep: 5,
  adaptiveCeiling: 100,
  adaptiveFloor: 20,
  adaptiveHitThreshold: 3,
  intervalSampleSize: 100,
  priorityIntervals: Object.freeze({ high: 0.05, normal: 0.1, low: 0.2 }),
});

const BACKOFF_STRATEGIES: readonly BackoffStrategy[] = ['linear', 'exponential', 'fibonacci'];

export function resolveOptimizationConfig(
  overrides: Partial<OptimizationConfig> = {},
): OptimizationConfig {
  const config: OptimizationConfig = { ...DEFAULT_OPTIMIZATION_CONFIG, ...overrides };
  const issues: string[] = [];

  positiveInteger(issues, config, 'maxConnections');
  positiveInteger(issues, config, 'maxBatchSize');
  positiveInteger(issues, config, 'responseTimeSampleSize');
  positiveDuration(issues, config, 'keepaliveExpirySeconds');
  positiveDuration(issues, config, 'connectTimeoutSeconds');
  positiveDuration(issues, config, 'readTimeoutSeconds');
  positiveDuration(issues, config, 'batchTimeoutSeconds');
  positiveDuration(issues, config, 'batchMaxWaitSeconds');
  positiveDuration(issues, config, 'cacheMaxSizeMb');
  positiveDuration(issues, config, 'cacheDefaultTtlSeconds');
  positiveDuration(issues, config, 'cacheMaxAgeSeconds');
  positiveDuration(issues, config, 'slowRequestThresholdSeconds');

  if (config.batchMaxWaitSeconds < config.batchTimeoutSeconds) {
    issues.push('batchMaxWaitSeconds must be >= batchTimeoutSeconds');
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return config;
}

export function resolveRateLimiterConfig(
  overrides: Partial<RateLimiterConfig> = {},
): RateLimiterConfig {
  const config: RateLimiterConfig = {
    ...DEFAULT_RATE_LIMITER_CONFIG,
    ...overrides,
    priorityIntervals: {
      ...DEFAULT_RATE_LIMITER_CONFIG.priorityIntervals,
      ...overrides.priorityIntervals,
    },
  };
  const issues: string[] = [];

  positiveInteger(issues, config, 'maxRequestsPerWindow');
  positiveInteger(issues, config, 'burstLimit');
  positiveInteger(issues, config, 'adaptiveMinSamples');
  positiveInteger(issues, config, 'adaptiveStep');
  positiveInteger(issues, config, 'adaptiveCeiling');
  positiveInteger(issues, config, 'adaptiveFloor');
  positiveInteger(issues, config, 'intervalSampleSize');
  positiveDuration(issues, config, 'windowSeconds');
  positiveDuration(issues, config, 'burstWindowSeconds');
  positiveDuration(issues, config, 'minBackoffSeconds');
  positiveDuration(issues, config, 'maxBackoffSeconds');
  positiveDuration(issues, config, 'adaptiveIntervalSeconds');

  if (!Number.isInteger(config.adaptiveHitThreshold) || config.adaptiveHitThreshold < 0) {
    issues.push('adaptiveHitThreshold must be a non-negative integer');
  }
  if (!Number.isFinite(config.backoffMultiplier) || config.backoffMultiplier < 1) {
    issues.push('backoffMultiplier must be >= 1');
  }
  if (!BACKOFF_STRATEGIES.includes(config.backoffStrategy)) {
    issues.push(`backoffStrategy must be one of ${BACKOFF_STRATEGIES.join(', ')}`);
  }
  if (config.maxBackoffSeconds < config.minBackoffSeconds) {
    issues.push('maxBackoffSeconds must be >= minBackoffSeconds');
  }
  if (config.adaptiveCeiling < config.adaptiveFloor) {
    issues.push('adaptiveCeiling must be >= adaptiveFloor');
  }
  for (const [priority, interval] of Object.entries(config.priorityIntervals)) {
    if (!Number.isFinite(interval) || interval < 0) {
      issues.push(`priorityIntervals.${priority} must be a non-negative number`);
    }
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return config;
}

type NumericKey<T> = { [K in keyof T]: T[K] extends number ? K : never }[keyof T];

function positiveInteger<T>(issues: string[], config: T, key: NumericKey<T>): void {
  const value = config[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    issues.push(`${String(key)} must be a positive integer`);
  }
}

function positiveDuration<T>(issues: string[], config: T, key: NumericKey<T>): void {
  const value = config[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    issues.push(`${String(key)} must be a positive number`);
  }
}
