import type { BackoffStrategy } from './config';

export type BackoffPolicy =
  | { kind: 'linear' }
  | { kind: 'exponential' }
  | { kind: 'fibonacci' }
  | { kind: 'server'; delaySeconds: number };

export type BackoffBounds = {
  minBackoffSeconds: number;
  maxBackoffSeconds: number;
  backoffMultiplier: number;
};

const GOLDEN_RATIO = 1.618;

/**
 * A positive server-suggested delay overrides the configured strategy and is
 * only capped at the maximum backoff.
 */
export function selectBackoffPolicy(
  strategy: BackoffStrategy,
  serverSuggestedDelaySeconds?: number,
): BackoffPolicy {
  if (serverSuggestedDelaySeconds !== undefined && serverSuggestedDelaySeconds > 0) {
    return { kind: 'server', delaySeconds: serverSuggestedDelaySeconds };
  }
  return { kind: strategy };
}

export function nextBackoff(current: number, policy: BackoffPolicy, bounds: BackoffBounds): number {
  const { minBackoffSeconds, maxBackoffSeconds, backoffMultiplier } = bounds;
  let next: number;
  switch (policy.kind) {
    case 'server':
      return Math.min(policy.delaySeconds, maxBackoffSeconds);
    case 'linear':
      next = current + minBackoffSeconds;
      break;
    case 'exponential':
      next = current * backoffMultiplier;
      break;
    case 'fibonacci':
      next = current * GOLDEN_RATIO;
      break;
  }
  return Math.min(Math.max(next, minBackoffSeconds), maxBackoffSeconds);
}
