import { Request, Response, NextFunction } from 'express';
import { createLogger, type Logger } from './logger';
import type { RequestOptimizer } from './optimizer';

export interface OptimizerMetricsOptions {
  path?: string;
  statsPath?: string;
  prefix?: string;
  logger?: Logger;
}

function rateLimiterGauges<TResult>(optimizer: RequestOptimizer<TResult>, prefix: string): string {
  const rateLimiter = optimizer.getRateLimiter();
  if (!rateLimiter) return '';

  const { currentState } = rateLimiter.getStats();
  const gauge = (name: string, help: string, value: number) =>
    [`# HELP ${prefix}${name} ${help}`, `# TYPE ${prefix}${name} gauge`, `${prefix}${name} ${value}`, ''].join('\n');

  return [
    gauge('rate_limiter_window_requests', 'Requests admitted in the current window', currentState.requestsInWindow),
    gauge('rate_limiter_backoff_seconds', 'Current backoff delay', currentState.currentBackoffSeconds),
    gauge('rate_limiter_capacity', 'Current per-window request capacity', rateLimiter.getCapacity()),
  ].join('\n');
}

/**
 * Serves Prometheus text on `path` and the JSON statistics snapshot on
 * `statsPath`. Every other request falls through to `next()`.
 */
export function optimizerMetrics<TResult>(
  optimizer: RequestOptimizer<TResult>,
  options: OptimizerMetricsOptions = {},
) {
  const {
    path = '/metrics',
    statsPath = '/stats',
    prefix = 'request_governor_',
    logger = createLogger({ name: 'metrics' }),
  } = options;

  return async (req: Request, res: Response, next: NextFunction) => {
    if (req.path === path) {
      try {
        const metrics =
          optimizer.getMetricsCollector().getPrometheusMetrics(prefix) + rateLimiterGauges(optimizer, prefix);

        res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
        res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
        res.status(200).send(metrics);
      } catch (error) {
        logger.error('Error generating Prometheus metrics', { error });
        res.status(500).json({ error: 'Failed to generate metrics' });
      }
      return;
    }

    if (req.path === statsPath) {
      try {
        const stats = await optimizer.getStats();
        res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
        res.status(200).json(stats);
      } catch (error) {
        logger.error('Error generating statistics', { error });
        res.status(500).json({ error: 'Failed to generate statistics' });
      }
      return;
    }

    next();
  };
}
