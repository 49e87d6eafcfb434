import express from 'express';
import {
  AdaptiveRateLimiter,
  RedisStore,
  RequestOptimizer,
  jsonExecutor,
  optimizerMetrics,
} from '../../src';

const upstream = process.env.UPSTREAM_URL ?? 'https://api.example.com';
const redisUrl = process.env.REDIS_URL;

const rateLimiter = new AdaptiveRateLimiter({
  config: {
    maxRequestsPerWindow: 80,
    windowSeconds: 10,
    burstLimit: 20,
    backoffStrategy: 'exponential',
  },
  hooks: {
    onRateLimitHit: ({ consecutiveHits, backoffSeconds }) => {
      console.warn(`Upstream rate limit hit ${consecutiveHits}x, backing off ${backoffSeconds}s`);
    },
  },
});

const optimizer = new RequestOptimizer({
  executor: jsonExecutor,
  rateLimiter,
  // Share cached results between instances when Redis is available
  store: redisUrl ? RedisStore.fromUrl(redisUrl, { prefix: 'example:' }) : undefined,
  config: { cacheDefaultTtlSeconds: 60 },
});

const app = express();

app.use(optimizerMetrics(optimizer, { path: '/metrics', statsPath: '/stats' }));

app.get('/users/:id', async (req, res) => {
  try {
    const user = await optimizer.performRequest({
      method: 'GET',
      url: `${upstream}/users/${encodeURIComponent(req.params.id)}`,
      cacheKey: `user:${req.params.id}`,
      priority: 'high',
    });
    res.json(user);
  } catch (error) {
    res.status(502).json({ error: error instanceof Error ? error.message : 'Upstream request failed' });
  }
});

// Lookups arriving close together are sent upstream as one bulk call
const userLookups = optimizer.createBatcher<string, unknown>(async (ids) => {
  const result = await optimizer.performRequest({
    method: 'POST',
    url: `${upstream}/users/bulk`,
    body: { ids },
  });
  return Array.isArray(result) ? result : [];
});

app.get('/profiles/:id', async (req, res) => {
  try {
    res.json(await userLookups.enqueue('users', req.params.id));
  } catch (error) {
    res.status(502).json({ error: error instanceof Error ? error.message : 'Batch request failed' });
  }
});

app.delete('/cache', async (req, res) => {
  const pattern = typeof req.query.pattern === 'string' ? req.query.pattern : undefined;
  try {
    res.json({ removed: await optimizer.invalidateCache(pattern) });
  } catch (error) {
    res.status(500).json({ error: error instanceof Error ? error.message : 'Cache invalidation failed' });
  }
});

const server = app.listen(3000, () => {
  console.log('Example app listening on http://localhost:3000');
});

process.on('SIGTERM', () => {
  server.close();
  optimizer.close().catch((error: unknown) => console.error('Failed to close optimizer', error));
});
