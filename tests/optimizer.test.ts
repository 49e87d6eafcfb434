import { MockAgent, type Dispatcher } from 'undici';
import { ConnectionManager } from '../src/lib/connection';
import { HttpStatusError, WaitAbortedError } from '../src/lib/errors';
import { jsonExecutor } from '../src/lib/executor';
import { RequestOptimizer, type RequestOptimizerOptions } from '../src/lib/optimizer';
import { AdaptiveRateLimiter } from '../src/lib/rateLimit';
import type { RequestDescriptor } from '../src/types';
import { deferred, silentLogger } from './helpers';

type Item = { url: string; call: number };

function setup(overrides: Partial<RequestOptimizerOptions<Item>> = {}) {
  let calls = 0;
  const executor = jest.fn(async (_client: Dispatcher, descriptor: RequestDescriptor): Promise<Item> => {
    calls += 1;
    return { url: descriptor.url, call: calls };
  });
  const optimizer = new RequestOptimizer<Item>({
    executor,
    connections: new ConnectionManager({ clientFactory: () => new MockAgent(), logger: silentLogger }),
    logger: silentLogger,
    ...overrides,
  });
  return { optimizer, executor };
}

describe('RequestOptimizer', () => {
  test('serves repeated keyed reads from the cache', async () => {
    const onCacheHit = jest.fn();
    const { optimizer, executor } = setup({ hooks: { onCacheHit } });
    const descriptor = { method: 'GET', url: 'https://api.test/users/1', cacheKey: 'user:1' };

    const first = await optimizer.performRequest(descriptor);
    const second = await optimizer.performRequest(descriptor);

    expect(second).toEqual(first);
    expect(executor).toHaveBeenCalledTimes(1);
    expect(onCacheHit).toHaveBeenCalledWith({ key: 'user:1', descriptor });

    const stats = await optimizer.getStats();
    expect(stats.requests).toEqual({ total: 2, cached: 1, batched: 0, deduplicated: 0, failed: 0 });
    expect(stats.performance.cacheHitRatio).toBe(0.5);
    expect(stats.cache.entriesCount).toBe(1);
    await optimizer.close();
  });

  test('does not cache when caching is disabled', async () => {
    const { optimizer, executor } = setup({ config: { cacheEnabled: false } });
    const descriptor = { method: 'GET', url: 'https://api.test/users/1', cacheKey: 'user:1' };

    await optimizer.performRequest(descriptor);
    await optimizer.performRequest(descriptor);

    expect(executor).toHaveBeenCalledTimes(2);
  });

  test('collapses concurrent identical reads into one physical request', async () => {
    const upstream = deferred<Item>();
    const executor = jest.fn(() => upstream.promise);
    const { optimizer } = setup({ executor });

    const requests = Array.from({ length: 5 }, () =>
      optimizer.performRequest({ method: 'GET', url: 'https://api.test/items?page=1' }),
    );
    upstream.resolve({ url: 'https://api.test/items?page=1', call: 1 });
    const results = await Promise.all(requests);

    expect(executor).toHaveBeenCalledTimes(1);
    expect(new Set(results).size).toBe(1);
    const stats = await optimizer.getStats();
    expect(stats.requests.deduplicated).toBe(4);
    expect(stats.requests.total).toBe(1);
  });

  test('never merges or caches non-idempotent requests', async () => {
    const { optimizer, executor } = setup();
    const descriptor = { method: 'POST', url: 'https://api.test/items', body: { name: 'widget' }, cacheKey: 'item' };

    await Promise.all([optimizer.performRequest(descriptor), optimizer.performRequest(descriptor)]);

    expect(executor).toHaveBeenCalledTimes(2);
    expect((await optimizer.getStats()).cache.entriesCount).toBe(0);
  });

  test('does not cache failures', async () => {
    const onError = jest.fn();
    const failure = new Error('connection reset');
    const executor = jest
      .fn<Promise<Item>, [Dispatcher, RequestDescriptor]>()
      .mockRejectedValueOnce(failure)
      .mockResolvedValue({ url: 'https://api.test/users/1', call: 2 });
    const { optimizer } = setup({ executor, hooks: { onError } });
    const descriptor = { method: 'GET', url: 'https://api.test/users/1', cacheKey: 'user:1' };

    await expect(optimizer.performRequest(descriptor)).rejects.toBe(failure);
    await expect(optimizer.performRequest(descriptor)).resolves.toEqual({ url: 'https://api.test/users/1', call: 2 });

    expect(executor).toHaveBeenCalledTimes(2);
    expect(onError).toHaveBeenCalledWith({ error: failure, descriptor });
    expect((await optimizer.getStats()).requests.failed).toBe(1);
  });

  test('an aborted caller stops waiting on a shared request', async () => {
    const upstream = deferred<Item>();
    const { optimizer } = setup({ executor: () => upstream.promise });
    const controller = new AbortController();

    const leader = optimizer.performRequest({ method: 'GET', url: 'https://api.test/slow' });
    const follower = optimizer.performRequest({ method: 'GET', url: 'https://api.test/slow', signal: controller.signal });
    controller.abort();

    await expect(follower).rejects.toBeInstanceOf(WaitAbortedError);
    upstream.resolve({ url: 'https://api.test/slow', call: 1 });
    await expect(leader).resolves.toEqual({ url: 'https://api.test/slow', call: 1 });
  });

  test('invalidates cached results by pattern', async () => {
    const { optimizer, executor } = setup();
    await optimizer.performRequest({ method: 'GET', url: 'https://api.test/users/1', cacheKey: 'user:1' });
    await optimizer.performRequest({ method: 'GET', url: 'https://api.test/orders/1', cacheKey: 'order:1' });

    expect(await optimizer.invalidateCache('user')).toBe(1);
    await optimizer.performRequest({ method: 'GET', url: 'https://api.test/users/1', cacheKey: 'user:1' });
    await optimizer.performRequest({ method: 'GET', url: 'https://api.test/orders/1', cacheKey: 'order:1' });

    expect(executor).toHaveBeenCalledTimes(3);
  });

  test('counts batched items', async () => {
    const { optimizer } = setup({ config: { maxBatchSize: 2 } });
    const batcher = optimizer.createBatcher<number, number>(async (ids) => ids.map((id) => id + 1));

    expect(await Promise.all([batcher.enqueue('ids', 1), batcher.enqueue('ids', 2)])).toEqual([2, 3]);
    expect((await optimizer.getStats()).requests.batched).toBe(2);
  });

  test('reading statistics mutates nothing', async () => {
    const { optimizer } = setup({
      rateLimiter: new AdaptiveRateLimiter({ config: { jitterEnabled: false }, logger: silentLogger }),
    });
    await optimizer.performRequest({ method: 'GET', url: 'https://api.test/users/1', cacheKey: 'user:1' });

    const first = await optimizer.getStats();
    const second = await optimizer.getStats();
    expect(second).toEqual(first);
    expect(first.rateLimiter?.performance.totalRequests).toBe(1);
    expect(first.optimizations).toEqual({
      caching: true,
      requestBatching: true,
      requestDeduplication: true,
      http2: true,
      adaptiveRateLimiting: true,
    });
  });

  test('rejects invalid configuration', () => {
    expect(() => setup({ config: { maxConnections: -1 } })).toThrow('maxConnections must be a positive integer');
  });
});

describe('RequestOptimizer with the JSON executor', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  const newOptimizer = (rateLimiter?: AdaptiveRateLimiter) =>
    new RequestOptimizer({
      executor: jsonExecutor,
      rateLimiter,
      connections: new ConnectionManager({ clientFactory: () => mockAgent, logger: silentLogger }),
      logger: silentLogger,
    });

  test('decodes JSON responses', async () => {
    mockAgent
      .get('https://api.test')
      .intercept({ path: '/users/1', method: 'GET' })
      .reply(200, { id: 1, name: 'Ada' }, { headers: { 'content-type': 'application/json' } });

    await expect(newOptimizer().performRequest({ method: 'GET', url: 'https://api.test/users/1' })).resolves.toEqual({
      id: 1,
      name: 'Ada',
    });
  });

  test('asks for JSON unless the caller sets its own accept header', async () => {
    const sentHeaders: unknown[] = [];
    mockAgent
      .get('https://api.test')
      .intercept({ path: '/users/1', method: 'GET' })
      .reply((options) => {
        sentHeaders.push(options.headers);
        return { statusCode: 200, data: { id: 1 } };
      })
      .times(2);
    const optimizer = newOptimizer();

    await optimizer.performRequest({ method: 'GET', url: 'https://api.test/users/1' });
    await optimizer.performRequest({
      method: 'GET',
      url: 'https://api.test/users/1',
      headers: { Accept: 'application/vnd.test+json' },
    });

    expect(sentHeaders).toEqual([{ accept: 'application/json' }, { Accept: 'application/vnd.test+json' }]);
  });

  test('sends read bodies as query parameters', async () => {
    mockAgent
      .get('https://api.test')
      .intercept({ path: '/search', method: 'GET', query: { q: 'widget', page: '2' } })
      .reply(200, { hits: 0 });

    const result = await newOptimizer().performRequest({
      method: 'GET',
      url: 'https://api.test/search',
      body: { q: 'widget', page: 2 },
    });
    expect(result).toEqual({ hits: 0 });
  });

  test('sends write bodies as JSON', async () => {
    mockAgent
      .get('https://api.test')
      .intercept({ path: '/items', method: 'POST', body: '{"name":"widget"}' })
      .reply(201, { id: 7 });

    const result = await newOptimizer().performRequest({
      method: 'post',
      url: 'https://api.test/items',
      body: { name: 'widget' },
    });
    expect(result).toEqual({ id: 7 });
  });

  test('turns 429 responses into a rate limiter backoff', async () => {
    mockAgent
      .get('https://api.test')
      .intercept({ path: '/items', method: 'GET' })
      .reply(429, 'slow down', { headers: { 'retry-after': '7' } });
    const rateLimiter = new AdaptiveRateLimiter({ config: { jitterEnabled: false }, logger: silentLogger });
    const optimizer = newOptimizer(rateLimiter);

    const failure = optimizer.performRequest({ method: 'GET', url: 'https://api.test/items' });
    await expect(failure).rejects.toBeInstanceOf(HttpStatusError);
    await expect(failure).rejects.toMatchObject({ statusCode: 429, retryAfterSeconds: 7, body: 'slow down' });

    expect(rateLimiter.getCurrentBackoffSeconds()).toBe(7);
    expect(rateLimiter.getMetrics().rateLimitHits).toBe(1);
    expect((await optimizer.getStats()).requests.failed).toBe(1);
  });

  test('other error statuses do not trigger a backoff', async () => {
    mockAgent.get('https://api.test').intercept({ path: '/items', method: 'GET' }).reply(500, 'boom');
    const rateLimiter = new AdaptiveRateLimiter({ logger: silentLogger });

    await expect(
      newOptimizer(rateLimiter).performRequest({ method: 'GET', url: 'https://api.test/items' }),
    ).rejects.toMatchObject({ statusCode: 500 });
    expect(rateLimiter.getMetrics().rateLimitHits).toBe(0);
  });
});
