import { RequestDeduplicator } from '../src/lib/dedup';
import { WaitAbortedError } from '../src/lib/errors';
import { deferred, silentLogger } from './helpers';

describe('RequestDeduplicator', () => {
  test('collapses concurrent identical requests into one call', async () => {
    const dedup = new RequestDeduplicator<string>({ logger: silentLogger });
    const upstream = deferred<string>();
    const produce = jest.fn(() => upstream.promise);

    const waiters = Array.from({ length: 10 }, () => dedup.join('k', produce));
    expect(dedup.isInFlight('k')).toBe(true);

    upstream.resolve('result');
    expect(await Promise.all(waiters)).toEqual(Array(10).fill('result'));
    expect(produce).toHaveBeenCalledTimes(1);
    expect(dedup.getStats()).toEqual({ inFlight: 0, deduplicated: 9 });
  });

  test('delivers the same failure to every waiter', async () => {
    const dedup = new RequestDeduplicator<string>({ logger: silentLogger });
    const upstream = deferred<string>();
    const failure = new Error('upstream down');

    const first = dedup.join('k', () => upstream.promise);
    const second = dedup.join('k', () => upstream.promise);
    upstream.reject(failure);

    await expect(first).rejects.toBe(failure);
    await expect(second).rejects.toBe(failure);
    expect(dedup.isInFlight('k')).toBe(false);
  });

  test('starts a new call once the previous one has settled', async () => {
    const dedup = new RequestDeduplicator<number>({ logger: silentLogger });
    let calls = 0;
    const produce = async () => ++calls;

    expect(await dedup.join('k', produce)).toBe(1);
    expect(await dedup.join('k', produce)).toBe(2);
    expect(dedup.getStats().deduplicated).toBe(0);
  });

  test('a synchronous throw in the producer does not leave a stale entry', async () => {
    const dedup = new RequestDeduplicator<number>({ logger: silentLogger });
    const produce = () => {
      throw new Error('bad input');
    };

    await expect(dedup.join('k', produce)).rejects.toThrow('bad input');
    expect(dedup.isInFlight('k')).toBe(false);
  });

  test('an aborted waiter stops waiting without cancelling the shared call', async () => {
    const dedup = new RequestDeduplicator<string>({ logger: silentLogger });
    const upstream = deferred<string>();
    const controller = new AbortController();

    const leader = dedup.join('k', () => upstream.promise);
    const follower = dedup.join('k', () => upstream.promise, controller.signal);

    controller.abort();
    await expect(follower).rejects.toBeInstanceOf(WaitAbortedError);
    expect(dedup.isInFlight('k')).toBe(true);

    upstream.resolve('done');
    await expect(leader).resolves.toBe('done');
  });

  test('an already aborted signal rejects immediately', async () => {
    const dedup = new RequestDeduplicator<string>({ logger: silentLogger });
    const controller = new AbortController();
    controller.abort();

    await expect(dedup.join('k', async () => 'value', controller.signal)).rejects.toBeInstanceOf(WaitAbortedError);
  });

  test('a throwing join hook does not break deduplication', async () => {
    const dedup = new RequestDeduplicator<string>({
      logger: silentLogger,
      hooks: {
        onJoin: () => {
          throw new Error('hook failure');
        },
      },
    });
    const upstream = deferred<string>();

    const first = dedup.join('k', () => upstream.promise);
    const second = dedup.join('k', () => upstream.promise);
    upstream.resolve('ok');

    expect(await Promise.all([first, second])).toEqual(['ok', 'ok']);
  });
});
