import { Agent, MockAgent } from 'undici';
import { ConnectionManager } from '../src/lib/connection';
import { deferred, silentLogger } from './helpers';

describe('ConnectionManager', () => {
  test('concurrent callers share one client construction', async () => {
    const pending = deferred<MockAgent>();
    const clientFactory = jest.fn(() => pending.promise);
    const manager = new ConnectionManager({ clientFactory, logger: silentLogger });

    const first = manager.getClient();
    const second = manager.getClient();
    const client = new MockAgent();
    pending.resolve(client);

    expect(await first).toBe(client);
    expect(await second).toBe(client);
    expect(clientFactory).toHaveBeenCalledTimes(1);
    expect(manager.getStats()).toEqual({ clientsCreated: 1, active: true });

    await manager.close();
  });

  test('reuses the client until it is closed, then builds a new one', async () => {
    const clientFactory = jest.fn(() => new MockAgent());
    const manager = new ConnectionManager({ clientFactory, logger: silentLogger });

    const first = await manager.getClient();
    expect(await manager.getClient()).toBe(first);

    await manager.close();
    expect(manager.getStats().active).toBe(false);

    const second = await manager.getClient();
    expect(second).not.toBe(first);
    expect(clientFactory).toHaveBeenCalledTimes(2);

    await manager.close();
  });

  test('a failed construction is retried by the next caller', async () => {
    const clientFactory = jest
      .fn<MockAgent, []>()
      .mockImplementationOnce(() => {
        throw new Error('tls setup failed');
      })
      .mockImplementation(() => new MockAgent());
    const manager = new ConnectionManager({ clientFactory, logger: silentLogger });

    await expect(manager.getClient()).rejects.toThrow('tls setup failed');
    await expect(manager.getClient()).resolves.toBeInstanceOf(MockAgent);

    await manager.close();
  });

  test('closing without a client is a no-op', async () => {
    const manager = new ConnectionManager({ logger: silentLogger });
    await expect(manager.close()).resolves.toBeUndefined();
    expect(manager.getStats()).toEqual({ clientsCreated: 0, active: false });
  });

  test('builds a pooled undici agent by default', async () => {
    const manager = new ConnectionManager({ maxConnections: 2, logger: silentLogger });
    expect(await manager.getClient()).toBeInstanceOf(Agent);
    await manager.close();
  });
});
