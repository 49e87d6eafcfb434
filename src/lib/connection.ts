import { Agent, type Dispatcher } from 'undici';
import type { OptimizationConfig } from './config';
import { createLogger, type Logger } from './logger';

export type ClientFactory = () => Dispatcher | Promise<Dispatcher>;

export type ConnectionPoolSettings = Pick<
  OptimizationConfig,
  | 'maxConnections'
  | 'keepaliveExpirySeconds'
  | 'connectTimeoutSeconds'
  | 'readTimeoutSeconds'
  | 'http2Enabled'
>;

export type ConnectionManagerOptions = Partial<ConnectionPoolSettings> & {
  clientFactory?: ClientFactory;
  logger?: Logger;
};

export function createPooledAgent(settings: ConnectionPoolSettings): Agent {
  const keepAliveMs = settings.keepaliveExpirySeconds * 1000;
  const readTimeoutMs = settings.readTimeoutSeconds * 1000;
  return new Agent({
    connections: settings.maxConnections,
    keepAliveTimeout: keepAliveMs,
    keepAliveMaxTimeout: keepAliveMs,
    connect: { timeout: settings.connectTimeoutSeconds * 1000 },
    headersTimeout: readTimeoutMs,
    bodyTimeout: readTimeoutMs,
    allowH2: settings.http2Enabled,
  });
}

/**
 * Owns one lazily created pooled HTTP client and rebuilds it once closed.
 */
export class ConnectionManager {
  private client: Dispatcher | undefined;
  private pending: Promise<Dispatcher> | undefined;
  private clientsCreated = 0;
  private readonly factory: ClientFactory;
  private readonly logger: Logger;

  constructor(options: ConnectionManagerOptions = {}) {
    const {
      maxConnections = 10,
      keepaliveExpirySeconds = 30,
      connectTimeoutSeconds = 10,
      readTimeoutSeconds = 30,
      http2Enabled = true,
      clientFactory,
      logger = createLogger({ name: 'connections' }),
    } = options;
    const settings = { maxConnections, keepaliveExpirySeconds, connectTimeoutSeconds, readTimeoutSeconds, http2Enabled };
    this.factory = clientFactory ?? (() => createPooledAgent(settings));
    this.logger = logger;
  }

  async getClient(): Promise<Dispatcher> {
    if (this.client && !isClosed(this.client)) return this.client;
    // Concurrent callers share one construction
    if (!this.pending) {
      this.pending = this.build().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  async close(): Promise<void> {
    if (this.pending) {
      await this.pending.then(
        () => undefined,
        (error: unknown) => this.logger.warn('Client construction failed before close', { error }),
      );
    }
    const client = this.client;
    this.client = undefined;
    if (!client || isClosed(client)) return;
    await client.close();
    this.logger.info('Closed pooled HTTP client');
  }

  getStats() {
    return {
      clientsCreated: this.clientsCreated,
      active: this.client !== undefined && !isClosed(this.client),
    };
  }

  private async build(): Promise<Dispatcher> {
    const client = await this.factory();
    this.client = client;
    this.clientsCreated += 1;
    this.logger.info('Created pooled HTTP client', { clientsCreated: this.clientsCreated });
    return client;
  }
}

function isClosed(client: Dispatcher): boolean {
  if ('closed' in client && client.closed === true) return true;
  return 'destroyed' in client && client.destroyed === true;
}
