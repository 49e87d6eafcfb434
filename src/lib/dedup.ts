import { WaitAbortedError } from './errors';
import { createLogger, type Logger } from './logger';

export type RequestDeduplicatorOptions = {
  logger?: Logger;
  hooks?: {
    onJoin?: (info: { key: string }) => void;
  };
};

/**
 * Collapses concurrent identical requests into a single call of `produce`.
 * The in-flight entry is dropped before any waiter observes the outcome,
 * so a request issued after settlement starts a new cluster.
 */
export class RequestDeduplicator<T = unknown> {
  private readonly inFlight = new Map<string, Promise<T>>();
  private deduplicated = 0;
  private readonly logger: Logger;
  private readonly hooks: RequestDeduplicatorOptions['hooks'];

  constructor(options: RequestDeduplicatorOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: 'dedup' });
    this.hooks = options.hooks;
  }

  join(key: string, produce: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.deduplicated += 1;
      this.logger.debug('Joining in-flight request', { key });
      this.notify(() => this.hooks?.onJoin?.({ key }));
      return waitFor(existing, key, signal);
    }

    const shared = this.start(key, produce);
    return waitFor(shared, key, signal);
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  getStats() {
    return {
      inFlight: this.inFlight.size,
      deduplicated: this.deduplicated,
    };
  }

  private start(key: string, produce: () => Promise<T>): Promise<T> {
    const shared: Promise<T> = Promise.resolve()
      .then(produce)
      .finally(() => {
        if (this.inFlight.get(key) === shared) this.inFlight.delete(key);
      });
    this.inFlight.set(key, shared);

    // Every waiter may have aborted already
    shared.catch((error: unknown) => {
      this.logger.debug('In-flight request failed', { key, error });
    });
    return shared;
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.warn('Deduplicator hook failed', { error });
    }
  }
}

function waitFor<T>(shared: Promise<T>, key: string, signal?: AbortSignal): Promise<T> {
  if (!signal) return shared;
  if (signal.aborted) return Promise.reject(new WaitAbortedError(key, signal.reason));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new WaitAbortedError(key, signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    shared.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
