import { BatchResultMismatchError, BatchTimeoutError } from './errors';
import { createLogger, type Logger } from './logger';

/**
 * Executes one batch. Must resolve exactly one result per item, in item order.
 */
export type BatchExecutor<TItem, TResult> = (items: TItem[], batchKey: string) => Promise<TResult[]>;

export type RequestBatcherOptions = {
  enabled?: boolean;
  maxBatchSize?: number;
  batchTimeoutSeconds?: number; // flush delay after the first item
  batchMaxWaitSeconds?: number; // hard limit on a single caller's wait
  logger?: Logger;
  hooks?: {
    onFlush?: (info: { batchKey: string; size: number }) => void;
    onTimeout?: (info: { batchKey: string }) => void;
  };
};

type Waiter<TItem, TResult> = {
  item: TItem;
  resolve: (result: TResult) => void;
  reject: (error: unknown) => void;
  settled: boolean;
  timer?: NodeJS.Timeout;
};

type BatchGroup<TItem, TResult> = {
  waiters: Waiter<TItem, TResult>[];
  timer: NodeJS.Timeout;
};

export class RequestBatcher<TItem, TResult> {
  private readonly groups = new Map<string, BatchGroup<TItem, TResult>>();
  private batchesExecuted = 0;
  private itemsBatched = 0;
  private timeouts = 0;

  private readonly enabled: boolean;
  private readonly maxBatchSize: number;
  private readonly batchTimeoutMs: number;
  private readonly batchMaxWaitMs: number;
  private readonly logger: Logger;
  private readonly hooks: RequestBatcherOptions['hooks'];

  constructor(
    private readonly execute: BatchExecutor<TItem, TResult>,
    options: RequestBatcherOptions = {},
  ) {
    const {
      enabled = true,
      maxBatchSize = 50,
      batchTimeoutSeconds = 0.5,
      batchMaxWaitSeconds = 2,
      logger = createLogger({ name: 'batcher' }),
      hooks,
    } = options;
    this.enabled = enabled;
    this.maxBatchSize = maxBatchSize;
    this.batchTimeoutMs = batchTimeoutSeconds * 1000;
    this.batchMaxWaitMs = batchMaxWaitSeconds * 1000;
    this.logger = logger;
    this.hooks = hooks;
  }

  async enqueue(batchKey: string, item: TItem): Promise<TResult> {
    if (!this.enabled) {
      const results = await this.execute([item], batchKey);
      if (results.length !== 1) throw new BatchResultMismatchError(batchKey, 1, results.length);
      return results[0];
    }

    return new Promise<TResult>((resolve, reject) => {
      let group = this.groups.get(batchKey);
      if (!group) {
        group = {
          waiters: [],
          timer: setTimeout(() => void this.flush(batchKey), this.batchTimeoutMs),
        };
        this.groups.set(batchKey, group);
      }

      const waiter: Waiter<TItem, TResult> = { item, resolve, reject, settled: false };
      waiter.timer = setTimeout(() => {
        if (waiter.settled) return;
        waiter.settled = true;
        this.timeouts += 1;
        this.notify(() => this.hooks?.onTimeout?.({ batchKey }));
        reject(new BatchTimeoutError(batchKey, this.batchMaxWaitMs));
      }, this.batchMaxWaitMs);
      group.waiters.push(waiter);

      if (group.waiters.length >= this.maxBatchSize) {
        void this.flush(batchKey);
      }
    });
  }

  async flushAll(): Promise<void> {
    await Promise.all([...this.groups.keys()].map((batchKey) => this.flush(batchKey)));
  }

  getStats() {
    let pendingItems = 0;
    for (const group of this.groups.values()) pendingItems += group.waiters.length;
    return {
      pendingGroups: this.groups.size,
      pendingItems,
      batchesExecuted: this.batchesExecuted,
      itemsBatched: this.itemsBatched,
      timeouts: this.timeouts,
    };
  }

  // Never rejects: every outcome is delivered to the waiters
  private async flush(batchKey: string): Promise<void> {
    const group = this.groups.get(batchKey);
    if (!group) return;
    this.groups.delete(batchKey);
    clearTimeout(group.timer);

    const { waiters } = group;
    this.batchesExecuted += 1;
    this.itemsBatched += waiters.length;
    this.logger.debug('Executing batch', { batchKey, size: waiters.length });
    this.notify(() => this.hooks?.onFlush?.({ batchKey, size: waiters.length }));

    let results: TResult[];
    try {
      results = await this.execute(
        waiters.map((waiter) => waiter.item),
        batchKey,
      );
    } catch (error) {
      for (const waiter of waiters) settle(waiter, () => waiter.reject(error));
      return;
    }

    if (results.length !== waiters.length) {
      const error = new BatchResultMismatchError(batchKey, waiters.length, results.length);
      this.logger.warn('Batch result count mismatch', { batchKey, expected: waiters.length, received: results.length });
      for (const waiter of waiters) settle(waiter, () => waiter.reject(error));
      return;
    }

    waiters.forEach((waiter, index) => settle(waiter, () => waiter.resolve(results[index])));
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.warn('Batcher hook failed', { error });
    }
  }
}

function settle<TItem, TResult>(waiter: Waiter<TItem, TResult>, action: () => void): void {
  clearTimeout(waiter.timer);
  if (waiter.settled) return;
  waiter.settled = true;
  action();
}
