import type { RedisCacheClient } from '../src/stores/redisStore';
import { createLogger } from '../src/lib/logger';

export const silentLogger = createLogger({ enabled: false });

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function globToRegExp(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const char = glob[i];
    if (char === '\\' && i + 1 < glob.length) {
      i += 1;
      source += glob[i].replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    } else if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

// In-process stand-in for the ioredis commands RedisStore uses
export class FakeRedis implements RedisCacheClient {
  readonly data = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string) {
    return this.data.get(key) ?? null;
  }

  async setex(key: string, seconds: number, value: string) {
    this.data.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async keys(pattern: string) {
    const regex = globToRegExp(pattern);
    return [...this.data.keys()].filter((key) => regex.test(key));
  }

  async del(...keys: string[]) {
    let removed = 0;
    for (const key of keys) {
      if (this.data.delete(key)) removed += 1;
      this.ttls.delete(key);
    }
    return removed;
  }

  async strlen(key: string) {
    return this.data.get(key)?.length ?? 0;
  }
}
