export type ResponseHeaders = Record<string, string | string[] | undefined>;

export type GovernorErrorCode =
  | 'CONFIG_INVALID'
  | 'HTTP_STATUS'
  | 'BATCH_TIMEOUT'
  | 'BATCH_RESULT_MISMATCH'
  | 'WAIT_ABORTED';

/**
 * Base class for every error raised by the package itself.
 * Transport errors from undici are passed through untouched.
 */
export class GovernorError extends Error {
  readonly code: GovernorErrorCode;

  constructor(code: GovernorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends GovernorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Non-2xx response from the upstream API.
 */
export class HttpStatusError extends GovernorError {
  readonly statusCode: number;
  readonly headers: ResponseHeaders;
  readonly body: string;
  readonly retryAfterSeconds: number | undefined;

  constructor(statusCode: number, headers: ResponseHeaders, body: string, url?: string) {
    super('HTTP_STATUS', `Request${url ? ` to ${url}` : ''} failed with status ${statusCode}`);
    this.statusCode = statusCode;
    this.headers = headers;
    this.body = body;
    this.retryAfterSeconds = parseRetryAfter(headers['retry-after']);
  }

  get isRateLimited(): boolean {
    return this.statusCode === 429;
  }
}

export class BatchTimeoutError extends GovernorError {
  readonly batchKey: string;
  readonly waitedMs: number;

  constructor(batchKey: string, waitedMs: number) {
    super('BATCH_TIMEOUT', `Batch "${batchKey}" did not complete within ${waitedMs}ms`);
    this.batchKey = batchKey;
    this.waitedMs = waitedMs;
  }
}

export class BatchResultMismatchError extends GovernorError {
  constructor(batchKey: string, expected: number, received: number) {
    super(
      'BATCH_RESULT_MISMATCH',
      `Batch "${batchKey}" returned ${received} results for ${expected} items`,
    );
  }
}

export class WaitAbortedError extends GovernorError {
  constructor(key: string, reason?: unknown) {
    super('WAIT_ABORTED', `Wait for in-flight request ${key} was aborted`, { cause: reason });
  }
}

// Retry-After is either delta-seconds or an HTTP date
export function parseRetryAfter(
  value: string | string[] | undefined,
  now: number = Date.now(),
): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined || raw.trim() === '') return undefined;

  const seconds = Number(raw);
  if (Number.isFinite(seconds)) return seconds >= 0 ? seconds : undefined;

  const date = Date.parse(raw);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, (date - now) / 1000);
}
