import { request, type Dispatcher } from 'undici';
import type { RequestDescriptor } from '../types';
import { HttpStatusError } from './errors';

/**
 * Performs exactly one physical request with a pooled client.
 */
export type RequestExecutor<T> = (client: Dispatcher, descriptor: RequestDescriptor) => Promise<T>;

const HTTP_METHODS: ReadonlySet<string> = new Set<Dispatcher.HttpMethod>([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
]);

// Methods whose body is sent as query parameters
const QUERY_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'DELETE']);

function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return HTTP_METHODS.has(method);
}

export function appendQuery(url: string, params: unknown): string {
  const target = new URL(url);
  if (typeof params === 'string') {
    for (const [key, value] of new URLSearchParams(params)) target.searchParams.append(key, value);
    return target.toString();
  }
  if (typeof params !== 'object' || params === null) return url;

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    const values: unknown[] = Array.isArray(value) ? value : [value];
    for (const item of values) target.searchParams.append(key, String(item));
  }
  return target.toString();
}

/**
 * Default executor: JSON in, JSON out, non-2xx statuses raise HttpStatusError.
 */
export const jsonExecutor: RequestExecutor<unknown> = async (client, descriptor) => {
  const method = descriptor.method.toUpperCase();
  if (!isHttpMethod(method)) throw new TypeError(`Unsupported HTTP method: ${descriptor.method}`);

  let url = descriptor.url;
  const headers: Record<string, string> = { ...descriptor.headers };
  const hasHeader = (name: string) => Object.keys(headers).some((header) => header.toLowerCase() === name);
  if (!hasHeader('accept')) headers.accept = 'application/json';
  let body: string | undefined;

  if (descriptor.body !== undefined && descriptor.body !== null) {
    if (QUERY_METHODS.has(method)) {
      url = appendQuery(url, descriptor.body);
    } else {
      body = typeof descriptor.body === 'string' ? descriptor.body : JSON.stringify(descriptor.body);
      if (!hasHeader('content-type')) headers['content-type'] = 'application/json';
    }
  }

  const timeoutMs = descriptor.timeout !== undefined ? descriptor.timeout * 1000 : undefined;
  const response = await request(url, {
    dispatcher: client,
    method,
    headers,
    body,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  });

  const text = await response.body.text();
  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new HttpStatusError(response.statusCode, response.headers, text, url);
  }
  if (method === 'HEAD' || text.length === 0) return null;
  return JSON.parse(text);
};
