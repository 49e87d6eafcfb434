import { createHash } from 'crypto';
import { canonicalJson } from './serialize';

// Headers that differ between otherwise identical requests
export const VOLATILE_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'user-agent',
  'request-id',
  'x-request-id',
]);

export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url.trim();
  }
  parsed.searchParams.sort();
  parsed.hash = '';
  return parsed.toString();
}

export function canonicalHeaders(headers: Record<string, string> | undefined): string | undefined {
  if (!headers) return undefined;
  const relevant: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (!VOLATILE_HEADERS.has(lower)) relevant[lower] = value;
  }
  return Object.keys(relevant).length > 0 ? canonicalJson(relevant) : undefined;
}

/**
 * Fixed-length key identifying requests that may share one physical call.
 */
export function createDedupKey(
  method: string,
  url: string,
  headers?: Record<string, string>,
  body?: unknown,
): string {
  const parts = [method.toUpperCase(), normalizeUrl(url)];

  const headerPart = canonicalHeaders(headers);
  if (headerPart !== undefined) parts.push(headerPart);
  if (body !== undefined && body !== null) parts.push(canonicalJson(body));

  return createHash('sha256').update(parts.join('|')).digest('hex');
}
