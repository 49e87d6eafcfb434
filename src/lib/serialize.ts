export const FALLBACK_SIZE_BYTES = 1024;

const bigintReplacer = (_key: string, value: unknown) =>
  typeof value === 'bigint' ? value.toString() : value;

/**
 * JSON encoding used for size estimates and Redis payloads.
 * Returns undefined when the value has no JSON form or cannot be encoded.
 */
export function toJson(value: unknown): string | undefined {
  try {
    return JSON.stringify(value, bigintReplacer);
  } catch {
    return undefined;
  }
}

export function estimateSizeBytes(value: unknown): { sizeBytes: number; estimated: boolean } {
  const json = toJson(value);
  if (json === undefined) return { sizeBytes: FALLBACK_SIZE_BYTES, estimated: true };
  return { sizeBytes: Buffer.byteLength(json, 'utf8'), estimated: false };
}

export function resolveTtlSeconds(
  ttlSeconds: number | undefined,
  defaultTtlSeconds: number,
  maxAgeSeconds: number,
): number {
  const ttl = ttlSeconds !== undefined && ttlSeconds > 0 ? ttlSeconds : defaultTtlSeconds;
  return Math.min(ttl, maxAgeSeconds);
}

/**
 * Stable JSON with recursively sorted object keys.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value, new WeakSet<object>()), bigintReplacer) ?? 'null';
}

function sortKeys(value: unknown, seen: WeakSet<object>): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  let result: unknown;
  if (Array.isArray(value)) {
    result = value.map((item) => sortKeys(item, seen));
  } else if (value instanceof Date) {
    result = value.toISOString();
  } else {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key), seen);
    }
    result = sorted;
  }
  seen.delete(value);
  return result;
}
